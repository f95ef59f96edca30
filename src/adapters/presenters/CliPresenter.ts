import Table from 'cli-table3';
import { DecodedToken, HighlightResult, TokenInfo } from '../../domain/entities';
import { kindName } from '../../domain/HighlightingKind';
import { ScopeTable } from '../../usecases/GetScopesUseCase';

export class CliPresenter {
  public present(data: unknown, options: { table?: boolean }): void {
    if (!options.table) {
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    if (Array.isArray(data)) {
      if (data.length === 0) {
        console.log('No tokens found.');
        return;
      }
      if (data.every((item) => this.isTokenInfo(item))) {
        this.renderTokenTable(data);
      } else if (data.every((item) => this.isDecodedToken(item))) {
        this.renderDecodedTable(data);
      } else {
        console.table(data);
      }
    } else if (this.isHighlightResult(data)) {
      this.renderHighlightResult(data);
    } else if (this.isScopeTable(data)) {
      this.renderScopeTable(data);
    } else if (typeof data === 'object' && data !== null) {
      console.table([data]);
    } else {
      console.log(data);
    }
  }

  private isTokenInfo(item: unknown): item is TokenInfo {
    return typeof item === 'object' && item !== null && 'scope' in item && 'kind' in item;
  }

  private isDecodedToken(item: unknown): item is DecodedToken {
    return (
      typeof item === 'object' &&
      item !== null &&
      'character' in item &&
      'length' in item &&
      !('scope' in item)
    );
  }

  private isHighlightResult(item: unknown): item is HighlightResult {
    return typeof item === 'object' && item !== null && 'lines' in item && 'version' in item;
  }

  private isScopeTable(item: unknown): item is ScopeTable {
    return typeof item === 'object' && item !== null && 'scopes' in item && 'kinds' in item;
  }

  private renderTokenTable(tokens: TokenInfo[]): void {
    const table = new Table({
      head: ['Line', 'Char', 'Length', 'Kind', 'Scope'],
      style: { head: ['cyan'] },
    });
    tokens.forEach((token) => {
      table.push([token.line, token.character, token.length, token.kind, token.scope]);
    });
    console.log(table.toString());
  }

  private renderDecodedTable(tokens: DecodedToken[]): void {
    const table = new Table({
      head: ['Char', 'Length', 'Kind'],
      style: { head: ['cyan'] },
    });
    tokens.forEach((token) => {
      table.push([token.character, token.length, kindName(token.kind)]);
    });
    console.log(table.toString());
  }

  private renderHighlightResult(result: HighlightResult): void {
    console.log(`\n${result.uri} @ version ${result.version}`);
    if (result.diagnostics > 0) {
      console.log(`${result.diagnostics} token(s) dropped with an invalid range`);
    }
    if (result.lines.length === 0) {
      console.log('No changed lines.');
      return;
    }

    const table = new Table({
      head: ['Line', 'Tokens'],
      style: { head: ['cyan'] },
      wordWrap: true,
    });
    result.lines.forEach((line) => {
      table.push([line.line, line.tokens || '(cleared)']);
    });
    console.log(table.toString());
  }

  private renderScopeTable(scopeTable: ScopeTable): void {
    const table = new Table({
      head: ['Ordinal', 'Kind', 'Scope'],
      style: { head: ['cyan'] },
    });
    scopeTable.kinds.forEach((kind, ordinal) => {
      table.push([ordinal, kind, scopeTable.scopes[ordinal]?.join(', ') ?? '']);
    });
    console.log(table.toString());
  }
}
