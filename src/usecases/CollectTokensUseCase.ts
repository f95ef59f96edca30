import { TokenInfo } from '../domain/entities';
import { kindName, toTextMateScope } from '../domain/HighlightingKind';
import { getSemanticHighlightings } from '../domain/TokenCollector';
import { reportDiagnostics } from '../utils/diagnostics';
import { ITreeRepository } from './ports/ITreeRepository';

export interface CollectTokensResult {
  tokens: TokenInfo[];
  diagnostics: number;
}

export class CollectTokensUseCase {
  constructor(private readonly treeRepo: ITreeRepository) {}

  async execute(treePath: string): Promise<CollectTokensResult> {
    const tree = await this.treeRepo.load(treePath);
    const { tokens, diagnostics } = getSemanticHighlightings(tree);

    reportDiagnostics(diagnostics);

    return {
      tokens: tokens.map((token) => ({
        line: token.range.start.line,
        character: token.range.start.character,
        length: token.range.end.character - token.range.start.character,
        kind: kindName(token.kind),
        scope: toTextMateScope(token.kind),
      })),
      diagnostics: diagnostics.length,
    };
  }
}
