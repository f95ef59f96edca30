import { ALL_KINDS, getTextMateScopes, kindName } from '../domain/HighlightingKind';

export interface ScopeTable {
  kinds: string[];
  scopes: string[][];
}

export class GetScopesUseCase {
  execute(): ScopeTable {
    return { kinds: ALL_KINDS.map(kindName), scopes: getTextMateScopes() };
  }
}
