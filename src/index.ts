export * from './domain/entities';
export * from './domain/errors';
export * from './domain/tree';
export { HighlightingKind, ALL_KINDS, kindName, toTextMateScope, getTextMateScopes } from './domain/HighlightingKind';
export { SourceRange } from './domain/SourceRange';
export type { Position } from './domain/SourceRange';
export { canHighlightName, kindForCandidateDecls, kindForDecl, kindForType } from './domain/classifier';
export { TreeWalker } from './domain/TreeWalker';
export { collectTokens, getSemanticHighlightings } from './domain/TokenCollector';
export { diffHighlightings, groupByLine } from './domain/diff';
export { decodeLineTokens, encodeLineTokens, toSemanticHighlightingInformation } from './domain/encoding';
export { parseResolvedTree } from './adapters/gateways/ResolvedTreeParser';
export { TextSourceManager } from './adapters/gateways/TextSourceManager';
