import { sortTokens, tokensEqual } from '../utils/sorter';
import { CollectedHighlightings, HighlightingToken } from './entities';
import { HighlightingKind } from './HighlightingKind';
import { SourceRange } from './SourceRange';
import { ResolvedTree } from './tree';
import { TreeWalker } from './TreeWalker';

/**
 * Turns a raw token stream into a canonical token set: sorted, without exact
 * duplicates, and with every range that received more than one kind removed.
 */
export function collectTokens(
  raw: readonly HighlightingToken[],
  macros: readonly SourceRange[] = [],
): HighlightingToken[] {
  // Macro expansions are not visited by the walker.
  const all = [...raw, ...macros.map((range) => ({ kind: HighlightingKind.Macro, range }))];

  // Initializer lists visit some names twice.
  const sorted = sortTokens(all);
  const unique: HighlightingToken[] = [];
  for (const token of sorted) {
    const last = unique[unique.length - 1];
    if (!last || !tokensEqual(last, token)) {
      unique.push(token);
    }
  }

  // Same range, different kinds (usually a macro over an AST name): drop all.
  const nonConflicting: HighlightingToken[] = [];
  let runStart = 0;
  while (runStart < unique.length) {
    let runEnd = runStart + 1;
    while (runEnd < unique.length && unique[runEnd].range.equals(unique[runStart].range)) {
      runEnd++;
    }
    if (runEnd - runStart === 1) {
      nonConflicting.push(unique[runStart]);
    }
    runStart = runEnd;
  }

  return nonConflicting;
}

export function getSemanticHighlightings(tree: ResolvedTree): CollectedHighlightings {
  const { tokens, diagnostics } = new TreeWalker(tree).walk();
  return { tokens: collectTokens(tokens, tree.macros), diagnostics };
}
