import { HighlightingToken } from '../domain/entities';

export function compareTokens(a: HighlightingToken, b: HighlightingToken): number {
  const byRange = a.range.compareTo(b.range);
  if (byRange !== 0) {
    return byRange;
  }
  return a.kind - b.kind;
}

export function tokensEqual(a: HighlightingToken, b: HighlightingToken): boolean {
  return compareTokens(a, b) === 0;
}

// Array.prototype.sort is stable, so equal tokens keep their emission order.
export function sortTokens(tokens: readonly HighlightingToken[]): HighlightingToken[] {
  return [...tokens].sort(compareTokens);
}

// Index of the first token that sorts before its predecessor, or -1.
export function findUnsorted(tokens: readonly HighlightingToken[]): number {
  for (let i = 1; i < tokens.length; i++) {
    if (compareTokens(tokens[i - 1], tokens[i]) > 0) {
      return i;
    }
  }
  return -1;
}

export function sameTokens(
  a: readonly HighlightingToken[],
  b: readonly HighlightingToken[],
): boolean {
  return a.length === b.length && a.every((token, i) => tokensEqual(token, b[i]));
}
