import { findUnsorted, sameTokens } from '../utils/sorter';
import { HighlightingToken, LineHighlightings } from './entities';

function assertCanonical(tokens: readonly HighlightingToken[], side: string): void {
  const i = findUnsorted(tokens);
  if (i >= 0) {
    throw new Error(
      `diffHighlightings expects tokens in canonical order: ${side} token at ${tokens[i].range} follows ${tokens[i - 1].range}`,
    );
  }
}

// Tokens on `line` starting at index `from`; empty when the token at `from`
// starts on another line.
function takeLine(tokens: readonly HighlightingToken[], from: number, line: number): HighlightingToken[] {
  let end = from;
  while (end < tokens.length && tokens[end].range.start.line === line) {
    end++;
  }
  return tokens.slice(from, end);
}

export function groupByLine(tokens: readonly HighlightingToken[]): LineHighlightings[] {
  const lines: LineHighlightings[] = [];
  let index = 0;
  while (index < tokens.length) {
    const line = tokens[index].range.start.line;
    const lineTokens = takeLine(tokens, index, line);
    lines.push({ line, tokens: lineTokens });
    index += lineTokens.length;
  }
  return lines;
}

/**
 * Returns the lines whose tokens differ between two canonical token sets,
 * each carrying the tokens it has in `next`. Lines present in neither set are
 * skipped; a line that lost all its tokens is reported with an empty list.
 *
 * Tokens are keyed by their start line only. When a multi-line token ends on
 * a line whose remaining tokens did not change, that line is not reported even
 * though the client may have cleared it. Splitting such tokens per covered
 * line would need the line lengths of the file, which the token set does not
 * carry.
 */
export function diffHighlightings(
  next: readonly HighlightingToken[],
  previous: readonly HighlightingToken[],
): LineHighlightings[] {
  assertCanonical(next, 'next');
  assertCanonical(previous, 'previous');

  const diffed: LineHighlightings[] = [];
  let nextIndex = 0;
  let previousIndex = 0;

  const nextLineNumber = (): number =>
    Math.min(
      nextIndex < next.length ? next[nextIndex].range.start.line : Infinity,
      previousIndex < previous.length ? previous[previousIndex].range.start.line : Infinity,
    );

  for (
    let line = 0;
    nextIndex < next.length || previousIndex < previous.length;
    line = nextLineNumber()
  ) {
    const nextLine = takeLine(next, nextIndex, line);
    const previousLine = takeLine(previous, previousIndex, line);
    nextIndex += nextLine.length;
    previousIndex += previousLine.length;

    if (!sameTokens(nextLine, previousLine)) {
      diffed.push({ line, tokens: nextLine });
    }
  }

  return diffed;
}
