import { TextSourceManager } from '../adapters/gateways/TextSourceManager';
import { HighlightingToken } from '../domain/entities';
import { HighlightingKind } from '../domain/HighlightingKind';
import { SourceRange } from '../domain/SourceRange';
import { DeclName, FileLocation, ResolvedTree, SourceLocation, TreeNode } from '../domain/tree';

export const MAIN_FILE = 'main.cpp';

export function at(line: number, character: number, file = MAIN_FILE): FileLocation {
  return { kind: 'file', file, line, character };
}

export function ident(text: string): DeclName {
  return { kind: 'identifier', text };
}

// Common declaration fields; the id doubles as the identifier text.
export function named(
  text: string,
  location?: SourceLocation,
): { id: string; name: DeclName; location?: SourceLocation } {
  return { id: text, name: ident(text), location };
}

export function tree(text: string, nodes: TreeNode[], macros: SourceRange[] = []): ResolvedTree {
  return {
    mainFile: MAIN_FILE,
    nodes,
    macros,
    sourceManager: new TextSourceManager(MAIN_FILE, text),
  };
}

export function token(
  kind: HighlightingKind,
  line: number,
  start: number,
  end: number,
  endLine = line,
): HighlightingToken {
  return { kind, range: SourceRange.of(line, start, endLine, end) };
}
