export interface Position {
  line: number; // 0-based
  character: number; // 0-based, UTF-16 code units
}

export class SourceRange {
  constructor(
    public readonly start: Position,
    public readonly end: Position,
  ) {}

  static of(startLine: number, startChar: number, endLine: number, endChar: number): SourceRange {
    return new SourceRange(
      { line: startLine, character: startChar },
      { line: endLine, character: endChar },
    );
  }

  toString(): string {
    return `${this.start.line}:${this.start.character}-${this.end.line}:${this.end.character}`;
  }

  compareTo(other: SourceRange): number {
    if (this.start.line !== other.start.line) {
      return this.start.line - other.start.line;
    }
    if (this.start.character !== other.start.character) {
      return this.start.character - other.start.character;
    }
    if (this.end.line !== other.end.line) {
      return this.end.line - other.end.line;
    }
    return this.end.character - other.end.character;
  }

  equals(other: SourceRange): boolean {
    return this.compareTo(other) === 0;
  }
}
