import { SourceRange } from '../../domain/SourceRange';
import { FileLocation, SourceManager } from '../../domain/tree';

const WORD_CHAR = /[\p{ID_Continue}$]/u;

// The code point starting at `index`: one or two UTF-16 units, or '' past the end.
function codePointAt(text: string, index: number): string {
  const code = text.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/**
 * Resolves token ranges against the text of the main file. Names are
 * measured as runs of Unicode identifier characters; anything else is a
 * single code point. Ranges are in UTF-16 code units.
 */
export class TextSourceManager implements SourceManager {
  private readonly lines: string[];

  constructor(
    private readonly mainFile: string,
    text: string,
  ) {
    this.lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  }

  isInsideMainFile(location: FileLocation): boolean {
    return location.file === this.mainFile;
  }

  getTokenRange(location: FileLocation): SourceRange | undefined {
    const text = this.lines[location.line];
    if (text === undefined || location.character < 0 || location.character >= text.length) {
      return undefined;
    }

    const first = codePointAt(text, location.character);
    if (/\s/u.test(first)) {
      return undefined;
    }

    let end = location.character + first.length;
    if (WORD_CHAR.test(first)) {
      let next = codePointAt(text, end);
      while (next !== '' && WORD_CHAR.test(next)) {
        end += next.length;
        next = codePointAt(text, end);
      }
    }

    return SourceRange.of(location.line, location.character, location.line, end);
  }
}
