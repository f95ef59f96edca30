import { DecodedToken, HighlightingToken, LineHighlightings, SemanticHighlightingInformation } from './entities';
import { isHighlightingKind } from './HighlightingKind';

// |<---- 4 bytes ---->|<-- 2 bytes -->|<--- 2 bytes -->|
// |    character      |    length     |   kind index   |
const RECORD_SIZE = 8;

export function encodeLineTokens(tokens: readonly HighlightingToken[]): string {
  const buffer = Buffer.alloc(tokens.length * RECORD_SIZE);
  tokens.forEach((token, i) => {
    const offset = i * RECORD_SIZE;
    buffer.writeUInt32BE(token.range.start.character, offset);
    // Wraps to 16 bits. A multi-line token can end left of where it starts.
    buffer.writeUInt16BE((token.range.end.character - token.range.start.character) & 0xffff, offset + 4);
    buffer.writeUInt16BE(token.kind, offset + 6);
  });
  return buffer.toString('base64');
}

export function decodeLineTokens(payload: string): DecodedToken[] {
  const buffer = Buffer.from(payload, 'base64');
  if (buffer.length % RECORD_SIZE !== 0) {
    throw new Error(`Invalid token payload length: ${buffer.length} bytes`);
  }

  const tokens: DecodedToken[] = [];
  for (let offset = 0; offset < buffer.length; offset += RECORD_SIZE) {
    const kind = buffer.readUInt16BE(offset + 6);
    if (!isHighlightingKind(kind)) {
      throw new Error(`Unknown highlighting kind: ${kind}`);
    }
    tokens.push({
      character: buffer.readUInt32BE(offset),
      length: buffer.readUInt16BE(offset + 4),
      kind,
    });
  }
  return tokens;
}

export function toSemanticHighlightingInformation(
  lines: readonly LineHighlightings[],
): SemanticHighlightingInformation[] {
  return lines.map((line) => ({ line: line.line, tokens: encodeLineTokens(line.tokens) }));
}
