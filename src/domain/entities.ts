import { HighlightingKind } from './HighlightingKind';
import { SourceRange } from './SourceRange';
import { FileLocation } from './tree';

export interface HighlightingToken {
  kind: HighlightingKind;
  range: SourceRange;
}

export interface LineHighlightings {
  line: number;
  tokens: HighlightingToken[];
}

export interface SemanticHighlightingInformation {
  line: number;
  tokens: string; // base64 of 8-byte records
}

export interface HighlightingDiagnostic {
  message: string;
  location: FileLocation;
}

export interface CollectedHighlightings {
  tokens: HighlightingToken[];
  diagnostics: HighlightingDiagnostic[];
}

// Flattened token for JSON and table output
export interface TokenInfo {
  line: number;
  character: number;
  length: number;
  kind: string;
  scope: string;
}

export interface DocumentSnapshot {
  version: number;
  tokens: HighlightingToken[];
}

export interface HighlightResult {
  uri: string;
  version: number;
  lines: SemanticHighlightingInformation[];
  diagnostics: number;
}

export interface DecodedToken {
  character: number;
  length: number;
  kind: HighlightingKind;
}
