import { HighlightingDiagnostic } from '../domain/entities';

export function formatDiagnostic(diagnostic: HighlightingDiagnostic): string {
  const { file, line, character } = diagnostic.location;
  return `${diagnostic.message} at ${file}:${line}:${character}`;
}

export function reportDiagnostics(diagnostics: readonly HighlightingDiagnostic[]): void {
  for (const diagnostic of diagnostics) {
    console.warn(formatDiagnostic(diagnostic));
  }
}
