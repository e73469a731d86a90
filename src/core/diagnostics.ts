/** Severity classes used by extraction and aggregation diagnostics. */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/** Optional source location attached to a diagnostic record. */
export interface DiagnosticSource {
  name?: string;
  line: number;
  column: number;
}

/** Canonical diagnostic object emitted by all public API operations. */
export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  source?: DiagnosticSource;
  htmlPath?: string;
}

/** Code-to-count histogram derived from diagnostics. */
export type DiagnosticHistogram = Record<string, number>;

/** Build a diagnostic code histogram from a list of diagnostics. */
export function buildCodeHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.code] = (histogram[diagnostic.code] ?? 0) + 1;
  }
  return histogram;
}

/** Build a severity histogram from a list of diagnostics. */
export function buildSeverityHistogram(diagnostics: readonly Diagnostic[]): DiagnosticHistogram {
  const histogram: DiagnosticHistogram = {};
  for (const diagnostic of diagnostics) {
    histogram[diagnostic.severity] = (histogram[diagnostic.severity] ?? 0) + 1;
  }
  return histogram;
}

/** True when any diagnostic is an error. */
export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
