import type { Diagnostic, DiagnosticSeverity } from '../core/diagnostics.js';
import type { HtmlLocation, HtmlNode } from './html-ast.js';

/** Supported extraction strictness modes. */
export type ParserMode = 'strict' | 'lenient';

/** Mutable pass state shared by extraction and aggregation helpers. */
export interface ParseContext {
  mode: ParserMode;
  sourceName?: string;
  diagnostics: Diagnostic[];
  validationFailure: boolean;
}

/** Create a context for one report pass. */
export function createParseContext(mode: ParserMode, sourceName?: string): ParseContext {
  return {
    mode,
    sourceName,
    diagnostics: [],
    validationFailure: false
  };
}

/** Record a diagnostic entry, escalating warnings to errors in strict mode. */
export function addDiagnostic(
  ctx: ParseContext,
  code: string,
  severity: DiagnosticSeverity,
  message: string,
  node?: Pick<HtmlNode, 'path' | 'location'>,
  source?: HtmlLocation
): void {
  let actualSeverity = severity;
  if (ctx.mode === 'strict' && severity === 'warning') {
    actualSeverity = 'error';
  }

  if (actualSeverity === 'error') {
    ctx.validationFailure = true;
  }

  const location = source ?? node?.location;
  ctx.diagnostics.push({
    code,
    severity: actualSeverity,
    message,
    source: location ? { name: ctx.sourceName, line: location.line, column: location.column } : undefined,
    htmlPath: node?.path
  });
}
