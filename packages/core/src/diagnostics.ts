/**
 * Tally diagnostics for assembly, validation and lowering errors.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  /** Instruction index, for diagnostics about an already-built program. */
  at?: number;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

export function makeProgramDiag(
  code: string,
  message: string,
  at: number,
  hint?: string
): Diagnostic {
  return { code, message, at, hint };
}

function location(d: Diagnostic): string {
  if (d.span) {
    return `${d.span.file}:${d.span.startLine}:${d.span.startCol}`;
  }
  if (d.at !== undefined) {
    return `instruction ${d.at}`;
  }
  return "<unknown>";
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}\n  --> ${location(d)}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
