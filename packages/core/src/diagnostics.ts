/**
 * minasm Diagnostic types for parse/validation/runtime errors.
 */
import type { Span } from "./ast.js";

export type DiagnosticCode =
  | "E_IO"
  | "E_LINE_NUMBER"
  | "E_DUP_LINE"
  | "E_SYNTAX"
  | "E_NUMBERING"
  | "E_BINDING"
  | "E_UNUSED_BINDING"
  | "E_CONFIG"
  | "E_JUMP_TARGET"
  | "E_UNINIT"
  | "E_OVERFLOW"
  | "E_RUNTIME";

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: DiagnosticCode,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file}:${d.span.startLine}:${d.span.startCol}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
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

/**
 * Thrown by the program facade when parsing, validation or binding checks fail.
 */
export class MinasmSyntaxError extends Error {
  diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "MinasmSyntaxError";
    this.diagnostic = diagnostic;
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }
}
