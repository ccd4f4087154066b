/**
 * Diagnostics for read errors and runtime failures.
 */
import { SublispError } from "./errors.js";

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

const HINTS: Record<string, string> = {
  E_ARITY: "Give the operator at least one argument, or group it with its arguments.",
  E_UNBOUND_REDUCTION: "An atom takes no arguments; check the grouping of this expression.",
  E_DIVISION: "The divisor reduced to 0.",
  E_INT_RANGE: "Integers are exact only up to 2^53 - 1.",
  E_BUDGET: "Raise the step limit with --max-steps, or check for a non-terminating program.",
};

export function diagnosticFromError(e: unknown): Diagnostic {
  if (e instanceof SublispError) {
    return makeDiag(e.code, e.message, undefined, HINTS[e.code]);
  }
  return makeDiag("E_RUNTIME", e instanceof Error ? e.message : String(e));
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}`;
  if (d.span) {
    out += `\n  --> ${d.span.file}:${d.span.startLine}:${d.span.startCol}`;
  }
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
