/**
 * sublisp std: operator names
 * + - * / car cdr lambda
 */
import { operator, OPERATOR_NAMES } from "@sublisp/core";
import type { Term } from "@sublisp/core";

/**
 * Map each operator name to a fresh, unbound operator term.
 */
export function getOperatorTable(): Map<string, Term> {
  const table = new Map<string, Term>();
  for (const name of OPERATOR_NAMES) {
    table.set(name, operator(name));
  }
  return table;
}
