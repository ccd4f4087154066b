/**
 * sublisp std: prelude
 *
 * Binds the operator names by substitution rather than by the reader:
 *
 *   ((lambda (lambda + - * / car cdr) program) <lambda> <+> <-> <*> </> <car> <cdr>)
 *
 * `lambda` comes first so that the later bindings already see the real
 * lambda-constructor and skip scopes that rebind an operator name.
 */
import { LAMBDA, operator } from "@sublisp/core";
import type { OperatorName, Source } from "@sublisp/core";

export const PRELUDE_NAMES: readonly OperatorName[] = ["lambda", "+", "-", "*", "/", "car", "cdr"];

export function withPrelude(program: Source): Source {
  return [
    [LAMBDA, [...PRELUDE_NAMES], program],
    ...PRELUDE_NAMES.map((name) => operator(name)),
  ];
}
