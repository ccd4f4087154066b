/**
 * Built-in primitives: arithmetic, list deconstruction and lambda construction.
 */
import { SublispError } from "./errors.js";
import { atom, head, isEmpty, lambda, operator, render, tail } from "./term.js";
import type { ArithmeticOp, Atom, Lambda, List, Operator, OperatorName, Term } from "./term.js";

const HOOKS: Record<ArithmeticOp, (x: number, y: number) => number> = {
  "+": (x, y) => x + y,
  "-": (x, y) => x - y,
  "*": (x, y) => x * y,
  "/": (x, y) => x / y,
};

export const PLUS: Operator = operator("+");
export const SUBTRACT: Operator = operator("-");
export const MULTIPLY: Operator = operator("*");
export const DIVIDE: Operator = operator("/");
export const CAR: Operator = operator("car");
export const CDR: Operator = operator("cdr");
export const LAMBDA: Operator = operator("lambda");

export const OPERATOR_NAMES: readonly OperatorName[] = ["+", "-", "*", "/", "car", "cdr", "lambda"];

/**
 * Apply `op` to two reduced operands and wrap the result.
 */
export function arithmetic(op: ArithmeticOp, left: Term, right: Term): Atom {
  const x = numericOperand(op, left);
  const y = numericOperand(op, right);
  if (op === "/" && y === 0) {
    throw new SublispError("E_DIVISION", `Division by zero: ${render(left)} / 0.`, { dividend: x });
  }
  return atom(HOOKS[op](x, y));
}

function numericOperand(op: ArithmeticOp, term: Term): number {
  if (term.kind === "Atom" && typeof term.value === "number") {
    return term.value;
  }
  throw new SublispError(
    "E_OPERAND_TYPE",
    `Operator '${op}' requires numbers, got ${render(term)}.`,
    { op, operand: render(term) }
  );
}

// car { xs } -> first element, unevaluated
export function car(args: List): Term {
  requireOperand("car", args);
  return head(args);
}

// cdr { xs } -> remaining elements, unevaluated
export function cdr(args: List): List {
  requireOperand("cdr", args);
  return tail(args);
}

/**
 * The head of `args` names the parameters (one Atom, or a List of Atoms);
 * the rest is the body.
 */
export function constructLambda(args: List): Lambda {
  requireOperand("lambda", args);
  return lambda(parameters(head(args)), tail(args));
}

function parameters(term: Term): Atom[] {
  if (term.kind === "Atom") return [term];
  if (term.kind === "List") {
    const params: Atom[] = [];
    for (const element of term.elements) {
      if (element.kind !== "Atom") {
        throw new SublispError(
          "E_PARAMS",
          `Lambda parameters must be atoms, got ${render(element)}.`,
          { param: render(element) }
        );
      }
      params.push(element);
    }
    return params;
  }
  throw new SublispError(
    "E_PARAMS",
    `Lambda parameters must be an atom or a list of atoms, got ${render(term)}.`,
    { param: render(term) }
  );
}

export function requireOperand(name: OperatorName, args: List): void {
  if (isEmpty(args)) {
    throw new SublispError("E_ARITY", `<${name}> requires a parameter.`, { op: name });
  }
}
