/**
 * sublisp term model.
 *
 * Every value is a Term, and every Term can be applied to a (possibly empty)
 * argument List. Terms are immutable: constructors freeze what they build,
 * and substitution returns new trees.
 */
import { SublispError } from "./errors.js";

// --- Variants ---
export type AtomValue = number | string;

export interface Atom {
  readonly kind: "Atom";
  readonly value: AtomValue;
}

export interface List {
  readonly kind: "List";
  readonly elements: readonly Term[];
}

export interface Lambda {
  readonly kind: "Lambda";
  readonly params: readonly Atom[];
  readonly body: Term;
}

export type ArithmeticOp = "+" | "-" | "*" | "/";
export type OperatorName = ArithmeticOp | "car" | "cdr" | "lambda";

// Bound operands of a partially applied binary operator.
export type Operands = readonly [] | readonly [Term] | readonly [Term, Term];

export interface Operator {
  readonly kind: "Operator";
  readonly op: OperatorName;
  readonly operands: Operands;
}

export type Term = Atom | List | Lambda | Operator;

// --- Constructors ---
export function atom(value: AtomValue): Atom {
  const node: Atom = { kind: "Atom", value };
  return Object.freeze(node);
}

export function list(elements: readonly Term[]): List {
  const node: List = { kind: "List", elements: Object.freeze([...elements]) };
  return Object.freeze(node);
}

export const NIL: List = list([]);

export function lambda(params: readonly Atom[], body: Term): Lambda {
  const node: Lambda = { kind: "Lambda", params: Object.freeze([...params]), body };
  return Object.freeze(node);
}

export function operator(op: OperatorName, operands: Operands = []): Operator {
  const node: Operator = { kind: "Operator", op, operands };
  return Object.freeze(node);
}

export function isArithmetic(op: OperatorName): op is ArithmeticOp {
  return op === "+" || op === "-" || op === "*" || op === "/";
}

// --- List access ---
export function isEmpty(xs: List): boolean {
  return xs.elements.length === 0;
}

// A single-element list evaluates its sole element.
export function isAtomic(xs: List): boolean {
  return xs.elements.length === 1;
}

export function head(xs: List): Term {
  const first = xs.elements[0];
  if (first === undefined) {
    throw new SublispError("E_EMPTY_LIST", "Cannot take the head of an empty list.");
  }
  return first;
}

export function tail(xs: List): List {
  if (isEmpty(xs)) {
    throw new SublispError("E_EMPTY_LIST", "Cannot take the tail of an empty list.");
  }
  return list(xs.elements.slice(1));
}

// --- Rendering ---

/**
 * Render a term in the canonical notation. Iterative, so arbitrarily deep
 * terms render without exhausting the call stack.
 */
export function render(term: Term): string {
  const out: string[] = [];
  // Literal text or a term still to render, in reverse order.
  const work: Array<Term | string> = [term];
  for (let item = work.pop(); item !== undefined; item = work.pop()) {
    if (typeof item === "string") {
      out.push(item);
      continue;
    }
    switch (item.kind) {
      case "Atom":
        out.push(typeof item.value === "string" ? `'${item.value}` : String(item.value));
        break;
      case "List":
        work.push("]");
        pushJoined(work, item.elements, ", ");
        work.push("[");
        break;
      case "Lambda":
        work.push(")", item.body, " -> ", list(item.params), "(");
        break;
      case "Operator":
        if (item.operands.length === 0) {
          out.push(`<${item.op}>`);
        } else {
          work.push(">");
          pushJoined(work, item.operands, " ");
          work.push(`<${item.op} `);
        }
        break;
    }
  }
  return out.join("");
}

function pushJoined(work: Array<Term | string>, terms: readonly Term[], separator: string): void {
  for (let i = terms.length - 1; i >= 0; i--) {
    work.push(terms[i]);
    if (i > 0) work.push(separator);
  }
}

// --- Equality ---

/**
 * Structural equality. Two terms are equal exactly when they render the same:
 * a symbol atom never equals a numeric atom, even when the texts match.
 */
export function equals(a: Term, b: Term): boolean {
  const pending: Array<[Term, Term]> = [[a, b]];
  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [x, y] = pair;
    if (x === y) continue;
    switch (x.kind) {
      case "Atom":
        if (y.kind !== "Atom" || typeof x.value !== typeof y.value || x.value !== y.value) return false;
        break;
      case "List":
        if (y.kind !== "List" || !pushPairs(pending, x.elements, y.elements)) return false;
        break;
      case "Lambda":
        if (y.kind !== "Lambda" || !pushPairs(pending, x.params, y.params)) return false;
        pending.push([x.body, y.body]);
        break;
      case "Operator":
        if (y.kind !== "Operator" || x.op !== y.op || !pushPairs(pending, x.operands, y.operands)) {
          return false;
        }
        break;
    }
  }
  return true;
}

function pushPairs(pending: Array<[Term, Term]>, xs: readonly Term[], ys: readonly Term[]): boolean {
  if (xs.length !== ys.length) return false;
  for (let i = 0; i < xs.length; i++) {
    pending.push([xs[i], ys[i]]);
  }
  return true;
}

// --- Rewriting ---

// How `rewrite` treats a subterm: keep `term` as the result, or rewrite
// `children` first and combine the results with `rebuild`.
type Visit =
  | { kind: "leaf"; term: Term }
  | { kind: "node"; children: readonly Term[]; rebuild: (children: readonly Term[]) => Term };

interface RewriteFrame {
  visit: Extract<Visit, { kind: "node" }>;
  done: Term[];
}

function leaf(term: Term): Visit {
  return { kind: "leaf", term };
}

function node(children: readonly Term[], rebuild: (children: readonly Term[]) => Term): Visit {
  return { kind: "node", children, rebuild };
}

/**
 * Bottom-up rewrite driven by an explicit stack instead of recursion.
 */
function rewrite(root: Term, visitor: (term: Term) => Visit): Term {
  const stack: RewriteFrame[] = [];
  let pending: Term | undefined = root;
  let result: Term = root;

  for (;;) {
    if (pending !== undefined) {
      const visit = visitor(pending);
      pending = undefined;
      if (visit.kind === "node" && visit.children.length > 0) {
        stack.push({ visit, done: [] });
        pending = visit.children[0];
        continue;
      }
      result = visit.kind === "leaf" ? visit.term : visit.rebuild([]);
    }

    const frame = stack[stack.length - 1];
    if (frame === undefined) return result;
    frame.done.push(result);
    if (frame.done.length < frame.visit.children.length) {
      pending = frame.visit.children[frame.done.length];
      continue;
    }
    stack.pop();
    result = frame.visit.rebuild(frame.done);
  }
}

// --- Substitution ---

/**
 * Replace every subterm equal to `target` with `value`.
 * Lambda parameters are binding positions and are left untouched.
 * Unchanged subtrees are shared with the input.
 */
export function replace(term: Term, target: Term, value: Term): Term {
  return rewrite(term, (t) => {
    if (equals(t, target)) return leaf(value);
    switch (t.kind) {
      case "Atom":
        return leaf(t);
      case "List":
        return node(t.elements, (elements) => withElements(t, elements));
      case "Lambda":
        return node([t.body], ([body]) => withBody(t, body));
      case "Operator":
        return node(t.operands, (operands) => withOperands(t, operands));
    }
  });
}

/**
 * Bind `param` to `value` inside a lambda body.
 *
 * Unlike `replace`, this stops at any inner scope that rebinds `param`: a
 * Lambda whose params contain it, or the rest of a list following a
 * lambda-constructor whose parameter element names it. Parameter elements
 * themselves are never rewritten.
 */
export function substitute(term: Term, param: Atom, value: Term): Term {
  return rewrite(term, (t) => {
    if (equals(t, param)) return leaf(value);
    switch (t.kind) {
      case "Atom":
        return leaf(t);
      case "List": {
        const open = scopedIndices(t.elements, param);
        return node(
          open.map((i) => t.elements[i]),
          (results) => {
            const elements = [...t.elements];
            open.forEach((i, k) => {
              elements[i] = results[k];
            });
            return withElements(t, elements);
          }
        );
      }
      case "Lambda":
        if (t.params.some((p) => equals(p, param))) return leaf(t);
        return node([t.body], ([body]) => withBody(t, body));
      case "Operator":
        return node(t.operands, (operands) => withOperands(t, operands));
    }
  });
}

// Indices of the elements where `param` is still free. A lambda-constructor
// and its parameter element are skipped; if that parameter element binds
// `param`, the rest of the list is the inner lambda's scope.
function scopedIndices(elements: readonly Term[], param: Atom): number[] {
  const open: number[] = [];
  for (let i = 0; i < elements.length; i++) {
    const binder = elements[i + 1];
    if (isLambdaConstructor(elements[i]) && binder !== undefined) {
      if (binds(binder, param)) break;
      i++;
      continue;
    }
    open.push(i);
  }
  return open;
}

function isLambdaConstructor(term: Term): boolean {
  return term.kind === "Operator" && term.op === "lambda";
}

function binds(binder: Term, name: Atom): boolean {
  if (binder.kind === "Atom") return equals(binder, name);
  if (binder.kind === "List") return binder.elements.some((e) => equals(e, name));
  return false;
}

function withElements(term: List, elements: readonly Term[]): List {
  return sameElements(elements, term.elements) ? term : list(elements);
}

function withBody(term: Lambda, body: Term): Lambda {
  return body === term.body ? term : lambda(term.params, body);
}

function withOperands(term: Operator, operands: readonly Term[]): Operator {
  if (sameElements(operands, term.operands)) return term;
  const [left, right] = operands;
  if (left === undefined) return operator(term.op);
  if (right === undefined) return operator(term.op, [left]);
  return operator(term.op, [left, right]);
}

function sameElements(a: readonly Term[], b: readonly Term[]): boolean {
  return a.length === b.length && a.every((t, i) => t === b[i]);
}
