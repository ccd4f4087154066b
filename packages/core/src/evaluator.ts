/**
 * sublisp evaluator - curried application by substitution.
 *
 * Reduction runs on an explicit frame stack rather than the host call stack,
 * so nesting depth is limited by memory only. A step budget bounds
 * non-terminating programs.
 */
import { SublispError } from "./errors.js";
import { build } from "./builder.js";
import type { Source } from "./builder.js";
import { arithmetic, car, cdr, constructLambda, requireOperand } from "./operators.js";
import {
  NIL,
  head,
  isAtomic,
  isEmpty,
  lambda,
  operator,
  render,
  substitute,
  tail,
} from "./term.js";
import type { ArithmeticOp, Lambda, List, Operands, Operator, Term } from "./term.js";

// --- Trace events ---
export type TraceEventType = "run_start" | "run_end" | "substitute" | "compute" | "budget_exceeded";

export type TraceData = { [key: string]: string | number };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  data?: TraceData;
}

// --- Options ---
export interface ExecOptions {
  /** Abort with E_BUDGET after this many reduction steps. */
  maxSteps?: number;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

type EmitTrace = (event: TraceEventType, data?: TraceData) => void;

interface StepTracker {
  steps: number;
  maxSteps?: number;
}

// --- Work stack ---

// What to do with a value once the term under reduction yields one.
type Frame =
  | { kind: "apply"; args: List }
  | { kind: "reduceRight"; op: ArithmeticOp; right: Term; rest: List }
  | { kind: "compute"; op: ArithmeticOp; left: Term; rest: List };

type Step =
  | { kind: "value"; term: Term }
  | { kind: "next"; term: Term; args: List; frame?: Frame };

function value(term: Term): Step {
  return { kind: "value", term };
}

function next(term: Term, args: List, frame?: Frame): Step {
  return { kind: "next", term, args, frame };
}

// Results are re-applied only to leftover arguments; a value is never
// re-evaluated against an empty list.
function thenApply(args: List): Frame | undefined {
  return isEmpty(args) ? undefined : { kind: "apply", args };
}

/**
 * Build `source` and reduce it against the empty list.
 */
export function execute(source: Source, options: ExecOptions = {}): Term {
  return reduce(build(source), NIL, options);
}

/**
 * Apply `term` to `args` until an irreducible term remains.
 */
export function reduce(term: Term, args: List = NIL, options: ExecOptions = {}): Term {
  const runId = options.runId ?? "local";
  const trace = options.trace;
  const emitTrace: EmitTrace = (event, data) => {
    if (trace) {
      trace({ ts: new Date().toISOString(), runId, event, data });
    }
  };
  const tracing = trace !== undefined;
  const tracker: StepTracker = { steps: 0, maxSteps: options.maxSteps };
  const startMs = Date.now();

  if (tracing) {
    emitTrace("run_start", { term: render(term), args: render(args) });
  }

  try {
    const result = run(term, args, tracker, tracing ? emitTrace : undefined);
    if (tracing) {
      emitTrace("run_end", {
        steps: tracker.steps,
        durationMs: Date.now() - startMs,
        result: render(result),
      });
    }
    return result;
  } catch (e) {
    if (tracing) {
      const errorData: TraceData = { steps: tracker.steps, durationMs: Date.now() - startMs };
      if (e instanceof SublispError) {
        errorData["error"] = e.code;
        errorData["message"] = e.message;
      } else {
        errorData["error"] = "E_RUNTIME";
        errorData["message"] = e instanceof Error ? e.message : String(e);
      }
      emitTrace("run_end", errorData);
    }
    throw e;
  }
}

function run(start: Term, startArgs: List, tracker: StepTracker, emitTrace?: EmitTrace): Term {
  const stack: Frame[] = [];
  let term = start;
  let args = startArgs;

  for (;;) {
    enforceStepBudget(tracker, emitTrace);
    const step = dispatch(term, args, emitTrace);

    if (step.kind === "next") {
      if (step.frame) stack.push(step.frame);
      term = step.term;
      args = step.args;
      continue;
    }

    const frame = stack.pop();
    if (frame === undefined) return step.term;

    switch (frame.kind) {
      case "apply":
        term = step.term;
        args = frame.args;
        break;
      case "reduceRight":
        stack.push({ kind: "compute", op: frame.op, left: step.term, rest: frame.rest });
        term = frame.right;
        args = NIL;
        break;
      case "compute": {
        const result = arithmetic(frame.op, frame.left, step.term);
        emitTrace?.("compute", {
          op: frame.op,
          left: render(frame.left),
          right: render(step.term),
          result: render(result),
        });
        term = result;
        args = frame.rest;
        break;
      }
    }
  }
}

function enforceStepBudget(tracker: StepTracker, emitTrace?: EmitTrace): void {
  tracker.steps++;
  if (tracker.maxSteps === undefined || tracker.steps <= tracker.maxSteps) return;
  emitTrace?.("budget_exceeded", { budget: "maxSteps", limit: tracker.maxSteps, actual: tracker.steps });
  throw new SublispError(
    "E_BUDGET",
    `Budget exceeded: maxSteps limit of ${tracker.maxSteps} reached.`,
    { budget: "maxSteps", limit: tracker.maxSteps }
  );
}

// --- Dispatch ---
function dispatch(term: Term, args: List, emitTrace?: EmitTrace): Step {
  switch (term.kind) {
    case "Atom":
      if (isEmpty(args)) return value(term);
      throw new SublispError(
        "E_UNBOUND_REDUCTION",
        `Atom ${render(term)} cannot be applied to ${render(args)}.`,
        { term: render(term), args: render(args) }
      );

    case "List":
      // Nil absorbs any arguments.
      if (isEmpty(term)) return value(term);
      if (isAtomic(term)) return next(head(term), NIL, thenApply(args));
      return next(head(term), tail(term), thenApply(args));

    case "Lambda":
      return applyLambda(term, args, emitTrace);

    case "Operator":
      return applyOperator(term, args);
  }
}

function applyLambda(fn: Lambda, args: List, emitTrace?: EmitTrace): Step {
  const [param, ...rest] = fn.params;
  if (param === undefined) {
    return next(fn.body, NIL, thenApply(args));
  }
  if (isEmpty(args)) return value(fn);

  const arg = head(args);
  const body = substitute(fn.body, param, arg);
  emitTrace?.("substitute", { param: render(param), value: render(arg) });
  return next(lambda(rest, body), tail(args));
}

function applyOperator(term: Operator, args: List): Step {
  const op = term.op;
  switch (op) {
    case "lambda":
      // A parameterless lambda runs as soon as it is built.
      return next(constructLambda(args), NIL);
    case "car":
      return value(car(args));
    case "cdr":
      return value(cdr(args));
    default:
      return applyArithmetic(term, op, term.operands, args);
  }
}

function applyArithmetic(term: Operator, op: ArithmeticOp, operands: Operands, args: List): Step {
  switch (operands.length) {
    case 0:
      requireOperand(op, args);
      return next(operator(op, [head(args)]), tail(args));
    case 1:
      if (isEmpty(args)) return value(term);
      return next(operator(op, [operands[0], head(args)]), tail(args));
    case 2:
      // Reduce the left operand, then the right, then compute.
      return next(operands[0], NIL, { kind: "reduceRight", op, right: operands[1], rest: args });
  }
}
