/**
 * @sublisp/core - term model, evaluator and reader
 */
export * from "./term.js";
export * from "./diagnostics.js";
export { SublispError } from "./errors.js";
export type { ErrorCode, ErrorDetails } from "./errors.js";
export { build, buildToken } from "./builder.js";
export type { Source, SourceNode } from "./builder.js";
export {
  PLUS,
  SUBTRACT,
  MULTIPLY,
  DIVIDE,
  CAR,
  CDR,
  LAMBDA,
  OPERATOR_NAMES,
  arithmetic,
} from "./operators.js";
export { MAX_NESTING, parse } from "./parser.js";
export type { ParseResult, ParseOptions } from "./parser.js";
export { execute, reduce } from "./evaluator.js";
export type { ExecOptions, TraceEvent, TraceEventType, TraceData } from "./evaluator.js";
