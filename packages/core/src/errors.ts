/**
 * sublisp runtime error.
 */

export type ErrorCode =
  | "E_ARITY"
  | "E_EMPTY_LIST"
  | "E_UNBOUND_REDUCTION"
  | "E_DIVISION"
  | "E_OPERAND_TYPE"
  | "E_PARAMS"
  | "E_BUDGET"
  | "E_INT_RANGE";

export type ErrorDetails = { [key: string]: string | number };

export class SublispError extends Error {
  code: ErrorCode;
  details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "SublispError";
    this.code = code;
    this.details = details;
  }
}
