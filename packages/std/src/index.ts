/**
 * @sublisp/std - standard environment
 */
export { getOperatorTable } from "./operator-table.js";
export { PRELUDE_NAMES, withPrelude } from "./prelude.js";
