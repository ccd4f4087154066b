/**
 * Reading programs for the run and build commands.
 */
import * as fs from "node:fs";
import { parse } from "@sublisp/core";
import type { ParseResult } from "@sublisp/core";
import { getOperatorTable, withPrelude } from "@sublisp/std";
import type { Binding } from "./config.js";

/** Read program text from a file, or from stdin when `file` is "-". */
export function readProgramText(file: string): string {
  return fs.readFileSync(file === "-" ? 0 : file, "utf-8");
}

/**
 * Parse program text, binding the operator names the way `binding` says:
 * - reader: names are resolved to operators while reading
 * - prelude: the program is wrapped in a lambda binding every name
 * - none: names stay symbols
 */
export function parseProgram(text: string, file: string, binding: Binding): ParseResult {
  const result = parse(text, file, binding === "reader" ? { symbols: getOperatorTable() } : {});
  if (binding === "prelude" && result.source) {
    return { source: withPrelude(result.source), diagnostics: result.diagnostics };
  }
  return result;
}
