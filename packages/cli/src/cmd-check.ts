/**
 * sublisp check - read a program without evaluating it
 */
import * as fs from "node:fs";
import { parse, formatDiagnostics, formatDiagnostic } from "@sublisp/core";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const parseResult = parse(text, file);
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, !!opts.pretty));
    return 2;
  }

  console.log(opts.pretty ? "No errors found." : "[]");
  return 0;
}
