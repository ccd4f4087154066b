/**
 * sublisp build - print the term a program builds to, without reducing it
 */
import { build, render, formatDiagnostics, formatDiagnostic } from "@sublisp/core";
import { resolveConfig, ConfigError } from "./config.js";
import type { Binding } from "./config.js";
import { readProgramText, parseProgram } from "./program.js";

export async function runBuild(
  file: string,
  opts: { binding?: Binding; pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;

  let binding: Binding;
  try {
    binding = opts.binding ?? resolveConfig(opts.cwd, opts.homeDir).config.binding;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: "E_CONFIG", message: `${e.message} (${e.path})` }, pretty));
      return 4;
    }
    throw e;
  }

  let text: string;
  try {
    text = readProgramText(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, pretty));
    return 4;
  }

  const parseResult = parseProgram(text, file, binding);
  if (parseResult.diagnostics.length > 0 || !parseResult.source) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }

  console.log(render(build(parseResult.source)));
  return 0;
}
