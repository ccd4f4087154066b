/**
 * sublisp run - evaluate a program and print the rendered result
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  execute,
  render,
  SublispError,
  diagnosticFromError,
  formatDiagnostics,
  formatDiagnostic,
} from "@sublisp/core";
import type { TraceEvent } from "@sublisp/core";
import { resolveConfig, ConfigError } from "./config.js";
import type { Binding } from "./config.js";
import { readProgramText, parseProgram } from "./program.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

function traceWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new CliIoError(`Error writing trace file: ${msg}`);
    }
  };
}

export interface RunOptions {
  trace?: string;
  maxSteps?: number;
  binding?: Binding;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  let maxSteps: number;
  let binding: Binding;
  try {
    const { config } = resolveConfig(opts.cwd, opts.homeDir);
    maxSteps = opts.maxSteps ?? config.maxSteps;
    binding = opts.binding ?? config.binding;
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError("E_CONFIG", `${e.message} (${e.path})`);
      return 4;
    }
    throw e;
  }

  let text: string;
  try {
    text = readProgramText(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const parseResult = parseProgram(text, file, binding);
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }
  if (!parseResult.source) {
    emitCliError("E_PARSE", "Parse produced no program.");
    return 2;
  }

  const runId = crypto.randomUUID();

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const traceHandler = traceFd !== null ? traceWriter(traceFd) : undefined;

  try {
    const result = execute(parseResult.source, { maxSteps, trace: traceHandler, runId });
    console.log(render(result));
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    console.error(formatDiagnostic(diagnosticFromError(e), pretty));
    if (e instanceof SublispError && e.code === "E_BUDGET") return 3;
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitCliError("E_IO", `Error closing trace file: ${msg}`);
        return 4;
      }
    }
  }
}
