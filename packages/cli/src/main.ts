#!/usr/bin/env node
/**
 * sublisp - substitution evaluator CLI
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runBuild } from "./cmd-build.js";
import { runTrace } from "./cmd-trace.js";
import { runHelp, QUICKREF } from "./cmd-help.js";
import { runConfig } from "./cmd-config.js";
import { BINDINGS } from "./config.js";
import type { Binding } from "./config.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

function parseMaxSteps(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const bindingOption = (): Option =>
  new Option("--binding <mode>", "How operator names are bound").choices(BINDINGS);

const program = new Command();

program
  .name("sublisp")
  .description("sublisp: a curried, substitution-based list evaluator")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("run")
  .description("Evaluate a program and print the result")
  .argument("<file>", "Program file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--max-steps <n>", "Abort after this many reduction steps", parseMaxSteps)
  .addOption(bindingOption())
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { trace?: string; maxSteps?: number; binding?: Binding; pretty?: boolean }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Read a program without evaluating it")
  .argument("<file>", "Program file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("build")
  .description("Print the term a program builds to, unreduced")
  .argument("<file>", "Program file to build (or - for stdin)")
  .addOption(bindingOption())
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { binding?: Binding; pretty?: boolean }) => {
    const code = await runBuild(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Language reference; run 'sublisp help <topic>' for details")
  .argument("[topic]", "Topic: syntax, terms, operators, lambda, prelude, budget, config, diagnostics, examples")
  .option("--index", "For the operators topic, print the operator index", false)
  .action((topic: string | undefined, opts: { index?: boolean }) => {
    runHelp(topic, opts);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "build", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
