/**
 * Tests for sublisp CLI help content.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createRequire } from "node:module";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { runHelp } from "./cmd-help.js";
import { MAX_NESTING } from "@sublisp/core";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function captureHelp(
  topic?: string,
  opts: { index?: boolean } = {}
): { stdout: string; stderr: string; exitCode: typeof process.exitCode } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  const prevExitCode = process.exitCode;

  process.exitCode = undefined;
  console.log = (...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  };

  try {
    runHelp(topic, opts);
    return {
      stdout: stdout.join("\n"),
      stderr: stderr.join("\n"),
      exitCode: process.exitCode,
    };
  } finally {
    console.log = origLog;
    console.error = origError;
    process.exitCode = prevExitCode;
  }
}

describe("sublisp CLI help content", () => {
  it("QUICKREF contains the version from package.json", () => {
    const expectedVersion = `v${pkg.version.replace(/\.\d+$/, "")}`;
    assert.ok(QUICKREF.includes(expectedVersion), `Expected QUICKREF to contain '${expectedVersion}'`);
  });

  it("QUICKREF lists every topic as a help command", () => {
    for (const topic of TOPIC_LIST) {
      assert.ok(QUICKREF.includes(`  sublisp help ${topic}\n`), `QUICKREF misses topic '${topic}'`);
    }
    assert.ok(QUICKREF.includes("  sublisp help operators --index"));
  });

  it("TOPICS has the expected keys", () => {
    assert.deepEqual(TOPIC_LIST, [
      "syntax",
      "terms",
      "operators",
      "lambda",
      "prelude",
      "budget",
      "config",
      "diagnostics",
      "examples",
    ]);
  });

  it("diagnostics topic documents every error code", () => {
    const codes = [
      "E_LEX",
      "E_PARSE",
      "E_AST",
      "E_DEPTH",
      "E_INT_RANGE",
      "E_ARITY",
      "E_EMPTY_LIST",
      "E_UNBOUND_REDUCTION",
      "E_DIVISION",
      "E_OPERAND_TYPE",
      "E_PARAMS",
      "E_BUDGET",
      "E_RUNTIME",
      "E_IO",
      "E_CONFIG",
    ];
    for (const code of codes) {
      assert.ok(TOPICS.diagnostics.includes(code), `diagnostics topic misses ${code}`);
    }
  });

  it("runHelp prints the quick reference without a topic", () => {
    const result = captureHelp();
    assert.equal(result.stdout, QUICKREF);
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp supports unique prefix matching", () => {
    const result = captureHelp("diag");
    assert.ok(result.stdout.startsWith("SUBLISP DIAGNOSTICS REFERENCE"));
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp resolves a one-letter prefix", () => {
    const result = captureHelp("l");
    assert.ok(result.stdout.startsWith("SUBLISP LAMBDAS"));
  });

  it("runHelp prints the operator index with --index", () => {
    const result = captureHelp("operators", { index: true });
    assert.equal(
      result.stdout,
      [
        "SUBLISP OPERATOR INDEX",
        "======================",
        "",
        "  +       <+>",
        "  -       <->",
        "  *       <*>",
        "  /       </>",
        "  car     <car>",
        "  cdr     <cdr>",
        "  lambda  <lambda>",
        "",
        "Total: 7",
      ].join("\n")
    );
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp rejects --index for other topics", () => {
    const result = captureHelp("syntax", { index: true });
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("only supported with the operators topic"));
    assert.ok(result.stderr.includes("  sublisp help operators --index"));
  });

  it("runHelp rejects --index when no topic is provided", () => {
    const result = captureHelp(undefined, { index: true });
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("only supported with the operators topic"));
  });

  it("runHelp sets exit code 1 for an unknown topic", () => {
    const result = captureHelp("no-such-topic");
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes('Unknown help topic: "no-such-topic"'));
    assert.ok(result.stderr.includes("  - syntax"));
    assert.ok(result.stderr.includes("  sublisp help <topic>"));
  });

  it("runHelp rejects prototype property names as topics", () => {
    const constructorResult = captureHelp("constructor");
    assert.equal(constructorResult.exitCode, 1);

    const protoResult = captureHelp("__proto__");
    assert.equal(protoResult.exitCode, 1);
  });

  it("notes the integer range and precision limits", () => {
    assert.ok(TOPICS.syntax.includes("Integers must lie within +/-9007199254740991 (E_INT_RANGE)."));
    assert.ok(TOPICS.syntax.includes(`Groups may nest up to ${MAX_NESTING} levels deep (E_DEPTH).`));
    assert.ok(TOPICS.operators.includes("Results are double-precision: beyond 2^53 they lose precision."));
  });
});
