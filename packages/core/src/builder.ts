/**
 * Builder: nested literal source -> List term.
 */
import { atom, list } from "./term.js";
import { SublispError } from "./errors.js";
import type { List, Term } from "./term.js";

/** A leaf is a token string or a pre-built term; arrays are groupings. */
export type SourceNode = string | Term | Source;
export type Source = readonly SourceNode[];

const INTEGER = /^\s*[+-]?\d+\s*$/;

interface BuildFrame {
  nodes: Source;
  built: Term[];
}

/**
 * Build a List from nested source. Groupings are walked with an explicit
 * stack, so nesting depth is bounded by memory rather than the call stack.
 */
export function build(source: Source): List {
  const stack: BuildFrame[] = [{ nodes: source, built: [] }];
  for (;;) {
    const frame = stack[stack.length - 1];
    if (frame.built.length < frame.nodes.length) {
      const node = frame.nodes[frame.built.length];
      if (isSource(node)) {
        stack.push({ nodes: node, built: [] });
      } else {
        frame.built.push(typeof node === "string" ? buildToken(node) : node);
      }
      continue;
    }
    stack.pop();
    const built = list(frame.built);
    const parent = stack[stack.length - 1];
    if (parent === undefined) return built;
    parent.built.push(built);
  }
}

/**
 * Decimal integers become numeric atoms; anything else is a symbol name.
 * Integers outside the safe range raise E_INT_RANGE.
 */
export function buildToken(token: string): Term {
  if (!INTEGER.test(token)) return atom(token);
  const literal = token.trim();
  const n = Number(literal);
  if (!Number.isSafeInteger(n)) {
    throw new SublispError(
      "E_INT_RANGE",
      `Integer literal ${literal} is outside the safe integer range (-${Number.MAX_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}).`,
      { literal }
    );
  }
  return atom(n);
}

function isSource(node: SourceNode): node is Source {
  return Array.isArray(node);
}
