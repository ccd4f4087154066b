/**
 * sublisp reader using Chevrotain.
 * Turns program text into the nested source the builder consumes.
 */
import { CstParser, EOF, type IToken, type CstNode } from "chevrotain";
import { allTokens, IntLit, LParen, Name, RParen, SublispLexer } from "./lexer.js";
import type { Source, SourceNode } from "./builder.js";
import type { Term } from "./term.js";
import type { Diagnostic, Span } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

class SublispCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.form);
    });
  });

  form = this.RULE("form", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.group) },
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(Name) },
    ]);
  });

  group = this.RULE("group", () => {
    this.CONSUME(LParen);
    this.MANY(() => {
      this.SUBRULE(this.form);
    });
    this.CONSUME(RParen);
  });
}

// Singleton parser instance
const cstParser = new SublispCstParser();

// --- CST to source visitor ---

function visitForms(cst: CstNode, symbols: ReadonlyMap<string, Term>): SourceNode[] {
  const forms = cst.children["form"];
  if (!forms) return [];
  return forms.map((f) => visitForm(asCstNode(f), symbols));
}

function visitForm(cst: CstNode, symbols: ReadonlyMap<string, Term>): SourceNode {
  const children = cst.children;
  const group = children["group"]?.[0];
  if (group) return visitForms(asCstNode(group), symbols);
  const int = children["IntLit"]?.[0];
  if (int) return asToken(int).image;
  const name = children["Name"]?.[0];
  if (name) {
    const image = asToken(name).image;
    return symbols.get(image) ?? image;
  }
  throw new Error("Unknown form type");
}

function asCstNode(element: CstNode | IToken): CstNode {
  if ("children" in element) return element;
  throw new Error(`Expected a form, got token '${element.image}'`);
}

function asToken(element: CstNode | IToken): IToken {
  if ("image" in element) return element;
  throw new Error(`Expected a token, got rule '${element.name}'`);
}

// Errors at end of input carry chevrotain's EOF token, which has no
// position; point just past the last real token instead.
function errorSpan(file: string, token: IToken, lastToken: IToken | undefined): Span {
  if (token.tokenType === EOF) {
    const line = lastToken?.endLine ?? 1;
    const col = (lastToken?.endColumn ?? 0) + 1;
    return { file, startLine: line, startCol: col, endLine: line, endCol: col };
  }
  return tokenSpan(file, token);
}

function tokenSpan(file: string, token: IToken): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

// --- Public API ---

export interface ParseOptions {
  /** Names read as these terms instead of symbol strings. */
  symbols?: ReadonlyMap<string, Term>;
}

export interface ParseResult {
  source?: Source;
  diagnostics: Diagnostic[];
}

/**
 * Deepest grouping the reader accepts. The CST parser and visitor recurse
 * once per level; deeper terms can still be built through `build`.
 */
export const MAX_NESTING = 100;

// Reports the first '(' that opens a group deeper than MAX_NESTING.
function checkNesting(tokens: readonly IToken[], file: string): Diagnostic | undefined {
  let depth = 0;
  for (const token of tokens) {
    if (token.tokenType === RParen) {
      depth = Math.max(0, depth - 1);
    } else if (token.tokenType === LParen && ++depth > MAX_NESTING) {
      return makeDiag(
        "E_DEPTH",
        `Groups nest deeper than ${MAX_NESTING} levels.`,
        tokenSpan(file, token),
        "Flatten the program, or build deeply nested terms through the API."
      );
    }
  }
  return undefined;
}

function checkIntegers(tokens: readonly IToken[], file: string): Diagnostic[] {
  return tokens
    .filter((token) => token.tokenType === IntLit && !Number.isSafeInteger(Number(token.image)))
    .map((token) =>
      makeDiag(
        "E_INT_RANGE",
        `Integer literal ${token.image} is outside the safe integer range (-${Number.MAX_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}).`,
        tokenSpan(file, token),
        "Integers are exact only up to 2^53 - 1."
      )
    );
}

export function parse(text: string, file: string = "<stdin>", options: ParseOptions = {}): ParseResult {
  const lexResult = SublispLexer.tokenize(text);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + (err.length ?? 1),
        },
        "Check for stray characters."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  const tooDeep = checkNesting(lexResult.tokens, file);
  if (tooDeep) {
    return { diagnostics: [tooDeep] };
  }

  diagnostics.push(...checkIntegers(lexResult.tokens, file));
  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  let cst: CstNode;
  try {
    cst = cstParser.program();
  } catch (e) {
    diagnostics.push(makeDiag("E_PARSE", e instanceof Error ? e.message : String(e)));
    return { diagnostics };
  }

  const lastToken = lexResult.tokens[lexResult.tokens.length - 1];
  for (const err of cstParser.errors) {
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        errorSpan(file, err.token, lastToken),
        "Check that every '(' has a matching ')'."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const source = visitForms(cst, options.symbols ?? new Map());
    return { source, diagnostics: [] };
  } catch (e) {
    diagnostics.push(
      makeDiag("E_AST", e instanceof Error ? e.message : String(e))
    );
    return { diagnostics };
  }
}
