/**
 * sublisp lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Symbols are any run of characters other than whitespace, parentheses and ';'.
export const Name = createToken({ name: "Name", pattern: /[^\s();]+/, line_breaks: false });

// Integers that run on into symbol characters (`1st`, `-2x`) lex as names.
export const IntLit = createToken({
  name: "IntLit",
  pattern: /-?\d+/,
  longer_alt: Name,
});

export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[^\S\r\n]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r\n?|\n/,
  line_breaks: true,
  group: Lexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /;[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: integers before names
export const allTokens = [
  WhiteSpace,
  Newline,
  Comment,
  LParen,
  RParen,
  IntLit,
  Name,
];

export const SublispLexer = new Lexer(allTokens);
