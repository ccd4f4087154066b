/**
 * sublisp CLI help content.
 * Terse language reference for terminal output.
 */

export const QUICKREF = `
SUBLISP QUICK REFERENCE (v0.1)
==============================

PROGRAMS
  (+ 2 3)                       ; groups are lists, applied head to tail
  ((lambda x x) z)              ; -> 'z
  ((lambda (x y) - x y) 10 4)   ; -> 6
  ((+ 1) 2)                     ; partial application -> 3

TERMS
  5  -3          numeric atoms        x  foo         symbol atoms ('x)
  (a b c)        list [a, b, c]       ()             empty list []

OPERATORS
  + - * /        arithmetic, two operands, curried
  car cdr        first argument / remaining arguments, unevaluated
  lambda         (lambda x body...) or (lambda (x y) body...)

EXIT CODES: 0=ok  2=read error  3=step budget  4=runtime/io

HELP TOPICS
  sublisp help syntax
  sublisp help terms
  sublisp help operators
  sublisp help operators --index
  sublisp help lambda
  sublisp help prelude
  sublisp help budget
  sublisp help config
  sublisp help diagnostics
  sublisp help examples
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
SUBLISP SYNTAX REFERENCE
========================

COMMENTS
  ; to the end of the line

FORMS
  ( form* )        a group, read as a nested list
  -?[0-9]+         an integer
  anything else    a name: any run of characters except whitespace, ( ) and ;

  Integers running into name characters read as names: 1st, -2x.
  Integers must lie within +/-9007199254740991 (E_INT_RANGE).
  Groups may nest up to 100 levels deep (E_DEPTH).
  The forms at the top level of a file make up the program list.

READING NAMES
  With the default "reader" binding, the names + - * / car cdr lambda
  are read as the operators themselves. Any other name is a symbol atom.
`.trimStart(),

// ─── TERMS ──────────────────────────────────────────────────────────────────
terms: `
SUBLISP TERMS
=============

  Atom       a number or a symbol                  5   'x
  List       an ordered sequence of terms          [1, 'x, []]
  Lambda     parameters plus a body                (['x] -> ['x])
  Operator   a built-in, with bound operands       <+>  <+ 2>  <car>

REDUCTION
  A list reduces by applying its head to its tail.
  A one-element list reduces to its element: (x) -> 'x
  The empty list absorbs any arguments: (() 1 2) -> []
  An atom applied to arguments fails with E_UNBOUND_REDUCTION.
  Terms with nothing left to do reduce to themselves.
`.trimStart(),

// ─── OPERATORS ──────────────────────────────────────────────────────────────
operators: `
SUBLISP OPERATORS
=================

ARITHMETIC
  (+ a b)  (- a b)  (* a b)  (/ a b)
  Operands are reduced left to right and must be numbers (E_OPERAND_TYPE).
  Division is real division; a zero divisor fails with E_DIVISION.
  Results are double-precision: beyond 2^53 they lose precision.
  Missing operands give a partial application: (+ 1) -> <+ 1>
  A bare operator with no operands fails with E_ARITY.

LISTS
  (car a b c)   -> a           first argument, not evaluated
  (cdr a b c)   -> [b, c]      remaining arguments, not evaluated
  Both fail with E_ARITY when given nothing.

LAMBDA
  (lambda x body...)           one parameter
  (lambda (x y) body...)       several parameters, bound in order
  Parameters must be atoms (E_PARAMS).
  (lambda () body...)          no parameters: the body is reduced at once
`.trimStart(),

// ─── LAMBDA ─────────────────────────────────────────────────────────────────
lambda: `
SUBLISP LAMBDAS
===============

APPLICATION
  Arguments are substituted into the body one at a time, unevaluated.
  When every parameter is bound the body is reduced, and the result is
  applied to any arguments left over.

  ((lambda (x y) - x y) 10)     -> (['y] -> [<->, 10, 'y])
  ((lambda (x y) - x y) 10 4)   -> 6
  (lambda () + 1 2)             -> 3

SCOPE
  Substitution stops at an inner lambda that binds the same name:
  ((lambda x ((lambda x + x 1) 5)) 1)   -> 6
`.trimStart(),

// ─── PRELUDE ────────────────────────────────────────────────────────────────
prelude: `
SUBLISP PRELUDE
===============

  sublisp run file.sl --binding prelude

  Wraps the program as
    ((lambda (lambda + - * / car cdr) program) <lambda> <+> <-> <*> </> <car> <cdr>)
  so the operator names are bound by substitution rather than by the reader.
  A program that rebinds one of these names keeps its own binding.

  --binding none leaves every name a symbol atom.
`.trimStart(),

// ─── BUDGET ─────────────────────────────────────────────────────────────────
budget: `
SUBLISP STEP BUDGET
===================

  Every reduction step counts against maxSteps (default 1000000).
  Exceeding it fails with E_BUDGET and exit code 3.

  sublisp run file.sl --max-steps 5000
  { "maxSteps": 5000 }          in .sublisprc.json
`.trimStart(),

// ─── CONFIG ─────────────────────────────────────────────────────────────────
config: `
SUBLISP CONFIGURATION
=====================

FILES (first found wins)
  ./.sublisprc.json
  ~/.sublisp/config.json

FIELDS
  version    1
  maxSteps   positive integer (default 1000000)
  binding    "reader" | "prelude" | "none" (default "reader")

  Command-line flags override the file. An invalid file fails with E_CONFIG.

  sublisp config            show the effective configuration
  sublisp config --json
`.trimStart(),

// ─── DIAGNOSTICS ────────────────────────────────────────────────────────────
diagnostics: `
SUBLISP DIAGNOSTICS REFERENCE
=============================

READ ERRORS (exit 2)
  E_LEX                 unrecognized character
  E_PARSE               unbalanced or unexpected parenthesis
  E_AST                 malformed syntax tree
  E_DEPTH               groups nested more than 100 levels deep
  E_INT_RANGE           integer literal outside the safe integer range

RUNTIME ERRORS (exit 4, E_BUDGET exit 3)
  E_ARITY               operator, car, cdr or lambda given no operands
  E_EMPTY_LIST          head or tail of an empty list
  E_UNBOUND_REDUCTION   an atom applied to arguments
  E_DIVISION            zero divisor
  E_OPERAND_TYPE        arithmetic on something that is not a number
  E_PARAMS              lambda parameter that is not an atom
  E_BUDGET              step budget exceeded
  E_RUNTIME             unexpected failure

CLI ERRORS (exit 4)
  E_IO                  file could not be read or written
  E_CONFIG              invalid configuration file

OUTPUT
  Diagnostics are JSON on stderr; --pretty prints error[CODE]: message.
`.trimStart(),

// ─── EXAMPLES ───────────────────────────────────────────────────────────────
examples: `
SUBLISP EXAMPLES
================

ARITHMETIC
  (* (- 7 3) 2)                       -> 8
  (/ 242 11)                          -> 22

CURRYING
  ((lambda a lambda b + a b) 3 1)     -> 4
  ((lambda add ((add 1) 2)) +)        -> 3

LISTS
  (car x y z)                         -> 'x
  (cdr x y z)                         -> ['y, 'z]

CLI USAGE
  sublisp run file.sl                 evaluate and print the result
  sublisp run - < file.sl             read the program from stdin
  sublisp run file.sl --trace t.jsonl write an execution trace
  sublisp check file.sl               read without evaluating
  sublisp build file.sl               print the unreduced term
  sublisp trace t.jsonl               summarize a trace file
`.trimStart(),

};

export const TOPIC_LIST = Object.keys(TOPICS);
