/**
 * Tests for the sublisp evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { execute, reduce } from "./evaluator.js";
import type { TraceEvent } from "./evaluator.js";
import { CAR, CDR, DIVIDE, LAMBDA, MULTIPLY, PLUS, SUBTRACT } from "./operators.js";
import { NIL, atom, equals, lambda, list, operator, render } from "./term.js";
import type { Term } from "./term.js";
import type { SourceNode } from "./builder.js";
import { SublispError } from "./errors.js";

function expectCode(fn: () => unknown, code: string): void {
  assert.throws(fn, (err: SublispError) => {
    assert.ok(err instanceof SublispError);
    assert.equal(err.code, code);
    return true;
  });
}

describe("sublisp Evaluator", () => {
  describe("arithmetic", () => {
    it("adds", () => {
      assert.ok(equals(execute([PLUS, "2", "3"]), atom(5)));
    });

    it("subtracts", () => {
      assert.ok(equals(execute([SUBTRACT, "7", "3"]), atom(4)));
    });

    it("multiplies", () => {
      assert.ok(equals(execute([MULTIPLY, "3", "2"]), atom(6)));
    });

    it("divides", () => {
      assert.ok(equals(execute([DIVIDE, "242", "11"]), atom(22)));
    });

    it("fails on division by zero", () => {
      expectCode(() => execute([DIVIDE, "1", "0"]), "E_DIVISION");
    });

    it("applies a grouped partial application to the next argument", () => {
      assert.ok(equals(execute([[PLUS, "1"], "2"]), atom(3)));
    });

    it("reduces nested operands", () => {
      assert.ok(equals(execute([PLUS, [MULTIPLY, "2", "3"], "4"]), atom(10)));
    });

    it("returns a partially applied operator when an operand is missing", () => {
      assert.equal(render(execute([PLUS, "1"])), "<+ 1>");
    });

    it("fails when the result is applied to a leftover argument", () => {
      expectCode(() => execute([PLUS, "1", "2", "3"]), "E_UNBOUND_REDUCTION");
    });

    it("fails on symbol operands", () => {
      expectCode(() => execute([PLUS, "x", "1"]), "E_OPERAND_TYPE");
    });

    it("fails when a bare operator gets no operands", () => {
      expectCode(() => execute([PLUS]), "E_ARITY");
      expectCode(() => execute([[MULTIPLY], "2", "3"]), "E_ARITY");
    });
  });

  describe("list operators", () => {
    it("car returns the first argument", () => {
      assert.ok(equals(execute([CAR, "x", "y", "z"]), atom("x")));
    });

    it("cdr returns the remaining arguments as a list", () => {
      assert.equal(render(execute([CDR, "x", "y", "z"])), "['y, 'z]");
    });

    it("does not evaluate what car returns", () => {
      assert.equal(render(execute([CAR, [PLUS, "1", "2"]])), "[<+>, 1, 2]");
    });

    it("fails without arguments", () => {
      expectCode(() => execute([[CAR], "x"]), "E_ARITY");
      expectCode(() => execute([CDR]), "E_ARITY");
    });
  });

  describe("lambda", () => {
    it("applies the identity lambda", () => {
      assert.ok(equals(execute([[LAMBDA, "x", "x"], "z"]), atom("z")));
    });

    it("curries nested single-parameter lambdas", () => {
      const source = [[LAMBDA, "a", LAMBDA, "b", PLUS, "a", "b"], "3", "1"];
      assert.ok(equals(execute(source), atom(4)));
    });

    it("binds a parameter list front to back", () => {
      const source = [[LAMBDA, ["x", "y"], SUBTRACT, "x", "y"], "10", "4"];
      assert.ok(equals(execute(source), atom(6)));
    });

    it("returns a smaller lambda on partial application", () => {
      const source = [[LAMBDA, ["x", "y"], SUBTRACT, "x", "y"], "10"];
      assert.equal(render(execute(source)), "(['y] -> [<->, 10, 'y])");
    });

    it("satisfies the currying law", () => {
      const fn = lambda(
        [atom("x"), atom("y"), atom("z")],
        list([SUBTRACT, list([MULTIPLY, atom("x"), atom("y")]), atom("z")])
      );
      const stepwise = reduce(reduce(fn, list([atom(2)])), list([atom(5), atom(3)]));
      const direct = reduce(fn, list([atom(2), atom(5), atom(3)]));
      assert.ok(equals(stepwise, atom(7)));
      assert.ok(equals(direct, atom(7)));
    });

    it("binds a name to an operator and uses it inside the body", () => {
      const source = [[LAMBDA, "add", [["add", "1"], "2"]], PLUS];
      assert.ok(equals(execute(source), atom(3)));
    });

    it("binds library names through nested lambdas", () => {
      const lib = [LAMBDA, "code", [[LAMBDA, "\\", LAMBDA, "+", "code"], LAMBDA, PLUS]];
      const source = [lib, [["\\", "a", "\\", "b", "+", "a", "b"], "1", "2"]];
      assert.ok(equals(execute(source), atom(3)));
    });

    it("resolves a shadowed name to the innermost binding", () => {
      // The inner x is 5, not the outer 1.
      const source = [[LAMBDA, "x", [[LAMBDA, "x", PLUS, "x", "1"], "5"]], "1"];
      assert.ok(equals(execute(source), atom(6)));
    });

    it("does not leak the inner binding outward", () => {
      const source = [[LAMBDA, "x", PLUS, [[LAMBDA, "x", "x"], "7"], "x"], "1"];
      assert.ok(equals(execute(source), atom(8)));
    });

    it("reduces the body of a parameterless lambda as soon as it is built", () => {
      assert.ok(equals(execute([LAMBDA, [], PLUS, "1", "2"]), atom(3)));
      assert.ok(equals(execute([[LAMBDA, [], LAMBDA, "x", MULTIPLY, "x", "x"], "6"]), atom(36)));
    });

    it("leaves a lambda with parameters idle until it gets arguments", () => {
      assert.equal(render(execute([LAMBDA, "x", PLUS, "x", "1"])), "(['x] -> [<+>, 'x, 1])");
    });

    it("fails when constructed without arguments", () => {
      expectCode(() => execute([LAMBDA]), "E_ARITY");
    });
  });

  describe("reduction rules", () => {
    it("is the identity on terms with nothing left to do", () => {
      const terms: Term[] = [
        atom(1),
        atom("x"),
        NIL,
        lambda([atom("x")], list([atom("x")])),
        operator("+", [atom(1)]),
      ];
      for (const t of terms) {
        assert.equal(reduce(t), t, render(t));
      }
    });

    it("reduces an atomic list to its element", () => {
      assert.ok(equals(execute(["x"]), atom("x")));
      assert.ok(equals(execute([[["5"]]]), atom(5)));
    });

    it("lets the empty list absorb arguments", () => {
      assert.equal(reduce(NIL, list([atom(1)])), NIL);
      assert.equal(render(execute([])), "[]");
    });

    it("fails when an atom is applied to arguments", () => {
      expectCode(() => execute(["x", "y"]), "E_UNBOUND_REDUCTION");
    });

    it("reduces deeply nested operands without exhausting the stack", () => {
      let term: Term = atom(0);
      for (let i = 0; i < 50000; i++) {
        term = list([PLUS, term, atom(1)]);
      }
      assert.ok(equals(reduce(term), atom(50000)));
    });

    it("executes source nested far deeper than the call stack", () => {
      let source: SourceNode = "x";
      for (let i = 0; i < 20000; i++) source = [source];
      assert.ok(equals(execute([source]), atom("x")));
    });

    it("applies a lambda over a deeply nested body", () => {
      let body: SourceNode = "x";
      for (let i = 0; i < 20000; i++) body = [PLUS, body, "1"];
      assert.ok(equals(execute([[LAMBDA, "x", body], "0"]), atom(20000)));
    });

    it("stops a non-terminating program at the step budget", () => {
      const omega = [LAMBDA, "x", "x", "x"];
      expectCode(() => execute([omega, omega], { maxSteps: 1000 }), "E_BUDGET");
    });

    it("runs within the step budget when it suffices", () => {
      assert.ok(equals(execute([PLUS, "2", "3"], { maxSteps: 100 }), atom(5)));
    });
  });

  describe("trace", () => {
    it("emits run, compute and end events", () => {
      const events: TraceEvent[] = [];
      execute([PLUS, "2", "3"], { trace: (e) => events.push(e), runId: "test-run" });
      assert.deepEqual(events.map((e) => e.event), ["run_start", "compute", "run_end"]);
      assert.equal(events[0].runId, "test-run");
      assert.equal(events[0].data?.["term"], "[<+>, 2, 3]");
      assert.deepEqual(events[1].data, { op: "+", left: "2", right: "3", result: "5" });
      assert.equal(events[2].data?.["result"], "5");
    });

    it("emits substitution events", () => {
      const events: TraceEvent[] = [];
      execute([[LAMBDA, "x", "x"], "z"], { trace: (e) => events.push(e) });
      const subs = events.filter((e) => e.event === "substitute");
      assert.equal(subs.length, 1);
      assert.deepEqual(subs[0].data, { param: "'x", value: "'z" });
    });

    it("records the error on run_end", () => {
      const events: TraceEvent[] = [];
      assert.throws(() => execute([DIVIDE, "1", "0"], { trace: (e) => events.push(e) }));
      const end = events[events.length - 1];
      assert.equal(end.event, "run_end");
      assert.equal(end.data?.["error"], "E_DIVISION");
    });

    it("emits budget_exceeded before failing", () => {
      const events: TraceEvent[] = [];
      const omega = [LAMBDA, "x", "x", "x"];
      assert.throws(() => execute([omega, omega], { maxSteps: 50, trace: (e) => events.push(e) }));
      const exceeded = events.find((e) => e.event === "budget_exceeded");
      assert.deepEqual(exceeded?.data, { budget: "maxSteps", limit: 50, actual: 51 });
    });
  });
});
