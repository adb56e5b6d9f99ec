import { describe, expect, test } from "vitest";
import { isDiagnosticError } from "../../../diagnostics/index.js";
import { resolveProperty } from "../../../reflection/members.js";
import { Types } from "../../../reflection/types.js";
import { compileLambdaExpression, evaluateExpression } from "../compiler.js";
import { Expr } from "../nodes.js";

const int32Array = Types.array(Types.int32);

describe("expression compiler", () => {
  test("loops until a labelled break", () => {
    const items = Expr.parameter(int32Array, "items");
    const index = Expr.parameter(Types.int32, "index", true);
    const body = Expr.block(Types.int32, [index], [
      Expr.loop(
        Expr.condition(
          Expr.binary(
            "less-than",
            Expr.load(index),
            Expr.property(Expr.load(items), resolveProperty(int32Array, "length"))
          ),
          Expr.block(Types.void, [], [Expr.assign(index, Expr.increment(Expr.load(index)))]),
          Expr.break("done")
        ),
        "done"
      ),
      Expr.load(index),
    ]);

    const count = compileLambdaExpression(Expr.lambda([items], Types.int32, body));
    expect(count([4, 5, 6])).toBe(3);
    expect(count([])).toBe(0);
  });

  test("comparisons against a null literal treat undefined as null", () => {
    const value = Expr.parameter(Types.nullable(Types.string), "value");
    const isMissing = compileLambdaExpression(
      Expr.lambda(
        [value],
        Types.boolean,
        Expr.binary(
          "equal",
          Expr.load(value),
          Expr.constant(Types.nullable(Types.string), null, null)
        )
      )
    );
    expect(isMissing(undefined)).toBe(true);
    expect(isMissing("x")).toBe(false);
  });

  test("reading an undeclared variable is a malformed graph", () => {
    let failure: unknown;
    try {
      evaluateExpression(Expr.load(Expr.parameter(Types.int32, "ghost")));
    } catch (error) {
      failure = error;
    }
    expect(isDiagnosticError(failure, "CG0001")).toBe(true);
  });

  test("node factories check the types they combine", () => {
    const local = Expr.parameter(Types.int32, "count", true);
    expect(() => Expr.assign(local, Expr.constant(Types.string, "x", "x"))).toThrow(
      "store count: expected int32, got string"
    );
  });
});
