import { describe, expect, it } from "vitest";
import { checkUnit, codesOf, messagesOf } from "../../__tests__/check-unit.js";

describe("linearity checking", () => {
  it("accepts qubits consumed exactly once on every path", () => {
    const result = checkUnit((b) => [
      b.fn("coin", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("q", b.call("qubit")),
          b.expr(b.call("h", [b.name("q")])),
          b.if(
            b.name("c"),
            [b.expr(b.call("discard", [b.name("q")]))],
            [b.assign("bit", b.call("measure", [b.name("q")]))]
          ),
        ],
      }),
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it("reports a qubit that is never consumed", () => {
    const result = checkUnit((b) => [
      b.fn("leak", { body: [b.assign("q", b.call("qubit"))] }),
    ]);
    expect(codesOf(result)).toEqual(["LN0003"]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is not consumed before the function exits",
    ]);
    expect(result.diagnostics[0]?.phase).toBe("linearity");
  });

  it("checks exits taken through an early return", () => {
    const result = checkUnit((b) => [
      b.fn("bail", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("q", b.call("qubit")),
          b.if(b.name("c"), [b.ret()]),
          b.expr(b.call("discard", [b.name("q")])),
        ],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is not consumed before the function exits",
    ]);
  });

  it("requires owned parameters to be consumed", () => {
    const result = checkUnit((b) => [
      b.fn("sink", { params: [b.param("q", b.type("qubit"))], body: [] }),
    ]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is not consumed before the function exits",
    ]);
  });

  it("rejects use after consumption", () => {
    const result = checkUnit((b) => [
      b.fn("twice", {
        returns: b.type("bool"),
        body: [
          b.assign("q", b.call("qubit")),
          b.assign("first", b.call("measure", [b.name("q")])),
          b.ret(b.call("measure", [b.name("q")])),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0002"]);
    expect(messagesOf(result)).toEqual(["q is used after it was consumed"]);
  });

  it("rejects branches that disagree on consumption", () => {
    const result = checkUnit((b) => [
      b.fn("branchy", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("q", b.call("qubit")),
          b.if(b.name("c"), [b.expr(b.call("discard", [b.name("q")]))]),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0004"]);
    expect(messagesOf(result)).toEqual([
      "q is consumed on some branches but not on others",
    ]);
  });

  it("accepts a conditional gate followed by an unconditional measurement", () => {
    const result = checkUnit((b) => [
      b.fn("maybe_flip", {
        params: [b.param("c", b.type("bool"))],
        returns: b.type("bool"),
        body: [
          b.assign("q", b.call("qubit")),
          b.if(b.name("c"), [b.expr(b.call("x", [b.name("q")]))]),
          b.ret(b.call("measure", [b.name("q")])),
        ],
      }),
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it("rejects a qubit bound on only one branch", () => {
    const result = checkUnit((b) => [
      b.fn("local", {
        params: [b.param("c", b.type("bool"))],
        body: [b.if(b.name("c"), [b.assign("q", b.call("qubit"))])],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is only bound on some paths and leaks at the merge",
    ]);
  });

  it("reports copyable names assigned on only some paths", () => {
    const result = checkUnit((b) => [
      b.fn("late", {
        params: [b.param("c", b.type("bool"))],
        returns: b.type("int"),
        body: [
          b.if(b.name("c"), [b.assign("y", b.int(1))]),
          b.ret(b.name("y")),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0001"]);
    expect(messagesOf(result)).toEqual([
      "y is used before it is assigned on every path",
    ]);
  });

  it("rejects a loop that consumes a qubit from outside the loop", () => {
    const result = checkUnit((b) => [
      b.fn("loopy", {
        body: [
          b.assign("q", b.call("qubit")),
          b.forRange("i", b.int(3), [b.expr(b.call("discard", [b.name("q")]))]),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0004"]);
    expect(messagesOf(result)).toEqual([
      "q is consumed by the loop body but not restored before the next iteration",
    ]);
  });

  it("rejects a qubit allocated in a loop body and left live", () => {
    const result = checkUnit((b) => [
      b.fn("pile", {
        body: [b.forRange("i", b.int(2), [b.assign("q", b.call("qubit"))])],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is still live at the end of a loop iteration",
    ]);
  });

  it("accepts a qubit allocated and measured in each iteration", () => {
    const result = checkUnit((b) => [
      b.fn("sample", {
        body: [
          b.forRange("i", b.int(2), [
            b.assign("q", b.call("qubit")),
            b.expr(b.call("h", [b.name("q")])),
            b.assign("bit", b.call("measure", [b.name("q")])),
          ]),
        ],
      }),
    ]);
    expect(result.diagnostics).toEqual([]);
  });

  it("consumes each element of a linear array in a for loop", () => {
    const result = checkUnit((b) => [
      b.fn("drain", {
        params: [b.param("qs", b.arrayType(b.type("qubit"), 2))],
        body: [
          b.forEach("q", b.name("qs"), [b.expr(b.call("discard", [b.name("q")]))]),
        ],
      }),
      b.fn("early_exit", {
        params: [b.param("qs", b.arrayType(b.type("qubit"), 2))],
        body: [
          b.forEach("q", b.name("qs"), [
            b.expr(b.call("discard", [b.name("q")])),
            b.break(),
          ]),
        ],
      }),
    ]);
    expect(result.functions.has("drain")).toBe(true);
    expect(messagesOf(result)).toEqual([
      "moving q out of array[qubit, 2] leaks its remaining linear parts",
    ]);
  });

  it("requires borrowed parameters to hold a value at exit", () => {
    const result = checkUnit((b) => [
      b.fn("steal", {
        params: [b.param("q", b.type("qubit"), "borrowed")],
        body: [b.expr(b.call("discard", [b.name("q")]))],
      }),
      b.fn("touch", {
        params: [b.param("q", b.type("qubit"), "borrowed")],
        body: [b.expr(b.call("x", [b.name("q")]))],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0005"]);
    expect(messagesOf(result)).toEqual([
      "borrowed parameter q must still hold a value when the function exits",
    ]);
    expect(result.functions.has("touch")).toBe(true);
  });

  it("rejects moving one qubit out of a pair", () => {
    const result = checkUnit((b) => [
      b.fn("split", {
        returns: b.type("qubit"),
        body: [
          b.assign("pair", b.tuple(b.call("qubit"), b.call("qubit"))),
          b.ret(b.index(b.name("pair"), b.int(0))),
        ],
      }),
      b.fn("unpair", {
        returns: b.tupleType(b.type("bool"), b.type("bool")),
        body: [
          b.assign("pair", b.tuple(b.call("qubit"), b.call("qubit"))),
          b.assign(["a", "b"], b.name("pair")),
          b.ret(
            b.tuple(
              b.call("measure", [b.name("a")]),
              b.call("measure", [b.name("b")])
            )
          ),
        ],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "moving element 0 out of (qubit, qubit) leaks its remaining linear parts",
    ]);
    expect(result.functions.has("unpair")).toBe(true);
  });

  it("rejects linear temporaries that are dropped", () => {
    const result = checkUnit((b) => [
      b.fn("drop", { body: [b.expr(b.call("qubit"))] }),
    ]);
    expect(messagesOf(result)).toEqual([
      "a value of linear type qubit is dropped without being consumed",
    ]);
  });

  it("rejects reassigning a live qubit", () => {
    const result = checkUnit((b) => [
      b.fn("overwrite", {
        body: [
          b.assign("q", b.call("qubit")),
          b.assign("q", b.call("qubit")),
          b.expr(b.call("discard", [b.name("q")])),
        ],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "q of linear type qubit is reassigned before it was consumed",
    ]);
  });

  it("lets affine values go unused but not be used twice", () => {
    const result = checkUnit((b) => [
      b.fn("unused", { body: [b.assign("r", b.call("rng", [b.int(1)]))] }),
      b.fn("moved", {
        returns: b.type("int"),
        body: [
          b.assign("r", b.call("rng", [b.int(1)])),
          b.assign("s", b.name("r")),
          b.ret(b.call("random_int", [b.name("r")])),
        ],
      }),
    ]);
    expect(result.functions.has("unused")).toBe(true);
    expect(messagesOf(result)).toEqual(["r is used after it was consumed"]);
  });

  it("rejects moving a linear field out of a struct", () => {
    const result = checkUnit((b) => [
      b.struct("Duo", {
        fields: [
          ["a", b.type("qubit")],
          ["b", b.type("qubit")],
        ],
      }),
      b.fn("half", {
        returns: b.type("bool"),
        body: [
          b.assign(
            "d",
            b.structLiteral("Duo", { a: b.call("qubit"), b: b.call("qubit") })
          ),
          b.ret(b.call("measure", [b.field(b.name("d"), "a")])),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0003"]);
    expect(messagesOf(result)).toEqual([
      "moving field a out of Duo leaks its remaining linear parts",
    ]);
  });

  it("rejects moving an affine field out of a struct that still holds a qubit", () => {
    const result = checkUnit((b) => [
      b.struct("Cell", {
        fields: [
          ["q", b.type("qubit")],
          ["r", b.type("rng")],
        ],
      }),
      b.fn("take", { params: [b.param("r", b.type("rng"))], body: [] }),
      b.fn("leaky", {
        body: [
          b.assign(
            "c",
            b.structLiteral("Cell", { q: b.call("qubit"), r: b.call("rng", [b.int(1)]) })
          ),
          b.expr(b.call("take", [b.field(b.name("c"), "r")])),
        ],
      }),
    ]);
    expect(result.functions.has("take")).toBe(true);
    expect(messagesOf(result)).toEqual([
      "moving field r out of Cell leaks its remaining linear parts",
    ]);
  });

  it("checks the state carried back by continue", () => {
    const result = checkUnit((b) => [
      b.fn("skip", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("q", b.call("qubit")),
          b.forRange("i", b.int(3), [
            b.if(b.name("c"), [b.expr(b.call("discard", [b.name("q")])), b.continue()]),
          ]),
          b.expr(b.call("discard", [b.name("q")])),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0004"]);
    expect(messagesOf(result)).toEqual([
      "q is consumed by the loop body but not restored before the next iteration",
    ]);
  });

  it("treats the right operand of and as conditionally evaluated", () => {
    const result = checkUnit((b) => [
      b.fn("short_circuit", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("q", b.call("qubit")),
          b.assign("both", b.binary("and", b.name("c"), b.call("measure", [b.name("q")]))),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0004"]);
    expect(messagesOf(result)).toEqual([
      "q is consumed on some branches but not on others",
    ]);
  });

  it("rejects loops that move an affine value from outside the loop", () => {
    const result = checkUnit((b) => [
      b.fn("take", { params: [b.param("r", b.type("rng"))], body: [] }),
      b.fn("spin", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("r", b.call("rng", [b.int(1)])),
          b.while(b.name("c"), [b.expr(b.call("take", [b.name("r")]))]),
        ],
      }),
      b.fn("after", {
        params: [b.param("c", b.type("bool"))],
        returns: b.type("int"),
        body: [
          b.assign("r", b.call("rng", [b.int(1)])),
          b.while(b.name("c"), [b.expr(b.call("take", [b.name("r")]))]),
          b.ret(b.call("random_int", [b.name("r")])),
        ],
      }),
    ]);
    expect(codesOf(result)).toEqual(["LN0004", "LN0004"]);
    expect(messagesOf(result)).toEqual([
      "r is consumed by the loop body but not restored before the next iteration",
      "r is consumed by the loop body but not restored before the next iteration",
    ]);
    expect([...result.rejected]).toEqual(["spin", "after"]);
  });

  it("lets a loop move an affine value it rebinds or leaves through break", () => {
    const result = checkUnit((b) => [
      b.fn("take", { params: [b.param("r", b.type("rng"))], body: [] }),
      b.fn("refill", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.assign("r", b.call("rng", [b.int(1)])),
          b.while(b.name("c"), [
            b.expr(b.call("take", [b.name("r")])),
            b.assign("r", b.call("rng", [b.int(2)])),
          ]),
        ],
      }),
      b.fn("once", {
        params: [b.param("c", b.type("bool"))],
        returns: b.type("int"),
        body: [
          b.assign("r", b.call("rng", [b.int(1)])),
          b.while(b.name("c"), [b.expr(b.call("take", [b.name("r")])), b.break()]),
          b.ret(b.call("random_int", [b.name("r")])),
        ],
      }),
    ]);
    expect(result.functions.has("refill")).toBe(true);
    expect(messagesOf(result)).toEqual(["r is used after it was consumed"]);
    expect([...result.rejected]).toEqual(["once"]);
  });
});
