import { describe, expect, it } from "vitest";
import { checkUnit, codesOf, messagesOf } from "../../__tests__/check-unit.js";

describe("function typing", () => {
  it("checks a well-typed quantum routine", () => {
    const result = checkUnit((b) => [
      b.fn("bell", {
        returns: b.tupleType(b.type("bool"), b.type("bool")),
        body: [
          b.assign("a", b.call("qubit")),
          b.assign("b", b.call("qubit")),
          b.expr(b.call("h", [b.name("a")])),
          b.expr(b.call("cx", [b.name("a"), b.name("b")])),
          b.ret(
            b.tuple(
              b.call("measure", [b.name("a")]),
              b.call("measure", [b.name("b")])
            )
          ),
        ],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    const bell = result.functions.get("bell");
    expect(bell && result.arena.format(bell.returnType)).toBe("(bool, bool)");
    expect(bell?.body.statements.map((statement) => statement.kind)).toEqual([
      "assign",
      "assign",
      "expr",
      "expr",
      "return",
    ]);
  });

  it("rejects a name bound to different types on two branches", () => {
    const result = checkUnit((b) => [
      b.fn("pick", {
        params: [b.param("c", b.type("bool"))],
        body: [
          b.if(
            b.name("c"),
            [b.assign("x", b.int(1))],
            [b.assign("x", b.bool(true))]
          ),
        ],
      }),
    ]);

    expect(codesOf(result)).toEqual(["TY0002"]);
    expect(messagesOf(result)).toEqual([
      "x has type int on one path and bool on another",
    ]);
    expect(result.rejected.has("pick")).toBe(true);
    expect(result.functions.has("pick")).toBe(false);
  });

  it("merges a name reassigned on one branch with its unchanged value", () => {
    const result = checkUnit((b) => [
      b.fn("bump", {
        params: [b.param("x", b.type("int")), b.param("c", b.type("bool"))],
        returns: b.type("int"),
        body: [b.if(b.name("c"), [b.assign("x", b.int(4))]), b.ret(b.name("x"))],
      }),
    ]);
    expect(result.diagnostics).toEqual([]);
    const [, ret] = result.functions.get("bump")?.body.statements ?? [];
    expect(
      ret?.kind === "return" && ret.value ? result.arena.format(ret.value.type) : undefined
    ).toBe("int");
  });

  it("rejects a loop body that changes the type of an outer name", () => {
    const result = checkUnit((b) => [
      b.fn("spin", {
        body: [
          b.assign("i", b.int(0)),
          b.while(b.bool(true), [b.assign("i", b.bool(false))]),
        ],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "i has type int on one path and bool on another",
    ]);
  });

  it("cannot infer the length of an unannotated qubit_array call", () => {
    const result = checkUnit((b) => [
      b.fn("alloc", {
        body: [
          b.assign("qs", b.call("qubit_array")),
          b.expr(b.call("measure_array", [b.name("qs")])),
        ],
      }),
    ]);

    expect(codesOf(result)).toEqual(["TY0003"]);
    expect(messagesOf(result)).toEqual(["cannot infer n for call to qubit_array"]);
    expect(result.diagnostics[0]?.hints?.[0]?.message).toContain("Annotate");
  });

  it("infers the length of qubit_array from the annotated target", () => {
    const result = checkUnit((b) => [
      b.fn("alloc", {
        returns: b.arrayType(b.type("bool"), 3),
        body: [
          b.assign("qs", b.call("qubit_array"), b.arrayType(b.type("qubit"), 3)),
          b.assign("bits", b.call("measure_array", [b.name("qs")])),
          b.ret(b.name("bits")),
        ],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    const [allocate, measured] = result.functions.get("alloc")?.body.statements ?? [];
    expect(allocate?.kind === "assign" && allocate.value.kind === "call"
      ? allocate.value.natArgs
      : undefined
    ).toEqual([{ kind: "nat-literal", value: 3 }]);
    expect(
      measured?.kind === "assign" && measured.target.kind === "name"
        ? result.arena.format(measured.target.binding.type)
        : undefined
    ).toBe("array[bool, 3]");
  });

  it("requires a return on every path of a function with a result", () => {
    const result = checkUnit((b) => [
      b.fn("maybe", {
        params: [b.param("c", b.type("bool"))],
        returns: b.type("int"),
        body: [b.if(b.name("c"), [b.ret(b.int(1))])],
      }),
    ]);
    expect(codesOf(result)).toEqual(["TY0004"]);
    expect(messagesOf(result)).toEqual(["maybe must return int on every path"]);
  });

  it("rejects break outside of a loop", () => {
    const result = checkUnit((b) => [b.fn("stray", { body: [b.break()] })]);
    expect(codesOf(result)).toEqual(["TY0005"]);
    expect(messagesOf(result)).toEqual(["break outside of a loop"]);
  });

  it("reports argument mismatches against the parameter type", () => {
    const result = checkUnit((b) => [
      b.fn("bad", { body: [b.expr(b.call("measure", [b.int(1)]))] }),
    ]);
    expect(messagesOf(result)).toEqual([
      "type mismatch in argument q of measure: expected qubit, got int",
    ]);
  });

  it("types operators as calls to the operand type's methods", () => {
    const result = checkUnit((b) => [
      b.fn("arith", {
        returns: b.type("angle"),
        body: [
          b.assign("x", b.binary("+", b.int(1), b.int(2))),
          b.assign("ok", b.binary("<", b.name("x"), b.int(3))),
          b.assign("theta", b.call("angle", [b.float(0.5)])),
          b.ret(b.binary("*", b.name("theta"), b.float(2.0))),
        ],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    const [sum, compare] = result.functions.get("arith")?.body.statements ?? [];
    expect(sum?.kind === "assign" && sum.value.kind === "call" ? sum.value.callee : undefined).toBe(
      "int.__add__"
    );
    expect(
      compare?.kind === "assign" ? result.arena.format(compare.value.type) : undefined
    ).toBe("bool");
  });

  it("rejects operators the operand type does not define", () => {
    const result = checkUnit((b) => [
      b.fn("nonsense", {
        body: [b.expr(b.binary("+", b.bool(true), b.bool(false)))],
      }),
    ]);
    expect(messagesOf(result)).toEqual(["operator + is not defined for bool"]);
  });

  it("requires boolean operands for and/or", () => {
    const result = checkUnit((b) => [
      b.fn("logic", {
        body: [b.assign("z", b.binary("and", b.bool(true), b.int(1)))],
      }),
    ]);
    expect(messagesOf(result)).toEqual([
      "type mismatch in operand of and: expected bool, got int",
    ]);
  });

  it("infers generic struct arguments from literal fields", () => {
    const result = checkUnit((b) => [
      b.struct("Pair", {
        typeParams: ["T"],
        fields: [
          ["first", b.type("T")],
          ["second", b.type("T")],
        ],
      }),
      b.fn("left", {
        returns: b.type("int"),
        body: [
          b.assign("p", b.structLiteral("Pair", { first: b.int(1), second: b.int(2) })),
          b.ret(b.field(b.name("p"), "first")),
        ],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    const [assign] = result.functions.get("left")?.body.statements ?? [];
    expect(
      assign?.kind === "assign" && assign.target.kind === "name"
        ? result.arena.format(assign.target.binding.type)
        : undefined
    ).toBe("Pair<int>");
  });

  it("rejects structs named after a primitive type", () => {
    const result = checkUnit((b) => [
      b.struct("qubit", { fields: [["level", b.type("int")]] }),
      b.fn("sample", {
        returns: b.type("bool"),
        body: [b.assign("q", b.call("qubit")), b.ret(b.call("measure", [b.name("q")]))],
      }),
    ]);

    expect(codesOf(result)).toEqual(["SG0002"]);
    expect(messagesOf(result)).toEqual([
      "qubit is a primitive type and cannot be redefined",
    ]);
    expect([...result.rejected]).toEqual(["qubit"]);
    expect(result.functions.has("sample")).toBe(true);
  });

  it("reports struct literals missing a field", () => {
    const result = checkUnit((b) => [
      b.struct("Pair", {
        typeParams: ["T"],
        fields: [
          ["first", b.type("T")],
          ["second", b.type("T")],
        ],
      }),
      b.fn("half", {
        body: [b.assign("p", b.structLiteral("Pair", { first: b.int(1) }))],
      }),
    ]);
    expect(codesOf(result)).toEqual(["TY0006"]);
    expect(messagesOf(result)).toEqual(["missing field second when constructing Pair"]);
  });

  it("calls methods with the receiver as self", () => {
    const result = checkUnit((b) => [
      b.struct("Counter", {
        fields: [["value", b.type("int")]],
        methods: [
          b.method("get", "borrowed", {
            returns: b.type("int"),
            body: [b.ret(b.field(b.name("self"), "value"))],
          }),
        ],
      }),
      b.fn("read", {
        returns: b.type("int"),
        body: [
          b.assign("c", b.structLiteral("Counter", { value: b.int(3) })),
          b.ret(b.methodCall(b.name("c"), "get")),
        ],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    expect([...result.functions.keys()]).toEqual(["Counter.get", "read"]);
    expect(result.functions.get("Counter.get")?.params[0]?.ownership).toBe("borrowed");
  });

  it("enforces the ownership bound of a type parameter", () => {
    const result = checkUnit((b) => [
      b.fn("dup", {
        typeParams: ["T"],
        params: [b.param("x", b.type("T"))],
        returns: b.tupleType(b.type("T"), b.type("T")),
        body: [b.ret(b.tuple(b.name("x"), b.name("x")))],
      }),
      b.fn("clone_qubit", {
        returns: b.tupleType(b.type("qubit"), b.type("qubit")),
        body: [b.ret(b.call("dup", [b.call("qubit")]))],
      }),
    ]);

    expect(result.functions.has("dup")).toBe(true);
    expect(messagesOf(result)).toEqual([
      "qubit is linear and cannot instantiate T, which must be copyable",
    ]);
    expect([...result.rejected]).toEqual(["clone_qubit"]);
  });

  it("destructures tuples of matching arity only", () => {
    const result = checkUnit((b) => [
      b.fn("unpack", {
        body: [b.assign(["a", "b", "c"], b.tuple(b.int(1), b.bool(true)))],
      }),
    ]);
    expect(messagesOf(result)).toEqual(["cannot destructure (int, bool) into 3 name(s)"]);
  });

  it("iterates arrays by element and ranges by int", () => {
    const result = checkUnit((b) => [
      b.fn("total", {
        params: [b.param("xs", b.arrayType(b.type("int"), 3), "borrowed")],
        returns: b.type("int"),
        body: [
          b.assign("sum", b.int(0)),
          b.forEach("x", b.name("xs"), [
            b.assign("sum", b.binary("+", b.name("sum"), b.name("x"))),
          ]),
          b.ret(b.name("sum")),
        ],
      }),
      b.fn("bad_range", {
        body: [b.forRange("i", b.bool(true), [])],
      }),
    ]);

    expect(result.functions.has("total")).toBe(true);
    expect(messagesOf(result)).toEqual([
      "type mismatch in range stop: expected int, got bool",
    ]);
  });

  it("reads nat parameters as int values", () => {
    const result = checkUnit((b) => [
      b.fn("size", {
        natParams: ["n"],
        params: [b.param("qs", b.arrayType(b.type("qubit"), "n"), "borrowed")],
        returns: b.type("int"),
        body: [b.ret(b.name("n"))],
      }),
    ]);

    expect(result.diagnostics).toEqual([]);
    const [ret] = result.functions.get("size")?.body.statements ?? [];
    expect(ret?.kind === "return" ? ret.value?.kind : undefined).toBe("nat-ref");
  });

  it("distinguishes unknown names from names assigned later", () => {
    const result = checkUnit((b) => [
      b.fn("lost", { returns: b.type("int"), body: [b.ret(b.name("ghost"))] }),
      b.fn("early", {
        returns: b.type("int"),
        body: [b.ret(b.name("z")), b.assign("z", b.int(1))],
      }),
    ]);

    expect(messagesOf(result)).toEqual([
      "unknown name ghost",
      "z is used before it is assigned on every path",
    ]);
    expect(result.diagnostics[1]?.phase).toBe("typing");
  });
});
