import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../../../diagnostics/index.js";
import { createTypingContext } from "../context.js";
import { formatSignature, isGenericSignature, SignatureTable, type Signature } from "../signature-table.js";

const span = { file: "unit.json", start: 4, end: 9 };

describe("signature table", () => {
  const setup = () => {
    const ctx = createTypingContext();
    const table = new SignatureTable({ arena: ctx.arena });
    const signature = (
      name: string,
      params: Signature["params"]
    ): Signature => ({
      name,
      kind: "function",
      typeParams: [],
      natParams: [],
      params,
      returnType: ctx.primitives.none,
      span,
    });
    return { ctx, table, signature };
  };

  it("accepts an identical re-registration", () => {
    const { ctx, table, signature } = setup();
    const first = table.register(
      signature("f", [{ name: "x", type: ctx.primitives.int, ownership: "owned" }])
    );
    const again = table.register(
      signature("f", [{ name: "x", type: ctx.primitives.int, ownership: "owned" }])
    );
    expect(again).toBe(first);
  });

  it("rejects a redefinition with a different arity", () => {
    const { ctx, table, signature } = setup();
    table.register(signature("f", [{ name: "x", type: ctx.primitives.int, ownership: "owned" }]));
    expect(() =>
      table.register(
        signature("f", [
          { name: "x", type: ctx.primitives.int, ownership: "owned" },
          { name: "y", type: ctx.primitives.int, ownership: "owned" },
        ])
      )
    ).toThrow("f is already defined with 1 parameter(s); cannot redefine it with 2");
  });

  it("rejects a redefinition with a different shape", () => {
    const { ctx, table, signature } = setup();
    table.register(signature("f", [{ name: "x", type: ctx.primitives.int, ownership: "owned" }]));
    let caught: unknown;
    try {
      table.register(
        signature("f", [{ name: "x", type: ctx.primitives.bool, ownership: "owned" }])
      );
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DiagnosticError);
    if (!(caught instanceof DiagnosticError)) return;
    expect(caught.diagnostic.code).toBe("SG0002");
    expect(caught.diagnostic.span).toEqual(span);
    expect(caught.diagnostic.message).toBe(
      "f is already defined as f(owned x: int) -> none; cannot redefine it as f(owned x: bool) -> none"
    );
  });

  it("is read-only once finalized", () => {
    const { table, signature } = setup();
    table.finalize();
    expect(table.finalized).toBe(true);
    expect(() => table.register(signature("g", []))).toThrow(
      "cannot register g after the signature table was finalized"
    );
  });

  it("raises on lookups of unknown names", () => {
    const { table } = setup();
    expect(table.get("missing")).toBeUndefined();
    expect(() => table.lookup("missing")).toThrow("unknown name missing");
  });

  it("registers the builtin prelude", () => {
    const { ctx } = setup();
    const render = (name: string) => formatSignature(ctx.arena, ctx.signatures.lookup(name));
    expect(render("measure")).toBe("measure(owned q: qubit) -> bool");
    expect(render("cx")).toBe(
      "cx(borrowed control: qubit, borrowed target: qubit) -> none"
    );
    expect(render("len")).toBe("len<T; n>(borrowed xs: array[T, n]) -> int");
    expect(render("qubit_array")).toBe("qubit_array<; n>() -> array[qubit, n]");
    expect(render("int.__add__")).toBe(
      "int.__add__(borrowed self: int, borrowed other: int) -> int"
    );
    expect(isGenericSignature(ctx.signatures.lookup("measure_array"))).toBe(true);
    expect(isGenericSignature(ctx.signatures.lookup("qubit"))).toBe(false);
  });
});
