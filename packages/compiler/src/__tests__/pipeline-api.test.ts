import { describe, expect, it } from "vitest";
import { DiagnosticError } from "../diagnostics/index.js";
import { createHirBuilder, type HirDefinition } from "../semantics/hir/index.js";
import {
  compileToLowering,
  compileUnit,
  type CompileUnitResult,
  type LoweringStage,
} from "../pipeline.js";

const unitWith = (
  build: (b: ReturnType<typeof createHirBuilder>) => HirDefinition[]
): HirDefinition[] => build(createHirBuilder({ file: "main.json" }));

const mixedUnit = () =>
  unitWith((b) => [
    b.fn("ok", {
      returns: b.type("bool"),
      body: [b.ret(b.call("measure", [b.call("qubit")]))],
    }),
    b.fn("leak", { body: [b.assign("q", b.call("qubit"))] }),
  ]);

const expectCompileFailure = (result: CompileUnitResult): CompileUnitResult => {
  expect(result.success).toBe(false);
  if (result.success) {
    throw new Error("expected compile failure");
  }
  return result;
};

const listInstances: LoweringStage<string[]> = {
  lower: (program) => [...program.functions.keys()],
};

describe("compile unit API", () => {
  it("checks and specializes a unit", () => {
    const result = compileUnit({
      definitions: unitWith((b) => [
        b.fn("ok", {
          returns: b.type("bool"),
          body: [b.ret(b.call("measure", [b.call("qubit")]))],
        }),
      ]),
    });
    expect(result.success).toBe(true);
    expect(result.diagnostics).toEqual([]);
    expect(result.program?.roots).toEqual(["ok"]);
  });

  it("rejects only the failing definition", () => {
    const result = expectCompileFailure(compileUnit({ definitions: mixedUnit() }));
    expect([...result.check.rejected]).toEqual(["leak"]);
    expect([...result.check.functions.keys()]).toEqual(["ok"]);
    expect(result.program?.roots).toEqual(["ok"]);
    expect(result.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(["LN0003"]);
  });

  it("stops at the first error when recovery is disabled", () => {
    expect(() =>
      compileUnit({
        definitions: mixedUnit(),
        options: { recoverDiagnosticErrors: false },
      })
    ).toThrow(DiagnosticError);
  });

  it("can stop after checking", () => {
    const result = compileUnit({
      definitions: mixedUnit(),
      options: { skipMonomorphisation: true },
    });
    expect(result.program).toBeUndefined();
    expect(result.check.functions.has("ok")).toBe(true);
  });

  it("hands concrete programs to a lowering stage", () => {
    const lowered = compileToLowering({
      definitions: unitWith((b) => [
        b.fn("ok", {
          returns: b.type("bool"),
          body: [b.ret(b.call("measure", [b.call("qubit")]))],
        }),
      ]),
      stage: listInstances,
    });
    expect(lowered.lowered).toEqual(["ok"]);

    const failed = compileToLowering({ definitions: mixedUnit(), stage: listInstances });
    expect(failed.success).toBe(false);
    expect(failed.lowered).toBeUndefined();
  });

  it("records signature conflicts with the prelude once", () => {
    const result = expectCompileFailure(
      compileUnit({
        definitions: unitWith((b) => [
          b.fn("measure", {
            params: [b.param("q", b.type("int"))],
            returns: b.type("bool"),
            body: [b.ret(b.bool(true))],
          }),
        ]),
      })
    );
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "measure is already defined as measure(owned q: qubit) -> bool; cannot redefine it as measure(owned q: int) -> bool",
    ]);
    expect(result.check.rejected.has("measure")).toBe(true);
  });

  it("rejects duplicate definitions and self-containing structs", () => {
    const result = expectCompileFailure(
      compileUnit({
        definitions: unitWith((b) => [
          b.struct("Node", { fields: [["next", b.type("Node")]] }),
          b.fn("f", { body: [] }),
          b.fn("f", { body: [] }),
        ]),
      })
    );
    expect(result.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "struct Node contains itself",
      "compilation unit declares f more than once",
    ]);
    expect(result.diagnostics[0]?.phase).toBe("signatures");
    expect(result.check.rejected.has("Node")).toBe(true);
  });
});
