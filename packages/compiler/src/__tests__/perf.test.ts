import { afterEach, describe, expect, it, vi } from "vitest";
import { CompilerPerfRecorder, compilerPerfEnabled } from "../perf.js";
import { compileUnit } from "../pipeline.js";
import { createHirBuilder, type HirDefinition } from "../semantics/hir/index.js";

const countingUnit = (): HirDefinition[] => {
  const b = createHirBuilder({ file: "count.json" });
  return [
    b.fn("count", {
      typeParams: ["T"],
      natParams: ["n"],
      params: [b.param("xs", b.arrayType(b.type("T"), "n"), "borrowed")],
      returns: b.type("int"),
      body: [b.ret(b.name("n"))],
    }),
    b.fn("main", {
      returns: b.type("int"),
      body: [
        b.assign("a", b.array(b.int(1), b.int(2), b.int(3))),
        b.assign("b", b.array(b.bool(true), b.bool(false))),
        b.ret(
          b.binary(
            "+",
            b.binary("+", b.call("count", [b.name("a")]), b.call("count", [b.name("a")])),
            b.call("count", [b.name("b")])
          )
        ),
      ],
    }),
    b.fn("leak", { body: [b.assign("q", b.call("qubit"))] }),
  ];
};

describe("compiler perf reporting", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("reads the perf switch from the environment", () => {
    expect(compilerPerfEnabled({ QCHECK_COMPILER_PERF: " Yes " })).toBe(true);
    expect(compilerPerfEnabled({ QCHECK_COMPILER_PERF: "1" })).toBe(true);
    expect(compilerPerfEnabled({ QCHECK_COMPILER_PERF: "0" })).toBe(false);
    expect(compilerPerfEnabled({})).toBe(false);
  });

  it("reports nothing while recording is off", () => {
    vi.stubEnv("QCHECK_COMPILER_PERF", "");
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const result = compileUnit({ definitions: countingUnit() });
    expect(result.perf).toBeUndefined();
    expect(log).not.toHaveBeenCalled();
  });

  it("counts checked definitions and specialization cache use", () => {
    vi.stubEnv("QCHECK_COMPILER_PERF", "1");
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const result = compileUnit({
      definitions: countingUnit(),
      options: { unit: "count.json" },
    });

    expect(result.perf).toMatchObject({
      unit: "count.json",
      success: false,
      diagnostics: 1,
      counters: {
        "definitions.checked": 3,
        "definitions.rejected": 1,
        "specializations.cache-hit": 1,
        "specializations.cache-miss": 3,
      },
    });
    expect(Object.keys(result.perf?.phasesMs ?? {})).toEqual(["check", "monomorphise"]);
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toBe(
      `[qcheck:compiler:perf] ${JSON.stringify(result.perf)}`
    );
  });

  it("leaves counters at zero on a disabled recorder", () => {
    const perf = new CompilerPerfRecorder({ enabled: false });
    perf.count("definitions.checked");
    expect(perf.time("check", () => 7)).toBe(7);
    expect(perf.report({ unit: "u", success: true, diagnostics: 0 })).toEqual({
      unit: "u",
      success: true,
      diagnostics: 0,
      phasesMs: {},
      counters: {
        "definitions.checked": 0,
        "definitions.rejected": 0,
        "specializations.cache-hit": 0,
        "specializations.cache-miss": 0,
      },
    });
  });
});
