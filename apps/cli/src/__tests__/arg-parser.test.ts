import { afterEach, describe, expect, it, vi } from "vitest";
import { getConfigFromCli, parseCliArgs } from "../config/arg-parser.js";

const runWithArgv = (argv: string[]) => {
  const originalArgv = process.argv;
  process.argv = argv;
  try {
    return getConfigFromCli();
  } finally {
    process.argv = originalArgv;
  }
};

describe("parseCliArgs", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reads the unit path with colored output by default", () => {
    const config = parseCliArgs(["unit.json"]);
    expect(config).toEqual({
      unit: "unit.json",
      emitTyped: undefined,
      monomorphise: undefined,
      maxSpecializationDepth: undefined,
      failFast: undefined,
      color: true,
    });
  });

  it("collects output and checking flags", () => {
    const config = parseCliArgs([
      "unit.json",
      "--monomorphise",
      "--emit-typed",
      "--max-specialization-depth",
      "8",
      "--fail-fast",
      "--no-color",
    ]);
    expect(config.unit).toBe("unit.json");
    expect(config.monomorphise).toBe(true);
    expect(config.emitTyped).toBe(true);
    expect(config.maxSpecializationDepth).toBe(8);
    expect(config.failFast).toBe(true);
    expect(config.color).toBe(false);
  });

  it("rejects a depth that is not a positive integer", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("exit");
    });

    expect(() =>
      parseCliArgs(["unit.json", "--max-specialization-depth", "0"])
    ).toThrow("exit");
    expect(String(stderr.mock.calls[0]?.[0])).toContain(
      'expected a positive integer, received "0"'
    );
  });

  it("reads process.argv when called without arguments", () => {
    const config = runWithArgv(["node", "qcheck", "program.json", "--fail-fast"]);
    expect(config.unit).toBe("program.json");
    expect(config.failFast).toBe(true);
  });
});
