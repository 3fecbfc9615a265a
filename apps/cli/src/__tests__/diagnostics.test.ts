import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { createDiagnostic, type Diagnostic } from "@qcheck/compiler";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic } from "../diagnostics.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturePath = resolve(__dirname, "fixtures/leak.json");
const fixtureSource = readFileSync(fixturePath, "utf8");

const findFixtureDiagnostic = (): { diagnostic: Diagnostic; line: number; column: number } => {
  const start = fixtureSource.indexOf('"leak"');
  if (start < 0) {
    throw new Error("fixture missing span target");
  }
  const lastNewline = fixtureSource.lastIndexOf("\n", start - 1);
  const line = fixtureSource.slice(0, start).split("\n").length;

  return {
    diagnostic: createDiagnostic({
      code: "LN0003",
      kind: "ResourceLeakError",
      message: "q of linear type qubit is not consumed before the function exits",
      subjects: ["q", "qubit"],
      span: { file: fixturePath, start, end: start + '"leak"'.length },
    }),
    line,
    column: start - lastNewline,
  };
};

describe("formatCliDiagnostic", () => {
  it("locates the span inside the unit file and underlines it", () => {
    const { diagnostic, line, column } = findFixtureDiagnostic();
    const lineText = fixtureSource.split("\n")[line - 1] ?? "";
    const indent = lineText.length - lineText.trimStart().length;

    const output = formatCliDiagnostic(diagnostic, { color: false });
    expect(output.split("\n")).toEqual([
      `error[LN0003] ResourceLeakError: ${diagnostic.message}`,
      `  --> ${fixturePath}:${line}:${column} (linearity)`,
      '   | "name": "leak",',
      `   | ${" ".repeat(column - 1 - indent)}^^^^^^`,
      "   = subjects: q, qubit",
    ]);
  });

  it("falls back to offsets when the file is not on disk", () => {
    const diagnostic = createDiagnostic({
      code: "TY0003",
      kind: "UnresolvedParameterError",
      message: "cannot infer n for call to qubit_array",
      span: { file: "missing/unit.json", start: 3, end: 7 },
      related: [
        createDiagnostic({
          code: "TY0003",
          kind: "UnresolvedParameterError",
          severity: "note",
          message: "n is declared here",
          span: { file: "missing/prelude.json", start: 1, end: 2 },
        }),
      ],
      hints: [{ message: "Annotate the target with array[qubit, 3]." }],
    });

    expect(formatCliDiagnostic(diagnostic, { color: false }).split("\n")).toEqual([
      "error[TY0003] UnresolvedParameterError: cannot infer n for call to qubit_array",
      `  --> ${resolve("missing/unit.json")}@3..7 (typing)`,
      "   = note: n is declared here",
      `     --> ${resolve("missing/prelude.json")}@1..2`,
      "   = hint: Annotate the target with array[qubit, 3].",
    ]);
  });

  it("colors the severity, code and underline when enabled", () => {
    const { diagnostic } = findFixtureDiagnostic();
    const [header, , , marker] = formatCliDiagnostic(diagnostic).split("\n");
    expect(header).toBe(
      `\u001B[1m\u001B[31merror\u001B[0m\u001B[0m[\u001B[35mLN0003\u001B[0m] ResourceLeakError: ${diagnostic.message}`
    );
    expect(marker?.endsWith("\u001B[31m^^^^^^\u001B[0m")).toBe(true);
  });
});
