import type { HirDefinition } from "./semantics/hir/index.js";
import {
  checkCompilationUnit,
  monomorphiseProgram,
  type CompilationResult,
  type MonomorphisedProgram,
} from "./semantics/pipeline.js";
import type { CheckOptions } from "./semantics/typing/types.js";
import type { Diagnostic } from "./diagnostics/index.js";
import {
  CompilerPerfRecorder,
  logCompilerPerfReport,
  type CompilerPerfReport,
} from "./perf.js";

/** Downstream consumer of a concrete program, such as a circuit emitter. */
export interface LoweringStage<T> {
  lower(program: MonomorphisedProgram): T;
}

export type CompileUnitOptions = CheckOptions & {
  /** Label used in perf summaries. */
  unit?: string;
  /** Stop after checking; no definition is specialized. */
  skipMonomorphisation?: boolean;
};

export type CompileUnitResult = {
  check: CompilationResult;
  program?: MonomorphisedProgram;
  diagnostics: readonly Diagnostic[];
  success: boolean;
  /** Present when `QCHECK_COMPILER_PERF` enables recording. */
  perf?: CompilerPerfReport;
};

export type LowerUnitResult<T> = CompileUnitResult & { lowered?: T };

export const compileUnit = ({
  definitions,
  options = {},
}: {
  definitions: readonly HirDefinition[];
  options?: CompileUnitOptions;
}): CompileUnitResult => {
  const perf = new CompilerPerfRecorder();

  const check = perf.time("check", () =>
    checkCompilationUnit({ definitions, options, perf })
  );
  const program = options.skipMonomorphisation
    ? undefined
    : perf.time("monomorphise", () => monomorphiseProgram(check));

  const diagnostics = program?.diagnostics ?? check.diagnostics;
  const success = !diagnostics.some((diagnostic) => diagnostic.severity === "error");

  if (!perf.enabled) return { check, program, diagnostics, success };

  const report = perf.report({
    unit: options.unit ?? "<unit>",
    success,
    diagnostics: diagnostics.length,
  });
  logCompilerPerfReport(report);
  return { check, program, diagnostics, success, perf: report };
};

/**
 * Checks and specializes a unit, then hands the concrete program to
 * `stage`. Nothing is lowered when any definition was rejected.
 */
export const compileToLowering = <T>({
  definitions,
  stage,
  options = {},
}: {
  definitions: readonly HirDefinition[];
  stage: LoweringStage<T>;
  options?: Omit<CompileUnitOptions, "skipMonomorphisation">;
}): LowerUnitResult<T> => {
  const result = compileUnit({ definitions, options });
  if (!result.success || !result.program) return result;
  return { ...result, lowered: stage.lower(result.program) };
};
