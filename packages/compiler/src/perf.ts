const COMPILER_PERF_ENV = "QCHECK_COMPILER_PERF";

export type CompilerPerfCounter =
  | "definitions.checked"
  | "definitions.rejected"
  | "specializations.cache-hit"
  | "specializations.cache-miss";

export type CompilerPerfPhase = "check" | "monomorphise";

const PHASES: readonly CompilerPerfPhase[] = ["check", "monomorphise"];

export interface CompilerPerfReport {
  unit: string;
  success: boolean;
  diagnostics: number;
  phasesMs: Partial<Record<CompilerPerfPhase, number>>;
  counters: Record<CompilerPerfCounter, number>;
}

/** `1`, `true` and `yes` in `QCHECK_COMPILER_PERF` turn recording on. */
export const compilerPerfEnabled = (
  env: NodeJS.ProcessEnv = process.env,
): boolean => {
  const raw = env[COMPILER_PERF_ENV];
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const roundMs = (value: number): number =>
  Math.round(value * 1000) / 1000;

/**
 * Counters and phase timings of one compilation unit. A disabled recorder
 * runs phases untimed and drops counts.
 */
export class CompilerPerfRecorder {
  readonly enabled: boolean;
  readonly #counters: Record<CompilerPerfCounter, number> = {
    "definitions.checked": 0,
    "definitions.rejected": 0,
    "specializations.cache-hit": 0,
    "specializations.cache-miss": 0,
  };
  readonly #phasesMs: Partial<Record<CompilerPerfPhase, number>> = {};

  constructor({ enabled = compilerPerfEnabled() }: { enabled?: boolean } = {}) {
    this.enabled = enabled;
  }

  count(counter: CompilerPerfCounter, amount = 1): void {
    if (!this.enabled) return;
    this.#counters[counter] += amount;
  }

  time<T>(phase: CompilerPerfPhase, run: () => T): T {
    if (!this.enabled) return run();
    const start = performance.now();
    try {
      return run();
    } finally {
      this.#phasesMs[phase] =
        (this.#phasesMs[phase] ?? 0) + performance.now() - start;
    }
  }

  report({
    unit,
    success,
    diagnostics,
  }: Pick<CompilerPerfReport, "unit" | "success" | "diagnostics">): CompilerPerfReport {
    const phasesMs: Partial<Record<CompilerPerfPhase, number>> = {};
    PHASES.forEach((phase) => {
      const value = this.#phasesMs[phase];
      if (value !== undefined) phasesMs[phase] = roundMs(value);
    });
    return { unit, success, diagnostics, phasesMs, counters: { ...this.#counters } };
  }
}

export const logCompilerPerfReport = (report: CompilerPerfReport): void => {
  console.error(`[qcheck:compiler:perf] ${JSON.stringify(report)}`);
};
