import { createTypeArena, type TypeArena } from "./type-arena.js";
import {
  internPrimitives,
  primitiveOwnership,
  registerPrelude,
} from "./builtins.js";
import { createOwnershipClassifier } from "./ownership.js";
import { SignatureTable } from "./signature-table.js";
import {
  StructStore,
  type CheckOptions,
  type ResolvedCheckOptions,
  type TypingContext,
} from "./types.js";
import { DiagnosticEmitter } from "../../diagnostics/index.js";
import { CompilerPerfRecorder } from "../../perf.js";

export const DEFAULT_MAX_SPECIALIZATION_DEPTH = 64;

const normalizeBudgetLimit = ({
  value,
  fallback,
}: {
  value: number | undefined;
  fallback: number;
}): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(1, Math.trunc(value));
};

export const resolveCheckOptions = (
  options?: CheckOptions
): ResolvedCheckOptions => ({
  maxSpecializationDepth: normalizeBudgetLimit({
    value: options?.maxSpecializationDepth,
    fallback: DEFAULT_MAX_SPECIALIZATION_DEPTH,
  }),
  recoverDiagnosticErrors: options?.recoverDiagnosticErrors ?? true,
});

export const createTypingContext = ({
  arena = createTypeArena(),
  options,
  perf = new CompilerPerfRecorder({ enabled: false }),
}: {
  arena?: TypeArena;
  options?: CheckOptions;
  perf?: CompilerPerfRecorder;
} = {}): TypingContext => {
  const primitives = internPrimitives(arena);
  const signatures = new SignatureTable({ arena });
  const structs = new StructStore({ arena });
  const ownership = createOwnershipClassifier({
    arena,
    leaves: primitiveOwnership,
    structFieldTypes: (type) =>
      structs.fieldsOf(type)?.map((field) => field.type),
  });

  registerPrelude({ arena, table: signatures, primitives });

  return {
    arena,
    primitives,
    signatures,
    structs,
    ownership,
    diagnostics: new DiagnosticEmitter(),
    options: resolveCheckOptions(options),
    perf,
  };
};
