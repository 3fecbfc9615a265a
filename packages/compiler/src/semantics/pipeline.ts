import type { HirDefinition } from "./hir/index.js";
import type { InstanceKey } from "./ids.js";
import { DiagnosticError, type Diagnostic } from "../diagnostics/index.js";
import type { CompilerPerfRecorder } from "../perf.js";
import { checkLinearity } from "./linearity/index.js";
import {
  MonomorphisationEngine,
  type SpecializedFunction,
  type SpecializedStruct,
} from "./monomorphize/index.js";
import { createTypingContext } from "./typing/context.js";
import { registerDefinitions, type DefinitionGuard } from "./typing/registry.js";
import { isGenericSignature, type SignatureTable } from "./typing/signature-table.js";
import type { TypeArena } from "./typing/type-arena.js";
import type { TypedFunction } from "./typing/typed-nodes.js";
import { typeFunction } from "./typing/typing.js";
import type { CheckOptions, StructStore, TypingContext } from "./typing/types.js";

export interface CompilationResult {
  ctx: TypingContext;
  arena: TypeArena;
  signatures: SignatureTable;
  structs: StructStore;
  /** Definitions that passed every check, keyed by signature name. */
  functions: ReadonlyMap<string, TypedFunction>;
  /** Names of definitions rejected with at least one diagnostic. */
  rejected: ReadonlySet<string>;
  diagnostics: readonly Diagnostic[];
}

export interface MonomorphisedProgram {
  functions: ReadonlyMap<InstanceKey, SpecializedFunction>;
  structs: ReadonlyMap<InstanceKey, SpecializedStruct>;
  /** Instances specialized as roots, in definition order. */
  roots: readonly InstanceKey[];
  /** Roots that could not be specialized. */
  rejected: ReadonlySet<string>;
  diagnostics: readonly Diagnostic[];
}

/**
 * Runs `run` for one definition. Diagnostics raised inside reject only that
 * definition when recovery is enabled; otherwise they propagate.
 */
const createDefinitionGuard = ({
  ctx,
  rejected,
}: {
  ctx: TypingContext;
  rejected: Set<string>;
}): DefinitionGuard => (name, run) => {
  try {
    run();
    return true;
  } catch (error) {
    if (!(error instanceof DiagnosticError)) throw error;
    // Errors raised by the signature table are thrown without being recorded.
    if (!ctx.diagnostics.diagnostics.includes(error.diagnostic)) {
      ctx.diagnostics.report(error.diagnostic);
    }
    if (!ctx.options.recoverDiagnosticErrors) throw error;
    rejected.add(name);
    ctx.perf.count("definitions.rejected");
    return false;
  }
};

/**
 * Registers every definition of a unit, finalizes the signature table, then
 * types and linearity-checks each function and method independently.
 */
export const checkCompilationUnit = ({
  definitions,
  options,
  perf,
}: {
  definitions: readonly HirDefinition[];
  options?: CheckOptions;
  /** Receives counters for this unit; recording is off without one. */
  perf?: CompilerPerfRecorder;
}): CompilationResult => {
  const ctx = createTypingContext({ options, perf });
  const rejected = new Set<string>();
  const guard = createDefinitionGuard({ ctx, rejected });

  const registration = registerDefinitions({ ctx, definitions, guard });
  registration.rejectedStructs.forEach((name) => rejected.add(name));
  ctx.signatures.finalize();

  const functions = new Map<string, TypedFunction>();
  registration.functions.forEach((registered) => {
    ctx.perf.count("definitions.checked");
    guard(registered.name, () => {
      const typed = typeFunction({ ctx, registered });
      checkLinearity({ ctx, fn: typed });
      functions.set(registered.name, typed);
    });
  });

  return {
    ctx,
    arena: ctx.arena,
    signatures: ctx.signatures,
    structs: ctx.structs,
    functions,
    rejected,
    diagnostics: ctx.diagnostics.diagnostics,
  };
};

/**
 * Specializes every checked non-generic function and method as a root.
 * Generic definitions are only reached through the calls that use them.
 */
export const monomorphiseProgram = (
  result: CompilationResult
): MonomorphisedProgram => {
  const { ctx } = result;
  const engine = new MonomorphisationEngine({ ctx, functions: result.functions });
  const roots: InstanceKey[] = [];
  const rejected = new Set<string>();
  const guard = createDefinitionGuard({ ctx, rejected });

  result.functions.forEach((fn, name) => {
    if (isGenericSignature(fn.signature)) return;
    guard(name, () => {
      roots.push(engine.specialize(name, [], [], fn.span).key);
    });
  });

  return {
    functions: new Map(engine.instances().map((instance) => [instance.key, instance])),
    structs: new Map(engine.structInstances().map((instance) => [instance.key, instance])),
    roots,
    rejected,
    diagnostics: ctx.diagnostics.diagnostics,
  };
};
