export * from "./diagnostics/index.js";
export * from "./semantics/hir/index.js";
export type { InstanceKey, NatParamId, TypeId, TypeParamId } from "./semantics/ids.js";
export {
  createTypeArena,
  emptySubstitution,
  natLiteral,
  natParam,
  natEquals,
  type NatArg,
  type Substitution,
  type TypeArena,
  type TypeDescriptor,
  type TypeParamBound,
  type UnificationResult,
} from "./semantics/typing/type-arena.js";
export {
  createOwnershipClassifier,
  joinOwnership,
  ownershipOfBound,
  satisfiesBound,
  type OwnershipClass,
  type OwnershipClassifier,
} from "./semantics/typing/ownership.js";
export {
  SignatureTable,
  formatSignature,
  isGenericSignature,
  type Signature,
  type SignatureKind,
  type SignatureParameter,
} from "./semantics/typing/signature-table.js";
export {
  createTypingContext,
  resolveCheckOptions,
  DEFAULT_MAX_SPECIALIZATION_DEPTH,
} from "./semantics/typing/context.js";
export type {
  CheckOptions,
  ResolvedCheckOptions,
  StructInfo,
  TypingContext,
} from "./semantics/typing/types.js";
export type * from "./semantics/typing/typed-nodes.js";
export { typeFunction } from "./semantics/typing/typing.js";
export { checkLinearity } from "./semantics/linearity/index.js";
export {
  MonomorphisationEngine,
  formatInstanceKey,
  type SpecializedFunction,
  type SpecializedStruct,
} from "./semantics/monomorphize/index.js";
export {
  checkCompilationUnit,
  monomorphiseProgram,
  type CompilationResult,
  type MonomorphisedProgram,
} from "./semantics/pipeline.js";
export {
  compileUnit,
  compileToLowering,
  type CompileUnitOptions,
  type CompileUnitResult,
  type LoweringStage,
  type LowerUnitResult,
} from "./pipeline.js";
export {
  CompilerPerfRecorder,
  compilerPerfEnabled,
  type CompilerPerfCounter,
  type CompilerPerfPhase,
  type CompilerPerfReport,
} from "./perf.js";
