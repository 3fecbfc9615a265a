/**
 * Shared identifier aliases consumed by the signature table, typing,
 * linearity and monomorphisation phases. These are intentionally opaque so
 * downstream code cannot depend on their underlying representation.
 */
export type TypeId = number;
export type TypeParamId = number;
export type NatParamId = number;

/** Canonical rendering of an instantiation key, e.g. `swap<int, qubit; 3>`. */
export type InstanceKey = string;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "../diagnostics/index.js";
