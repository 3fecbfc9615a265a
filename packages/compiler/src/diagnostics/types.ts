export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "signatures"
  | "typing"
  | "linearity"
  | "monomorphisation";

export interface SourceSpan {
  file: string;
  start: number;
  end: number;
}

export interface DiagnosticHint {
  message: string;
}

export type DiagnosticKind =
  | "UnknownNameError"
  | "DuplicateDefinitionError"
  | "TypeMismatchError"
  | "InconsistentBindingTypeError"
  | "UnresolvedParameterError"
  | "UseBeforeDefinitionError"
  | "UseAfterConsumeError"
  | "ResourceLeakError"
  | "InconsistentConsumptionError"
  | "ArityMismatchError"
  | "UnresolvedGenericError"
  | "RecursiveMonomorphisationError"
  | "MissingReturnError"
  | "LoopControlOutsideLoopError"
  | "MissingFieldError"
  | "BorrowedResourceConsumedError";

export interface Diagnostic {
  code: string;
  kind: DiagnosticKind;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  /** Names and rendered types the diagnostic is about. */
  subjects: readonly string[];
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
}

export type DiagnosticInput = {
  code: string;
  kind: DiagnosticKind;
  message: string;
  span: SourceSpan;
  subjects?: readonly string[];
  severity?: DiagnosticSeverity;
  related?: readonly Diagnostic[];
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};
