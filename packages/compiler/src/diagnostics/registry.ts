import type {
  DiagnosticHint,
  DiagnosticKind,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  kind: DiagnosticKind;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const annotationHint: DiagnosticHint = {
  message:
    "Annotate the assignment target or pass explicit type/nat arguments so the missing parameters can be inferred.",
};

type DiagnosticParamsMap = {
  SG0001:
    | { kind: "unknown-name"; name: string }
    | { kind: "unknown-type"; name: string }
    | { kind: "unknown-nat"; name: string }
    | { kind: "unknown-field"; name: string; receiver: string }
    | { kind: "unknown-method"; name: string; receiver: string }
    | { kind: "unknown-operator"; operator: string; operand: string }
    | { kind: "unchecked-definition"; name: string };
  SG0002:
    | {
        kind: "incompatible-arity";
        name: string;
        existingArity: number;
        arity: number;
      }
    | {
        kind: "incompatible-signature";
        name: string;
        existing: string;
        incoming: string;
      }
    | { kind: "duplicate-member"; owner: string; name: string }
    | { kind: "primitive-name"; name: string };
  TY0001:
    | { kind: "type-mismatch"; context: string; expected: string; actual: string }
    | {
        kind: "ownership-bound";
        parameter: string;
        bound: string;
        actual: string;
        ownership: string;
      }
    | { kind: "not-callable"; name: string; actual: string }
    | { kind: "not-indexable"; actual: string }
    | { kind: "no-fields"; field: string; actual: string }
    | { kind: "tuple-arity"; expected: number; actual: string };
  TY0002: { name: string; left: string; right: string };
  TY0003:
    | { kind: "unresolved-parameters"; callee: string; parameters: readonly string[] }
    | { kind: "empty-array" }
    | { kind: "bare-none" };
  TY0004: { functionName: string; returnType: string };
  TY0005: { statement: "break" | "continue" };
  TY0006: { struct: string; field: string };
  LN0001: { name: string };
  LN0002: { name: string };
  LN0003:
    | { kind: "unconsumed-at-exit"; name: string; type: string }
    | { kind: "branch-local"; name: string; type: string }
    | { kind: "loop-local"; name: string; type: string }
    | { kind: "overwritten"; name: string; type: string }
    | { kind: "dropped-temporary"; type: string }
    | { kind: "partial-move"; container: string; part: string };
  LN0004: { kind: "branches" | "loop"; name: string };
  LN0005: { name: string };
  MO0001: {
    kind: "type-arguments" | "nat-arguments" | "call-arguments";
    name: string;
    expected: number;
    actual: number;
  };
  MO0002:
    | { kind: "open-argument"; name: string; argument: string }
    | { kind: "open-signature"; name: string; type: string };
  MO0003:
    | { kind: "cycle"; key: string; chain: readonly string[] }
    | { kind: "depth"; key: string; limit: number }
    | { kind: "recursive-struct"; key: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  SG0001: {
    code: "SG0001",
    kind: "UnknownNameError",
    message: (params) => {
      switch (params.kind) {
        case "unknown-name":
          return `unknown name ${params.name}`;
        case "unknown-type":
          return `unknown type ${params.name}`;
        case "unknown-nat":
          return `unknown nat parameter ${params.name}`;
        case "unknown-field":
          return `${params.receiver} has no field ${params.name}`;
        case "unknown-method":
          return `${params.receiver} has no method ${params.name}`;
        case "unknown-operator":
          return `operator ${params.operator} is not defined for ${params.operand}`;
        case "unchecked-definition":
          return `${params.name} was rejected during checking and cannot be specialized`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "signatures",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0001"]>,
  SG0002: {
    code: "SG0002",
    kind: "DuplicateDefinitionError",
    message: (params) => {
      switch (params.kind) {
        case "incompatible-arity":
          return `${params.name} is already defined with ${params.existingArity} parameter(s); cannot redefine it with ${params.arity}`;
        case "incompatible-signature":
          return `${params.name} is already defined as ${params.existing}; cannot redefine it as ${params.incoming}`;
        case "duplicate-member":
          return `${params.owner} declares ${params.name} more than once`;
        case "primitive-name":
          return `${params.name} is a primitive type and cannot be redefined`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "signatures",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["SG0002"]>,
  TY0001: {
    code: "TY0001",
    kind: "TypeMismatchError",
    message: (params) => {
      switch (params.kind) {
        case "type-mismatch":
          return `type mismatch in ${params.context}: expected ${params.expected}, got ${params.actual}`;
        case "ownership-bound":
          return `${params.actual} is ${params.ownership} and cannot instantiate ${params.parameter}, which must be ${params.bound}`;
        case "not-callable":
          return `${params.name} has type ${params.actual} and cannot be called`;
        case "not-indexable":
          return `cannot index into a value of type ${params.actual}`;
        case "no-fields":
          return `cannot read field ${params.field} of a value of type ${params.actual}`;
        case "tuple-arity":
          return `cannot destructure ${params.actual} into ${params.expected} name(s)`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    kind: "InconsistentBindingTypeError",
    message: (params) =>
      `${params.name} has type ${params.left} on one path and ${params.right} on another`,
    severity: "error",
    phase: "typing",
    hints: [
      {
        message:
          "Assign values of the same type on every branch, or use distinct names.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    kind: "UnresolvedParameterError",
    message: (params) => {
      switch (params.kind) {
        case "unresolved-parameters":
          return `cannot infer ${params.parameters.join(", ")} for call to ${params.callee}`;
        case "empty-array":
          return "cannot infer the element type of an empty array literal";
        case "bare-none":
          return "cannot infer the type of none";
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "typing",
    hints: [annotationHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    kind: "MissingReturnError",
    message: (params) =>
      `${params.functionName} must return ${params.returnType} on every path`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    kind: "LoopControlOutsideLoopError",
    message: (params) => `${params.statement} outside of a loop`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    kind: "MissingFieldError",
    message: (params) =>
      `missing field ${params.field} when constructing ${params.struct}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  LN0001: {
    code: "LN0001",
    kind: "UseBeforeDefinitionError",
    message: (params) =>
      `${params.name} is used before it is assigned on every path`,
    severity: "error",
    phase: "linearity",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LN0001"]>,
  LN0002: {
    code: "LN0002",
    kind: "UseAfterConsumeError",
    message: (params) => `${params.name} is used after it was consumed`,
    severity: "error",
    phase: "linearity",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LN0002"]>,
  LN0003: {
    code: "LN0003",
    kind: "ResourceLeakError",
    message: (params) => {
      switch (params.kind) {
        case "unconsumed-at-exit":
          return `${params.name} of linear type ${params.type} is not consumed before the function exits`;
        case "branch-local":
          return `${params.name} of linear type ${params.type} is only bound on some paths and leaks at the merge`;
        case "loop-local":
          return `${params.name} of linear type ${params.type} is still live at the end of a loop iteration`;
        case "overwritten":
          return `${params.name} of linear type ${params.type} is reassigned before it was consumed`;
        case "dropped-temporary":
          return `a value of linear type ${params.type} is dropped without being consumed`;
        case "partial-move":
          return `moving ${params.part} out of ${params.container} leaks its remaining linear parts`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "linearity",
    hints: [
      {
        message:
          "Pass linear values to an owned parameter, return them, or call a consuming operation such as measure or discard.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LN0003"]>,
  LN0004: {
    code: "LN0004",
    kind: "InconsistentConsumptionError",
    message: (params) =>
      params.kind === "branches"
        ? `${params.name} is consumed on some branches but not on others`
        : `${params.name} is consumed by the loop body but not restored before the next iteration`,
    severity: "error",
    phase: "linearity",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LN0004"]>,
  LN0005: {
    code: "LN0005",
    kind: "BorrowedResourceConsumedError",
    message: (params) =>
      `borrowed parameter ${params.name} must still hold a value when the function exits`,
    severity: "error",
    phase: "linearity",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LN0005"]>,
  MO0001: {
    code: "MO0001",
    kind: "ArityMismatchError",
    message: (params) => {
      const what =
        params.kind === "type-arguments"
          ? "type argument(s)"
          : params.kind === "nat-arguments"
            ? "nat argument(s)"
            : "argument(s)";
      return `${params.name} expects ${params.expected} ${what}, received ${params.actual}`;
    },
    severity: "error",
    phase: "monomorphisation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MO0001"]>,
  MO0002: {
    code: "MO0002",
    kind: "UnresolvedGenericError",
    message: (params) =>
      params.kind === "open-argument"
        ? `cannot specialize ${params.name} with non-concrete argument ${params.argument}`
        : `specialization of ${params.name} leaves ${params.type} unresolved`,
    severity: "error",
    phase: "monomorphisation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MO0002"]>,
  MO0003: {
    code: "MO0003",
    kind: "RecursiveMonomorphisationError",
    message: (params) => {
      switch (params.kind) {
        case "cycle":
          return `specialization of ${params.key} requires itself (${[...params.chain, params.key].join(" -> ")})`;
        case "depth":
          return `specialization of ${params.key} exceeds the nesting limit of ${params.limit}`;
        case "recursive-struct":
          return `struct ${params.key} contains itself`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "monomorphisation",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MO0003"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
