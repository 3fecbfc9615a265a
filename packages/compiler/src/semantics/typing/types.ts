import type { NatParamId, SourceSpan, TypeId, TypeParamId } from "../ids.js";
import type { DiagnosticEmitter } from "../../diagnostics/index.js";
import type { CompilerPerfRecorder } from "../../perf.js";
import type { PrimitiveTypes } from "./builtins.js";
import type { OwnershipClassifier } from "./ownership.js";
import type { SignatureTable } from "./signature-table.js";
import type { NatArg, TypeArena } from "./type-arena.js";
import type { Binding } from "./typed-nodes.js";

export interface CheckOptions {
  /** Longest chain of nested specializations before giving up. */
  maxSpecializationDepth?: number;
  /** Collect per-definition errors and keep going. Defaults to true. */
  recoverDiagnosticErrors?: boolean;
}

export interface ResolvedCheckOptions {
  maxSpecializationDepth: number;
  recoverDiagnosticErrors: boolean;
}

export interface StructField {
  name: string;
  type: TypeId;
  span?: SourceSpan;
}

export interface StructInfo {
  name: string;
  typeParams: readonly TypeParamId[];
  natParams: readonly NatParamId[];
  /** The struct applied to its own parameters. */
  type: TypeId;
  fields: readonly StructField[];
  span?: SourceSpan;
}

export class StructStore {
  #structs = new Map<string, StructInfo>();
  #fieldsByType = new Map<TypeId, readonly StructField[]>();
  readonly #arena: TypeArena;

  constructor({ arena }: { arena: TypeArena }) {
    this.#arena = arena;
  }

  declare(info: Omit<StructInfo, "fields" | "type">): StructInfo {
    const declared: StructInfo = {
      ...info,
      type: this.#arena.internStruct({
        name: info.name,
        typeArgs: info.typeParams.map((param) =>
          this.#arena.internTypeParamRef(param)
        ),
        natArgs: info.natParams.map((param) => ({ kind: "nat-param", param })),
      }),
      fields: [],
    };
    this.#structs.set(info.name, declared);
    return declared;
  }

  defineFields(name: string, fields: readonly StructField[]): StructInfo {
    const info = this.#structs.get(name);
    if (!info) {
      throw new Error(`struct ${name} was not declared`);
    }
    const defined = { ...info, fields: [...fields] };
    this.#structs.set(name, defined);
    return defined;
  }

  get(name: string): StructInfo | undefined {
    return this.#structs.get(name);
  }

  has(name: string): boolean {
    return this.#structs.has(name);
  }

  values(): IterableIterator<StructInfo> {
    return this.#structs.values();
  }

  /** Fields of a struct type with its type and nat arguments applied. */
  fieldsOf(type: TypeId): readonly StructField[] | undefined {
    const cached = this.#fieldsByType.get(type);
    if (cached) return cached;

    const desc = this.#arena.get(type);
    if (desc.kind !== "struct") return undefined;
    const info = this.#structs.get(desc.name);
    if (!info) return undefined;

    const types = new Map<TypeParamId, TypeId>();
    info.typeParams.forEach((param, index) => {
      const arg = desc.typeArgs[index];
      if (typeof arg === "number") types.set(param, arg);
    });
    const nats = new Map<NatParamId, NatArg>();
    info.natParams.forEach((param, index) => {
      const arg = desc.natArgs[index];
      if (arg) nats.set(param, arg);
    });

    const fields = info.fields.map((field) => ({
      ...field,
      type: this.#arena.substitute(field.type, { types, nats }),
    }));
    if (info.fields.length > 0) {
      this.#fieldsByType.set(type, fields);
    }
    return fields;
  }
}

export type TypeEnv = Map<string, Binding>;

export interface GenericScope {
  types: ReadonlyMap<string, TypeParamId>;
  nats: ReadonlyMap<string, NatParamId>;
}

export const emptyGenericScope = (): GenericScope => ({
  types: new Map(),
  nats: new Map(),
});

export interface LoopFrame {
  breaks: TypeEnv[];
  continues: TypeEnv[];
}

export interface TypingContext {
  arena: TypeArena;
  primitives: PrimitiveTypes;
  signatures: SignatureTable;
  structs: StructStore;
  ownership: OwnershipClassifier;
  diagnostics: DiagnosticEmitter;
  options: ResolvedCheckOptions;
  perf: CompilerPerfRecorder;
}

/** Per-definition state; never shared between definitions. */
export interface FunctionTypingState {
  ctx: TypingContext;
  functionName: string;
  scope: GenericScope;
  returnType: TypeId;
  /** Every name assigned anywhere in the body, for use-before-assignment reports. */
  assignedNames: ReadonlySet<string>;
  loops: LoopFrame[];
}
