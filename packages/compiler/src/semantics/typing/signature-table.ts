import type { NatParamId, SourceSpan, TypeId, TypeParamId } from "../ids.js";
import type { Ownership } from "../hir/index.js";
import { normalizeSpan, raiseDiagnostic } from "../../diagnostics/index.js";
import type { TypeArena } from "./type-arena.js";

export type SignatureKind = "builtin" | "function" | "method" | "struct";

export interface SignatureParameter {
  name: string;
  type: TypeId;
  ownership: Ownership;
}

export interface Signature {
  name: string;
  kind: SignatureKind;
  typeParams: readonly TypeParamId[];
  natParams: readonly NatParamId[];
  params: readonly SignatureParameter[];
  returnType: TypeId;
  /** Declaring struct of a method or constructor. */
  owner?: string;
  span?: SourceSpan;
}

export const isGenericSignature = (signature: Signature): boolean =>
  signature.typeParams.length > 0 || signature.natParams.length > 0;

export const formatSignature = (
  arena: TypeArena,
  signature: Signature
): string => {
  const typeParams = signature.typeParams.map(
    (param) => arena.getTypeParam(param).name
  );
  const natParams = signature.natParams.map(
    (param) => arena.getNatParam(param).name
  );
  const generics =
    typeParams.length === 0 && natParams.length === 0
      ? ""
      : natParams.length === 0
        ? `<${typeParams.join(", ")}>`
        : `<${typeParams.join(", ")}; ${natParams.join(", ")}>`;
  const params = signature.params
    .map(
      (param) =>
        `${param.ownership} ${param.name}: ${arena.format(param.type)}`
    )
    .join(", ");
  return `${signature.name}${generics}(${params}) -> ${arena.format(signature.returnType)}`;
};

/**
 * Name to signature mapping for one compilation unit. Populated during
 * registration, then finalized and only read while definitions are checked.
 */
export class SignatureTable {
  #entries = new Map<string, Signature>();
  #finalized = false;
  readonly #arena: TypeArena;

  constructor({ arena }: { arena: TypeArena }) {
    this.#arena = arena;
  }

  register(signature: Signature): Signature {
    if (this.#finalized) {
      throw new Error(
        `cannot register ${signature.name} after the signature table was finalized`
      );
    }

    const existing = this.#entries.get(signature.name);
    if (!existing) {
      this.#entries.set(signature.name, signature);
      return signature;
    }

    const span = normalizeSpan(signature.span, existing.span);
    if (existing.params.length !== signature.params.length) {
      return raiseDiagnostic({
        code: "SG0002",
        params: {
          kind: "incompatible-arity",
          name: signature.name,
          existingArity: existing.params.length,
          arity: signature.params.length,
        },
        span,
      });
    }

    const existingShape = formatSignature(this.#arena, existing);
    const incomingShape = formatSignature(this.#arena, signature);
    if (existingShape !== incomingShape || existing.kind !== signature.kind) {
      return raiseDiagnostic({
        code: "SG0002",
        params: {
          kind: "incompatible-signature",
          name: signature.name,
          existing: existingShape,
          incoming: incomingShape,
        },
        span,
      });
    }

    return existing;
  }

  lookup(name: string, span?: SourceSpan): Signature {
    const signature = this.#entries.get(name);
    if (!signature) {
      return raiseDiagnostic({
        code: "SG0001",
        params: { kind: "unknown-name", name },
        span: normalizeSpan(span),
      });
    }
    return signature;
  }

  get(name: string): Signature | undefined {
    return this.#entries.get(name);
  }

  has(name: string): boolean {
    return this.#entries.has(name);
  }

  finalize(): void {
    this.#finalized = true;
  }

  get finalized(): boolean {
    return this.#finalized;
  }

  values(): IterableIterator<Signature> {
    return this.#entries.values();
  }
}
