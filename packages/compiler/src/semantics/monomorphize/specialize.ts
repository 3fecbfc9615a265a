import type {
  InstanceKey,
  NatParamId,
  SourceSpan,
  TypeId,
  TypeParamId,
} from "../ids.js";
import { emitDiagnostic, normalizeSpan } from "../../diagnostics/index.js";
import { ownershipOfBound, satisfiesBound } from "../typing/ownership.js";
import { isGenericSignature, type Signature } from "../typing/signature-table.js";
import type { NatArg, Substitution } from "../typing/type-arena.js";
import type {
  Binding,
  TypedArgument,
  TypedBlock,
  TypedExpression,
  TypedFunction,
  TypedParameter,
  TypedStatement,
} from "../typing/typed-nodes.js";
import type { StructField, TypingContext } from "../typing/types.js";
import { formatInstanceKey, isConcreteNat } from "./instance-key.js";

export interface SpecializedFunction {
  key: InstanceKey;
  /** Name of the checked definition this instance was produced from. */
  name: string;
  kind: TypedFunction["kind"];
  typeArgs: readonly TypeId[];
  natArgs: readonly number[];
  params: readonly TypedParameter[];
  returnType: TypeId;
  body: TypedBlock;
  span: SourceSpan;
}

export interface SpecializedStruct {
  key: InstanceKey;
  name: string;
  type: TypeId;
  fields: readonly StructField[];
}

const substitutionFor = (
  signature: Signature,
  typeArgs: readonly TypeId[],
  natArgs: readonly NatArg[]
): Substitution => {
  const types = new Map<TypeParamId, TypeId>();
  const nats = new Map<NatParamId, NatArg>();
  signature.typeParams.forEach((param, index) => {
    const arg = typeArgs[index];
    if (arg !== undefined) types.set(param, arg);
  });
  signature.natParams.forEach((param, index) => {
    const arg = natArgs[index];
    if (arg) nats.set(param, arg);
  });
  return { types, nats };
};

/**
 * Produces concrete copies of checked definitions. Results are cached by
 * instantiation key; a key that reappears on its own specialization chain
 * is a cycle, and chains longer than `maxSpecializationDepth` are cut off.
 */
export class MonomorphisationEngine {
  #cache = new Map<InstanceKey, SpecializedFunction>();
  #structs = new Map<InstanceKey, SpecializedStruct>();
  #active: InstanceKey[] = [];
  readonly #ctx: TypingContext;
  readonly #functions: ReadonlyMap<string, TypedFunction>;

  constructor({
    ctx,
    functions,
  }: {
    ctx: TypingContext;
    /** Definitions that passed checking, keyed by signature name. */
    functions: ReadonlyMap<string, TypedFunction>;
  }) {
    this.#ctx = ctx;
    this.#functions = functions;
  }

  specialize(
    name: string,
    typeArgs: readonly TypeId[] = [],
    natArgs: readonly NatArg[] = [],
    span?: SourceSpan
  ): SpecializedFunction {
    const ctx = this.#ctx;
    const { arena } = ctx;
    const at = normalizeSpan(span);
    const fn = this.#functions.get(name);
    if (!fn) {
      return emitDiagnostic({
        ctx,
        code: "SG0001",
        params: { kind: "unchecked-definition", name },
        span: at,
        phase: "monomorphisation",
      });
    }
    const { signature } = fn;
    this.#checkArity(signature, typeArgs, natArgs, at);
    this.#checkClosed(name, typeArgs, natArgs, at);
    this.#checkBounds(signature, typeArgs, at);

    const key = formatInstanceKey({ arena, name, typeArgs, natArgs });
    const cached = this.#cache.get(key);
    if (cached) {
      ctx.perf.count("specializations.cache-hit");
      return cached;
    }
    ctx.perf.count("specializations.cache-miss");

    return this.#withActive(key, at, () => {
      const subst = substitutionFor(signature, typeArgs, natArgs);

      const returnType = this.#concreteType(arena.substitute(fn.returnType, subst), key);
      const params = fn.params.map((param) => ({
        binding: this.#rewriteBinding(param.binding, subst, key),
        ownership: param.ownership,
      }));
      params.forEach((param) => {
        if (!arena.isClosed(param.binding.type)) {
          emitDiagnostic({
            ctx,
            code: "MO0002",
            params: {
              kind: "open-signature",
              name,
              type: arena.format(param.binding.type),
            },
            span: at,
          });
        }
      });

      const specialized: SpecializedFunction = {
        key,
        name,
        kind: fn.kind,
        typeArgs: [...typeArgs],
        natArgs: natArgs.filter(isConcreteNat).map((nat) => nat.value),
        params,
        returnType,
        body: this.#rewriteBlock(fn.body, subst, key),
        span: fn.span,
      };
      this.#cache.set(key, specialized);
      return specialized;
    });
  }

  /** Specializes the struct layout of a closed struct type. */
  specializeStruct(type: TypeId, span?: SourceSpan): SpecializedStruct {
    const { arena, structs } = this.#ctx;
    const desc = arena.get(type);
    if (desc.kind !== "struct") {
      throw new Error(`${arena.format(type)} is not a struct type`);
    }
    const key = formatInstanceKey({
      arena,
      name: desc.name,
      typeArgs: desc.typeArgs,
      natArgs: desc.natArgs,
    });
    const cached = this.#structs.get(key);
    if (cached) return cached;

    const at = normalizeSpan(span, structs.get(desc.name)?.span);
    this.#checkClosed(desc.name, desc.typeArgs, desc.natArgs, at);
    return this.#withActive(key, at, () => {
      const fields = structs.fieldsOf(type);
      if (!fields) throw new Error(`struct ${desc.name} has no layout`);
      const specialized: SpecializedStruct = {
        key,
        name: desc.name,
        type,
        fields: fields.map((field) => ({
          ...field,
          type: this.#concreteType(field.type, key),
        })),
      };
      this.#structs.set(key, specialized);
      return specialized;
    });
  }

  instances(): SpecializedFunction[] {
    return [...this.#cache.values()];
  }

  structInstances(): SpecializedStruct[] {
    return [...this.#structs.values()];
  }

  #withActive<T>(key: InstanceKey, span: SourceSpan, run: () => T): T {
    const ctx = this.#ctx;
    if (this.#active.includes(key)) {
      return emitDiagnostic({
        ctx,
        code: "MO0003",
        params: { kind: "cycle", key, chain: [...this.#active] },
        span,
      });
    }
    const limit = ctx.options.maxSpecializationDepth;
    if (this.#active.length >= limit) {
      return emitDiagnostic({
        ctx,
        code: "MO0003",
        params: { kind: "depth", key, limit },
        span,
      });
    }
    this.#active.push(key);
    try {
      return run();
    } finally {
      this.#active.pop();
    }
  }

  #checkArity(
    signature: Signature,
    typeArgs: readonly TypeId[],
    natArgs: readonly NatArg[],
    span: SourceSpan
  ): void {
    const ctx = this.#ctx;
    if (typeArgs.length !== signature.typeParams.length) {
      emitDiagnostic({
        ctx,
        code: "MO0001",
        params: {
          kind: "type-arguments",
          name: signature.name,
          expected: signature.typeParams.length,
          actual: typeArgs.length,
        },
        span,
      });
    }
    if (natArgs.length !== signature.natParams.length) {
      emitDiagnostic({
        ctx,
        code: "MO0001",
        params: {
          kind: "nat-arguments",
          name: signature.name,
          expected: signature.natParams.length,
          actual: natArgs.length,
        },
        span,
      });
    }
  }

  #checkClosed(
    name: string,
    typeArgs: readonly TypeId[],
    natArgs: readonly NatArg[],
    span: SourceSpan
  ): void {
    const ctx = this.#ctx;
    const { arena } = ctx;
    typeArgs.forEach((arg) => {
      if (arena.isClosed(arg)) return;
      emitDiagnostic({
        ctx,
        code: "MO0002",
        params: { kind: "open-argument", name, argument: arena.format(arg) },
        span,
      });
    });
    natArgs.forEach((arg) => {
      if (isConcreteNat(arg)) return;
      emitDiagnostic({
        ctx,
        code: "MO0002",
        params: { kind: "open-argument", name, argument: arena.formatNat(arg) },
        span,
      });
    });
  }

  #checkBounds(
    signature: Signature,
    typeArgs: readonly TypeId[],
    span: SourceSpan
  ): void {
    const ctx = this.#ctx;
    signature.typeParams.forEach((param, index) => {
      const arg = typeArgs[index];
      if (arg === undefined) return;
      const { name, bound } = ctx.arena.getTypeParam(param);
      const ownership = ctx.ownership.classify(arg);
      if (satisfiesBound(ownership, bound)) return;
      emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "ownership-bound",
          parameter: name,
          bound: ownershipOfBound(bound),
          actual: ctx.arena.format(arg),
          ownership,
        },
        span,
        phase: "monomorphisation",
      });
    });
  }

  /** Asserts a substituted type is closed and specializes the structs it mentions. */
  #concreteType(type: TypeId, key: InstanceKey): TypeId {
    const { arena } = this.#ctx;
    if (!arena.isClosed(type)) {
      throw new Error(`specialization ${key} left ${arena.format(type)} open`);
    }
    this.#visitStructs(type);
    return type;
  }

  #visitStructs(type: TypeId): void {
    const desc = this.#ctx.arena.get(type);
    switch (desc.kind) {
      case "struct":
        this.specializeStruct(type);
        return;
      case "tuple":
        desc.elements.forEach((element) => this.#visitStructs(element));
        return;
      case "array":
        this.#visitStructs(desc.element);
        return;
      case "option":
        this.#visitStructs(desc.inner);
        return;
      case "function":
        desc.parameters.forEach((param) => this.#visitStructs(param.type));
        this.#visitStructs(desc.returnType);
        return;
      default:
        return;
    }
  }

  #rewriteBinding(binding: Binding, subst: Substitution, key: InstanceKey): Binding {
    const type = this.#concreteType(this.#ctx.arena.substitute(binding.type, subst), key);
    return { ...binding, type, ownership: this.#ctx.ownership.classify(type) };
  }

  #rewriteBlock(block: TypedBlock, subst: Substitution, key: InstanceKey): TypedBlock {
    return {
      statements: block.statements.map((statement) =>
        this.#rewriteStatement(statement, subst, key)
      ),
      span: block.span,
    };
  }

  #rewriteStatement(
    statement: TypedStatement,
    subst: Substitution,
    key: InstanceKey
  ): TypedStatement {
    const expr = (value: TypedExpression) => this.#rewriteExpr(value, subst, key);
    const block = (value: TypedBlock) => this.#rewriteBlock(value, subst, key);
    const binding = (value: Binding) => this.#rewriteBinding(value, subst, key);
    switch (statement.kind) {
      case "assign":
        return {
          ...statement,
          target:
            statement.target.kind === "name"
              ? { kind: "name", binding: binding(statement.target.binding) }
              : { kind: "tuple", bindings: statement.target.bindings.map(binding) },
          value: expr(statement.value),
        };
      case "expr":
        return { ...statement, expr: expr(statement.expr) };
      case "return":
        return {
          ...statement,
          value: statement.value ? expr(statement.value) : undefined,
        };
      case "if":
        return {
          ...statement,
          condition: expr(statement.condition),
          then: block(statement.then),
          else: statement.else ? block(statement.else) : undefined,
        };
      case "while":
        return {
          ...statement,
          condition: expr(statement.condition),
          body: block(statement.body),
        };
      case "for":
        return {
          ...statement,
          binding: binding(statement.binding),
          iterable:
            statement.iterable.kind === "range"
              ? {
                  kind: "range",
                  start: expr(statement.iterable.start),
                  stop: expr(statement.iterable.stop),
                }
              : { kind: "array", value: expr(statement.iterable.value) },
          body: block(statement.body),
        };
      case "break":
      case "continue":
        return statement;
    }
  }

  #rewriteExpr(
    expr: TypedExpression,
    subst: Substitution,
    key: InstanceKey
  ): TypedExpression {
    const { arena } = this.#ctx;
    const type = this.#concreteType(arena.substitute(expr.type, subst), key);
    const rewrite = (value: TypedExpression) => this.#rewriteExpr(value, subst, key);

    switch (expr.kind) {
      case "literal":
      case "local":
        return { ...expr, type };
      case "nat-ref": {
        const nat = arena.substituteNat(expr.nat, subst);
        if (!isConcreteNat(nat)) {
          throw new Error(`specialization ${key} left nat ${arena.formatNat(nat)} open`);
        }
        return { kind: "literal", value: nat.value, type, span: expr.span };
      }
      case "function-ref":
        return {
          ...expr,
          type,
          instanceKey: this.#referenceKey(expr.name, expr.span),
        };
      case "call": {
        const typeArgs = expr.typeArgs.map((arg) =>
          this.#concreteType(arena.substitute(arg, subst), key)
        );
        const natArgs = expr.natArgs.map((arg) => arena.substituteNat(arg, subst));
        const args = expr.args.map(
          (arg): TypedArgument => ({ expr: rewrite(arg.expr), ownership: arg.ownership })
        );
        return {
          ...expr,
          type,
          args,
          typeArgs,
          natArgs,
          instanceKey: this.#calleeKey(expr.callee, expr.calleeKind, typeArgs, natArgs, expr.span),
        };
      }
      case "tuple":
      case "array":
        return { ...expr, type, elements: expr.elements.map(rewrite) };
      case "struct-literal":
        return {
          ...expr,
          type,
          fields: expr.fields.map((field) => ({
            name: field.name,
            value: rewrite(field.value),
          })),
          instanceKey: this.specializeStruct(type, expr.span).key,
        };
      case "field-access":
        return { ...expr, type, target: rewrite(expr.target) };
      case "index":
        return {
          ...expr,
          type,
          target: rewrite(expr.target),
          index: rewrite(expr.index),
        };
      case "option":
        return {
          ...expr,
          type,
          value: expr.value ? rewrite(expr.value) : undefined,
        };
      case "logical":
        return {
          ...expr,
          type,
          left: rewrite(expr.left),
          right: rewrite(expr.right),
        };
    }
  }

  /** Non-generic user definitions are referenced by name, never re-specialized. */
  #referenceKey(name: string, span: SourceSpan): InstanceKey | undefined {
    const signature = this.#ctx.signatures.get(name);
    if (!signature || signature.kind === "builtin") return undefined;
    if (signature.kind === "struct") {
      return this.specializeStruct(signature.returnType, span).key;
    }
    if (!this.#functions.has(name)) {
      return emitDiagnostic({
        ctx: this.#ctx,
        code: "SG0001",
        params: { kind: "unchecked-definition", name },
        span,
        phase: "monomorphisation",
      });
    }
    return name;
  }

  #calleeKey(
    callee: string,
    calleeKind: "signature" | "local",
    typeArgs: readonly TypeId[],
    natArgs: readonly NatArg[],
    span: SourceSpan
  ): InstanceKey | undefined {
    if (calleeKind === "local") return undefined;
    const signature = this.#ctx.signatures.get(callee);
    if (!signature || signature.kind === "builtin") return undefined;
    if (signature.kind === "struct") {
      const type = this.#ctx.arena.substitute(
        signature.returnType,
        substitutionFor(signature, typeArgs, natArgs)
      );
      return this.specializeStruct(type, span).key;
    }
    if (!isGenericSignature(signature)) return this.#referenceKey(callee, span);
    return this.specialize(callee, typeArgs, natArgs, span).key;
  }
}
