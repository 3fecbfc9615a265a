import type { NatParamId, SourceSpan, TypeId, TypeParamId } from "../ids.js";
import type {
  HirDefinition,
  HirFunctionDecl,
  HirMethodDecl,
  HirNatParameter,
  HirStructDecl,
  HirTypeParameter,
} from "../hir/index.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import { isPrimitiveName } from "./builtins.js";
import { resolveTypeExpr } from "./type-exprs.js";
import type { Signature, SignatureParameter } from "./signature-table.js";
import type {
  GenericScope,
  StructField,
  StructInfo,
  TypingContext,
} from "./types.js";

const UNIT_OWNER = "compilation unit";

export interface RegisteredFunction {
  name: string;
  kind: "function" | "method";
  decl: HirFunctionDecl;
  signature: Signature;
  scope: GenericScope;
  owner?: StructInfo;
}

/**
 * Runs `register` for one definition. Returns false when the definition was
 * rejected; the guard decides whether a rejection is recoverable.
 */
export type DefinitionGuard = (
  name: string,
  register: () => void
) => boolean;

export interface RegistrationResult {
  functions: RegisteredFunction[];
  /** Struct names whose declaration or layout was rejected. */
  rejectedStructs: Set<string>;
}

const declareGenerics = ({
  ctx,
  owner,
  typeParameters = [],
  natParameters = [],
  inherited,
}: {
  ctx: TypingContext;
  owner: string;
  typeParameters?: readonly HirTypeParameter[];
  natParameters?: readonly HirNatParameter[];
  inherited?: GenericScope;
}): {
  scope: GenericScope;
  typeParams: TypeParamId[];
  natParams: NatParamId[];
} => {
  const types = new Map(inherited?.types);
  const nats = new Map(inherited?.nats);
  const seen = new Set<string>();
  const claim = (name: string, span: SourceSpan) => {
    if (seen.has(name)) {
      emitDiagnostic({
        ctx,
        code: "SG0002",
        params: { kind: "duplicate-member", owner, name },
        span,
      });
    }
    seen.add(name);
  };

  const typeParams = typeParameters.map((param) => {
    claim(param.name, param.span);
    const id = ctx.arena.freshTypeParam({
      name: param.name,
      bound: { copyable: param.copyable, droppable: param.droppable },
    });
    types.set(param.name, id);
    return id;
  });
  const natParams = natParameters.map((param) => {
    claim(param.name, param.span);
    const id = ctx.arena.freshNatParam({ name: param.name });
    nats.set(param.name, id);
    return id;
  });

  return { scope: { types, nats }, typeParams, natParams };
};

const scopeOfStruct = (ctx: TypingContext, info: StructInfo): GenericScope => ({
  types: new Map(
    info.typeParams.map((param) => [ctx.arena.getTypeParam(param).name, param])
  ),
  nats: new Map(
    info.natParams.map((param) => [ctx.arena.getNatParam(param).name, param])
  ),
});

const declareStruct = (ctx: TypingContext, decl: HirStructDecl): void => {
  if (isPrimitiveName(decl.name)) {
    emitDiagnostic({
      ctx,
      code: "SG0002",
      params: { kind: "primitive-name", name: decl.name },
      span: decl.span,
    });
  }
  if (ctx.structs.has(decl.name)) {
    emitDiagnostic({
      ctx,
      code: "SG0002",
      params: { kind: "duplicate-member", owner: UNIT_OWNER, name: decl.name },
      span: decl.span,
    });
  }
  const { typeParams, natParams } = declareGenerics({
    ctx,
    owner: decl.name,
    typeParameters: decl.typeParameters,
    natParameters: decl.natParameters,
  });
  ctx.structs.declare({
    name: decl.name,
    typeParams,
    natParams,
    span: decl.span,
  });
};

const defineStructFields = (ctx: TypingContext, decl: HirStructDecl): void => {
  const info = ctx.structs.get(decl.name);
  if (!info) {
    throw new Error(`struct ${decl.name} was not declared`);
  }
  const scope = scopeOfStruct(ctx, info);
  const seen = new Set<string>();
  const fields: StructField[] = decl.fields.map((field) => {
    if (seen.has(field.name)) {
      emitDiagnostic({
        ctx,
        code: "SG0002",
        params: { kind: "duplicate-member", owner: decl.name, name: field.name },
        span: field.span,
      });
    }
    seen.add(field.name);
    return {
      name: field.name,
      type: resolveTypeExpr({ ctx, expr: field.type, scope }),
      span: field.span,
    };
  });
  ctx.structs.defineFields(decl.name, fields);
};

/** Struct names that reach themselves through their field layout. */
const findSelfContainingStructs = (ctx: TypingContext): Set<string> => {
  const edges = new Map<string, Set<string>>();
  const collect = (type: TypeId, into: Set<string>): void => {
    const desc = ctx.arena.get(type);
    switch (desc.kind) {
      case "struct":
        into.add(desc.name);
        desc.typeArgs.forEach((arg) => collect(arg, into));
        return;
      case "tuple":
        desc.elements.forEach((element) => collect(element, into));
        return;
      case "array":
        collect(desc.element, into);
        return;
      case "option":
        collect(desc.inner, into);
        return;
      default:
        return;
    }
  };

  for (const info of ctx.structs.values()) {
    const targets = new Set<string>();
    info.fields.forEach((field) => collect(field.type, targets));
    edges.set(info.name, targets);
  }

  const cyclic = new Set<string>();
  const reaches = (from: string, target: string, seen: Set<string>): boolean => {
    for (const next of edges.get(from) ?? []) {
      if (next === target) return true;
      if (seen.has(next)) continue;
      seen.add(next);
      if (reaches(next, target, seen)) return true;
    }
    return false;
  };
  edges.forEach((_targets, name) => {
    if (reaches(name, name, new Set())) cyclic.add(name);
  });
  return cyclic;
};

const registerFunctionLike = ({
  ctx,
  decl,
  name,
  kind,
  owner,
}: {
  ctx: TypingContext;
  decl: HirFunctionDecl | HirMethodDecl;
  name: string;
  kind: "function" | "method";
  owner?: StructInfo;
}): RegisteredFunction => {
  const inherited = owner ? scopeOfStruct(ctx, owner) : undefined;
  const generics = declareGenerics({
    ctx,
    owner: name,
    typeParameters: decl.typeParameters,
    natParameters: decl.natParameters,
    inherited,
  });
  const scope = generics.scope;

  const params: SignatureParameter[] = [];
  const seen = new Set<string>();
  const addParam = (param: SignatureParameter, span: SourceSpan) => {
    if (seen.has(param.name)) {
      emitDiagnostic({
        ctx,
        code: "SG0002",
        params: { kind: "duplicate-member", owner: name, name: param.name },
        span,
      });
    }
    seen.add(param.name);
    params.push(param);
  };

  if (owner && "receiver" in decl) {
    addParam(
      { name: "self", type: owner.type, ownership: decl.receiver },
      decl.span
    );
  }
  decl.parameters.forEach((param) =>
    addParam(
      {
        name: param.name,
        type: resolveTypeExpr({ ctx, expr: param.type, scope }),
        ownership: param.ownership ?? "owned",
      },
      param.span
    )
  );

  const returnType = decl.returnType
    ? resolveTypeExpr({ ctx, expr: decl.returnType, scope })
    : ctx.primitives.none;

  const signature = ctx.signatures.register({
    name,
    kind,
    typeParams: [...(owner?.typeParams ?? []), ...generics.typeParams],
    natParams: [...(owner?.natParams ?? []), ...generics.natParams],
    params,
    returnType,
    owner: owner?.name,
    span: decl.span,
  });

  return { name, kind, decl, signature, scope, owner };
};

export const methodSignatureName = (struct: string, method: string): string =>
  `${struct}.${method}`;

/**
 * Registers every definition of a unit: struct names first so fields and
 * signatures may refer to structs declared later, then layouts, then
 * constructor, method and function signatures.
 */
export const registerDefinitions = ({
  ctx,
  definitions,
  guard,
}: {
  ctx: TypingContext;
  definitions: readonly HirDefinition[];
  guard: DefinitionGuard;
}): RegistrationResult => {
  const structs = definitions.filter(
    (definition): definition is HirStructDecl => definition.kind === "struct"
  );
  const functionDecls = definitions.filter(
    (definition): definition is HirFunctionDecl =>
      definition.kind === "function"
  );
  const rejectedStructs = new Set<string>();
  const reject = (decl: HirStructDecl) => {
    rejectedStructs.add(decl.name);
    decl.methods?.forEach((method) =>
      guard(methodSignatureName(decl.name, method.name), () => {
        emitDiagnostic({
          ctx,
          code: "SG0001",
          params: { kind: "unchecked-definition", name: decl.name },
          span: method.span,
        });
      })
    );
  };

  const declared = structs.filter((decl) => {
    const ok = guard(decl.name, () => declareStruct(ctx, decl));
    if (!ok) reject(decl);
    return ok;
  });
  const laidOut = declared.filter((decl) => {
    const ok = guard(decl.name, () => defineStructFields(ctx, decl));
    if (!ok) reject(decl);
    return ok;
  });

  const selfContaining = findSelfContainingStructs(ctx);
  const sized = laidOut.filter((decl) => {
    if (!selfContaining.has(decl.name)) return true;
    guard(decl.name, () => {
      emitDiagnostic({
        ctx,
        code: "MO0003",
        params: { kind: "recursive-struct", key: decl.name },
        span: decl.span,
        phase: "signatures",
      });
    });
    reject(decl);
    return false;
  });

  const functions: RegisteredFunction[] = [];
  const registeredNames = new Set<string>();
  const registerOnce = (
    name: string,
    span: SourceSpan,
    register: () => RegisteredFunction
  ) => {
    guard(name, () => {
      if (registeredNames.has(name)) {
        emitDiagnostic({
          ctx,
          code: "SG0002",
          params: { kind: "duplicate-member", owner: UNIT_OWNER, name },
          span,
        });
      }
      const registered = register();
      registeredNames.add(name);
      functions.push(registered);
    });
  };

  sized.forEach((decl) => {
    const ok = guard(decl.name, () => {
      const info = ctx.structs.get(decl.name);
      if (!info) throw new Error(`struct ${decl.name} was not declared`);
      ctx.signatures.register({
        name: decl.name,
        kind: "struct",
        typeParams: info.typeParams,
        natParams: info.natParams,
        params: info.fields.map((field) => ({
          name: field.name,
          type: field.type,
          ownership: "owned",
        })),
        returnType: info.type,
        owner: decl.name,
        span: decl.span,
      });
    });
    if (!ok) {
      reject(decl);
      return;
    }
    const owner = ctx.structs.get(decl.name);
    decl.methods?.forEach((method) => {
      const name = methodSignatureName(decl.name, method.name);
      registerOnce(name, method.span, () =>
        registerFunctionLike({ ctx, decl: method, name, kind: "method", owner })
      );
    });
  });

  functionDecls.forEach((decl) =>
    registerOnce(decl.name, decl.span, () =>
      registerFunctionLike({ ctx, decl, name: decl.name, kind: "function" })
    )
  );

  return { functions, rejectedStructs };
};
