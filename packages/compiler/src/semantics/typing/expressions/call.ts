import type { HirCallExpr, HirExpression, HirNatExpr, HirTypeExpr } from "../../hir/index.js";
import type { NatParamId, SourceSpan, TypeId, TypeParamId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import { typeExpression } from "../expressions.js";
import { ownershipOfBound, satisfiesBound } from "../ownership.js";
import type { Signature } from "../signature-table.js";
import {
  emptySubstitution,
  natParam,
  type NatArg,
  type Substitution,
} from "../type-arena.js";
import { resolveNatExpr, resolveTypeExpr } from "../type-exprs.js";
import type {
  TypedArgument,
  TypedCall,
  TypedExpression,
} from "../typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import { ensureTypeMatches } from "./shared.js";

/** Arguments already typed by the caller (receivers, operands) or still syntax. */
export type CallArgument =
  | { kind: "typed"; value: TypedExpression }
  | { kind: "syntax"; value: HirExpression };

export const typeCallExpr = (
  expr: HirCallExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedCall => {
  const { ctx } = state;
  const local = env.get(expr.callee);
  if (local) {
    return typeLocalCall({ expr, state, env, callee: local.type });
  }

  const signature = ctx.signatures.get(expr.callee);
  if (!signature) {
    if (state.assignedNames.has(expr.callee)) {
      return emitDiagnostic({
        ctx,
        code: "LN0001",
        params: { name: expr.callee },
        span: expr.span,
        phase: "typing",
      });
    }
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: { kind: "unknown-name", name: expr.callee },
      span: expr.span,
    });
  }

  return typeSignatureCall({
    state,
    env,
    signature,
    args: expr.args.map((value) => ({ kind: "syntax" as const, value })),
    typeArguments: expr.typeArguments,
    natArguments: expr.natArguments,
    expectedType,
    span: expr.span,
  });
};

const typeLocalCall = ({
  expr,
  state,
  env,
  callee,
}: {
  expr: HirCallExpr;
  state: FunctionTypingState;
  env: TypeEnv;
  callee: TypeId;
}): TypedCall => {
  const { ctx } = state;
  const desc = ctx.arena.get(callee);
  if (desc.kind !== "function") {
    return emitDiagnostic({
      ctx,
      code: "TY0001",
      params: {
        kind: "not-callable",
        name: expr.callee,
        actual: ctx.arena.format(callee),
      },
      span: expr.span,
    });
  }
  if (desc.parameters.length !== expr.args.length) {
    return emitDiagnostic({
      ctx,
      code: "MO0001",
      params: {
        kind: "call-arguments",
        name: expr.callee,
        expected: desc.parameters.length,
        actual: expr.args.length,
      },
      span: expr.span,
      phase: "typing",
    });
  }

  const args = expr.args.map((arg, index): TypedArgument => {
    const param = desc.parameters[index];
    if (!param) throw new Error(`missing parameter ${index} of ${expr.callee}`);
    const typed = typeExpression(arg, state, env, { expectedType: param.type });
    ensureTypeMatches({
      state,
      actual: typed.type,
      expected: param.type,
      context: `argument ${index + 1} of ${expr.callee}`,
      span: arg.span,
    });
    return { expr: typed, ownership: param.ownership };
  });

  return {
    kind: "call",
    callee: expr.callee,
    calleeKind: "local",
    args,
    typeArgs: [],
    natArgs: [],
    type: desc.returnType,
    span: expr.span,
  };
};

const argumentSpan = (arg: CallArgument): SourceSpan => arg.value.span;

/**
 * Instantiates a signature at one call site. The callee's type and nat
 * parameters are replaced by fresh unification variables, which are bound
 * from explicit arguments first, then the expected result type, then the
 * argument types left to right.
 */
export const typeSignatureCall = ({
  state,
  env,
  signature,
  args,
  typeArguments = [],
  natArguments = [],
  expectedType,
  span,
}: {
  state: FunctionTypingState;
  env: TypeEnv;
  signature: Signature;
  args: readonly CallArgument[];
  typeArguments?: readonly HirTypeExpr[];
  natArguments?: readonly HirNatExpr[];
  expectedType?: TypeId;
  span: SourceSpan;
}): TypedCall => {
  const { ctx } = state;
  const { arena } = ctx;

  if (args.length !== signature.params.length) {
    return emitDiagnostic({
      ctx,
      code: "MO0001",
      params: {
        kind: "call-arguments",
        name: signature.name,
        expected: signature.params.length,
        actual: args.length,
      },
      span,
      phase: "typing",
    });
  }
  if (typeArguments.length > 0 && typeArguments.length !== signature.typeParams.length) {
    return emitDiagnostic({
      ctx,
      code: "MO0001",
      params: {
        kind: "type-arguments",
        name: signature.name,
        expected: signature.typeParams.length,
        actual: typeArguments.length,
      },
      span,
      phase: "typing",
    });
  }
  if (natArguments.length > 0 && natArguments.length !== signature.natParams.length) {
    return emitDiagnostic({
      ctx,
      code: "MO0001",
      params: {
        kind: "nat-arguments",
        name: signature.name,
        expected: signature.natParams.length,
        actual: natArguments.length,
      },
      span,
      phase: "typing",
    });
  }

  const freshTypeParams: TypeParamId[] = signature.typeParams.map((param) => {
    const info = arena.getTypeParam(param);
    return arena.freshTypeParam({ name: info.name, bound: info.bound });
  });
  const freshNatParams: NatParamId[] = signature.natParams.map((param) =>
    arena.freshNatParam({ name: arena.getNatParam(param).name })
  );
  const instantiation: Substitution = {
    types: new Map(
      signature.typeParams.map((param, index) => [
        param,
        arena.internTypeParamRef(freshTypeParams[index] ?? param),
      ])
    ),
    nats: new Map(
      signature.natParams.map((param, index) => [
        param,
        natParam(freshNatParams[index] ?? param),
      ])
    ),
  };
  const flexible = {
    types: new Set(freshTypeParams),
    nats: new Set(freshNatParams),
  };
  const paramTypes = signature.params.map((param) =>
    arena.substitute(param.type, instantiation)
  );
  const returnType = arena.substitute(signature.returnType, instantiation);

  let subst = emptySubstitution();

  typeArguments.forEach((arg, index) => {
    const fresh = freshTypeParams[index];
    if (fresh === undefined) return;
    const resolved = resolveTypeExpr({ ctx, expr: arg, scope: state.scope });
    const types = new Map(subst.types);
    types.set(fresh, resolved);
    subst = { types, nats: subst.nats };
  });
  natArguments.forEach((arg, index) => {
    const fresh = freshNatParams[index];
    if (fresh === undefined) return;
    const resolved = resolveNatExpr({ ctx, expr: arg, scope: state.scope });
    const nats = new Map(subst.nats);
    nats.set(fresh, resolved);
    subst = { types: subst.types, nats };
  });

  if (typeof expectedType === "number") {
    const seeded = arena.unify(returnType, expectedType, {
      reason: `expected result of ${signature.name}`,
      flexible,
      substitution: subst,
    });
    // A clash with the expected type is reported by the caller once the
    // call is fully typed.
    if (seeded.ok) subst = seeded.substitution;
  }

  const hasOpenParams = (type: TypeId): boolean => {
    const free = arena.freeParams(type);
    return (
      [...free.types].some((param) => flexible.types.has(param)) ||
      [...free.nats].some((param) => flexible.nats.has(param))
    );
  };

  const typedArgs = args.map((arg, index): TypedArgument => {
    const param = signature.params[index];
    const paramType = paramTypes[index];
    if (!param || paramType === undefined) {
      throw new Error(`missing parameter ${index} of ${signature.name}`);
    }
    const current = arena.substitute(paramType, subst);
    const typed =
      arg.kind === "typed"
        ? arg.value
        : typeExpression(arg.value, state, env, {
            expectedType: hasOpenParams(current) ? undefined : current,
          });
    const result = arena.unify(current, typed.type, {
      reason: `argument ${param.name} of ${signature.name}`,
      flexible,
      substitution: subst,
    });
    if (!result.ok) {
      return emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "type-mismatch",
          context: `argument ${param.name} of ${signature.name}`,
          expected: arena.format(current),
          actual: arena.format(typed.type),
        },
        span: argumentSpan(arg),
      });
    }
    subst = result.substitution;
    return { expr: typed, ownership: param.ownership };
  });

  const typeArgs = freshTypeParams.map((param) =>
    arena.substitute(arena.internTypeParamRef(param), subst)
  );
  const natArgs: NatArg[] = freshNatParams.map((param) =>
    arena.substituteNat(natParam(param), subst)
  );

  const unresolved = [
    ...signature.typeParams.filter((_param, index) => {
      const arg = typeArgs[index];
      return arg === undefined || hasOpenParams(arg);
    }).map((param) => arena.getTypeParam(param).name),
    ...signature.natParams.filter((_param, index) => {
      const arg = natArgs[index];
      return !arg || (arg.kind === "nat-param" && flexible.nats.has(arg.param));
    }).map((param) => arena.getNatParam(param).name),
  ];
  if (unresolved.length > 0) {
    return emitDiagnostic({
      ctx,
      code: "TY0003",
      params: {
        kind: "unresolved-parameters",
        callee: signature.name,
        parameters: unresolved,
      },
      span,
    });
  }

  signature.typeParams.forEach((param, index) => {
    const arg = typeArgs[index];
    if (arg === undefined) return;
    const { name, bound } = arena.getTypeParam(param);
    const ownership = ctx.ownership.classify(arg);
    if (!satisfiesBound(ownership, bound)) {
      emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "ownership-bound",
          parameter: name,
          bound: ownershipOfBound(bound),
          actual: arena.format(arg),
          ownership,
        },
        span,
      });
    }
  });

  return {
    kind: "call",
    callee: signature.name,
    calleeKind: "signature",
    args: typedArgs,
    typeArgs,
    natArgs,
    type: arena.substitute(returnType, subst),
    span,
  };
};
