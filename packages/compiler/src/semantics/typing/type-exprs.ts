import type { TypeId } from "../ids.js";
import type { HirNatExpr, HirTypeExpr } from "../hir/index.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import { isPrimitiveName } from "./builtins.js";
import { natLiteral, natParam, type NatArg } from "./type-arena.js";
import type { GenericScope, TypingContext } from "./types.js";

export const resolveNatExpr = ({
  ctx,
  expr,
  scope,
}: {
  ctx: TypingContext;
  expr: HirNatExpr;
  scope: GenericScope;
}): NatArg => {
  if (expr.natKind === "literal") {
    if (!Number.isInteger(expr.value) || expr.value < 0) {
      return emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "type-mismatch",
          context: "nat argument",
          expected: "a non-negative integer",
          actual: `${expr.value}`,
        },
        span: expr.span,
      });
    }
    return natLiteral(expr.value);
  }

  const param = scope.nats.get(expr.name);
  if (typeof param !== "number") {
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: { kind: "unknown-nat", name: expr.name },
      span: expr.span,
    });
  }
  return natParam(param);
};

export const resolveTypeExpr = ({
  ctx,
  expr,
  scope,
}: {
  ctx: TypingContext;
  expr: HirTypeExpr;
  scope: GenericScope;
}): TypeId => {
  const resolve = (inner: HirTypeExpr): TypeId =>
    resolveTypeExpr({ ctx, expr: inner, scope });
  const { arena } = ctx;

  switch (expr.typeKind) {
    case "tuple":
      return arena.internTuple(expr.elements.map(resolve));
    case "array":
      return arena.internArray(
        resolve(expr.element),
        resolveNatExpr({ ctx, expr: expr.length, scope })
      );
    case "option":
      return arena.internOption(resolve(expr.inner));
    case "function":
      return arena.internFunction({
        parameters: expr.parameters.map((param) => ({
          type: resolve(param.type),
          ownership: param.ownership ?? "owned",
        })),
        returnType: resolve(expr.returnType),
        typeParams: [],
        natParams: [],
      });
    case "named":
      break;
  }

  const typeArguments = expr.typeArguments ?? [];
  const natArguments = expr.natArguments ?? [];
  const expectArity = ({
    typeCount,
    natCount,
  }: {
    typeCount: number;
    natCount: number;
  }) => {
    if (typeArguments.length !== typeCount) {
      emitDiagnostic({
        ctx,
        code: "MO0001",
        params: {
          kind: "type-arguments",
          name: expr.name,
          expected: typeCount,
          actual: typeArguments.length,
        },
        span: expr.span,
        phase: "typing",
      });
    }
    if (natArguments.length !== natCount) {
      emitDiagnostic({
        ctx,
        code: "MO0001",
        params: {
          kind: "nat-arguments",
          name: expr.name,
          expected: natCount,
          actual: natArguments.length,
        },
        span: expr.span,
        phase: "typing",
      });
    }
  };

  const typeParam = scope.types.get(expr.name);
  if (typeof typeParam === "number") {
    expectArity({ typeCount: 0, natCount: 0 });
    return arena.internTypeParamRef(typeParam);
  }

  if (isPrimitiveName(expr.name)) {
    expectArity({ typeCount: 0, natCount: 0 });
    return ctx.primitives[expr.name];
  }

  const struct = ctx.structs.get(expr.name);
  if (struct) {
    expectArity({
      typeCount: struct.typeParams.length,
      natCount: struct.natParams.length,
    });
    return arena.internStruct({
      name: struct.name,
      typeArgs: typeArguments.map(resolve),
      natArgs: natArguments.map((nat) =>
        resolveNatExpr({ ctx, expr: nat, scope })
      ),
    });
  }

  return emitDiagnostic({
    ctx,
    code: "SG0001",
    params: { kind: "unknown-type", name: expr.name },
    span: expr.span,
  });
};
