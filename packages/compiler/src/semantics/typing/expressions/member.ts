import type {
  HirFieldAccessExpr,
  HirIndexExpr,
  HirMethodCallExpr,
} from "../../hir/index.js";
import type { TypeId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import { typeExpression } from "../expressions.js";
import { methodSignatureName } from "../registry.js";
import type { TypedCall, TypedExpression } from "../typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import { typeSignatureCall } from "./call.js";
import { ensureTypeMatches, receiverTypeName } from "./shared.js";

/** `receiver.method(args)` calls `Type.method` with the receiver as `self`. */
export const typeMethodCallExpr = (
  expr: HirMethodCallExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedCall => {
  const { ctx } = state;
  const receiver = typeExpression(expr.receiver, state, env);
  const owner = receiverTypeName(ctx.arena, receiver.type);
  const signature =
    owner === undefined
      ? undefined
      : ctx.signatures.get(methodSignatureName(owner, expr.method));
  if (!signature) {
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: {
        kind: "unknown-method",
        name: expr.method,
        receiver: ctx.arena.format(receiver.type),
      },
      span: expr.span,
    });
  }

  return typeSignatureCall({
    state,
    env,
    signature,
    args: [
      { kind: "typed", value: receiver },
      ...expr.args.map((value) => ({ kind: "syntax" as const, value })),
    ],
    expectedType,
    span: expr.span,
  });
};

export const typeFieldAccessExpr = (
  expr: HirFieldAccessExpr,
  state: FunctionTypingState,
  env: TypeEnv
): TypedExpression => {
  const { ctx } = state;
  const target = typeExpression(expr.target, state, env);
  const fields = ctx.structs.fieldsOf(target.type);
  if (!fields) {
    return emitDiagnostic({
      ctx,
      code: "TY0001",
      params: {
        kind: "no-fields",
        field: expr.field,
        actual: ctx.arena.format(target.type),
      },
      span: expr.span,
    });
  }

  const field = fields.find((candidate) => candidate.name === expr.field);
  if (!field) {
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: {
        kind: "unknown-field",
        name: expr.field,
        receiver: ctx.arena.format(target.type),
      },
      span: expr.span,
    });
  }

  return {
    kind: "field-access",
    target,
    field: expr.field,
    type: field.type,
    span: expr.span,
  };
};

/**
 * Arrays take any `int` index; bounds are a runtime concern. Tuples take an
 * integer literal so the element type is known statically.
 */
export const typeIndexExpr = (
  expr: HirIndexExpr,
  state: FunctionTypingState,
  env: TypeEnv
): TypedExpression => {
  const { ctx } = state;
  const target = typeExpression(expr.target, state, env);
  const desc = ctx.arena.get(target.type);
  const int = ctx.primitives.int;

  if (desc.kind === "array") {
    const index = typeExpression(expr.index, state, env, { expectedType: int });
    ensureTypeMatches({
      state,
      actual: index.type,
      expected: int,
      context: "array index",
      span: expr.index.span,
    });
    return {
      kind: "index",
      target,
      index,
      type: desc.element,
      span: expr.span,
    };
  }

  if (desc.kind === "tuple") {
    const literal = expr.index;
    const position =
      literal.exprKind === "literal" && literal.literalKind === "int"
        ? literal.value
        : undefined;
    const element =
      typeof position === "number" ? desc.elements[position] : undefined;
    if (typeof position !== "number" || element === undefined) {
      return emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "type-mismatch",
          context: "tuple index",
          expected: `an integer literal below ${desc.elements.length}`,
          actual:
            typeof position === "number" ? `${position}` : "a computed index",
        },
        span: expr.index.span,
      });
    }
    return {
      kind: "index",
      target,
      index: {
        kind: "literal",
        value: position,
        type: int,
        span: literal.span,
      },
      type: element,
      span: expr.span,
    };
  }

  return emitDiagnostic({
    ctx,
    code: "TY0001",
    params: { kind: "not-indexable", actual: ctx.arena.format(target.type) },
    span: expr.span,
  });
};
