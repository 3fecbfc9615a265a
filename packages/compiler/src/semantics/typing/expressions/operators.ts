import type { HirBinaryExpr, HirUnaryExpr } from "../../hir/index.js";
import type { SourceSpan, TypeId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import {
  binaryOperatorMethods,
  operatorSignatureName,
  unaryOperatorMethods,
} from "../builtins.js";
import { typeExpression } from "../expressions.js";
import type { Signature } from "../signature-table.js";
import type { TypedCall, TypedExpression } from "../typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import { typeSignatureCall, type CallArgument } from "./call.js";
import { receiverTypeName } from "./shared.js";

const findOperator = ({
  state,
  operand,
  operator,
  method,
  span,
}: {
  state: FunctionTypingState;
  operand: TypedExpression;
  operator: string;
  method: string;
  span: SourceSpan;
}): Signature => {
  const { ctx } = state;
  const owner = receiverTypeName(ctx.arena, operand.type);
  const signature =
    owner === undefined
      ? undefined
      : ctx.signatures.get(operatorSignatureName(owner, method));
  if (!signature) {
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: {
        kind: "unknown-operator",
        operator,
        operand: ctx.arena.format(operand.type),
      },
      span,
    });
  }
  return signature;
};

/** `a + b` is typed as the call `A.__add__(a, b)`, so structs may overload it. */
export const typeBinaryOperatorExpr = (
  expr: HirBinaryExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedCall => {
  const { operator } = expr;
  if (operator === "and" || operator === "or") {
    throw new Error(`${operator} is not an overloadable operator`);
  }
  const left = typeExpression(expr.left, state, env);
  const signature = findOperator({
    state,
    operand: left,
    operator,
    method: binaryOperatorMethods[operator],
    span: expr.span,
  });
  const args: CallArgument[] = [
    { kind: "typed", value: left },
    { kind: "syntax", value: expr.right },
  ];
  return typeSignatureCall({
    state,
    env,
    signature,
    args,
    expectedType,
    span: expr.span,
  });
};

export const typeUnaryOperatorExpr = (
  expr: HirUnaryExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedCall => {
  const operand = typeExpression(expr.operand, state, env);
  const signature = findOperator({
    state,
    operand,
    operator: expr.operator,
    method: unaryOperatorMethods[expr.operator],
    span: expr.span,
  });
  return typeSignatureCall({
    state,
    env,
    signature,
    args: [{ kind: "typed", value: operand }],
    expectedType,
    span: expr.span,
  });
};
