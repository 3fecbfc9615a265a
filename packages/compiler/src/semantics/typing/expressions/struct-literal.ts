import type { HirExpression, HirStructLiteralExpr } from "../../hir/index.js";
import type { TypeId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import type { TypedStructLiteral } from "../typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import { typeSignatureCall } from "./call.js";

/**
 * Struct literals are checked as a call to the struct's constructor with the
 * fields in declaration order, so generic structs infer their arguments the
 * same way generic functions do.
 */
export const typeStructLiteralExpr = (
  expr: HirStructLiteralExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedStructLiteral => {
  const { ctx } = state;
  const info = ctx.structs.get(expr.struct);
  if (!info) {
    return emitDiagnostic({
      ctx,
      code: "SG0001",
      params: { kind: "unknown-type", name: expr.struct },
      span: expr.span,
    });
  }

  const provided = new Map<string, HirExpression>();
  expr.fields.forEach((field) => {
    if (!info.fields.some((declared) => declared.name === field.name)) {
      emitDiagnostic({
        ctx,
        code: "SG0001",
        params: { kind: "unknown-field", name: field.name, receiver: info.name },
        span: field.span,
      });
    }
    if (provided.has(field.name)) {
      emitDiagnostic({
        ctx,
        code: "SG0002",
        params: { kind: "duplicate-member", owner: info.name, name: field.name },
        span: field.span,
      });
    }
    provided.set(field.name, field.value);
  });

  const ordered = info.fields.map((field) => {
    const value = provided.get(field.name);
    if (!value) {
      return emitDiagnostic({
        ctx,
        code: "TY0006",
        params: { struct: info.name, field: field.name },
        span: expr.span,
      });
    }
    return value;
  });

  const constructor = ctx.signatures.lookup(info.name, expr.span);
  const call = typeSignatureCall({
    state,
    env,
    signature: constructor,
    args: ordered.map((value) => ({ kind: "syntax" as const, value })),
    typeArguments: expr.typeArguments,
    natArguments: expr.natArguments,
    expectedType,
    span: expr.span,
  });

  return {
    kind: "struct-literal",
    struct: info.name,
    fields: info.fields.map((field, index) => {
      const arg = call.args[index];
      if (!arg) throw new Error(`constructor of ${info.name} dropped ${field.name}`);
      return { name: field.name, value: arg.expr };
    }),
    type: call.type,
    span: expr.span,
  };
};
