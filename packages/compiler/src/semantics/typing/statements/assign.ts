import type { HirAssignStatement } from "../../hir/index.js";
import type { SourceSpan, TypeId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import { typeExpression } from "../expressions.js";
import { ensureTypeMatches } from "../expressions/index.js";
import { resolveTypeExpr } from "../type-exprs.js";
import type { Binding } from "../typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import type { StatementResult } from "../statements.js";

export const createBinding = ({
  state,
  name,
  type,
  span,
}: {
  state: FunctionTypingState;
  name: string;
  type: TypeId;
  span: SourceSpan;
}): Binding => ({
  name,
  type,
  ownership: state.ctx.ownership.classify(type),
  definedAt: span,
});

/**
 * `x = value`, `x: T = value` and `(a, b) = value`. Rebinding a name to a
 * value of another type is allowed on straight-line code.
 */
export const typeAssignStatement = (
  statement: HirAssignStatement,
  state: FunctionTypingState,
  env: TypeEnv
): StatementResult => {
  const { ctx } = state;
  const { target } = statement;
  const annotation = statement.annotation
    ? resolveTypeExpr({ ctx, expr: statement.annotation, scope: state.scope })
    : undefined;

  const value = typeExpression(statement.value, state, env, {
    expectedType: annotation,
  });
  const type = annotation ?? value.type;
  if (annotation !== undefined) {
    ensureTypeMatches({
      state,
      actual: value.type,
      expected: annotation,
      context: `assignment to ${
        target.targetKind === "name" ? target.name : `(${target.names.join(", ")})`
      }`,
      span: statement.value.span,
    });
  }

  const next = new Map(env);

  if (target.targetKind === "name") {
    const binding = createBinding({
      state,
      name: target.name,
      type,
      span: target.span,
    });
    next.set(target.name, binding);
    return {
      statement: {
        kind: "assign",
        target: { kind: "name", binding },
        value,
        span: statement.span,
      },
      env: next,
    };
  }

  const desc = ctx.arena.get(type);
  if (desc.kind !== "tuple" || desc.elements.length !== target.names.length) {
    return emitDiagnostic({
      ctx,
      code: "TY0001",
      params: {
        kind: "tuple-arity",
        expected: target.names.length,
        actual: ctx.arena.format(type),
      },
      span: target.span,
    });
  }

  const seen = new Set<string>();
  const bindings = target.names.map((name, index) => {
    if (seen.has(name)) {
      return emitDiagnostic({
        ctx,
        code: "SG0002",
        params: { kind: "duplicate-member", owner: "tuple pattern", name },
        span: target.span,
      });
    }
    seen.add(name);
    const element = desc.elements[index];
    if (element === undefined) {
      throw new Error(`tuple element ${index} missing from ${ctx.arena.format(type)}`);
    }
    const binding = createBinding({ state, name, type: element, span: target.span });
    next.set(name, binding);
    return binding;
  });

  return {
    statement: {
      kind: "assign",
      target: { kind: "tuple", bindings },
      value,
      span: statement.span,
    },
    env: next,
  };
};
