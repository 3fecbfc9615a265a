import type { HirIfStatement } from "../../hir/index.js";
import { cloneEnv, mergeEnvs } from "../environment.js";
import { typeExpression } from "../expressions.js";
import { ensureTypeMatches } from "../expressions/index.js";
import type { FunctionTypingState, TypeEnv } from "../types.js";
import { typeBlock, type StatementResult } from "../statements.js";

export const typeIfStatement = (
  statement: HirIfStatement,
  state: FunctionTypingState,
  env: TypeEnv
): StatementResult => {
  const bool = state.ctx.primitives.bool;
  const condition = typeExpression(statement.condition, state, env, {
    expectedType: bool,
  });
  ensureTypeMatches({
    state,
    actual: condition.type,
    expected: bool,
    context: "if condition",
    span: statement.condition.span,
  });

  const then = typeBlock(statement.then, state, cloneEnv(env));
  const otherwise = statement.else
    ? typeBlock(statement.else, state, cloneEnv(env))
    : undefined;

  return {
    statement: {
      kind: "if",
      condition,
      then: then.block,
      else: otherwise?.block,
      span: statement.span,
    },
    env: mergeEnvs({
      state,
      envs: [then.env, otherwise ? otherwise.env : env],
      span: statement.span,
    }),
  };
};
