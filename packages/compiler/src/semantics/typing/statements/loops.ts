import type {
  HirForStatement,
  HirIterable,
  HirWhileStatement,
} from "../../hir/index.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import { checkBackEdges, cloneEnv, mergeEnvs } from "../environment.js";
import { typeExpression } from "../expressions.js";
import { ensureTypeMatches } from "../expressions/index.js";
import type { TypedExpression, TypedIterable } from "../typed-nodes.js";
import type { FunctionTypingState, LoopFrame, TypeEnv } from "../types.js";
import { typeBlock, type BlockResult, type StatementResult } from "../statements.js";
import { createBinding } from "./assign.js";

const withLoopFrame = (
  state: FunctionTypingState,
  run: () => BlockResult
): { body: BlockResult; frame: LoopFrame } => {
  const frame: LoopFrame = { breaks: [], continues: [] };
  state.loops.push(frame);
  try {
    return { body: run(), frame };
  } finally {
    state.loops.pop();
  }
};

const typeIntExpr = (
  state: FunctionTypingState,
  env: TypeEnv,
  expr: Extract<HirIterable, { iterKind: "range" }>,
  which: "start" | "stop"
): TypedExpression => {
  const int = state.ctx.primitives.int;
  const source = expr[which];
  if (!source) {
    return { kind: "literal", value: 0, type: int, span: expr.stop.span };
  }
  const typed = typeExpression(source, state, env, { expectedType: int });
  ensureTypeMatches({
    state,
    actual: typed.type,
    expected: int,
    context: `range ${which}`,
    span: source.span,
  });
  return typed;
};

export const typeWhileStatement = (
  statement: HirWhileStatement,
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
    context: "while condition",
    span: statement.condition.span,
  });

  const { body, frame } = withLoopFrame(state, () =>
    typeBlock(statement.body, state, cloneEnv(env))
  );
  checkBackEdges({
    state,
    entry: env,
    edges: body.env ? [body.env, ...frame.continues] : frame.continues,
    span: statement.span,
  });

  return {
    statement: { kind: "while", condition, body: body.block, span: statement.span },
    env: mergeEnvs({ state, envs: [env, ...frame.breaks], span: statement.span }),
  };
};

export const typeForStatement = (
  statement: HirForStatement,
  state: FunctionTypingState,
  env: TypeEnv
): StatementResult => {
  const { ctx } = state;
  const { iterable: source } = statement;

  let iterable: TypedIterable;
  let elementType = ctx.primitives.int;
  if (source.iterKind === "range") {
    iterable = {
      kind: "range",
      start: typeIntExpr(state, env, source, "start"),
      stop: typeIntExpr(state, env, source, "stop"),
    };
  } else {
    const value = typeExpression(source.value, state, env);
    const desc = ctx.arena.get(value.type);
    if (desc.kind !== "array") {
      return emitDiagnostic({
        ctx,
        code: "TY0001",
        params: {
          kind: "type-mismatch",
          context: "for loop",
          expected: "array or range",
          actual: ctx.arena.format(value.type),
        },
        span: source.value.span,
      });
    }
    iterable = { kind: "array", value };
    elementType = desc.element;
  }

  const binding = createBinding({
    state,
    name: statement.variable,
    type: elementType,
    span: statement.span,
  });
  const bodyEnv = cloneEnv(env);
  bodyEnv.set(binding.name, binding);

  const { body, frame } = withLoopFrame(state, () =>
    typeBlock(statement.body, state, bodyEnv)
  );
  checkBackEdges({
    state,
    entry: env,
    edges: body.env ? [body.env, ...frame.continues] : frame.continues,
    span: statement.span,
  });

  const exit = mergeEnvs({
    state,
    envs: [env, ...frame.breaks],
    span: statement.span,
  });
  if (exit && !env.has(binding.name)) exit.delete(binding.name);

  return {
    statement: {
      kind: "for",
      binding,
      iterable,
      body: body.block,
      span: statement.span,
    },
    env: exit,
  };
};
