import type { SourceSpan } from "../ids.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import type { Binding } from "./typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "./types.js";

export const cloneEnv = (env: TypeEnv): TypeEnv => new Map(env);

const reportInconsistentBinding = ({
  state,
  left,
  right,
  span,
}: {
  state: FunctionTypingState;
  left: Binding;
  right: Binding;
  span: SourceSpan;
}): never =>
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0002",
    params: {
      name: left.name,
      left: state.ctx.arena.format(left.type),
      right: state.ctx.arena.format(right.type),
    },
    span,
  });

/**
 * Joins the environments of every path reaching a merge point. Paths that
 * ended in return, break or continue are passed as undefined and skipped.
 * A name bound on only some paths stays visible; whether it is assigned on
 * every path is left to the linearity pass.
 */
export const mergeEnvs = ({
  state,
  envs,
  span,
}: {
  state: FunctionTypingState;
  envs: readonly (TypeEnv | undefined)[];
  span: SourceSpan;
}): TypeEnv | undefined => {
  const live = envs.filter((env): env is TypeEnv => env !== undefined);
  if (live.length === 0) return undefined;

  const merged: TypeEnv = new Map();
  live.forEach((env) => {
    env.forEach((binding, name) => {
      const existing = merged.get(name);
      if (!existing) {
        merged.set(name, binding);
        return;
      }
      if (existing.type !== binding.type) {
        reportInconsistentBinding({ state, left: existing, right: binding, span });
      }
    });
  });
  return merged;
};

/**
 * A loop may run any number of times, so every name live at loop entry must
 * keep its type on each path back to the loop head.
 */
export const checkBackEdges = ({
  state,
  entry,
  edges,
  span,
}: {
  state: FunctionTypingState;
  entry: TypeEnv;
  edges: readonly TypeEnv[];
  span: SourceSpan;
}): void => {
  edges.forEach((edge) => {
    entry.forEach((binding, name) => {
      const after = edge.get(name);
      if (after && after.type !== binding.type) {
        reportInconsistentBinding({ state, left: binding, right: after, span });
      }
    });
  });
};
