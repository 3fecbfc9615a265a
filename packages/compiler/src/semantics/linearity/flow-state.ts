import type { SourceSpan, TypeId } from "../ids.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import type { OwnershipClass } from "../typing/ownership.js";
import type { TypingContext } from "../typing/types.js";

export type BindingState = "undefined" | "defined" | "consumed";

export interface TrackedBinding {
  name: string;
  state: BindingState;
  ownership: OwnershipClass;
  type: TypeId;
  definedAt: SourceSpan;
  /** Borrowed parameters must hold their value again at every exit. */
  borrowed: boolean;
}

export type FlowState = Map<string, TrackedBinding>;

export const cloneFlow = (flow: FlowState): FlowState =>
  new Map([...flow].map(([name, binding]) => [name, { ...binding }]));

export const replaceFlow = (target: FlowState, source: FlowState): void => {
  target.clear();
  source.forEach((binding, name) => target.set(name, binding));
};

const stateOf = (flow: FlowState, name: string): BindingState =>
  flow.get(name)?.state ?? "undefined";

const mergeState = ({
  ctx,
  binding,
  states,
  span,
}: {
  ctx: TypingContext;
  binding: TrackedBinding;
  states: readonly BindingState[];
  span: SourceSpan;
}): BindingState => {
  const first = states[0] ?? "undefined";
  if (states.every((state) => state === first)) return first;

  const defined = states.includes("defined");
  const consumed = states.includes("consumed");

  if (binding.ownership === "copyable") return "undefined";

  if (binding.ownership === "linear" && defined && consumed) {
    return emitDiagnostic({
      ctx,
      code: "LN0004",
      params: { kind: "branches", name: binding.name },
      span,
    });
  }
  if (binding.ownership === "linear" && defined) {
    return emitDiagnostic({
      ctx,
      code: "LN0003",
      params: {
        kind: "branch-local",
        name: binding.name,
        type: ctx.arena.format(binding.type),
      },
      span,
    });
  }
  // An affine value that may have been moved is treated as moved; one that
  // may never have been bound is treated as unbound.
  return consumed ? "consumed" : "undefined";
};

/**
 * Joins the flow states of every live path reaching a merge point. Paths
 * that ended in return, break or continue are passed as undefined.
 */
export const mergeFlows = ({
  ctx,
  flows,
  span,
}: {
  ctx: TypingContext;
  flows: readonly (FlowState | undefined)[];
  span: SourceSpan;
}): FlowState | undefined => {
  const live = flows.filter((flow): flow is FlowState => flow !== undefined);
  const [first] = live;
  if (!first) return undefined;
  if (live.length === 1) return cloneFlow(first);

  const merged: FlowState = new Map();
  live.forEach((flow) => {
    flow.forEach((binding, name) => {
      if (merged.has(name)) return;
      const state = mergeState({
        ctx,
        binding,
        states: live.map((candidate) => stateOf(candidate, name)),
        span,
      });
      merged.set(name, { ...binding, state });
    });
  });
  return merged;
};

/** Linear bindings introduced inside a loop body may not survive an iteration. */
export const checkLoopLocals = ({
  ctx,
  entry,
  flow,
  span,
}: {
  ctx: TypingContext;
  entry: FlowState;
  flow: FlowState;
  span: SourceSpan;
}): void => {
  flow.forEach((binding, name) => {
    if (binding.ownership !== "linear" || binding.state !== "defined") return;
    if (stateOf(entry, name) !== "undefined") return;
    emitDiagnostic({
      ctx,
      code: "LN0003",
      params: {
        kind: "loop-local",
        name,
        type: ctx.arena.format(binding.type),
      },
      span,
    });
  });
};

/**
 * Every path back to the loop head must leave the linear bindings live at
 * loop entry in the state they had on entry, and may not move an affine
 * binding the next iteration could use again.
 */
export const checkBackEdge = ({
  ctx,
  entry,
  edge,
  span,
}: {
  ctx: TypingContext;
  entry: FlowState;
  edge: FlowState;
  span: SourceSpan;
}): void => {
  checkLoopLocals({ ctx, entry, flow: edge, span });
  entry.forEach((binding, name) => {
    if (binding.ownership === "copyable") return;
    const after = stateOf(edge, name);
    if (after === binding.state) return;
    if (binding.ownership === "affine" && after !== "consumed") return;
    emitDiagnostic({
      ctx,
      code: "LN0004",
      params: { kind: "loop", name },
      span,
    });
  });
};

/** Checks performed wherever control leaves the function. */
export const checkExit = ({
  ctx,
  flow,
  span,
}: {
  ctx: TypingContext;
  flow: FlowState;
  span: SourceSpan;
}): void => {
  flow.forEach((binding, name) => {
    if (binding.borrowed) {
      if (binding.state !== "defined") {
        emitDiagnostic({ ctx, code: "LN0005", params: { name }, span });
      }
      return;
    }
    if (binding.ownership === "linear" && binding.state === "defined") {
      emitDiagnostic({
        ctx,
        code: "LN0003",
        params: {
          kind: "unconsumed-at-exit",
          name,
          type: ctx.arena.format(binding.type),
        },
        span,
      });
    }
  });
};
