import type { SourceSpan, TypeId } from "../ids.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import type {
  Binding,
  TypedBlock,
  TypedExpression,
  TypedFieldAccess,
  TypedFunction,
  TypedIndex,
  TypedStatement,
} from "../typing/typed-nodes.js";
import type { TypingContext } from "../typing/types.js";
import {
  checkBackEdge,
  checkExit,
  checkLoopLocals,
  cloneFlow,
  mergeFlows,
  replaceFlow,
  type FlowState,
} from "./flow-state.js";

/**
 * How a value is used. Consuming positions take ownership (owned arguments,
 * assignment sources, aggregate elements, returns); borrowing positions read
 * without taking ownership; discarded values are evaluated for effect only.
 */
export type UsePosition = "consume" | "borrow" | "discard";

interface LoopFlowFrame {
  entry: FlowState;
  breaks: FlowState[];
  continues: FlowState[];
  /** Set when breaking out would drop the rest of a linear iterable. */
  iterable?: { type: TypeId; variable: string };
}

interface LinearityState {
  ctx: TypingContext;
  loops: LoopFlowFrame[];
}

type Projection = TypedFieldAccess | TypedIndex;

const isProjection = (expr: TypedExpression): expr is Projection =>
  expr.kind === "field-access" || expr.kind === "index";

const isLinear = (state: LinearityState, type: TypeId): boolean =>
  state.ctx.ownership.classify(type) === "linear";

const define = (flow: FlowState, binding: Binding, borrowed: boolean): void => {
  flow.set(binding.name, {
    name: binding.name,
    state: "defined",
    ownership: binding.ownership,
    type: binding.type,
    definedAt: binding.definedAt,
    borrowed,
  });
};

/** Binds a name, refusing to drop a linear value it still holds. */
const bind = (
  state: LinearityState,
  flow: FlowState,
  binding: Binding,
  span: SourceSpan
): void => {
  const { ctx } = state;
  const existing = flow.get(binding.name);
  if (existing?.state === "defined" && existing.ownership === "linear") {
    emitDiagnostic({
      ctx,
      code: "LN0003",
      params: {
        kind: "overwritten",
        name: binding.name,
        type: ctx.arena.format(existing.type),
      },
      span,
    });
  }
  define(flow, binding, existing?.borrowed ?? false);
};

const requireDefined = (
  state: LinearityState,
  flow: FlowState,
  name: string,
  span: SourceSpan
) => {
  const binding = flow.get(name);
  if (!binding || binding.state === "undefined") {
    return emitDiagnostic({ ctx: state.ctx, code: "LN0001", params: { name }, span });
  }
  if (binding.state === "consumed") {
    return emitDiagnostic({ ctx: state.ctx, code: "LN0002", params: { name }, span });
  }
  return binding;
};

const useLocal = (
  state: LinearityState,
  flow: FlowState,
  name: string,
  position: UsePosition,
  span: SourceSpan
): void => {
  const binding = requireDefined(state, flow, name, span);
  if (position === "consume" && binding.ownership !== "copyable") {
    flow.set(name, { ...binding, state: "consumed" });
  }
};

const dropTemporary = (
  state: LinearityState,
  expr: TypedExpression,
  position: UsePosition
): void => {
  if (position === "consume" || !isLinear(state, expr.type)) return;
  emitDiagnostic({
    ctx: state.ctx,
    code: "LN0003",
    params: { kind: "dropped-temporary", type: state.ctx.arena.format(expr.type) },
    span: expr.span,
  });
};

/** Whether the container of a projection keeps linear parts besides the one taken. */
const leavesLinearSiblings = (state: LinearityState, expr: Projection): boolean => {
  const { ctx } = state;
  const container = expr.target.type;
  if (expr.kind === "field-access") {
    const fields = ctx.structs.fieldsOf(container) ?? [];
    return fields.some(
      (field) => field.name !== expr.field && isLinear(state, field.type)
    );
  }
  const desc = ctx.arena.get(container);
  if (desc.kind === "tuple") {
    const position = expr.index.kind === "literal" ? expr.index.value : undefined;
    return desc.elements.some(
      (element, index) => index !== position && isLinear(state, element)
    );
  }
  if (desc.kind === "array") {
    if (!isLinear(state, desc.element)) return false;
    return !(desc.length.kind === "nat-literal" && desc.length.value === 1);
  }
  return false;
};

const describePart = (expr: Projection): string => {
  if (expr.kind === "field-access") return `field ${expr.field}`;
  return expr.index.kind === "literal"
    ? `element ${String(expr.index.value)}`
    : "an element";
};

/**
 * Field and element reads. Moving a non-copyable part out consumes the whole
 * root binding, so any move out of a container that keeps other linear parts
 * would leak them.
 */
const useProjection = (
  state: LinearityState,
  flow: FlowState,
  expr: Projection,
  position: UsePosition
): void => {
  if (expr.kind === "index") {
    useExpression(state, flow, expr.index, "consume");
  }

  const moves =
    position === "consume" && state.ctx.ownership.classify(expr.type) !== "copyable";

  if (moves) {
    let level: TypedExpression = expr;
    while (isProjection(level)) {
      if (leavesLinearSiblings(state, level)) {
        return emitDiagnostic({
          ctx: state.ctx,
          code: "LN0003",
          params: {
            kind: "partial-move",
            container: state.ctx.arena.format(level.target.type),
            part: describePart(level),
          },
          span: expr.span,
        });
      }
      level = level.target;
    }
  }

  let root: TypedExpression = expr.target;
  while (isProjection(root)) root = root.target;

  if (root.kind === "local") {
    useLocal(state, flow, root.name, moves ? "consume" : "borrow", root.span);
    return;
  }
  useExpression(state, flow, root, moves ? "consume" : "discard");
};

export const useExpression = (
  state: LinearityState,
  flow: FlowState,
  expr: TypedExpression,
  position: UsePosition
): void => {
  switch (expr.kind) {
    case "literal":
    case "nat-ref":
    case "function-ref":
      return;
    case "local":
      useLocal(state, flow, expr.name, position, expr.span);
      return;
    case "field-access":
    case "index":
      useProjection(state, flow, expr, position);
      return;
    case "call":
      if (expr.calleeKind === "local") {
        useLocal(state, flow, expr.callee, "borrow", expr.span);
      }
      expr.args.forEach((arg) =>
        useExpression(
          state,
          flow,
          arg.expr,
          arg.ownership === "owned" ? "consume" : "borrow"
        )
      );
      dropTemporary(state, expr, position);
      return;
    case "tuple":
    case "array":
      expr.elements.forEach((element) =>
        useExpression(state, flow, element, "consume")
      );
      dropTemporary(state, expr, position);
      return;
    case "struct-literal":
      expr.fields.forEach((field) =>
        useExpression(state, flow, field.value, "consume")
      );
      dropTemporary(state, expr, position);
      return;
    case "option":
      if (expr.value) useExpression(state, flow, expr.value, "consume");
      dropTemporary(state, expr, position);
      return;
    case "logical": {
      useExpression(state, flow, expr.left, "consume");
      const right = cloneFlow(flow);
      useExpression(state, right, expr.right, "consume");
      const merged = mergeFlows({ ctx: state.ctx, flows: [flow, right], span: expr.span });
      if (merged) replaceFlow(flow, merged);
      return;
    }
  }
};

const checkBlock = (
  state: LinearityState,
  block: TypedBlock,
  flow: FlowState
): FlowState | undefined => {
  let current: FlowState | undefined = flow;
  for (const statement of block.statements) {
    if (!current) break;
    current = checkStatement(state, statement, current);
  }
  return current;
};

/**
 * Checks a loop body starting from `start`. `frame.entry` is the state at
 * the loop head, which every back edge has to reproduce.
 */
const runLoop = ({
  state,
  frame,
  start,
  body,
  span,
}: {
  state: LinearityState;
  frame: LoopFlowFrame;
  start: FlowState;
  body: TypedBlock;
  span: SourceSpan;
}): FlowState[] => {
  state.loops.push(frame);
  let end: FlowState | undefined;
  try {
    end = checkBlock(state, body, start);
  } finally {
    state.loops.pop();
  }
  const edges = end ? [end, ...frame.continues] : frame.continues;
  edges.forEach((edge) =>
    checkBackEdge({ ctx: state.ctx, entry: frame.entry, edge, span })
  );
  frame.breaks.forEach((exit) =>
    checkLoopLocals({ ctx: state.ctx, entry: frame.entry, flow: exit, span })
  );
  return frame.breaks;
};

const checkStatement = (
  state: LinearityState,
  statement: TypedStatement,
  flow: FlowState
): FlowState | undefined => {
  const { ctx } = state;
  switch (statement.kind) {
    case "assign": {
      useExpression(state, flow, statement.value, "consume");
      const targets =
        statement.target.kind === "name"
          ? [statement.target.binding]
          : statement.target.bindings;
      targets.forEach((binding) => bind(state, flow, binding, statement.span));
      return flow;
    }
    case "expr":
      useExpression(state, flow, statement.expr, "discard");
      return flow;
    case "return":
      if (statement.value) useExpression(state, flow, statement.value, "consume");
      checkExit({ ctx, flow, span: statement.span });
      return undefined;
    case "if": {
      useExpression(state, flow, statement.condition, "consume");
      const then = checkBlock(state, statement.then, cloneFlow(flow));
      const otherwise = statement.else
        ? checkBlock(state, statement.else, cloneFlow(flow))
        : flow;
      return mergeFlows({ ctx, flows: [then, otherwise], span: statement.span });
    }
    case "while": {
      const frame: LoopFlowFrame = { entry: cloneFlow(flow), breaks: [], continues: [] };
      useExpression(state, flow, statement.condition, "consume");
      const breaks = runLoop({
        state,
        frame,
        start: cloneFlow(flow),
        body: statement.body,
        span: statement.span,
      });
      return mergeFlows({ ctx, flows: [flow, ...breaks], span: statement.span });
    }
    case "for": {
      const { iterable, binding } = statement;
      let linearIterable: LoopFlowFrame["iterable"];
      if (iterable.kind === "range") {
        useExpression(state, flow, iterable.start, "consume");
        useExpression(state, flow, iterable.stop, "consume");
      } else {
        useExpression(state, flow, iterable.value, "consume");
        if (isLinear(state, binding.type)) {
          linearIterable = { type: iterable.value.type, variable: binding.name };
        }
      }
      const frame: LoopFlowFrame = {
        entry: cloneFlow(flow),
        breaks: [],
        continues: [],
        iterable: linearIterable,
      };
      const start = cloneFlow(flow);
      bind(state, start, binding, statement.span);
      const breaks = runLoop({
        state,
        frame,
        start,
        body: statement.body,
        span: statement.span,
      });
      const exit = mergeFlows({ ctx, flows: [flow, ...breaks], span: statement.span });
      if (exit && !flow.has(binding.name)) exit.delete(binding.name);
      return exit;
    }
    case "break":
    case "continue": {
      const frame = state.loops[state.loops.length - 1];
      if (!frame) {
        throw new Error(`${statement.kind} outside of a loop reached linearity checking`);
      }
      if (statement.kind === "break" && frame.iterable) {
        emitDiagnostic({
          ctx,
          code: "LN0003",
          params: {
            kind: "partial-move",
            container: ctx.arena.format(frame.iterable.type),
            part: frame.iterable.variable,
          },
          span: statement.span,
        });
      }
      (statement.kind === "break" ? frame.breaks : frame.continues).push(
        cloneFlow(flow)
      );
      return undefined;
    }
  }
};

/**
 * Definite-assignment and linearity check of one typed function. Each
 * binding moves through undefined, defined and consumed; linear values must
 * be consumed exactly once on every path, affine values at most once.
 */
export const checkLinearity = ({
  ctx,
  fn,
}: {
  ctx: TypingContext;
  fn: TypedFunction;
}): void => {
  const state: LinearityState = { ctx, loops: [] };
  const flow: FlowState = new Map();
  fn.params.forEach((param) =>
    define(flow, param.binding, param.ownership === "borrowed")
  );
  const end = checkBlock(state, fn.body, flow);
  if (end) checkExit({ ctx, flow: end, span: fn.span });
};
