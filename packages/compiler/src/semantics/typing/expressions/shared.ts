import type { SourceSpan, TypeId } from "../../ids.js";
import { emitDiagnostic } from "../../../diagnostics/index.js";
import type { TypeArena } from "../type-arena.js";
import type { FunctionTypingState } from "../types.js";

export const ensureTypeMatches = ({
  state,
  actual,
  expected,
  context,
  span,
}: {
  state: FunctionTypingState;
  actual: TypeId;
  expected: TypeId;
  context: string;
  span: SourceSpan;
}): void => {
  if (actual === expected) return;
  const { arena } = state.ctx;
  if (arena.unify(actual, expected, { reason: context }).ok) return;
  emitDiagnostic({
    ctx: state.ctx,
    code: "TY0001",
    params: {
      kind: "type-mismatch",
      context,
      expected: arena.format(expected),
      actual: arena.format(actual),
    },
    span,
  });
};

/** Prefix used to find methods and operators of a receiver type. */
export const receiverTypeName = (
  arena: TypeArena,
  type: TypeId
): string | undefined => {
  const desc = arena.get(type);
  if (desc.kind === "primitive" || desc.kind === "struct") {
    return desc.name;
  }
  return undefined;
};
