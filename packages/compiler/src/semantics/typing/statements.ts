import type { HirBlock, HirStatement } from "../hir/index.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import { cloneEnv } from "./environment.js";
import { typeExpression } from "./expressions.js";
import { ensureTypeMatches } from "./expressions/index.js";
import type { TypedBlock, TypedStatement } from "./typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "./types.js";
import {
  typeAssignStatement,
  typeForStatement,
  typeIfStatement,
  typeWhileStatement,
} from "./statements/index.js";

/** The environment after a statement, or undefined when control cannot fall through. */
export type StatementResult = {
  statement: TypedStatement;
  env: TypeEnv | undefined;
};

export type BlockResult = {
  block: TypedBlock;
  env: TypeEnv | undefined;
};

/**
 * Types a block in order. Statements after a return, break or continue are
 * unreachable and left out of the typed tree.
 */
export const typeBlock = (
  block: HirBlock,
  state: FunctionTypingState,
  env: TypeEnv
): BlockResult => {
  const statements: TypedStatement[] = [];
  let current: TypeEnv | undefined = env;
  for (const statement of block.statements) {
    if (!current) break;
    const result = typeStatement(statement, state, current);
    statements.push(result.statement);
    current = result.env;
  }
  return { block: { statements, span: block.span }, env: current };
};

export const typeStatement = (
  statement: HirStatement,
  state: FunctionTypingState,
  env: TypeEnv
): StatementResult => {
  switch (statement.kind) {
    case "assign":
      return typeAssignStatement(statement, state, env);
    case "expr-stmt":
      return {
        statement: {
          kind: "expr",
          expr: typeExpression(statement.expr, state, env),
          span: statement.span,
        },
        env,
      };
    case "return": {
      const { ctx, returnType } = state;
      if (!statement.value) {
        ensureTypeMatches({
          state,
          actual: ctx.primitives.none,
          expected: returnType,
          context: `return from ${state.functionName}`,
          span: statement.span,
        });
        return { statement: { kind: "return", span: statement.span }, env: undefined };
      }
      const value = typeExpression(statement.value, state, env, {
        expectedType: returnType,
      });
      ensureTypeMatches({
        state,
        actual: value.type,
        expected: returnType,
        context: `return from ${state.functionName}`,
        span: statement.value.span,
      });
      return {
        statement: { kind: "return", value, span: statement.span },
        env: undefined,
      };
    }
    case "if":
      return typeIfStatement(statement, state, env);
    case "while":
      return typeWhileStatement(statement, state, env);
    case "for":
      return typeForStatement(statement, state, env);
    case "break":
    case "continue": {
      const frame = state.loops[state.loops.length - 1];
      if (!frame) {
        return emitDiagnostic({
          ctx: state.ctx,
          code: "TY0005",
          params: { statement: statement.kind },
          span: statement.span,
        });
      }
      (statement.kind === "break" ? frame.breaks : frame.continues).push(
        cloneEnv(env)
      );
      return {
        statement: { kind: statement.kind, span: statement.span },
        env: undefined,
      };
    }
  }
};
