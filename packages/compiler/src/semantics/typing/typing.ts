import type { HirBlock } from "../hir/index.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import type { RegisteredFunction } from "./registry.js";
import { typeBlock } from "./statements.js";
import { createBinding } from "./statements/index.js";
import type { TypedFunction, TypedParameter } from "./typed-nodes.js";
import type { FunctionTypingState, TypeEnv, TypingContext } from "./types.js";

export * from "./types.js";

const collectAssignedNames = (block: HirBlock, into: Set<string>): Set<string> => {
  block.statements.forEach((statement) => {
    switch (statement.kind) {
      case "assign":
        if (statement.target.targetKind === "name") {
          into.add(statement.target.name);
        } else {
          statement.target.names.forEach((name) => into.add(name));
        }
        return;
      case "if":
        collectAssignedNames(statement.then, into);
        if (statement.else) collectAssignedNames(statement.else, into);
        return;
      case "while":
        collectAssignedNames(statement.body, into);
        return;
      case "for":
        into.add(statement.variable);
        collectAssignedNames(statement.body, into);
        return;
      default:
        return;
    }
  });
  return into;
};

/**
 * Types one registered function or method body against the finalized
 * signature table. All state besides the shared context is private to the
 * call, so a rejected definition leaves nothing behind.
 */
export const typeFunction = ({
  ctx,
  registered,
}: {
  ctx: TypingContext;
  registered: RegisteredFunction;
}): TypedFunction => {
  const { decl, signature } = registered;
  const state: FunctionTypingState = {
    ctx,
    functionName: registered.name,
    scope: registered.scope,
    returnType: signature.returnType,
    assignedNames: collectAssignedNames(decl.body, new Set()),
    loops: [],
  };

  const env: TypeEnv = new Map();
  const params = signature.params.map((param): TypedParameter => {
    const span =
      decl.parameters.find((candidate) => candidate.name === param.name)?.span ??
      decl.span;
    const binding = createBinding({
      state,
      name: param.name,
      type: param.type,
      span,
    });
    env.set(param.name, binding);
    return { binding, ownership: param.ownership };
  });

  const body = typeBlock(decl.body, state, env);
  if (body.env && signature.returnType !== ctx.primitives.none) {
    emitDiagnostic({
      ctx,
      code: "TY0004",
      params: {
        functionName: registered.name,
        returnType: ctx.arena.format(signature.returnType),
      },
      span: decl.span,
    });
  }

  return {
    name: registered.name,
    kind: registered.kind,
    signature,
    params,
    returnType: signature.returnType,
    body: body.block,
    span: decl.span,
  };
};
