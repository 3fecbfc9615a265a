import type {
  HirArrayExpr,
  HirBinaryExpr,
  HirExpression,
  HirIdentifierExpr,
  HirLiteralExpr,
  HirTupleExpr,
} from "../hir/index.js";
import type { TypeId } from "../ids.js";
import { emitDiagnostic } from "../../diagnostics/index.js";
import { isGenericSignature } from "./signature-table.js";
import { natLiteral, natParam } from "./type-arena.js";
import type { TypedExpression } from "./typed-nodes.js";
import type { FunctionTypingState, TypeEnv } from "./types.js";
import {
  ensureTypeMatches,
  typeBinaryOperatorExpr,
  typeCallExpr,
  typeFieldAccessExpr,
  typeIndexExpr,
  typeMethodCallExpr,
  typeStructLiteralExpr,
  typeUnaryOperatorExpr,
} from "./expressions/index.js";

export type TypeExpressionOptions = {
  expectedType?: TypeId;
};

export const typeExpression = (
  expr: HirExpression,
  state: FunctionTypingState,
  env: TypeEnv,
  options: TypeExpressionOptions = {}
): TypedExpression => {
  const { expectedType } = options;
  switch (expr.exprKind) {
    case "literal":
      return typeLiteralExpr(expr, state);
    case "identifier":
      return typeIdentifierExpr(expr, state, env);
    case "call":
      return typeCallExpr(expr, state, env, expectedType);
    case "method-call":
      return typeMethodCallExpr(expr, state, env, expectedType);
    case "binary":
      return expr.operator === "and" || expr.operator === "or"
        ? typeLogicalExpr(expr, expr.operator, state, env)
        : typeBinaryOperatorExpr(expr, state, env, expectedType);
    case "unary":
      return typeUnaryOperatorExpr(expr, state, env, expectedType);
    case "tuple":
      return typeTupleExpr(expr, state, env, expectedType);
    case "array":
      return typeArrayExpr(expr, state, env, expectedType);
    case "struct-literal":
      return typeStructLiteralExpr(expr, state, env, expectedType);
    case "field-access":
      return typeFieldAccessExpr(expr, state, env);
    case "index":
      return typeIndexExpr(expr, state, env);
    case "some": {
      const expected =
        typeof expectedType === "number" ? state.ctx.arena.get(expectedType) : undefined;
      const value = typeExpression(expr.value, state, env, {
        expectedType: expected?.kind === "option" ? expected.inner : undefined,
      });
      return {
        kind: "option",
        value,
        type: state.ctx.arena.internOption(value.type),
        span: expr.span,
      };
    }
    case "none": {
      if (typeof expectedType !== "number") {
        return emitDiagnostic({
          ctx: state.ctx,
          code: "TY0003",
          params: { kind: "bare-none" },
          span: expr.span,
        });
      }
      if (state.ctx.arena.get(expectedType).kind !== "option") {
        return emitDiagnostic({
          ctx: state.ctx,
          code: "TY0001",
          params: {
            kind: "type-mismatch",
            context: "none literal",
            expected: state.ctx.arena.format(expectedType),
            actual: "option[?]",
          },
          span: expr.span,
        });
      }
      return { kind: "option", type: expectedType, span: expr.span };
    }
  }
};

const typeLiteralExpr = (
  expr: HirLiteralExpr,
  state: FunctionTypingState
): TypedExpression => {
  const { primitives } = state.ctx;
  const type =
    expr.literalKind === "int"
      ? primitives.int
      : expr.literalKind === "float"
        ? primitives.float
        : primitives.bool;
  if (expr.literalKind === "bool" ? typeof expr.value !== "boolean" : typeof expr.value !== "number") {
    throw new Error(`literal of kind ${expr.literalKind} holds ${typeof expr.value}`);
  }
  return { kind: "literal", value: expr.value, type, span: expr.span };
};

const typeIdentifierExpr = (
  expr: HirIdentifierExpr,
  state: FunctionTypingState,
  env: TypeEnv
): TypedExpression => {
  const { ctx } = state;
  const binding = env.get(expr.name);
  if (binding) {
    return { kind: "local", name: expr.name, type: binding.type, span: expr.span };
  }

  const nat = state.scope.nats.get(expr.name);
  if (typeof nat === "number") {
    return {
      kind: "nat-ref",
      nat: natParam(nat),
      type: ctx.primitives.int,
      span: expr.span,
    };
  }

  const signature = ctx.signatures.get(expr.name);
  if (signature) {
    if (isGenericSignature(signature)) {
      return emitDiagnostic({
        ctx,
        code: "TY0003",
        params: {
          kind: "unresolved-parameters",
          callee: signature.name,
          parameters: [
            ...signature.typeParams.map((param) => ctx.arena.getTypeParam(param).name),
            ...signature.natParams.map((param) => ctx.arena.getNatParam(param).name),
          ],
        },
        span: expr.span,
      });
    }
    return {
      kind: "function-ref",
      name: signature.name,
      type: ctx.arena.internFunction({
        parameters: signature.params.map((param) => ({
          type: param.type,
          ownership: param.ownership,
        })),
        returnType: signature.returnType,
        typeParams: [],
        natParams: [],
      }),
      span: expr.span,
    };
  }

  if (state.assignedNames.has(expr.name)) {
    return emitDiagnostic({
      ctx,
      code: "LN0001",
      params: { name: expr.name },
      span: expr.span,
      phase: "typing",
    });
  }

  return emitDiagnostic({
    ctx,
    code: "SG0001",
    params: { kind: "unknown-name", name: expr.name },
    span: expr.span,
  });
};

const typeTupleExpr = (
  expr: HirTupleExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedExpression => {
  const { arena } = state.ctx;
  const expected =
    typeof expectedType === "number" ? arena.get(expectedType) : undefined;
  const expectedElements =
    expected?.kind === "tuple" && expected.elements.length === expr.elements.length
      ? expected.elements
      : undefined;
  const elements = expr.elements.map((element, index) =>
    typeExpression(element, state, env, {
      expectedType: expectedElements?.[index],
    })
  );
  return {
    kind: "tuple",
    elements,
    type: arena.internTuple(elements.map((element) => element.type)),
    span: expr.span,
  };
};

const typeArrayExpr = (
  expr: HirArrayExpr,
  state: FunctionTypingState,
  env: TypeEnv,
  expectedType?: TypeId
): TypedExpression => {
  const { ctx } = state;
  const expected =
    typeof expectedType === "number" ? ctx.arena.get(expectedType) : undefined;
  const expectedElement = expected?.kind === "array" ? expected.element : undefined;

  const [first, ...rest] = expr.elements;
  if (!first) {
    if (expectedElement === undefined) {
      return emitDiagnostic({
        ctx,
        code: "TY0003",
        params: { kind: "empty-array" },
        span: expr.span,
      });
    }
    return {
      kind: "array",
      elements: [],
      type: ctx.arena.internArray(expectedElement, natLiteral(0)),
      span: expr.span,
    };
  }

  const head = typeExpression(first, state, env, { expectedType: expectedElement });
  const elementType = expectedElement ?? head.type;
  ensureTypeMatches({
    state,
    actual: head.type,
    expected: elementType,
    context: "array element",
    span: first.span,
  });
  const tail = rest.map((element) => {
    const typed = typeExpression(element, state, env, { expectedType: elementType });
    ensureTypeMatches({
      state,
      actual: typed.type,
      expected: elementType,
      context: "array element",
      span: element.span,
    });
    return typed;
  });

  return {
    kind: "array",
    elements: [head, ...tail],
    type: ctx.arena.internArray(elementType, natLiteral(expr.elements.length)),
    span: expr.span,
  };
};

const typeLogicalExpr = (
  expr: HirBinaryExpr,
  operator: "and" | "or",
  state: FunctionTypingState,
  env: TypeEnv
): TypedExpression => {
  const bool = state.ctx.primitives.bool;
  const operand = (value: HirExpression) => {
    const typed = typeExpression(value, state, env, { expectedType: bool });
    ensureTypeMatches({
      state,
      actual: typed.type,
      expected: bool,
      context: `operand of ${operator}`,
      span: value.span,
    });
    return typed;
  };
  return {
    kind: "logical",
    operator,
    left: operand(expr.left),
    right: operand(expr.right),
    type: bool,
    span: expr.span,
  };
};
