import type { SourceSpan } from "../ids.js";
import type {
  BinaryOperator,
  HirBlock,
  HirExpression,
  HirFunctionDecl,
  HirIterable,
  HirMethodDecl,
  HirNatExpr,
  HirNatParameter,
  HirParameter,
  HirStatement,
  HirStructDecl,
  HirTypeExpr,
  HirTypeParameter,
  Ownership,
  UnaryOperator,
} from "./nodes.js";

type GenericArgs = {
  typeArgs?: readonly HirTypeExpr[];
  natArgs?: readonly (number | string)[];
};

type FunctionParts = {
  typeParams?: readonly (string | HirTypeParameter)[];
  natParams?: readonly string[];
  params?: readonly HirParameter[];
  returns?: HirTypeExpr;
  body: readonly HirStatement[];
};

export type HirBuilder = ReturnType<typeof createHirBuilder>;

/**
 * Constructs syntax trees with distinct, increasing spans. Used by the
 * registration layer and by tests; the checker never depends on span values.
 */
export const createHirBuilder = ({ file }: { file: string }) => {
  let offset = 0;

  const span = (): SourceSpan => {
    const start = offset;
    offset += 1;
    return { file, start, end: start + 1 };
  };

  const nat = (value: number | string): HirNatExpr =>
    typeof value === "number"
      ? { natKind: "literal", value, span: span() }
      : { natKind: "name", name: value, span: span() };

  const type = (name: string, args: GenericArgs = {}): HirTypeExpr => ({
    typeKind: "named",
    name,
    typeArguments: args.typeArgs,
    natArguments: args.natArgs?.map(nat),
    span: span(),
  });

  const block = (statements: readonly HirStatement[]): HirBlock => ({
    statements,
    span: span(),
  });

  const typeParam = (
    name: string,
    options: { copyable?: boolean; droppable?: boolean } = {}
  ): HirTypeParameter => ({ name, ...options, span: span() });

  const natParam = (name: string): HirNatParameter => ({ name, span: span() });

  const functionDecl = (name: string, parts: FunctionParts): HirFunctionDecl => ({
    kind: "function",
    name,
    typeParameters: parts.typeParams?.map((param) =>
      typeof param === "string" ? typeParam(param) : param
    ),
    natParameters: parts.natParams?.map(natParam),
    parameters: parts.params ?? [],
    returnType: parts.returns,
    body: block(parts.body),
    span: span(),
  });

  const iterate = (
    variable: string,
    iterable: HirIterable,
    body: readonly HirStatement[]
  ): HirStatement => ({
    kind: "for",
    variable,
    iterable,
    body: block(body),
    span: span(),
  });

  return {
    span,
    nat,
    type,
    block,
    typeParam,
    natParam,
    tupleType: (...elements: HirTypeExpr[]): HirTypeExpr => ({
      typeKind: "tuple",
      elements,
      span: span(),
    }),
    arrayType: (element: HirTypeExpr, length: number | string): HirTypeExpr => ({
      typeKind: "array",
      element,
      length: nat(length),
      span: span(),
    }),
    optionType: (inner: HirTypeExpr): HirTypeExpr => ({
      typeKind: "option",
      inner,
      span: span(),
    }),
    fnType: (
      parameters: readonly (readonly [HirTypeExpr, Ownership?])[],
      returnType: HirTypeExpr
    ): HirTypeExpr => ({
      typeKind: "function",
      parameters: parameters.map(([paramType, ownership]) => ({
        type: paramType,
        ownership,
      })),
      returnType,
      span: span(),
    }),

    param: (
      name: string,
      paramType: HirTypeExpr,
      ownership?: Ownership
    ): HirParameter => ({ name, type: paramType, ownership, span: span() }),
    fn: functionDecl,
    method: (
      name: string,
      receiver: Ownership,
      parts: FunctionParts
    ): HirMethodDecl => ({ ...functionDecl(name, parts), receiver }),
    struct: (
      name: string,
      parts: {
        typeParams?: readonly (string | HirTypeParameter)[];
        natParams?: readonly string[];
        fields: readonly (readonly [string, HirTypeExpr])[];
        methods?: readonly HirMethodDecl[];
      }
    ): HirStructDecl => ({
      kind: "struct",
      name,
      typeParameters: parts.typeParams?.map((param) =>
        typeof param === "string" ? typeParam(param) : param
      ),
      natParameters: parts.natParams?.map(natParam),
      fields: parts.fields.map(([fieldName, fieldType]) => ({
        name: fieldName,
        type: fieldType,
        span: span(),
      })),
      methods: parts.methods,
      span: span(),
    }),

    assign: (
      target: string | readonly string[],
      value: HirExpression,
      annotation?: HirTypeExpr
    ): HirStatement => ({
      kind: "assign",
      target:
        typeof target === "string"
          ? { targetKind: "name", name: target, span: span() }
          : { targetKind: "tuple", names: target, span: span() },
      annotation,
      value,
      span: span(),
    }),
    expr: (expr: HirExpression): HirStatement => ({
      kind: "expr-stmt",
      expr,
      span: span(),
    }),
    ret: (value?: HirExpression): HirStatement => ({
      kind: "return",
      value,
      span: span(),
    }),
    if: (
      condition: HirExpression,
      then: readonly HirStatement[],
      otherwise?: readonly HirStatement[]
    ): HirStatement => ({
      kind: "if",
      condition,
      then: block(then),
      else: otherwise ? block(otherwise) : undefined,
      span: span(),
    }),
    while: (
      condition: HirExpression,
      body: readonly HirStatement[]
    ): HirStatement => ({
      kind: "while",
      condition,
      body: block(body),
      span: span(),
    }),
    forRange: (
      variable: string,
      stop: HirExpression,
      body: readonly HirStatement[],
      start?: HirExpression
    ): HirStatement => iterate(variable, { iterKind: "range", start, stop }, body),
    forEach: (
      variable: string,
      value: HirExpression,
      body: readonly HirStatement[]
    ): HirStatement => iterate(variable, { iterKind: "array", value }, body),
    break: (): HirStatement => ({ kind: "break", span: span() }),
    continue: (): HirStatement => ({ kind: "continue", span: span() }),

    int: (value: number): HirExpression => ({
      exprKind: "literal",
      literalKind: "int",
      value,
      span: span(),
    }),
    float: (value: number): HirExpression => ({
      exprKind: "literal",
      literalKind: "float",
      value,
      span: span(),
    }),
    bool: (value: boolean): HirExpression => ({
      exprKind: "literal",
      literalKind: "bool",
      value,
      span: span(),
    }),
    name: (name: string): HirExpression => ({
      exprKind: "identifier",
      name,
      span: span(),
    }),
    call: (
      callee: string,
      args: readonly HirExpression[] = [],
      generics: GenericArgs = {}
    ): HirExpression => ({
      exprKind: "call",
      callee,
      args,
      typeArguments: generics.typeArgs,
      natArguments: generics.natArgs?.map(nat),
      span: span(),
    }),
    methodCall: (
      receiver: HirExpression,
      method: string,
      args: readonly HirExpression[] = []
    ): HirExpression => ({
      exprKind: "method-call",
      receiver,
      method,
      args,
      span: span(),
    }),
    binary: (
      operator: BinaryOperator,
      left: HirExpression,
      right: HirExpression
    ): HirExpression => ({
      exprKind: "binary",
      operator,
      left,
      right,
      span: span(),
    }),
    unary: (operator: UnaryOperator, operand: HirExpression): HirExpression => ({
      exprKind: "unary",
      operator,
      operand,
      span: span(),
    }),
    tuple: (...elements: HirExpression[]): HirExpression => ({
      exprKind: "tuple",
      elements,
      span: span(),
    }),
    array: (...elements: HirExpression[]): HirExpression => ({
      exprKind: "array",
      elements,
      span: span(),
    }),
    structLiteral: (
      struct: string,
      fields: Readonly<Record<string, HirExpression>>,
      generics: GenericArgs = {}
    ): HirExpression => ({
      exprKind: "struct-literal",
      struct,
      typeArguments: generics.typeArgs,
      natArguments: generics.natArgs?.map(nat),
      fields: Object.entries(fields).map(([fieldName, value]) => ({
        name: fieldName,
        value,
        span: span(),
      })),
      span: span(),
    }),
    field: (target: HirExpression, field: string): HirExpression => ({
      exprKind: "field-access",
      target,
      field,
      span: span(),
    }),
    index: (target: HirExpression, index: HirExpression): HirExpression => ({
      exprKind: "index",
      target,
      index,
      span: span(),
    }),
    some: (value: HirExpression): HirExpression => ({
      exprKind: "some",
      value,
      span: span(),
    }),
    none: (): HirExpression => ({ exprKind: "none", span: span() }),
  };
};
