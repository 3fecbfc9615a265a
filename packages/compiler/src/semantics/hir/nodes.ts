import type { SourceSpan } from "../ids.js";

/**
 * Syntax trees handed to the core by the parsing and registration layer.
 * Every node carries a source span that is only threaded through for
 * diagnostics.
 */
export interface HirNodeBase {
  span: SourceSpan;
}

export type Ownership = "owned" | "borrowed";

export type HirTypeExpr =
  | HirNamedTypeExpr
  | HirTupleTypeExpr
  | HirArrayTypeExpr
  | HirOptionTypeExpr
  | HirFunctionTypeExpr;

export interface HirNamedTypeExpr extends HirNodeBase {
  typeKind: "named";
  name: string;
  typeArguments?: readonly HirTypeExpr[];
  natArguments?: readonly HirNatExpr[];
}

export interface HirTupleTypeExpr extends HirNodeBase {
  typeKind: "tuple";
  elements: readonly HirTypeExpr[];
}

export interface HirArrayTypeExpr extends HirNodeBase {
  typeKind: "array";
  element: HirTypeExpr;
  length: HirNatExpr;
}

export interface HirOptionTypeExpr extends HirNodeBase {
  typeKind: "option";
  inner: HirTypeExpr;
}

export interface HirFunctionTypeParameter {
  type: HirTypeExpr;
  ownership?: Ownership;
}

export interface HirFunctionTypeExpr extends HirNodeBase {
  typeKind: "function";
  parameters: readonly HirFunctionTypeParameter[];
  returnType: HirTypeExpr;
}

export type HirNatExpr = HirNatLiteral | HirNatName;

export interface HirNatLiteral extends HirNodeBase {
  natKind: "literal";
  value: number;
}

export interface HirNatName extends HirNodeBase {
  natKind: "name";
  name: string;
}

export interface HirTypeParameter extends HirNodeBase {
  name: string;
  /** Values of the parameter may be duplicated. Defaults to true. */
  copyable?: boolean;
  /** Values of the parameter may go unused. Defaults to true. */
  droppable?: boolean;
}

export interface HirNatParameter extends HirNodeBase {
  name: string;
}

export interface HirParameter extends HirNodeBase {
  name: string;
  type: HirTypeExpr;
  ownership?: Ownership;
}

export type HirDefinition = HirFunctionDecl | HirStructDecl;

export interface HirFunctionDecl extends HirNodeBase {
  kind: "function";
  name: string;
  typeParameters?: readonly HirTypeParameter[];
  natParameters?: readonly HirNatParameter[];
  parameters: readonly HirParameter[];
  /** Omitted means `none`. */
  returnType?: HirTypeExpr;
  body: HirBlock;
}

export interface HirMethodDecl extends HirFunctionDecl {
  receiver: Ownership;
}

export interface HirStructField extends HirNodeBase {
  name: string;
  type: HirTypeExpr;
}

export interface HirStructDecl extends HirNodeBase {
  kind: "struct";
  name: string;
  typeParameters?: readonly HirTypeParameter[];
  natParameters?: readonly HirNatParameter[];
  fields: readonly HirStructField[];
  methods?: readonly HirMethodDecl[];
}

export interface HirBlock extends HirNodeBase {
  statements: readonly HirStatement[];
}

export type HirStatement =
  | HirAssignStatement
  | HirExprStatement
  | HirReturnStatement
  | HirIfStatement
  | HirWhileStatement
  | HirForStatement
  | HirBreakStatement
  | HirContinueStatement;

export type HirAssignTarget =
  | { targetKind: "name"; name: string; span: SourceSpan }
  | { targetKind: "tuple"; names: readonly string[]; span: SourceSpan };

export interface HirAssignStatement extends HirNodeBase {
  kind: "assign";
  target: HirAssignTarget;
  annotation?: HirTypeExpr;
  value: HirExpression;
}

export interface HirExprStatement extends HirNodeBase {
  kind: "expr-stmt";
  expr: HirExpression;
}

export interface HirReturnStatement extends HirNodeBase {
  kind: "return";
  value?: HirExpression;
}

export interface HirIfStatement extends HirNodeBase {
  kind: "if";
  condition: HirExpression;
  then: HirBlock;
  else?: HirBlock;
}

export interface HirWhileStatement extends HirNodeBase {
  kind: "while";
  condition: HirExpression;
  body: HirBlock;
}

export type HirIterable =
  | { iterKind: "range"; start?: HirExpression; stop: HirExpression }
  | { iterKind: "array"; value: HirExpression };

export interface HirForStatement extends HirNodeBase {
  kind: "for";
  variable: string;
  iterable: HirIterable;
  body: HirBlock;
}

export interface HirBreakStatement extends HirNodeBase {
  kind: "break";
}

export interface HirContinueStatement extends HirNodeBase {
  kind: "continue";
}

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "and"
  | "or";

export type UnaryOperator = "-" | "not";

export type HirExpression =
  | HirLiteralExpr
  | HirIdentifierExpr
  | HirCallExpr
  | HirMethodCallExpr
  | HirBinaryExpr
  | HirUnaryExpr
  | HirTupleExpr
  | HirArrayExpr
  | HirStructLiteralExpr
  | HirFieldAccessExpr
  | HirIndexExpr
  | HirSomeExpr
  | HirNoneExpr;

export interface HirLiteralExpr extends HirNodeBase {
  exprKind: "literal";
  literalKind: "int" | "float" | "bool";
  value: number | boolean;
}

export interface HirIdentifierExpr extends HirNodeBase {
  exprKind: "identifier";
  name: string;
}

export interface HirCallExpr extends HirNodeBase {
  exprKind: "call";
  callee: string;
  args: readonly HirExpression[];
  typeArguments?: readonly HirTypeExpr[];
  natArguments?: readonly HirNatExpr[];
}

export interface HirMethodCallExpr extends HirNodeBase {
  exprKind: "method-call";
  receiver: HirExpression;
  method: string;
  args: readonly HirExpression[];
}

export interface HirBinaryExpr extends HirNodeBase {
  exprKind: "binary";
  operator: BinaryOperator;
  left: HirExpression;
  right: HirExpression;
}

export interface HirUnaryExpr extends HirNodeBase {
  exprKind: "unary";
  operator: UnaryOperator;
  operand: HirExpression;
}

export interface HirTupleExpr extends HirNodeBase {
  exprKind: "tuple";
  elements: readonly HirExpression[];
}

export interface HirArrayExpr extends HirNodeBase {
  exprKind: "array";
  elements: readonly HirExpression[];
}

export interface HirStructLiteralField extends HirNodeBase {
  name: string;
  value: HirExpression;
}

export interface HirStructLiteralExpr extends HirNodeBase {
  exprKind: "struct-literal";
  struct: string;
  typeArguments?: readonly HirTypeExpr[];
  natArguments?: readonly HirNatExpr[];
  fields: readonly HirStructLiteralField[];
}

export interface HirFieldAccessExpr extends HirNodeBase {
  exprKind: "field-access";
  target: HirExpression;
  field: string;
}

export interface HirIndexExpr extends HirNodeBase {
  exprKind: "index";
  target: HirExpression;
  index: HirExpression;
}

export interface HirSomeExpr extends HirNodeBase {
  exprKind: "some";
  value: HirExpression;
}

export interface HirNoneExpr extends HirNodeBase {
  exprKind: "none";
}
