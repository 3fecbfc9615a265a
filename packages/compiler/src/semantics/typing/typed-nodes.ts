import type { InstanceKey, SourceSpan, TypeId } from "../ids.js";
import type { Ownership } from "../hir/index.js";
import type { OwnershipClass } from "./ownership.js";
import type { Signature } from "./signature-table.js";
import type { NatArg } from "./type-arena.js";

/**
 * The checked tree handed from typing to the linearity pass and then to
 * monomorphisation. Operators and method calls are already desugared into
 * calls, and every expression carries its type.
 */
export interface Binding {
  name: string;
  type: TypeId;
  ownership: OwnershipClass;
  definedAt: SourceSpan;
}

interface TypedExprBase {
  span: SourceSpan;
  type: TypeId;
}

export type TypedExpression =
  | TypedLiteral
  | TypedLocal
  | TypedNatRef
  | TypedFunctionRef
  | TypedCall
  | TypedTuple
  | TypedArray
  | TypedStructLiteral
  | TypedFieldAccess
  | TypedIndex
  | TypedOption
  | TypedLogical;

export interface TypedLiteral extends TypedExprBase {
  kind: "literal";
  value: number | boolean;
}

export interface TypedLocal extends TypedExprBase {
  kind: "local";
  name: string;
}

/** A nat parameter read as an `int` value. */
export interface TypedNatRef extends TypedExprBase {
  kind: "nat-ref";
  nat: NatArg;
}

/** A non-generic function used as a value. */
export interface TypedFunctionRef extends TypedExprBase {
  kind: "function-ref";
  name: string;
  instanceKey?: InstanceKey;
}

export interface TypedArgument {
  expr: TypedExpression;
  ownership: Ownership;
}

export interface TypedCall extends TypedExprBase {
  kind: "call";
  callee: string;
  calleeKind: "signature" | "local";
  args: readonly TypedArgument[];
  typeArgs: readonly TypeId[];
  natArgs: readonly NatArg[];
  /** Set once the callee has been specialized for this call site. */
  instanceKey?: InstanceKey;
}

export interface TypedTuple extends TypedExprBase {
  kind: "tuple";
  elements: readonly TypedExpression[];
}

export interface TypedArray extends TypedExprBase {
  kind: "array";
  elements: readonly TypedExpression[];
}

export interface TypedStructLiteral extends TypedExprBase {
  kind: "struct-literal";
  struct: string;
  fields: readonly { name: string; value: TypedExpression }[];
  instanceKey?: InstanceKey;
}

export interface TypedFieldAccess extends TypedExprBase {
  kind: "field-access";
  target: TypedExpression;
  field: string;
}

export interface TypedIndex extends TypedExprBase {
  kind: "index";
  target: TypedExpression;
  index: TypedExpression;
}

export interface TypedOption extends TypedExprBase {
  kind: "option";
  value?: TypedExpression;
}

export interface TypedLogical extends TypedExprBase {
  kind: "logical";
  operator: "and" | "or";
  left: TypedExpression;
  right: TypedExpression;
}

export interface TypedBlock {
  statements: readonly TypedStatement[];
  span: SourceSpan;
}

export type TypedAssignTarget =
  | { kind: "name"; binding: Binding }
  | { kind: "tuple"; bindings: readonly Binding[] };

export type TypedIterable =
  | { kind: "range"; start: TypedExpression; stop: TypedExpression }
  | { kind: "array"; value: TypedExpression };

export type TypedStatement =
  | { kind: "assign"; target: TypedAssignTarget; value: TypedExpression; span: SourceSpan }
  | { kind: "expr"; expr: TypedExpression; span: SourceSpan }
  | { kind: "return"; value?: TypedExpression; span: SourceSpan }
  | {
      kind: "if";
      condition: TypedExpression;
      then: TypedBlock;
      else?: TypedBlock;
      span: SourceSpan;
    }
  | { kind: "while"; condition: TypedExpression; body: TypedBlock; span: SourceSpan }
  | {
      kind: "for";
      binding: Binding;
      iterable: TypedIterable;
      body: TypedBlock;
      span: SourceSpan;
    }
  | { kind: "break"; span: SourceSpan }
  | { kind: "continue"; span: SourceSpan };

export interface TypedParameter {
  binding: Binding;
  ownership: Ownership;
}

export interface TypedFunction {
  name: string;
  kind: "function" | "method";
  signature: Signature;
  params: readonly TypedParameter[];
  returnType: TypeId;
  body: TypedBlock;
  span: SourceSpan;
}
