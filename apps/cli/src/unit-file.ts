import { readFile } from "node:fs/promises";
import type {
  BinaryOperator,
  HirAssignTarget,
  HirBlock,
  HirDefinition,
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
  SourceSpan,
  UnaryOperator,
} from "@qcheck/compiler";

/** Raised when a unit file does not hold well-formed definitions. */
export class UnitFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "UnitFileError";
    this.path = path;
  }
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const BINARY_OPERATORS: readonly BinaryOperator[] = [
  "+", "-", "*", "/", "//", "%", "==", "!=", "<", "<=", ">", ">=", "and", "or",
];
const UNARY_OPERATORS: readonly UnaryOperator[] = ["-", "not"];

const isBinaryOperator = (value: unknown): value is BinaryOperator =>
  BINARY_OPERATORS.some((operator) => operator === value);
const isUnaryOperator = (value: unknown): value is UnaryOperator =>
  UNARY_OPERATORS.some((operator) => operator === value);
const isOwnership = (value: unknown): value is Ownership =>
  value === "owned" || value === "borrowed";

/** Reads fields of one JSON object, reporting failures against its path. */
class Reader {
  readonly path: string;
  readonly #value: JsonRecord;
  readonly #file: string;

  constructor(value: unknown, path: string, file: string) {
    if (!isRecord(value)) throw new UnitFileError(path, "expected an object");
    this.#value = value;
    this.path = path;
    this.#file = file;
  }

  fail(message: string): never {
    throw new UnitFileError(this.path, message);
  }

  child(key: string): Reader {
    return new Reader(this.#value[key], `${this.path}.${key}`, this.#file);
  }

  has(key: string): boolean {
    return this.#value[key] !== undefined;
  }

  string(key: string): string {
    const value = this.#value[key];
    if (typeof value !== "string") return this.fail(`expected string field ${key}`);
    return value;
  }

  number(key: string): number {
    const value = this.#value[key];
    if (typeof value !== "number") return this.fail(`expected number field ${key}`);
    return value;
  }

  optionalBoolean(key: string): boolean | undefined {
    const value = this.#value[key];
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") return this.fail(`expected boolean field ${key}`);
    return value;
  }

  optionalOwnership(key: string): Ownership | undefined {
    const value = this.#value[key];
    if (value === undefined) return undefined;
    if (!isOwnership(value)) return this.fail(`${key} must be "owned" or "borrowed"`);
    return value;
  }

  raw(key: string): unknown {
    return this.#value[key];
  }

  list<T>(key: string, read: (item: Reader) => T): T[] {
    const value = this.#value[key];
    if (!Array.isArray(value)) return this.fail(`expected array field ${key}`);
    return value.map((item, index) =>
      read(new Reader(item, `${this.path}.${key}[${index}]`, this.#file))
    );
  }

  optionalList<T>(key: string, read: (item: Reader) => T): T[] | undefined {
    return this.has(key) ? this.list(key, read) : undefined;
  }

  strings(key: string): string[] {
    const value = this.#value[key];
    if (!Array.isArray(value) || !value.every((item) => typeof item === "string")) {
      this.fail(`expected an array of strings in ${key}`);
    }
    return value.filter((item): item is string => typeof item === "string");
  }

  /** Spans are optional in unit files and default to the whole file. */
  span(): SourceSpan {
    const value = this.#value.span;
    if (value === undefined) return { file: this.#file, start: 0, end: 0 };
    const span = this.child("span");
    return {
      file: span.has("file") ? span.string("file") : this.#file,
      start: span.number("start"),
      end: span.number("end"),
    };
  }
}

const readNat = (reader: Reader): HirNatExpr => {
  const span = reader.span();
  const kind = reader.string("natKind");
  if (kind === "literal") return { natKind: "literal", value: reader.number("value"), span };
  if (kind === "name") return { natKind: "name", name: reader.string("name"), span };
  return reader.fail(`unknown natKind ${kind}`);
};

const readType = (reader: Reader): HirTypeExpr => {
  const span = reader.span();
  const kind = reader.string("typeKind");
  switch (kind) {
    case "named":
      return {
        typeKind: "named",
        name: reader.string("name"),
        typeArguments: reader.optionalList("typeArguments", readType),
        natArguments: reader.optionalList("natArguments", readNat),
        span,
      };
    case "tuple":
      return { typeKind: "tuple", elements: reader.list("elements", readType), span };
    case "array":
      return {
        typeKind: "array",
        element: readType(reader.child("element")),
        length: readNat(reader.child("length")),
        span,
      };
    case "option":
      return { typeKind: "option", inner: readType(reader.child("inner")), span };
    case "function":
      return {
        typeKind: "function",
        parameters: reader.list("parameters", (param) => ({
          type: readType(param.child("type")),
          ownership: param.optionalOwnership("ownership"),
        })),
        returnType: readType(reader.child("returnType")),
        span,
      };
    default:
      return reader.fail(`unknown typeKind ${kind}`);
  }
};

const readExpression = (reader: Reader): HirExpression => {
  const span = reader.span();
  const kind = reader.string("exprKind");
  switch (kind) {
    case "literal": {
      const literalKind = reader.string("literalKind");
      const value = reader.raw("value");
      if (literalKind === "bool" && typeof value === "boolean") {
        return { exprKind: "literal", literalKind, value, span };
      }
      if ((literalKind === "int" || literalKind === "float") && typeof value === "number") {
        return { exprKind: "literal", literalKind, value, span };
      }
      return reader.fail(`invalid ${literalKind} literal`);
    }
    case "identifier":
      return { exprKind: "identifier", name: reader.string("name"), span };
    case "call":
      return {
        exprKind: "call",
        callee: reader.string("callee"),
        args: reader.list("args", readExpression),
        typeArguments: reader.optionalList("typeArguments", readType),
        natArguments: reader.optionalList("natArguments", readNat),
        span,
      };
    case "method-call":
      return {
        exprKind: "method-call",
        receiver: readExpression(reader.child("receiver")),
        method: reader.string("method"),
        args: reader.list("args", readExpression),
        span,
      };
    case "binary": {
      const operator = reader.raw("operator");
      if (!isBinaryOperator(operator)) return reader.fail("unknown binary operator");
      return {
        exprKind: "binary",
        operator,
        left: readExpression(reader.child("left")),
        right: readExpression(reader.child("right")),
        span,
      };
    }
    case "unary": {
      const operator = reader.raw("operator");
      if (!isUnaryOperator(operator)) return reader.fail("unknown unary operator");
      return {
        exprKind: "unary",
        operator,
        operand: readExpression(reader.child("operand")),
        span,
      };
    }
    case "tuple":
      return { exprKind: "tuple", elements: reader.list("elements", readExpression), span };
    case "array":
      return { exprKind: "array", elements: reader.list("elements", readExpression), span };
    case "struct-literal":
      return {
        exprKind: "struct-literal",
        struct: reader.string("struct"),
        typeArguments: reader.optionalList("typeArguments", readType),
        natArguments: reader.optionalList("natArguments", readNat),
        fields: reader.list("fields", (field) => ({
          name: field.string("name"),
          value: readExpression(field.child("value")),
          span: field.span(),
        })),
        span,
      };
    case "field-access":
      return {
        exprKind: "field-access",
        target: readExpression(reader.child("target")),
        field: reader.string("field"),
        span,
      };
    case "index":
      return {
        exprKind: "index",
        target: readExpression(reader.child("target")),
        index: readExpression(reader.child("index")),
        span,
      };
    case "some":
      return { exprKind: "some", value: readExpression(reader.child("value")), span };
    case "none":
      return { exprKind: "none", span };
    default:
      return reader.fail(`unknown exprKind ${kind}`);
  }
};

const readBlock = (reader: Reader): HirBlock => ({
  statements: reader.list("statements", readStatement),
  span: reader.span(),
});

const readTarget = (reader: Reader): HirAssignTarget => {
  const span = reader.span();
  const kind = reader.string("targetKind");
  if (kind === "name") return { targetKind: "name", name: reader.string("name"), span };
  if (kind === "tuple") return { targetKind: "tuple", names: reader.strings("names"), span };
  return reader.fail(`unknown targetKind ${kind}`);
};

const readIterable = (reader: Reader): HirIterable => {
  const kind = reader.string("iterKind");
  if (kind === "range") {
    return {
      iterKind: "range",
      start: reader.has("start") ? readExpression(reader.child("start")) : undefined,
      stop: readExpression(reader.child("stop")),
    };
  }
  if (kind === "array") {
    return { iterKind: "array", value: readExpression(reader.child("value")) };
  }
  return reader.fail(`unknown iterKind ${kind}`);
};

const readStatement = (reader: Reader): HirStatement => {
  const span = reader.span();
  const kind = reader.string("kind");
  switch (kind) {
    case "assign":
      return {
        kind: "assign",
        target: readTarget(reader.child("target")),
        annotation: reader.has("annotation")
          ? readType(reader.child("annotation"))
          : undefined,
        value: readExpression(reader.child("value")),
        span,
      };
    case "expr-stmt":
      return { kind: "expr-stmt", expr: readExpression(reader.child("expr")), span };
    case "return":
      return {
        kind: "return",
        value: reader.has("value") ? readExpression(reader.child("value")) : undefined,
        span,
      };
    case "if":
      return {
        kind: "if",
        condition: readExpression(reader.child("condition")),
        then: readBlock(reader.child("then")),
        else: reader.has("else") ? readBlock(reader.child("else")) : undefined,
        span,
      };
    case "while":
      return {
        kind: "while",
        condition: readExpression(reader.child("condition")),
        body: readBlock(reader.child("body")),
        span,
      };
    case "for":
      return {
        kind: "for",
        variable: reader.string("variable"),
        iterable: readIterable(reader.child("iterable")),
        body: readBlock(reader.child("body")),
        span,
      };
    case "break":
      return { kind: "break", span };
    case "continue":
      return { kind: "continue", span };
    default:
      return reader.fail(`unknown statement kind ${kind}`);
  }
};

const readTypeParameter = (reader: Reader): HirTypeParameter => ({
  name: reader.string("name"),
  copyable: reader.optionalBoolean("copyable"),
  droppable: reader.optionalBoolean("droppable"),
  span: reader.span(),
});

const readNatParameter = (reader: Reader): HirNatParameter => ({
  name: reader.string("name"),
  span: reader.span(),
});

const readParameter = (reader: Reader): HirParameter => ({
  name: reader.string("name"),
  type: readType(reader.child("type")),
  ownership: reader.optionalOwnership("ownership"),
  span: reader.span(),
});

const readFunction = (reader: Reader): HirFunctionDecl => ({
  kind: "function",
  name: reader.string("name"),
  typeParameters: reader.optionalList("typeParameters", readTypeParameter),
  natParameters: reader.optionalList("natParameters", readNatParameter),
  parameters: reader.list("parameters", readParameter),
  returnType: reader.has("returnType") ? readType(reader.child("returnType")) : undefined,
  body: readBlock(reader.child("body")),
  span: reader.span(),
});

const readMethod = (reader: Reader): HirMethodDecl => {
  const receiver = reader.optionalOwnership("receiver");
  if (!receiver) return reader.fail("methods need a receiver");
  return { ...readFunction(reader), receiver };
};

const readStruct = (reader: Reader): HirStructDecl => ({
  kind: "struct",
  name: reader.string("name"),
  typeParameters: reader.optionalList("typeParameters", readTypeParameter),
  natParameters: reader.optionalList("natParameters", readNatParameter),
  fields: reader.list("fields", (field) => ({
    name: field.string("name"),
    type: readType(field.child("type")),
    span: field.span(),
  })),
  methods: reader.optionalList("methods", readMethod),
  span: reader.span(),
});

const readDefinition = (reader: Reader): HirDefinition => {
  const kind = reader.string("kind");
  if (kind === "function") return readFunction(reader);
  if (kind === "struct") return readStruct(reader);
  return reader.fail(`unknown definition kind ${kind}`);
};

/** Decodes `{ "definitions": [...] }`. Spans without a file point at `file`. */
export const decodeUnit = (value: unknown, file: string): HirDefinition[] =>
  new Reader(value, "$", file).list("definitions", readDefinition);

export const readUnitFile = async (path: string): Promise<HirDefinition[]> => {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new UnitFileError(
      path,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }
  return decodeUnit(json, path);
};
