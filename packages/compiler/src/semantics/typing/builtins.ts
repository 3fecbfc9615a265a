import type { NatParamId, TypeId, TypeParamId } from "../ids.js";
import type { BinaryOperator, Ownership, UnaryOperator } from "../hir/index.js";
import type { OwnershipClass } from "./ownership.js";
import type { SignatureTable } from "./signature-table.js";
import { natParam, type TypeArena } from "./type-arena.js";

export const primitiveOwnership = {
  int: "copyable",
  float: "copyable",
  bool: "copyable",
  angle: "copyable",
  none: "copyable",
  qubit: "linear",
  rng: "affine",
} as const satisfies Record<string, OwnershipClass>;

export type PrimitiveName = keyof typeof primitiveOwnership;

export type PrimitiveTypes = Record<PrimitiveName, TypeId>;

export const isPrimitiveName = (name: string): name is PrimitiveName =>
  Object.prototype.hasOwnProperty.call(primitiveOwnership, name);

export const internPrimitives = (arena: TypeArena): PrimitiveTypes => ({
  int: arena.internPrimitive("int"),
  float: arena.internPrimitive("float"),
  bool: arena.internPrimitive("bool"),
  angle: arena.internPrimitive("angle"),
  none: arena.internPrimitive("none"),
  qubit: arena.internPrimitive("qubit"),
  rng: arena.internPrimitive("rng"),
});

export type ArithmeticOperator = Exclude<BinaryOperator, "and" | "or">;

export const binaryOperatorMethods: Record<ArithmeticOperator, string> = {
  "+": "__add__",
  "-": "__sub__",
  "*": "__mul__",
  "/": "__truediv__",
  "//": "__floordiv__",
  "%": "__mod__",
  "==": "__eq__",
  "!=": "__ne__",
  "<": "__lt__",
  "<=": "__le__",
  ">": "__gt__",
  ">=": "__ge__",
};

export const unaryOperatorMethods: Record<UnaryOperator, string> = {
  "-": "__neg__",
  not: "__not__",
};

type OperatorRow = readonly [
  receiver: PrimitiveName,
  operator: ArithmeticOperator | "neg" | "not",
  operand: PrimitiveName | undefined,
  result: PrimitiveName,
];

const comparisons = (type: PrimitiveName): OperatorRow[] =>
  (["==", "!=", "<", "<=", ">", ">="] as const).map(
    (operator) => [type, operator, type, "bool"] as const
  );

const operatorRows: readonly OperatorRow[] = [
  ["int", "+", "int", "int"],
  ["int", "-", "int", "int"],
  ["int", "*", "int", "int"],
  ["int", "/", "int", "float"],
  ["int", "//", "int", "int"],
  ["int", "%", "int", "int"],
  ["int", "neg", undefined, "int"],
  ...comparisons("int"),
  ["float", "+", "float", "float"],
  ["float", "-", "float", "float"],
  ["float", "*", "float", "float"],
  ["float", "/", "float", "float"],
  ["float", "neg", undefined, "float"],
  ...comparisons("float"),
  ["angle", "+", "angle", "angle"],
  ["angle", "-", "angle", "angle"],
  ["angle", "*", "float", "angle"],
  ["angle", "neg", undefined, "angle"],
  ["angle", "==", "angle", "bool"],
  ["angle", "!=", "angle", "bool"],
  ["bool", "==", "bool", "bool"],
  ["bool", "!=", "bool", "bool"],
  ["bool", "not", undefined, "bool"],
];

const operatorMethodName = (operator: OperatorRow[1]): string => {
  if (operator === "neg") return unaryOperatorMethods["-"];
  if (operator === "not") return unaryOperatorMethods.not;
  return binaryOperatorMethods[operator];
};

/** Name under which an operator on values of `typeName` is registered. */
export const operatorSignatureName = (typeName: string, method: string): string =>
  `${typeName}.${method}`;

/** Registers the builtin catalog: quantum primitives, conversions and operators. */
export const registerPrelude = ({
  arena,
  table,
  primitives,
}: {
  arena: TypeArena;
  table: SignatureTable;
  primitives: PrimitiveTypes;
}): void => {
  const define = (
    name: string,
    params: readonly (readonly [string, TypeId, Ownership])[],
    returnType: TypeId,
    generics: {
      typeParams?: readonly TypeParamId[];
      natParams?: readonly NatParamId[];
    } = {}
  ) => {
    table.register({
      name,
      kind: "builtin",
      typeParams: generics.typeParams ?? [],
      natParams: generics.natParams ?? [],
      params: params.map(([paramName, type, ownership]) => ({
        name: paramName,
        type,
        ownership,
      })),
      returnType,
    });
  };

  const { int, float, bool, angle, none, qubit, rng } = primitives;

  define("qubit", [], qubit);
  define("measure", [["q", qubit, "owned"]], bool);
  define("discard", [["q", qubit, "owned"]], none);
  ["h", "x", "y", "z", "s", "t", "reset"].forEach((gate) =>
    define(gate, [["q", qubit, "borrowed"]], none)
  );
  ["rx", "ry", "rz"].forEach((gate) =>
    define(
      gate,
      [
        ["q", qubit, "borrowed"],
        ["theta", angle, "owned"],
      ],
      none
    )
  );
  ["cx", "cz"].forEach((gate) =>
    define(
      gate,
      [
        ["control", qubit, "borrowed"],
        ["target", qubit, "borrowed"],
      ],
      none
    )
  );
  define("angle", [["value", float, "owned"]], angle);
  define("float", [["value", int, "owned"]], float);
  define("rng", [["seed", int, "owned"]], rng);
  define("random_int", [["r", rng, "borrowed"]], int);

  {
    const T = arena.freshTypeParam({
      name: "T",
      bound: { copyable: false, droppable: false },
    });
    const n = arena.freshNatParam({ name: "n" });
    define(
      "len",
      [["xs", arena.internArray(arena.internTypeParamRef(T), natParam(n)), "borrowed"]],
      int,
      { typeParams: [T], natParams: [n] }
    );
  }

  {
    const n = arena.freshNatParam({ name: "n" });
    define("qubit_array", [], arena.internArray(qubit, natParam(n)), {
      natParams: [n],
    });
  }

  {
    const n = arena.freshNatParam({ name: "n" });
    define(
      "measure_array",
      [["qs", arena.internArray(qubit, natParam(n)), "owned"]],
      arena.internArray(bool, natParam(n)),
      { natParams: [n] }
    );
  }

  operatorRows.forEach(([receiver, operator, operand, result]) => {
    const params: [string, TypeId, Ownership][] = [
      ["self", primitives[receiver], "borrowed"],
    ];
    if (operand) {
      params.push(["other", primitives[operand], "borrowed"]);
    }
    define(
      operatorSignatureName(receiver, operatorMethodName(operator)),
      params,
      primitives[result]
    );
  });
};
