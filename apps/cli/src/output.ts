import {
  formatSignature,
  type CompilationResult,
  type MonomorphisedProgram,
  type TypeArena,
} from "@qcheck/compiler";

const CIRCULAR_REFERENCE = "[Circular]";

/** Object keys whose numeric values are type ids rendered through the arena. */
const TYPE_KEYS = new Set(["type", "returnType"]);
const TYPE_LIST_KEYS = new Set(["typeArgs"]);

type TypeFormatter = (type: number) => string;

const isRecord = (value: object): value is Record<string, unknown> =>
  !Array.isArray(value);

const normalizeWithTraversalTracking = ({
  value,
  ancestors,
  normalize,
}: {
  value: object;
  ancestors: WeakSet<object>;
  normalize: () => unknown;
}): unknown => {
  if (ancestors.has(value)) {
    return CIRCULAR_REFERENCE;
  }

  ancestors.add(value);
  try {
    return normalize();
  } finally {
    ancestors.delete(value);
  }
};

const normalizeEntry = ({
  key,
  value,
  ancestors,
  formatType,
}: {
  key: string;
  value: unknown;
  ancestors: WeakSet<object>;
  formatType?: TypeFormatter;
}): unknown => {
  if (formatType && TYPE_KEYS.has(key) && typeof value === "number") {
    return formatType(value);
  }
  if (formatType && TYPE_LIST_KEYS.has(key) && Array.isArray(value)) {
    return value.map((entry) =>
      typeof entry === "number" ? formatType(entry) : entry
    );
  }
  return normalizeOutput({ value, ancestors, formatType });
};

const normalizeOutput = ({
  value,
  ancestors = new WeakSet(),
  formatType,
}: {
  value: unknown;
  ancestors?: WeakSet<object>;
  formatType?: TypeFormatter;
}): unknown => {
  if (!value || typeof value !== "object") {
    return value;
  }

  return normalizeWithTraversalTracking({
    value,
    ancestors,
    normalize: () => {
      if (value instanceof Map) {
        return Object.fromEntries(
          Array.from(value.entries()).map(([key, entry]) => [
            String(key),
            normalizeOutput({ value: entry, ancestors, formatType }),
          ])
        );
      }

      if (value instanceof Set) {
        return Array.from(value).map((entry) =>
          normalizeOutput({ value: entry, ancestors, formatType })
        );
      }

      if (Array.isArray(value)) {
        return value.map((entry) =>
          normalizeOutput({ value: entry, ancestors, formatType })
        );
      }

      if (!isRecord(value)) return value;
      return Object.fromEntries(
        Object.entries(value)
          // Spans and ownership classes are noise in printed trees.
          .filter(([key]) => key !== "span" && key !== "definedAt")
          .map(([key, entry]) => [
            key,
            normalizeEntry({ key, value: entry, ancestors, formatType }),
          ])
      );
    },
  });
};

export const stringifyOutput = (
  value: unknown,
  arena?: TypeArena
): string =>
  JSON.stringify(
    normalizeOutput({
      value,
      formatType: arena ? (type) => arena.format(type) : undefined,
    }),
    undefined,
    2
  );

export const printJson = (value: unknown, arena?: TypeArena): void => {
  console.log(stringifyOutput(value, arena));
};

/** Checked definitions with their signatures and typed bodies. */
export const renderTypedDefinitions = (result: CompilationResult) =>
  Array.from(result.functions.values()).map((fn) => ({
    name: fn.name,
    kind: fn.kind,
    signature: formatSignature(result.arena, fn.signature),
    body: fn.body,
  }));

/** Concrete instances and struct layouts ready for lowering. */
export const renderProgram = (
  program: MonomorphisedProgram,
  arena: TypeArena
) => ({
  roots: program.roots,
  functions: Array.from(program.functions.values()).map((instance) => ({
    key: instance.key,
    params: instance.params.map(
      (param) =>
        `${param.ownership} ${param.binding.name}: ${arena.format(param.binding.type)}`
    ),
    returnType: arena.format(instance.returnType),
    body: instance.body,
  })),
  structs: Array.from(program.structs.values()).map((instance) => ({
    key: instance.key,
    fields: instance.fields.map(
      (field) => `${field.name}: ${arena.format(field.type)}`
    ),
  })),
});
