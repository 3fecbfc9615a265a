import type { TypeId } from "../ids.js";
import type { TypeArena, TypeParamBound } from "./type-arena.js";

export type OwnershipClass = "copyable" | "affine" | "linear";

const ownershipRank: Record<OwnershipClass, number> = {
  copyable: 0,
  affine: 1,
  linear: 2,
};

export const joinOwnership = (
  left: OwnershipClass,
  right: OwnershipClass
): OwnershipClass =>
  ownershipRank[left] >= ownershipRank[right] ? left : right;

export const ownershipOfBound = (bound: TypeParamBound): OwnershipClass => {
  if (!bound.droppable) return "linear";
  return bound.copyable ? "copyable" : "affine";
};

/** True when values of class `actual` may stand in for a parameter bounded by `bound`. */
export const satisfiesBound = (
  actual: OwnershipClass,
  bound: TypeParamBound
): boolean => ownershipRank[actual] <= ownershipRank[ownershipOfBound(bound)];

export interface OwnershipClassifier {
  classify(type: TypeId): OwnershipClass;
  isLinear(type: TypeId): boolean;
}

export const createOwnershipClassifier = ({
  arena,
  leaves,
  structFieldTypes,
}: {
  arena: TypeArena;
  leaves: Readonly<Record<string, OwnershipClass>>;
  /** Field types of a struct type with its arguments applied. */
  structFieldTypes: (type: TypeId) => readonly TypeId[] | undefined;
}): OwnershipClassifier => {
  const cache = new Map<TypeId, OwnershipClass>();
  const active = new Set<TypeId>();

  const strongest = (types: readonly TypeId[]): OwnershipClass =>
    types.reduce<OwnershipClass>(
      (current, type) => joinOwnership(current, classify(type)),
      "copyable"
    );

  const derive = (type: TypeId): OwnershipClass => {
    const desc = arena.get(type);
    switch (desc.kind) {
      case "primitive": {
        const leaf = leaves[desc.name];
        if (!leaf) {
          throw new Error(`no ownership class for primitive ${desc.name}`);
        }
        return leaf;
      }
      case "function":
      case "unresolved":
        return "copyable";
      case "type-param-ref":
        return ownershipOfBound(arena.getTypeParam(desc.param).bound);
      case "tuple":
        return strongest(desc.elements);
      case "array":
        return classify(desc.element);
      case "option":
        return classify(desc.inner);
      case "struct": {
        const fields = structFieldTypes(type);
        if (!fields) {
          throw new Error(`no field layout for ${arena.format(type)}`);
        }
        return strongest(fields);
      }
    }
  };

  const classify = (type: TypeId): OwnershipClass => {
    const cached = cache.get(type);
    if (cached) return cached;
    // Self-containing structs are rejected at registration.
    if (active.has(type)) return "copyable";

    active.add(type);
    try {
      const result = derive(type);
      cache.set(type, result);
      return result;
    } finally {
      active.delete(type);
    }
  };

  return {
    classify,
    isLinear: (type) => classify(type) === "linear",
  };
};
