import type { InstanceKey, TypeId } from "../ids.js";
import type { NatArg, TypeArena } from "../typing/type-arena.js";

/**
 * Renders the canonical key of an instantiation: `swap<int, qubit>`,
 * `count<bool; 2>`, `qubit_array<; 3>`, or the bare name when there are no
 * arguments. Types print through the arena, so equal arguments always give
 * equal keys.
 */
export const formatInstanceKey = ({
  arena,
  name,
  typeArgs,
  natArgs,
}: {
  arena: TypeArena;
  name: string;
  typeArgs: readonly TypeId[];
  natArgs: readonly NatArg[];
}): InstanceKey => {
  if (typeArgs.length === 0 && natArgs.length === 0) return name;
  const types = typeArgs.map((arg) => arena.format(arg)).join(", ");
  if (natArgs.length === 0) return `${name}<${types}>`;
  const nats = natArgs.map((arg) => arena.formatNat(arg)).join(", ");
  return typeArgs.length === 0 ? `${name}<; ${nats}>` : `${name}<${types}; ${nats}>`;
};

export const isConcreteNat = (
  nat: NatArg
): nat is { kind: "nat-literal"; value: number } =>
  nat.kind === "nat-literal" && Number.isInteger(nat.value) && nat.value >= 0;
