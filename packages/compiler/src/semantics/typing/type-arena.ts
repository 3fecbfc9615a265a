import type { NatParamId, TypeId, TypeParamId } from "../ids.js";
import type { Ownership } from "../hir/index.js";

export type NatArg =
  | { kind: "nat-literal"; value: number }
  | { kind: "nat-param"; param: NatParamId };

export type TypeDescriptor =
  | PrimitiveType
  | TupleType
  | ArrayType
  | StructType
  | FunctionType
  | OptionType
  | TypeParamRef
  | UnresolvedType;

export interface PrimitiveType {
  kind: "primitive";
  name: string;
}

export interface TupleType {
  kind: "tuple";
  elements: readonly TypeId[];
}

export interface ArrayType {
  kind: "array";
  element: TypeId;
  length: NatArg;
}

export interface StructType {
  kind: "struct";
  name: string;
  typeArgs: readonly TypeId[];
  natArgs: readonly NatArg[];
}

export interface FunctionParameter {
  type: TypeId;
  ownership: Ownership;
}

export interface FunctionType {
  kind: "function";
  parameters: readonly FunctionParameter[];
  returnType: TypeId;
  typeParams: readonly TypeParamId[];
  natParams: readonly NatParamId[];
}

export interface OptionType {
  kind: "option";
  inner: TypeId;
}

export interface TypeParamRef {
  kind: "type-param-ref";
  param: TypeParamId;
}

export interface UnresolvedType {
  kind: "unresolved";
}

export interface TypeParamBound {
  copyable: boolean;
  droppable: boolean;
}

export interface TypeParamInfo {
  id: TypeParamId;
  name: string;
  bound: TypeParamBound;
}

export interface NatParamInfo {
  id: NatParamId;
  name: string;
}

export interface Substitution {
  types: ReadonlyMap<TypeParamId, TypeId>;
  nats: ReadonlyMap<NatParamId, NatArg>;
}

export const emptySubstitution = (): Substitution => ({
  types: new Map(),
  nats: new Map(),
});

export interface FlexibleParams {
  types: ReadonlySet<TypeParamId>;
  nats: ReadonlySet<NatParamId>;
}

export interface UnificationContext {
  reason: string;
  /** Parameters that may be bound. Everything else only equals itself. */
  flexible?: FlexibleParams;
  substitution?: Substitution;
}

export type UnificationResult =
  | { ok: true; substitution: Substitution }
  | { ok: false; conflict: UnificationConflict };

export interface UnificationConflict {
  left: TypeId;
  right: TypeId;
  message: string;
}

export interface FreeParams {
  types: Set<TypeParamId>;
  nats: Set<NatParamId>;
}

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  internPrimitive(name: string): TypeId;
  internTuple(elements: readonly TypeId[]): TypeId;
  internArray(element: TypeId, length: NatArg): TypeId;
  internStruct(desc: Omit<StructType, "kind">): TypeId;
  internFunction(desc: Omit<FunctionType, "kind">): TypeId;
  internOption(inner: TypeId): TypeId;
  internTypeParamRef(param: TypeParamId): TypeId;
  unresolved(): TypeId;
  freshTypeParam(options: { name: string; bound?: Partial<TypeParamBound> }): TypeParamId;
  freshNatParam(options: { name: string }): NatParamId;
  getTypeParam(id: TypeParamId): Readonly<TypeParamInfo>;
  getNatParam(id: NatParamId): Readonly<NatParamInfo>;
  substitute(type: TypeId, subst: Substitution): TypeId;
  substituteNat(nat: NatArg, subst: Substitution): NatArg;
  unify(a: TypeId, b: TypeId, ctx: UnificationContext): UnificationResult;
  equals(a: TypeId, b: TypeId, subst?: Substitution): boolean;
  freeParams(type: TypeId): FreeParams;
  isClosed(type: TypeId): boolean;
  format(type: TypeId): string;
  formatNat(nat: NatArg): string;
}

export const natLiteral = (value: number): NatArg => ({
  kind: "nat-literal",
  value,
});

export const natParam = (param: NatParamId): NatArg => ({
  kind: "nat-param",
  param,
});

export const natEquals = (left: NatArg, right: NatArg): boolean =>
  left.kind === "nat-literal"
    ? right.kind === "nat-literal" && right.value === left.value
    : right.kind === "nat-param" && right.param === left.param;

export const createTypeArena = (): TypeArena => {
  let nextTypeId: TypeId = 0;
  let nextTypeParamId: TypeParamId = 0;
  let nextNatParamId: NatParamId = 0;

  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();
  const typeParams = new Map<TypeParamId, TypeParamInfo>();
  const natParams = new Map<NatParamId, NatParamInfo>();

  const keyFor = (desc: TypeDescriptor): string => JSON.stringify(desc);

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = nextTypeId++;
    descriptors[id] = desc;
    descriptorCache.set(key, id);
    return id;
  };

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const internPrimitive = (name: string): TypeId =>
    storeDescriptor({ kind: "primitive", name });

  const internTuple = (elements: readonly TypeId[]): TypeId =>
    storeDescriptor({ kind: "tuple", elements: [...elements] });

  const internArray = (element: TypeId, length: NatArg): TypeId =>
    storeDescriptor({ kind: "array", element, length: { ...length } });

  const internStruct = (desc: Omit<StructType, "kind">): TypeId =>
    storeDescriptor({
      kind: "struct",
      name: desc.name,
      typeArgs: [...desc.typeArgs],
      natArgs: desc.natArgs.map((nat) => ({ ...nat })),
    });

  const internFunction = (desc: Omit<FunctionType, "kind">): TypeId =>
    storeDescriptor({
      kind: "function",
      parameters: desc.parameters.map((param) => ({
        type: param.type,
        ownership: param.ownership,
      })),
      returnType: desc.returnType,
      typeParams: [...desc.typeParams],
      natParams: [...desc.natParams],
    });

  const internOption = (inner: TypeId): TypeId =>
    storeDescriptor({ kind: "option", inner });

  const internTypeParamRef = (param: TypeParamId): TypeId =>
    storeDescriptor({ kind: "type-param-ref", param });

  const unresolved = (): TypeId => storeDescriptor({ kind: "unresolved" });

  const freshTypeParam = ({
    name,
    bound,
  }: {
    name: string;
    bound?: Partial<TypeParamBound>;
  }): TypeParamId => {
    const id = nextTypeParamId++;
    typeParams.set(id, {
      id,
      name,
      bound: {
        copyable: bound?.copyable ?? true,
        droppable: bound?.droppable ?? true,
      },
    });
    return id;
  };

  const freshNatParam = ({ name }: { name: string }): NatParamId => {
    const id = nextNatParamId++;
    natParams.set(id, { id, name });
    return id;
  };

  const getTypeParam = (id: TypeParamId): TypeParamInfo => {
    const info = typeParams.get(id);
    if (!info) {
      throw new Error(`unknown TypeParamId ${id}`);
    }
    return info;
  };

  const getNatParam = (id: NatParamId): NatParamInfo => {
    const info = natParams.get(id);
    if (!info) {
      throw new Error(`unknown NatParamId ${id}`);
    }
    return info;
  };

  const substituteNat = (nat: NatArg, subst: Substitution): NatArg => {
    if (nat.kind === "nat-literal") {
      return nat;
    }
    const bound = subst.nats.get(nat.param);
    if (!bound || natEquals(bound, nat)) {
      return nat;
    }
    return substituteNat(bound, subst);
  };

  const substitute = (type: TypeId, subst: Substitution): TypeId => {
    if (subst.types.size === 0 && subst.nats.size === 0) {
      return type;
    }

    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "primitive":
      case "unresolved":
        return type;
      case "type-param-ref": {
        const replacement = subst.types.get(desc.param);
        if (typeof replacement !== "number" || replacement === type) {
          return type;
        }
        // Bindings may mention other bound parameters; unify's occurs check
        // keeps this finite.
        return substitute(replacement, subst);
      }
      case "tuple":
        return internTuple(
          desc.elements.map((element) => substitute(element, subst))
        );
      case "array":
        return internArray(
          substitute(desc.element, subst),
          substituteNat(desc.length, subst)
        );
      case "struct":
        return internStruct({
          name: desc.name,
          typeArgs: desc.typeArgs.map((arg) => substitute(arg, subst)),
          natArgs: desc.natArgs.map((arg) => substituteNat(arg, subst)),
        });
      case "function":
        return internFunction({
          parameters: desc.parameters.map((param) => ({
            type: substitute(param.type, subst),
            ownership: param.ownership,
          })),
          returnType: substitute(desc.returnType, subst),
          typeParams: desc.typeParams.filter((param) => !subst.types.has(param)),
          natParams: desc.natParams.filter((param) => !subst.nats.has(param)),
        });
      case "option":
        return internOption(substitute(desc.inner, subst));
    }
  };

  const freeParams = (type: TypeId): FreeParams => {
    const found: FreeParams = { types: new Set(), nats: new Set() };
    const visitNat = (nat: NatArg) => {
      if (nat.kind === "nat-param") found.nats.add(nat.param);
    };
    const visit = (current: TypeId): void => {
      const desc = getDescriptor(current);
      switch (desc.kind) {
        case "primitive":
        case "unresolved":
          return;
        case "type-param-ref":
          found.types.add(desc.param);
          return;
        case "tuple":
          desc.elements.forEach(visit);
          return;
        case "array":
          visit(desc.element);
          visitNat(desc.length);
          return;
        case "struct":
          desc.typeArgs.forEach(visit);
          desc.natArgs.forEach(visitNat);
          return;
        case "function":
          desc.parameters.forEach((param) => visit(param.type));
          visit(desc.returnType);
          return;
        case "option":
          visit(desc.inner);
          return;
      }
    };
    visit(type);
    return found;
  };

  const containsUnresolved = (type: TypeId): boolean => {
    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "unresolved":
        return true;
      case "primitive":
      case "type-param-ref":
        return false;
      case "tuple":
        return desc.elements.some(containsUnresolved);
      case "array":
        return containsUnresolved(desc.element);
      case "struct":
        return desc.typeArgs.some(containsUnresolved);
      case "function":
        return (
          desc.parameters.some((param) => containsUnresolved(param.type)) ||
          containsUnresolved(desc.returnType)
        );
      case "option":
        return containsUnresolved(desc.inner);
    }
  };

  const isClosed = (type: TypeId): boolean => {
    const free = freeParams(type);
    return (
      free.types.size === 0 && free.nats.size === 0 && !containsUnresolved(type)
    );
  };

  const unify = (
    a: TypeId,
    b: TypeId,
    ctx: UnificationContext
  ): UnificationResult => {
    const flexibleTypes = ctx.flexible?.types ?? new Set<TypeParamId>();
    const flexibleNats = ctx.flexible?.nats ?? new Set<NatParamId>();

    const success = (substitution: Substitution): UnificationResult => ({
      ok: true,
      substitution,
    });

    const conflict = (
      left: TypeId,
      right: TypeId,
      message?: string
    ): UnificationResult => ({
      ok: false,
      conflict: {
        left,
        right,
        message: message ?? `cannot unify ${format(left)} with ${format(right)} (${ctx.reason})`,
      },
    });

    const flexibleParamOf = (
      type: TypeId,
      subst: Substitution
    ): TypeParamId | undefined => {
      const desc = getDescriptor(type);
      if (
        desc.kind === "type-param-ref" &&
        flexibleTypes.has(desc.param) &&
        !subst.types.has(desc.param)
      ) {
        return desc.param;
      }
      return undefined;
    };

    const resolve = (type: TypeId, subst: Substitution): TypeId => {
      const desc = getDescriptor(type);
      if (desc.kind !== "type-param-ref") return type;
      const bound = subst.types.get(desc.param);
      return typeof bound === "number" ? resolve(bound, subst) : type;
    };

    const bindParam = (
      param: TypeParamId,
      target: TypeId,
      subst: Substitution
    ): UnificationResult => {
      const resolvedTarget = substitute(target, subst);
      if (freeParams(resolvedTarget).types.has(param)) {
        return conflict(
          internTypeParamRef(param),
          target,
          `${getTypeParam(param).name} occurs in ${format(resolvedTarget)} (${ctx.reason})`
        );
      }
      const types = new Map(subst.types);
      types.set(param, resolvedTarget);
      return success({ types, nats: subst.nats });
    };

    const unifyNat = (
      left: NatArg,
      right: NatArg,
      subst: Substitution,
      owner: { left: TypeId; right: TypeId }
    ): UnificationResult => {
      const l = substituteNat(left, subst);
      const r = substituteNat(right, subst);
      if (natEquals(l, r)) {
        return success(subst);
      }
      const bind = (param: NatParamId, value: NatArg): UnificationResult => {
        const nats = new Map(subst.nats);
        nats.set(param, value);
        return success({ types: subst.types, nats });
      };
      if (l.kind === "nat-param" && flexibleNats.has(l.param)) {
        return bind(l.param, r);
      }
      if (r.kind === "nat-param" && flexibleNats.has(r.param)) {
        return bind(r.param, l);
      }
      return conflict(
        owner.left,
        owner.right,
        `length ${formatNat(l)} does not match ${formatNat(r)} (${ctx.reason})`
      );
    };

    const unifyAll = (
      lefts: readonly TypeId[],
      rights: readonly TypeId[],
      subst: Substitution
    ): UnificationResult => {
      let working = subst;
      for (let index = 0; index < lefts.length; index += 1) {
        const left = lefts[index];
        const right = rights[index];
        if (left === undefined || right === undefined) {
          return success(working);
        }
        const result = unifyInternal(left, right, working);
        if (!result.ok) return result;
        working = result.substitution;
      }
      return success(working);
    };

    const unifyInternal = (
      rawLeft: TypeId,
      rawRight: TypeId,
      subst: Substitution
    ): UnificationResult => {
      const left = resolve(rawLeft, subst);
      const right = resolve(rawRight, subst);
      if (left === right) {
        return success(subst);
      }

      const leftParam = flexibleParamOf(left, subst);
      if (typeof leftParam === "number") {
        return bindParam(leftParam, right, subst);
      }
      const rightParam = flexibleParamOf(right, subst);
      if (typeof rightParam === "number") {
        return bindParam(rightParam, left, subst);
      }

      const leftDesc = getDescriptor(left);
      const rightDesc = getDescriptor(right);
      if (leftDesc.kind === "unresolved" || rightDesc.kind === "unresolved") {
        return success(subst);
      }

      if (leftDesc.kind === "tuple" && rightDesc.kind === "tuple") {
        if (leftDesc.elements.length !== rightDesc.elements.length) {
          return conflict(left, right);
        }
        return unifyAll(leftDesc.elements, rightDesc.elements, subst);
      }

      if (leftDesc.kind === "array" && rightDesc.kind === "array") {
        const element = unifyInternal(leftDesc.element, rightDesc.element, subst);
        if (!element.ok) return element;
        return unifyNat(leftDesc.length, rightDesc.length, element.substitution, {
          left,
          right,
        });
      }

      if (leftDesc.kind === "struct" && rightDesc.kind === "struct") {
        if (
          leftDesc.name !== rightDesc.name ||
          leftDesc.typeArgs.length !== rightDesc.typeArgs.length ||
          leftDesc.natArgs.length !== rightDesc.natArgs.length
        ) {
          return conflict(left, right);
        }
        const args = unifyAll(leftDesc.typeArgs, rightDesc.typeArgs, subst);
        if (!args.ok) return args;
        let working = args.substitution;
        for (let index = 0; index < leftDesc.natArgs.length; index += 1) {
          const l = leftDesc.natArgs[index];
          const r = rightDesc.natArgs[index];
          if (!l || !r) break;
          const result = unifyNat(l, r, working, { left, right });
          if (!result.ok) return result;
          working = result.substitution;
        }
        return success(working);
      }

      if (leftDesc.kind === "function" && rightDesc.kind === "function") {
        if (leftDesc.parameters.length !== rightDesc.parameters.length) {
          return conflict(left, right);
        }
        const ownershipClash = leftDesc.parameters.some(
          (param, index) => rightDesc.parameters[index]?.ownership !== param.ownership
        );
        if (ownershipClash) {
          return conflict(
            left,
            right,
            `parameter ownership differs between ${format(left)} and ${format(right)} (${ctx.reason})`
          );
        }
        const params = unifyAll(
          leftDesc.parameters.map((param) => param.type),
          rightDesc.parameters.map((param) => param.type),
          subst
        );
        if (!params.ok) return params;
        return unifyInternal(
          leftDesc.returnType,
          rightDesc.returnType,
          params.substitution
        );
      }

      if (leftDesc.kind === "option" && rightDesc.kind === "option") {
        return unifyInternal(leftDesc.inner, rightDesc.inner, subst);
      }

      return conflict(left, right);
    };

    return unifyInternal(a, b, ctx.substitution ?? emptySubstitution());
  };

  const equals = (a: TypeId, b: TypeId, subst?: Substitution): boolean =>
    subst ? substitute(a, subst) === substitute(b, subst) : a === b;

  const formatNat = (nat: NatArg): string =>
    nat.kind === "nat-literal" ? `${nat.value}` : getNatParam(nat.param).name;

  const formatGenericArgs = (
    typeArgs: readonly TypeId[],
    natArgs: readonly NatArg[]
  ): string => {
    if (typeArgs.length === 0 && natArgs.length === 0) return "";
    const types = typeArgs.map(format).join(", ");
    const nats = natArgs.map(formatNat).join(", ");
    if (natArgs.length === 0) return `<${types}>`;
    if (typeArgs.length === 0) return `<; ${nats}>`;
    return `<${types}; ${nats}>`;
  };

  const format = (type: TypeId): string => {
    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "primitive":
        return desc.name;
      case "unresolved":
        return "?";
      case "type-param-ref":
        return getTypeParam(desc.param).name;
      case "tuple":
        return `(${desc.elements.map(format).join(", ")})`;
      case "array":
        return `array[${format(desc.element)}, ${formatNat(desc.length)}]`;
      case "struct":
        return `${desc.name}${formatGenericArgs(desc.typeArgs, desc.natArgs)}`;
      case "function": {
        const params = desc.parameters
          .map((param) => `${param.ownership} ${format(param.type)}`)
          .join(", ");
        return `fn(${params}) -> ${format(desc.returnType)}`;
      }
      case "option":
        return `option[${format(desc.inner)}]`;
    }
  };

  return {
    get: getDescriptor,
    internPrimitive,
    internTuple,
    internArray,
    internStruct,
    internFunction,
    internOption,
    internTypeParamRef,
    unresolved,
    freshTypeParam,
    freshNatParam,
    getTypeParam,
    getNatParam,
    substitute,
    substituteNat,
    unify,
    equals,
    freeParams,
    isClosed,
    format,
    formatNat,
  };
};
