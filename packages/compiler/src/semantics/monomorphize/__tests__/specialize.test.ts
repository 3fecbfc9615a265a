import { describe, expect, it } from "vitest";
import { checkUnit, codesOf } from "../../__tests__/check-unit.js";
import type { HirBuilder, HirDefinition } from "../../hir/index.js";
import { monomorphiseProgram } from "../../pipeline.js";
import { natLiteral } from "../../typing/type-arena.js";
import { formatInstanceKey } from "../instance-key.js";
import { MonomorphisationEngine } from "../specialize.js";

const countUnit = (b: HirBuilder): HirDefinition[] => [
  b.fn("count", {
    typeParams: ["T"],
    natParams: ["n"],
    params: [b.param("xs", b.arrayType(b.type("T"), "n"), "borrowed")],
    returns: b.type("int"),
    body: [b.ret(b.name("n"))],
  }),
  b.fn("main", {
    returns: b.type("int"),
    body: [
      b.assign("a", b.array(b.int(1), b.int(2), b.int(3))),
      b.assign("b", b.array(b.bool(true), b.bool(false))),
      b.ret(
        b.binary(
          "+",
          b.call("count", [b.name("a")]),
          b.call("count", [b.name("b")])
        )
      ),
    ],
  }),
];

describe("monomorphisation", () => {
  it("specializes each distinct instantiation reached from a root", () => {
    const checked = checkUnit(countUnit);
    expect(checked.diagnostics).toEqual([]);

    const program = monomorphiseProgram(checked);
    expect(program.roots).toEqual(["main"]);
    expect([...program.functions.keys()]).toEqual([
      "count<int; 3>",
      "count<bool; 2>",
      "main",
    ]);

    const intCount = program.functions.get("count<int; 3>");
    expect(intCount?.natArgs).toEqual([3]);
    expect(
      intCount?.params.map((param) => checked.arena.format(param.binding.type))
    ).toEqual(["array[int, 3]"]);
    expect(intCount?.body.statements[0]).toMatchObject({
      kind: "return",
      value: { kind: "literal", value: 3 },
    });
  });

  it("records the instance key on each generic call site", () => {
    const checked = checkUnit(countUnit);
    const program = monomorphiseProgram(checked);
    const [, , ret] = program.functions.get("main")?.body.statements ?? [];
    const sum = ret?.kind === "return" ? ret.value : undefined;
    expect(sum?.kind).toBe("call");
    if (sum?.kind !== "call") return;
    expect(sum.instanceKey).toBeUndefined();
    expect(
      sum.args.map((arg) => (arg.expr.kind === "call" ? arg.expr.instanceKey : undefined))
    ).toEqual(["count<int; 3>", "count<bool; 2>"]);
  });

  it("reuses cached specializations", () => {
    const checked = checkUnit(countUnit);
    const engine = new MonomorphisationEngine({
      ctx: checked.ctx,
      functions: checked.functions,
    });
    const { int } = checked.ctx.primitives;
    const first = engine.specialize("count", [int], [natLiteral(4)]);
    const second = engine.specialize("count", [int], [natLiteral(4)]);
    expect(second).toBe(first);
    expect(engine.instances()).toHaveLength(1);
  });

  it("keeps cached instances independent of the caller's argument arrays", () => {
    const checked = checkUnit(countUnit);
    const engine = new MonomorphisationEngine({
      ctx: checked.ctx,
      functions: checked.functions,
    });
    const { int, bool } = checked.ctx.primitives;
    const typeArgs = [int];
    const first = engine.specialize("count", typeArgs, [natLiteral(2)]);
    typeArgs[0] = bool;

    const again = engine.specialize("count", [int], [natLiteral(2)]);
    expect(again).toBe(first);
    expect(again.key).toBe("count<int; 2>");
    expect(again.typeArgs.map((type) => checked.arena.format(type))).toEqual(["int"]);
  });

  it("checks argument counts, closedness and bounds", () => {
    const checked = checkUnit(countUnit);
    const engine = new MonomorphisationEngine({
      ctx: checked.ctx,
      functions: checked.functions,
    });
    const { arena, primitives } = checked.ctx;
    const open = arena.internTypeParamRef(arena.freshTypeParam({ name: "U" }));

    expect(() => engine.specialize("count", [primitives.int], [])).toThrow(
      "count expects 1 nat argument(s), received 0"
    );
    expect(() => engine.specialize("count", [open], [natLiteral(1)])).toThrow(
      "cannot specialize count with non-concrete argument U"
    );
    expect(() => engine.specialize("count", [primitives.qubit], [natLiteral(1)])).toThrow(
      "qubit is linear and cannot instantiate T, which must be copyable"
    );
    expect(() => engine.specialize("missing")).toThrow(
      "missing was rejected during checking and cannot be specialized"
    );
    expect(codesOf(checked)).toEqual(["MO0001", "MO0002", "TY0001", "SG0001"]);
    expect(checked.diagnostics[2]?.phase).toBe("monomorphisation");
  });

  it("detects a specialization that requires itself", () => {
    const checked = checkUnit((b) => [
      b.fn("again", {
        typeParams: ["T"],
        params: [b.param("x", b.type("T"))],
        body: [b.expr(b.call("again", [b.name("x")]))],
      }),
      b.fn("start", { body: [b.expr(b.call("again", [b.int(1)]))] }),
    ]);
    expect(checked.diagnostics).toEqual([]);

    const program = monomorphiseProgram(checked);
    expect(codesOf(program)).toEqual(["MO0003"]);
    expect(program.diagnostics[0]?.message).toBe(
      "specialization of again<int> requires itself (start -> again<int> -> again<int>)"
    );
    expect([...program.rejected]).toEqual(["start"]);
    expect(program.roots).toEqual([]);
  });

  it("stops chains of ever-growing instantiations at the depth limit", () => {
    const checked = checkUnit(
      (b) => [
        b.fn("grow", {
          typeParams: ["T"],
          params: [b.param("x", b.type("T"))],
          body: [b.expr(b.call("grow", [b.tuple(b.name("x"), b.name("x"))]))],
        }),
        b.fn("start", { body: [b.expr(b.call("grow", [b.int(1)]))] }),
      ],
      { maxSpecializationDepth: 4 }
    );
    expect(checked.diagnostics).toEqual([]);

    const program = monomorphiseProgram(checked);
    expect(codesOf(program)).toEqual(["MO0003"]);
    expect(program.diagnostics[0]?.message).toMatch(
      /^specialization of grow<.*> exceeds the nesting limit of 4$/
    );
  });

  it("lets plain recursion reference itself", () => {
    const checked = checkUnit((b) => [
      b.fn("countdown", {
        params: [b.param("n", b.type("int"))],
        body: [
          b.if(b.binary(">", b.name("n"), b.int(0)), [
            b.expr(b.call("countdown", [b.binary("-", b.name("n"), b.int(1))])),
          ]),
        ],
      }),
    ]);
    const program = monomorphiseProgram(checked);
    expect(program.diagnostics).toEqual([]);
    expect([...program.functions.keys()]).toEqual(["countdown"]);
  });

  it("specializes the struct layouts concrete code mentions", () => {
    const checked = checkUnit((b) => [
      b.struct("Pair", {
        typeParams: ["T"],
        fields: [
          ["first", b.type("T")],
          ["second", b.type("T")],
        ],
      }),
      b.fn("make", {
        returns: b.type("int"),
        body: [
          b.assign("p", b.structLiteral("Pair", { first: b.int(1), second: b.int(2) })),
          b.ret(b.field(b.name("p"), "second")),
        ],
      }),
    ]);
    const program = monomorphiseProgram(checked);
    expect(program.diagnostics).toEqual([]);
    const pair = program.structs.get("Pair<int>");
    expect(
      pair?.fields.map((field) => `${field.name}: ${checked.arena.format(field.type)}`)
    ).toEqual(["first: int", "second: int"]);
  });
});

describe("instance keys", () => {
  it("renders type and nat arguments", () => {
    const checked = checkUnit(() => []);
    const { arena, primitives } = checked.ctx;
    expect(formatInstanceKey({ arena, name: "main", typeArgs: [], natArgs: [] })).toBe("main");
    expect(
      formatInstanceKey({
        arena,
        name: "swap",
        typeArgs: [primitives.int, primitives.qubit],
        natArgs: [],
      })
    ).toBe("swap<int, qubit>");
    expect(
      formatInstanceKey({ arena, name: "qubit_array", typeArgs: [], natArgs: [natLiteral(3)] })
    ).toBe("qubit_array<; 3>");
  });
});
