import { describe, expect, it } from "vitest";

import { resolveArrayAnalysisOptions } from "../src/engine/config";
import { createAnalysisContext } from "../src/engine/context";
import { arrayOf, assign, getattr, int64, staticGetitem, uniTuple, v } from "../src/engine/ir-builder";
import { materializeSizes } from "../src/engine/size-materialization";
import { makeCallTypes, makeFunction, makeTypes } from "./helpers/ir";

function setup(types: Parameters<typeof makeTypes>[0], fn = makeFunction([[]])) {
  const typeMap = makeTypes(types);
  const callTypes = makeCallTypes();
  const ctx = createAnalysisContext(fn, typeMap, callTypes, resolveArrayAnalysisOptions({ debug: false }));
  return { ctx, typeMap, callTypes };
}

describe("size materialization", () => {
  it("reuses an existing representative without emitting anything", () => {
    const { ctx } = setup({ z: arrayOf(1), n: int64 });
    const c = ctx.classes.allocate();
    ctx.classes.setSizes(c, [v("n")]);

    const { instructions, sizeVars } = materializeSizes(ctx, v("z"), [c]);

    expect(instructions).toEqual([]);
    expect(sizeVars).toEqual([{ name: "n" }]);
  });

  it("reads the shape tuple for an unbacked class and records the representative", () => {
    const { ctx, typeMap, callTypes } = setup({ z: arrayOf(2), n: int64 });
    const backed = ctx.classes.allocate();
    ctx.classes.setSizes(backed, [v("n")]);
    const fresh = ctx.classes.allocate();

    const { instructions, sizeVars } = materializeSizes(ctx, v("z"), [backed, fresh]);

    expect(instructions).toEqual([
      assign("z_sh_attr1.1", getattr("z", "shape")),
      assign("$constz1.2", { op: "const", value: 1 }),
      assign("zsize1.3", staticGetitem("z_sh_attr1.1", 1, v("$constz1.2"))),
    ]);
    expect(sizeVars).toEqual([{ name: "n" }, { name: "zsize1.3" }]);
    expect(ctx.classes.sizesOf(fresh)).toEqual([{ name: "zsize1.3" }]);

    expect(typeMap.get("z_sh_attr1.1")).toEqual(uniTuple(int64, 2));
    expect(typeMap.get("$constz1.2")).toEqual(int64);
    expect(typeMap.get("zsize1.3")).toEqual(int64);

    const getitem = instructions[2].value;
    expect(callTypes.has(getitem)).toBe(true);
    expect(callTypes.get(getitem)).toBeNull();
  });

  it("materializes unknown dimensions without backing the unknown class", () => {
    const { ctx } = setup({ z: arrayOf(1) });

    const { instructions, sizeVars } = materializeSizes(ctx, v("z"), [-1]);

    expect(instructions.map((inst) => inst.target.name)).toEqual(["z_sh_attr0.1", "$constz0.2", "zsize0.3"]);
    expect(sizeVars).toEqual([{ name: "zsize0.3" }]);
    expect(ctx.classes.hasSizes(-1)).toBe(false);
  });

  it("materializes unknown dimensions every time", () => {
    const { ctx } = setup({ z: arrayOf(2) });

    const { instructions } = materializeSizes(ctx, v("z"), [-1, -1]);

    expect(instructions.map((inst) => inst.target.name)).toEqual([
      "z_sh_attr0.1",
      "$constz0.2",
      "zsize0.3",
      "z_sh_attr1.4",
      "$constz1.5",
      "zsize1.6",
    ]);
  });

  it("shares one representative between dimensions of the same class", () => {
    const { ctx } = setup({ z: arrayOf(2) });
    const c = ctx.classes.allocate();

    const { instructions, sizeVars } = materializeSizes(ctx, v("z"), [c, c]);

    expect(instructions).toHaveLength(3);
    expect(sizeVars).toEqual([{ name: "zsize0.3" }, { name: "zsize0.3" }]);
  });

  it("skips generated names already present in the type map", () => {
    const { ctx } = setup({ z: arrayOf(1), "z_sh_attr0.1": uniTuple(int64, 1) });
    const c = ctx.classes.allocate();

    const { instructions } = materializeSizes(ctx, v("z"), [c]);

    expect(instructions.map((inst) => inst.target.name)).toEqual(["z_sh_attr0.2", "$constz0.3", "zsize0.4"]);
  });

  it("adopts an existing shape read instead of emitting a new one", () => {
    const fn = makeFunction([
      [
        assign("t", getattr("z", "shape")),
        assign("z0", staticGetitem("t", 0, null)),
      ],
    ]);
    const { ctx } = setup({ z: arrayOf(1), t: uniTuple(int64, 1), z0: int64 }, fn);
    ctx.symbols.scanShapeFetches(fn);
    const c = ctx.classes.allocate();

    const { instructions, sizeVars } = materializeSizes(ctx, v("z"), [c]);

    expect(instructions).toEqual([]);
    expect(sizeVars).toEqual([{ name: "z0" }]);
    expect(ctx.classes.sizesOf(c)).toEqual([{ name: "z0" }]);
  });

  it("carries the source location onto generated instructions", () => {
    const { ctx } = setup({ z: arrayOf(1) });
    const c = ctx.classes.allocate();

    const { instructions } = materializeSizes(ctx, v("z"), [c], { line: 12 });

    expect(instructions.map((inst) => inst.loc)).toEqual([{ line: 12 }, { line: 12 }, { line: 12 }]);
  });
});
