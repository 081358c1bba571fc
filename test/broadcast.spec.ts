import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { NoArrayOperandError } from "../src/engine/analysis-errors";
import { broadcastAndMatchShapes } from "../src/engine/broadcast";
import { EquivalenceClassRegistry } from "../src/engine/equivalence-classes";
import { ShapeTable } from "../src/engine/shape-table";

function setup(): {
  shapes: ShapeTable;
  classes: EquivalenceClassRegistry;
  broadcast: (operands: string[]) => number[];
} {
  const shapes = new ShapeTable();
  const classes = new EquivalenceClassRegistry(shapes);
  const broadcast = (operands: string[]) =>
    broadcastAndMatchShapes(operands, (name) => shapes.has(name), shapes, classes);
  return { shapes, classes, broadcast };
}

describe("broadcast resolver", () => {
  it("takes the non-size-one class from each side of [X,1] and [1,Y]", () => {
    const { shapes, classes, broadcast } = setup();
    const x = classes.allocate();
    const y = classes.allocate();
    shapes.record("A", [x, 0]);
    shapes.record("B", [0, y]);

    expect(broadcast(["A", "B"])).toEqual([x, y]);
    // No merge was needed.
    expect(classes.allocate()).toBe(3);
  });

  it("merges distinct classes at every aligned dimension", () => {
    const { shapes, classes, broadcast } = setup();
    const [a0, a1, b0, b1] = [1, 2, 3, 4].map(() => classes.allocate());
    shapes.record("A", [a0, a1]);
    shapes.record("B", [b0, b1]);

    expect(broadcast(["A", "B"])).toEqual([5, 6]);
    expect(shapes.lookup("A")).toEqual([5, 6]);
    expect(shapes.lookup("B")).toEqual([5, 6]);
  });

  it("aligns shapes of different rank from the trailing dimension", () => {
    const { shapes, classes, broadcast } = setup();
    const [m, n, k] = [1, 2, 3].map(() => classes.allocate());
    shapes.record("M", [m, n]);
    shapes.record("V", [k]);

    expect(broadcast(["M", "V"])).toEqual([m, 4]);
    expect(shapes.lookup("V")).toEqual([4]);
    expect(shapes.lookup("M")).toEqual([m, 4]);
  });

  it("treats non-array operands as rank zero", () => {
    const { shapes, classes, broadcast } = setup();
    const [m, n] = [1, 2].map(() => classes.allocate());
    shapes.record("A", [m, n]);
    expect(broadcast(["A", "scalar"])).toEqual([m, n]);
    expect(broadcast(["scalar", "A"])).toEqual([m, n]);
  });

  it("keeps the output current when a class repeats across dimensions", () => {
    const { shapes, classes, broadcast } = setup();
    const [k, p, q] = [1, 2, 3].map(() => classes.allocate());
    shapes.record("S", [k, k]);
    shapes.record("B", [p, q]);

    expect(broadcast(["S", "B"])).toEqual([5, 5]);
    expect(shapes.lookup("S")).toEqual([5, 5]);
    expect(shapes.lookup("B")).toEqual([5, 5]);
  });

  it("never merges unknown dimensions", () => {
    const { shapes, classes, broadcast } = setup();
    const c = classes.allocate();
    shapes.record("U", [-1]);
    shapes.record("K", [c]);

    expect(broadcast(["U", "K"])).toEqual([-1]);
    expect(broadcast(["K", "U"])).toEqual([-1]);
    expect(shapes.lookup("K")).toEqual([c]);
    expect(classes.allocate()).toBe(2);
  });

  it("merges the known classes beside an unknown dimension in any operand order", () => {
    for (const order of [
      ["K1", "K2", "U"],
      ["U", "K1", "K2"],
    ]) {
      const { shapes, classes, broadcast } = setup();
      const x = classes.allocate();
      const y = classes.allocate();
      shapes.record("U", [-1]);
      shapes.record("K1", [x]);
      shapes.record("K2", [y]);

      expect(broadcast(order)).toEqual([-1]);
      expect(shapes.lookup("K1")).toEqual([3]);
      expect(shapes.lookup("K2")).toEqual([3]);
      expect(shapes.lookup("U")).toEqual([-1]);
    }
  });

  it("requires at least one array operand", () => {
    const { broadcast } = setup();
    expect(() => broadcast(["s", "t"])).toThrow(NoArrayOperandError);
  });

  it("proves every pair of aligned non-size-one dimensions equal", () => {
    const shapeArb = fc.array(fc.integer({ min: 0, max: 4 }), { minLength: 1, maxLength: 4 });
    fc.assert(
      fc.property(shapeArb, shapeArb, (rawA, rawB) => {
        const { shapes, classes, broadcast } = setup();
        for (let i = 0; i < 4; i += 1) classes.allocate();
        shapes.record("A", rawA);
        shapes.record("B", rawB);

        const out = broadcast(["A", "B"]);
        const rank = Math.max(rawA.length, rawB.length);
        expect(out).toHaveLength(rank);

        const a = shapes.lookup("A");
        const b = shapes.lookup("B");
        for (let i = 1; i <= rank; i += 1) {
          const ea = a[a.length - i] ?? 0;
          const eb = b[b.length - i] ?? 0;
          const o = out[rank - i];
          if (ea !== 0) expect(ea).toBe(o);
          if (eb !== 0) expect(eb).toBe(o);
          if (ea === 0 && eb === 0) expect(o).toBe(0);
        }
      }),
    );
  });
});
