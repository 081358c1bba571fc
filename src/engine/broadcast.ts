import {
  type ClassId,
  padLeading,
  SIZE_ONE_CLASS,
  UNKNOWN_CLASS,
} from "../core/shape";
import { NoArrayOperandError } from "./analysis-errors";
import type { EquivalenceClassRegistry } from "./equivalence-classes";
import type { ShapeTable } from "./shape-table";

/**
 * Infer shape equivalence of operands under array broadcasting and return the
 * output shape.
 *
 * Shapes are aligned from their trailing dimension; non-array operands count
 * as rank 0. At each dimension every non-size-one class must equal the
 * running candidate, so distinct classes are merged rather than compared.
 * Unknown dimensions are never merged; they make that output dimension
 * unknown while the known classes beside them are still merged.
 */
export function broadcastAndMatchShapes(
  operands: readonly string[],
  isArray: (name: string) => boolean,
  shapes: ShapeTable,
  classes: EquivalenceClassRegistry,
): ClassId[] {
  const arrays = operands.filter((name) => isArray(name));
  if (arrays.length === 0) {
    throw new NoArrayOperandError(operands.slice());
  }
  const rank = Math.max(...arrays.map((name) => shapes.lookup(name).length));

  // Read fresh for every operand so a merge made earlier in this call is seen.
  const classAt = (name: string, dim: number): ClassId =>
    padLeading(isArray(name) ? shapes.lookup(name) : [], rank)[dim];

  const out = new Array<ClassId>(rank).fill(UNKNOWN_CLASS);
  for (let i = 0; i < rank; i += 1) {
    let known = SIZE_ONE_CLASS;
    let unknownSeen = false;
    for (const name of operands) {
      const e = classAt(name, i);
      if (e === UNKNOWN_CLASS) {
        unknownSeen = true;
        continue;
      }
      if (e === SIZE_ONE_CLASS || e === known) {
        continue;
      }
      if (known === SIZE_ONE_CLASS) {
        known = e;
        continue;
      }
      const merged = classes.merge(known, e);
      // Square inputs repeat a class across dimensions; keep `out` current.
      for (let j = 0; j < i; j += 1) {
        if (out[j] === known || out[j] === e) out[j] = merged;
      }
      known = merged;
    }
    out[i] = unknownSeen ? UNKNOWN_CLASS : known;
  }
  return out;
}
