/**
 * Canonical pure helpers over shape-class vectors.
 *
 * No dependencies; importable from any layer.
 */

/** Equivalence class id for one array dimension. */
export type ClassId = number;

/** Dimension statically known to have length 1 (includes broadcast padding). */
export const SIZE_ONE_CLASS: ClassId = 0;

/** Dimension with no equivalence proof. Never merged, never backed. */
export const UNKNOWN_CLASS: ClassId = -1;

export function shapesEqual(a: readonly ClassId[], b: readonly ClassId[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function unknownShape(rank: number): ClassId[] {
  return new Array<ClassId>(rank).fill(UNKNOWN_CLASS);
}

/** Left-pad with size-one classes so trailing dimensions line up. */
export function padLeading(shape: readonly ClassId[], rank: number): ClassId[] {
  const out = shape.slice();
  while (out.length < rank) {
    out.unshift(SIZE_ONE_CLASS);
  }
  return out;
}

export function reversed(shape: readonly ClassId[]): ClassId[] {
  return shape.slice().reverse();
}

/**
 * Renumber positive classes in order of first appearance, leaving 0 and -1
 * alone. Two analyses agree "up to renaming" when their canonical forms match.
 */
export function canonicalizeShapes(
  shapes: ReadonlyMap<string, readonly ClassId[]>,
): Map<string, ClassId[]> {
  const renumber = new Map<ClassId, ClassId>();
  const out = new Map<string, ClassId[]>();
  const names = [...shapes.keys()].sort();
  for (const name of names) {
    const shape = shapes.get(name) ?? [];
    out.set(
      name,
      shape.map((c) => {
        if (c <= SIZE_ONE_CLASS) return c;
        let mapped = renumber.get(c);
        if (mapped === undefined) {
          mapped = renumber.size + 1;
          renumber.set(c, mapped);
        }
        return mapped;
      }),
    );
  }
  return out;
}
