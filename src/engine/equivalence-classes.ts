import { type ClassId, SIZE_ONE_CLASS, UNKNOWN_CLASS } from "../core/shape";
import { InvalidMergeError, PreconditionViolationError } from "./analysis-errors";
import type { Var } from "./ir";
import type { ShapeTable } from "./shape-table";

/** A runtime value equal to some dimension's length: a variable or a literal. */
export type SizeRef = Var | number;

export function formatSizeRef(ref: SizeRef): string {
  return typeof ref === "number" ? String(ref) : ref.name;
}

/**
 * Allocates equivalence classes and merges them eagerly.
 *
 * A merge always allocates a new id and rewrites every recorded shape vector
 * in place, so later instructions in the same pass see the union at once.
 */
export class EquivalenceClassRegistry {
  private nextClass: ClassId = 1;
  private readonly classSizes = new Map<ClassId, SizeRef[]>([[SIZE_ONE_CLASS, [1]]]);

  constructor(private readonly shapes: ShapeTable) {}

  allocate(): ClassId {
    const id = this.nextClass;
    this.nextClass += 1;
    return id;
  }

  merge(c1: ClassId, c2: ClassId): ClassId {
    if (c1 === c2) {
      return c1;
    }
    if (c1 === UNKNOWN_CLASS || c2 === UNKNOWN_CLASS) {
      throw new InvalidMergeError(`cannot merge unknown class with ${c1 === UNKNOWN_CLASS ? c2 : c1}`);
    }
    const merged = this.allocate();
    this.shapes.renameClasses([c1, c2], merged);
    const sizes = [...(this.classSizes.get(c1) ?? []), ...(this.classSizes.get(c2) ?? [])];
    this.classSizes.delete(c1);
    this.classSizes.delete(c2);
    this.classSizes.set(merged, sizes);
    return merged;
  }

  hasSizes(c: ClassId): boolean {
    return this.classSizes.has(c);
  }

  sizesOf(c: ClassId): SizeRef[] {
    return this.classSizes.get(c)?.slice() ?? [];
  }

  representativeOf(c: ClassId): SizeRef | undefined {
    return this.classSizes.get(c)?.[0];
  }

  setSizes(c: ClassId, refs: SizeRef[]): void {
    if (c === UNKNOWN_CLASS) {
      throw new PreconditionViolationError("unknown class cannot carry size values");
    }
    this.classSizes.set(c, refs.slice());
  }

  snapshot(): Map<ClassId, SizeRef[]> {
    const out = new Map<ClassId, SizeRef[]>();
    for (const [c, refs] of this.classSizes) {
      out.set(c, refs.slice());
    }
    return out;
  }
}
