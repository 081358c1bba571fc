import { type ClassId, shapesEqual, unknownShape } from "../core/shape";
import { UnknownVariableError } from "./analysis-errors";
import type { SizeRef } from "./equivalence-classes";

export type RecordOutcome =
  | { kind: "recorded" }
  | { kind: "unchanged" }
  | { kind: "conflict"; previous: ClassId[]; incoming: ClassId[] };

/**
 * Array variable → shape-class vector, plus the size value chosen for each of
 * its dimensions.
 *
 * Vectors are stored privately and copied on every read, so a merge that
 * renames classes is visible to the next lookup but never to a vector a
 * caller already holds.
 */
export class ShapeTable {
  private readonly shapes = new Map<string, ClassId[]>();
  private readonly sizeVars = new Map<string, SizeRef[]>();

  has(variable: string): boolean {
    return this.shapes.has(variable);
  }

  lookup(variable: string): ClassId[] {
    const shape = this.shapes.get(variable);
    if (!shape) {
      throw new UnknownVariableError(variable);
    }
    return shape.slice();
  }

  /**
   * Store a shape. A variable that already has a different shape (possibly
   * from another block) is downgraded to all-unknown at its prior rank and
   * loses its size variables.
   */
  record(variable: string, shape: readonly ClassId[]): RecordOutcome {
    const previous = this.shapes.get(variable);
    if (!previous) {
      this.shapes.set(variable, shape.slice());
      return { kind: "recorded" };
    }
    if (shapesEqual(previous, shape)) {
      return { kind: "unchanged" };
    }
    this.shapes.set(variable, unknownShape(previous.length));
    this.sizeVars.delete(variable);
    return { kind: "conflict", previous: previous.slice(), incoming: shape.slice() };
  }

  /** Rewrite every occurrence of `from` classes to `to`, across all vectors. */
  renameClasses(from: readonly ClassId[], to: ClassId): void {
    for (const shape of this.shapes.values()) {
      for (let i = 0; i < shape.length; i += 1) {
        if (from.includes(shape[i])) {
          shape[i] = to;
        }
      }
    }
  }

  setSizeVars(variable: string, refs: SizeRef[]): void {
    this.sizeVars.set(variable, refs.slice());
  }

  sizeVarsOf(variable: string): SizeRef[] | undefined {
    return this.sizeVars.get(variable)?.slice();
  }

  snapshot(): Map<string, ClassId[]> {
    const out = new Map<string, ClassId[]>();
    for (const [name, shape] of this.shapes) {
      out.set(name, shape.slice());
    }
    return out;
  }

  sizeVarsSnapshot(): Map<string, SizeRef[]> {
    const out = new Map<string, SizeRef[]>();
    for (const [name, refs] of this.sizeVars) {
      out.set(name, refs.slice());
    }
    return out;
  }
}
