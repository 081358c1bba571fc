import type { SizeRef } from "./equivalence-classes";
import type { Assign, FunctionIR } from "./ir";
import { ARRAY_MATH_MODULE, SHAPE_ATTR } from "./op-registry";

export type ArrayAttrCall = {
  method: string;
  receiver: string;
};

/**
 * Side tables that let the analysis see through the generic instruction
 * sequences a call lowers to:
 *
 *   $np = global(numpy)          -> arrayMathGlobals
 *   $fn = getattr($np, "zeros")  -> arrayMathCalls[$fn] = "zeros"
 *   $m  = getattr(A, "sum")      -> arrayAttrCalls[$m] = { "sum", A }
 *   $t  = build_tuple(n, m)      -> tupleTable[$t] = [n, m]
 */
export class AuxiliarySymbolTables {
  readonly arrayMathGlobals = new Set<string>();
  readonly mapCalls = new Set<string>();
  readonly arrayMathCalls = new Map<string, string>();
  readonly arrayAttrCalls = new Map<string, ArrayAttrCall>();
  readonly tupleTable = new Map<string, SizeRef[]>();
  /** `arr.shape[i]` reads already present in the function, by array then dim. */
  readonly shapeFetches = new Map<string, Map<number, string>>();

  /**
   * Register whatever the right-hand side of `assign` tells us about its
   * target. `isArray` decides whether a getattr receiver is an array.
   */
  observe(assign: Assign, isArray: (name: string) => boolean): void {
    const lhs = assign.target.name;
    const rhs = assign.value;
    switch (rhs.op) {
      case "global":
        if (rhs.value.kind === "ufunc") {
          this.mapCalls.add(lhs);
        }
        if (rhs.value.kind === "module" && rhs.value.name === ARRAY_MATH_MODULE) {
          this.arrayMathGlobals.add(lhs);
        }
        return;
      case "getattr":
        if (this.arrayMathGlobals.has(rhs.value.name)) {
          this.arrayMathCalls.set(lhs, rhs.attr);
        } else if (isArray(rhs.value.name)) {
          this.arrayAttrCalls.set(lhs, { method: rhs.attr, receiver: rhs.value.name });
        }
        return;
      case "build_tuple":
        this.tupleTable.set(lhs, rhs.items.slice());
        return;
      case "const":
        if (Array.isArray(rhs.value)) {
          this.tupleTable.set(lhs, rhs.value.slice());
        }
        return;
      default:
        return;
    }
  }

  /** Index the `getattr(arr, "shape")` / `static_getitem` pairs in `fn`. */
  scanShapeFetches(fn: FunctionIR): void {
    const shapeAttrs = new Map<string, string>();
    for (const block of fn.blocks.values()) {
      for (const inst of block.body) {
        if (inst.kind !== "assign") continue;
        const rhs = inst.value;
        if (rhs.op === "getattr" && rhs.attr === SHAPE_ATTR) {
          shapeAttrs.set(inst.target.name, rhs.value.name);
        }
      }
    }
    for (const block of fn.blocks.values()) {
      for (const inst of block.body) {
        if (inst.kind !== "assign" || inst.value.op !== "static_getitem") continue;
        const array = shapeAttrs.get(inst.value.value.name);
        if (array === undefined) continue;
        let dims = this.shapeFetches.get(array);
        if (!dims) {
          dims = new Map();
          this.shapeFetches.set(array, dims);
        }
        if (!dims.has(inst.value.index)) {
          dims.set(inst.value.index, inst.target.name);
        }
      }
    }
  }

  existingShapeFetch(array: string, dim: number): string | undefined {
    return this.shapeFetches.get(array)?.get(dim);
  }
}
