import { type ClassId, UNKNOWN_CLASS } from "../core/shape";
import type { AnalysisContext } from "./context";
import type { SizeRef } from "./equivalence-classes";
import type { Assign, Loc, Var } from "./ir";
import { assign, constant, getattr, int64, staticGetitem, uniTuple, v } from "./ir-builder";
import { SHAPE_ATTR } from "./op-registry";

export type MaterializedSizes = {
  /** Instructions to splice in right after the array's assignment. */
  instructions: Assign[];
  /** Size value chosen for each dimension of the array. */
  sizeVars: SizeRef[];
};

/**
 * Give every dimension of a freshly assigned array a runtime size value.
 *
 * A dimension whose class already has a representative reuses it. Otherwise
 * the size is read off the array's shape tuple (or an existing read of it is
 * adopted) and becomes the class's representative, unless the class is
 * unknown.
 */
export function materializeSizes(
  ctx: AnalysisContext,
  target: Var,
  shape: readonly ClassId[],
  loc?: Loc,
): MaterializedSizes {
  const instructions: Assign[] = [];
  const sizeVars: SizeRef[] = [];
  for (let i = 0; i < shape.length; i += 1) {
    const c = shape[i];
    const existing = c === UNKNOWN_CLASS ? undefined : ctx.classes.representativeOf(c);
    if (existing !== undefined) {
      sizeVars.push(existing);
      continue;
    }
    let sizeVar: Var;
    const fetched = ctx.symbols.existingShapeFetch(target.name, i);
    if (fetched !== undefined) {
      sizeVar = v(fetched);
    } else {
      const generated = generateSizeCall(ctx, target, i, shape.length, loc);
      instructions.push(...generated);
      sizeVar = generated[generated.length - 1].target;
    }
    if (c !== UNKNOWN_CLASS) {
      ctx.classes.setSizes(c, [sizeVar]);
    }
    sizeVars.push(sizeVar);
  }
  return { instructions, sizeVars };
}

/**
 *   <A>_sh_attr<i> = getattr(A, shape)
 *   $const<A><i>   = const(i)
 *   <A>size<i>     = static_getitem(<A>_sh_attr<i>, i)
 */
function generateSizeCall(
  ctx: AnalysisContext,
  array: Var,
  dim: number,
  ndims: number,
  loc?: Loc,
): Assign[] {
  const { names, typeMap, callTypes } = ctx;

  const attrVar = v(names.fresh(`${array.name}_sh_attr${dim}`));
  typeMap.set(attrVar.name, uniTuple(int64, ndims));
  const attrAssign = assign(attrVar, getattr(array, SHAPE_ATTR), loc);

  const constVar = v(names.fresh(`$const${array.name}${dim}`));
  typeMap.set(constVar.name, int64);
  const constAssign = assign(constVar, constant(dim), loc);

  const sizeVar = v(names.fresh(`${array.name}size${dim}`));
  typeMap.set(sizeVar.name, int64);
  const getitem = staticGetitem(attrVar, dim, constVar);
  callTypes.set(getitem, null);
  const getitemAssign = assign(sizeVar, getitem, loc);

  return [attrAssign, constAssign, getitemAssign];
}
