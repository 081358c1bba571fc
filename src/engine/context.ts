import { MissingTypeError } from "./analysis-errors";
import type { ResolvedArrayAnalysisOptions } from "./config";
import { DiagnosticRecorder } from "./diagnostics";
import { EquivalenceClassRegistry } from "./equivalence-classes";
import { type CallTypeMap, type FunctionIR, isArrayType, type StaticType, type TypeMap } from "./ir";
import { UniqueNameGenerator } from "./ir-builder";
import { ShapeTable } from "./shape-table";
import { AuxiliarySymbolTables } from "./symbol-tables";

/**
 * Everything one analysis run owns. Created fresh per run and never shared,
 * so concurrent runs over different functions need no coordination.
 */
export type AnalysisContext = {
  fn: FunctionIR;
  typeMap: TypeMap;
  callTypes: CallTypeMap;
  options: ResolvedArrayAnalysisOptions;
  shapes: ShapeTable;
  classes: EquivalenceClassRegistry;
  symbols: AuxiliarySymbolTables;
  diagnostics: DiagnosticRecorder;
  names: UniqueNameGenerator;
};

export function createAnalysisContext(
  fn: FunctionIR,
  typeMap: TypeMap,
  callTypes: CallTypeMap,
  options: ResolvedArrayAnalysisOptions,
): AnalysisContext {
  const shapes = new ShapeTable();
  return {
    fn,
    typeMap,
    callTypes,
    options,
    shapes,
    classes: new EquivalenceClassRegistry(shapes),
    symbols: new AuxiliarySymbolTables(),
    diagnostics: new DiagnosticRecorder(),
    names: new UniqueNameGenerator((name) => typeMap.has(name)),
  };
}

export function isArrayVar(ctx: AnalysisContext, name: string): boolean {
  return isArrayType(ctx.typeMap.get(name));
}

export function requireType(ctx: AnalysisContext, name: string): StaticType {
  const type = ctx.typeMap.get(name);
  if (!type) {
    throw new MissingTypeError(name);
  }
  return type;
}

/** Declared rank of an array variable, or 0 for anything else. */
export function ndimOf(ctx: AnalysisContext, name: string): number {
  const type = requireType(ctx, name);
  return type.kind === "array" ? type.ndim : 0;
}
