/**
 * Array shape analysis (shape equivalence classes)
 *
 * For every array-typed variable, infers one equivalence class per dimension
 * such that dimensions sharing a class are provably equal in length. Along the
 * way, each array assignment is followed by instructions that read any
 * dimension size not yet backed by a runtime value.
 *
 * Blocks are visited once, in stored order. A variable whose shape differs
 * between two assignments is downgraded to all-unknown; there is no fixpoint.
 */

import { type ClassId, UNKNOWN_CLASS, unknownShape } from "../core/shape";
import { UnsupportedCallError, UnsupportedOperationError } from "./analysis-errors";
import {
  type ArrayAnalysisOptions,
  resolveArrayAnalysisOptions,
  type ResolvedArrayAnalysisOptions,
} from "./config";
import { type AnalysisContext, createAnalysisContext, isArrayVar, ndimOf } from "./context";
import type { AnalysisDiagnostic } from "./diagnostics";
import { formatSizeRef, type SizeRef } from "./equivalence-classes";
import type { Assign, Block, CallTypeMap, FunctionIR, Instruction, TypeMap } from "./ir";
import { formatFunction } from "./ir-format";
import { ShapeInferenceEngine } from "./shape-inference";
import { materializeSizes } from "./size-materialization";

// ============================================================================
// Results
// ============================================================================

/** Read-only view of the tables left behind by one analysis run. */
export class ArrayAnalysisResult {
  constructor(
    private readonly shapes: Map<string, ClassId[]>,
    private readonly sizes: Map<ClassId, SizeRef[]>,
    private readonly sizeVars: Map<string, SizeRef[]>,
    readonly diagnostics: AnalysisDiagnostic[],
  ) {}

  shapeOf(variable: string): ClassId[] | undefined {
    return this.shapes.get(variable)?.slice();
  }

  sizeVarsOf(variable: string): SizeRef[] | undefined {
    return this.sizeVars.get(variable)?.slice();
  }

  sizesOf(c: ClassId): SizeRef[] {
    return this.sizes.get(c)?.slice() ?? [];
  }

  /** Every recorded shape, keyed by variable. */
  allShapes(): Map<string, ClassId[]> {
    return new Map([...this.shapes].map(([name, shape]) => [name, shape.slice()]));
  }

  classSizes(): Map<ClassId, SizeRef[]> {
    return new Map([...this.sizes].map(([c, refs]) => [c, refs.slice()]));
  }

  /** True only when both dimensions carry the same known class. */
  equivalentDims(a: string, dimA: number, b: string, dimB: number): boolean {
    const ca = this.shapes.get(a)?.[dimA];
    const cb = this.shapes.get(b)?.[dimB];
    return ca !== undefined && ca !== UNKNOWN_CLASS && ca === cb;
  }
}

// ============================================================================
// Analysis Driver
// ============================================================================

export class ArrayAnalysis {
  private readonly options: ResolvedArrayAnalysisOptions;

  constructor(
    private readonly fn: FunctionIR,
    private readonly typeMap: TypeMap,
    private readonly callTypes: CallTypeMap,
    options: ArrayAnalysisOptions = {},
  ) {
    this.options = resolveArrayAnalysisOptions(options);
  }

  /** Analyze every block, splicing size reads into the function in place. */
  run(): ArrayAnalysisResult {
    const ctx = createAnalysisContext(this.fn, this.typeMap, this.callTypes, this.options);
    const engine = new ShapeInferenceEngine(ctx);

    if (this.options.debug) {
      console.log("[array-analysis] starting array analysis");
      console.log(formatFunction(this.fn));
    }

    ctx.symbols.scanShapeFetches(this.fn);
    for (const block of this.fn.blocks.values()) {
      analyzeBlock(ctx, engine, block);
    }

    if (this.options.debug) {
      dumpTables(ctx);
    }

    return new ArrayAnalysisResult(
      ctx.shapes.snapshot(),
      ctx.classes.snapshot(),
      ctx.shapes.sizeVarsSnapshot(),
      ctx.diagnostics.snapshot(),
    );
  }
}

export function analyzeArrays(
  fn: FunctionIR,
  typeMap: TypeMap,
  callTypes: CallTypeMap,
  options?: ArrayAnalysisOptions,
): ArrayAnalysisResult {
  return new ArrayAnalysis(fn, typeMap, callTypes, options).run();
}

function analyzeBlock(ctx: AnalysisContext, engine: ShapeInferenceEngine, block: Block): void {
  const original = block.body.slice();
  const out: Instruction[] = [];
  for (const inst of original) {
    const generated = inst.kind === "assign" ? analyzeAssign(ctx, engine, inst) : [];
    out.push(inst, ...generated);
  }
  block.body = out;
}

function analyzeAssign(
  ctx: AnalysisContext,
  engine: ShapeInferenceEngine,
  inst: Assign,
): Assign[] {
  const lhs = inst.target.name;
  ctx.symbols.observe(inst, (name) => isArrayVar(ctx, name));
  if (!isArrayVar(ctx, lhs)) {
    return [];
  }

  const rank = ndimOf(ctx, lhs);
  let shape = inferOrUnknown(ctx, engine, inst, rank);
  if (shape.length !== rank) {
    ctx.diagnostics.record({
      type: "unsupported_operation",
      target: lhs,
      op: inst.value.op,
      message: `inferred rank ${shape.length} does not match declared rank ${rank}`,
    });
    shape = unknownShape(rank);
  }

  const outcome = ctx.shapes.record(lhs, shape);
  if (outcome.kind === "conflict") {
    ctx.diagnostics.record({
      type: "shape_conflict",
      target: lhs,
      previous: outcome.previous,
      incoming: outcome.incoming,
    });
    return [];
  }

  // Re-read: the recorded vector may already carry a merged class.
  const recorded = ctx.shapes.lookup(lhs);
  const { instructions, sizeVars } = materializeSizes(ctx, inst.target, recorded, inst.loc);
  ctx.shapes.setSizeVars(lhs, sizeVars);
  return instructions;
}

function inferOrUnknown(
  ctx: AnalysisContext,
  engine: ShapeInferenceEngine,
  inst: Assign,
  rank: number,
): ClassId[] {
  try {
    return engine.infer(inst.target, inst.value);
  } catch (err) {
    if (err instanceof UnsupportedCallError) {
      ctx.diagnostics.record({ type: "unsupported_call", target: inst.target.name, callName: err.callName });
      return unknownShape(rank);
    }
    if (err instanceof UnsupportedOperationError) {
      ctx.diagnostics.record({
        type: "unsupported_operation",
        target: inst.target.name,
        op: err.op,
        message: err.message,
      });
      return unknownShape(rank);
    }
    throw err;
  }
}

function dumpTables(ctx: AnalysisContext): void {
  const { shapes, classes, symbols } = ctx;
  const fmtShapes = [...shapes.snapshot()].map(([name, shape]) => `${name}: [${shape.join(", ")}]`);
  const fmtSizes = [...classes.snapshot()].map(
    ([c, refs]) => `${c}: [${refs.map(formatSizeRef).join(", ")}]`,
  );
  const fmtSizeVars = [...shapes.sizeVarsSnapshot()].map(
    ([name, refs]) => `${name}: [${refs.map(formatSizeRef).join(", ")}]`,
  );
  const fmtAttrCalls = [...symbols.arrayAttrCalls].map(
    ([name, call]) => `${name}: ${call.receiver}.${call.method}`,
  );
  const fmtTuples = [...symbols.tupleTable].map(
    ([name, items]) => `${name}: (${items.map(formatSizeRef).join(", ")})`,
  );
  console.log(`[array-analysis] classes: {${fmtShapes.join("; ")}}`);
  console.log(`[array-analysis] class sizes: {${fmtSizes.join("; ")}}`);
  console.log(`[array-analysis] array size vars: {${fmtSizeVars.join("; ")}}`);
  console.log(`[array-analysis] array-math globals: [${[...symbols.arrayMathGlobals].join(", ")}]`);
  console.log(
    `[array-analysis] array-math calls: {${[...symbols.arrayMathCalls].map(([name, attr]) => `${name}: ${attr}`).join("; ")}}`,
  );
  console.log(`[array-analysis] array attr calls: {${fmtAttrCalls.join("; ")}}`);
  console.log(`[array-analysis] map calls: [${[...symbols.mapCalls].join(", ")}]`);
  console.log(`[array-analysis] tuple table: {${fmtTuples.join("; ")}}`);
}
