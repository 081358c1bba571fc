import { BINARY_MAP_OPS, UFUNC_NAMES, UNARY_MAP_OPS } from "./op-registry";

export type ArrayAnalysisOptions = {
  /** Dump IR and analysis tables. Defaults to SHAPECLASS_DEBUG_ARRAY_OPT=1. */
  debug?: boolean;
  /** Universal-function names that broadcast over all arguments. */
  ufuncs?: Iterable<string>;
  unaryOps?: Iterable<string>;
  binaryOps?: Iterable<string>;
};

export type ResolvedArrayAnalysisOptions = {
  debug: boolean;
  ufuncs: ReadonlySet<string>;
  unaryOps: ReadonlySet<string>;
  binaryOps: ReadonlySet<string>;
};

function debugFromEnv(): boolean {
  return (
    typeof process !== "undefined" &&
    process.env?.SHAPECLASS_DEBUG_ARRAY_OPT === "1"
  );
}

export function resolveArrayAnalysisOptions(
  options: ArrayAnalysisOptions = {},
): ResolvedArrayAnalysisOptions {
  return {
    debug: options.debug ?? debugFromEnv(),
    ufuncs: options.ufuncs ? new Set(options.ufuncs) : UFUNC_NAMES,
    unaryOps: options.unaryOps ? new Set(options.unaryOps) : UNARY_MAP_OPS,
    binaryOps: options.binaryOps ? new Set(options.binaryOps) : BINARY_MAP_OPS,
  };
}
