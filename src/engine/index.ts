export {
  InvalidMergeError,
  MissingTypeError,
  NoArrayOperandError,
  PreconditionViolationError,
  UnknownVariableError,
  UnsupportedCallError,
  UnsupportedOperationError,
} from "./analysis-errors";
export { analyzeArrays, ArrayAnalysis, ArrayAnalysisResult } from "./array-analysis";
export { broadcastAndMatchShapes } from "./broadcast";
export type { ArrayAnalysisOptions, ResolvedArrayAnalysisOptions } from "./config";
export { resolveArrayAnalysisOptions } from "./config";
export type { AnalysisContext } from "./context";
export { createAnalysisContext } from "./context";
export type { AnalysisDiagnostic } from "./diagnostics";
export { DiagnosticRecorder, formatDiagnostic } from "./diagnostics";
export type { SizeRef } from "./equivalence-classes";
export { EquivalenceClassRegistry, formatSizeRef } from "./equivalence-classes";
export type {
  ArrayExprTree,
  ArrayLayout,
  ArrayType,
  Assign,
  Block,
  CallSignature,
  CallTypeMap,
  ConstValue,
  Expr,
  ExprOp,
  FunctionIR,
  GlobalValue,
  Instruction,
  Loc,
  ScalarDType,
  StaticType,
  TypeMap,
  Var,
} from "./ir";
export { isArrayType, listArrayExprVars } from "./ir";
export * as ir from "./ir-builder";
export { formatExpr, formatFunction, formatInstruction } from "./ir-format";
export type { NamedCallCategory } from "./op-registry";
export {
  ARRAY_MATH_MODULE,
  BINARY_MAP_OPS,
  namedCallCategory,
  UFUNC_NAMES,
  UNARY_MAP_OPS,
} from "./op-registry";
export { ShapeInferenceEngine } from "./shape-inference";
export type { RecordOutcome } from "./shape-table";
export { ShapeTable } from "./shape-table";
export type { MaterializedSizes } from "./size-materialization";
export { materializeSizes } from "./size-materialization";
export type { ArrayAttrCall } from "./symbol-tables";
export { AuxiliarySymbolTables } from "./symbol-tables";
