/**
 * Function IR consumed by the array analysis pass.
 *
 * The pass reads these structures and mutates only two things: block bodies
 * (materialization instructions are spliced in) and the type/call-type maps
 * (entries for synthesized variables and expressions).
 */

// ============================================================================
// Static Types
// ============================================================================

export type ScalarDType =
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64"
  | "float32"
  | "float64"
  | "bool";

export type ArrayLayout = "C" | "F" | "A";

export type StaticType =
  | { kind: "array"; ndim: number; dtype: ScalarDType; layout: ArrayLayout }
  | { kind: "integer"; bitwidth: number; signed: boolean }
  | { kind: "float"; bitwidth: number }
  | { kind: "boolean" }
  | { kind: "unituple"; dtype: StaticType; count: number }
  | { kind: "tuple"; items: StaticType[] }
  | { kind: "module"; name: string }
  | { kind: "function"; name: string }
  | { kind: "none" }
  | { kind: "opaque"; name: string };

export type ArrayType = Extract<StaticType, { kind: "array" }>;

/** Variable name → static type. Owned by the type inference stage. */
export type TypeMap = Map<string, StaticType>;

export type CallSignature = {
  returnType: StaticType;
  args: StaticType[];
};

/**
 * Call-like expression → resolved signature, keyed by expression identity.
 * `null` marks an expression lowering resolves on its own.
 */
export type CallTypeMap = Map<Expr, CallSignature | null>;

// ============================================================================
// Variables and Expressions
// ============================================================================

export type Loc = {
  line: number;
  column?: number;
};

export type Var = {
  name: string;
};

/** Value referenced by a `global` expression. */
export type GlobalValue =
  | { kind: "module"; name: string }
  | { kind: "ufunc"; name: string }
  | { kind: "function"; name: string }
  | { kind: "other"; name: string };

export type ConstValue = number | boolean | string | null | number[];

/** Node of a fused elementwise expression tree. */
export type ArrayExprTree =
  | { kind: "leaf"; var: Var }
  | { kind: "const"; value: number }
  | { kind: "op"; fn: string; operands: ArrayExprTree[] };

export type Expr =
  | { op: "global"; name: string; value: GlobalValue }
  | { op: "arg"; index: number; name: string }
  | { op: "getattr"; value: Var; attr: string }
  | { op: "build_tuple"; items: Var[] }
  | { op: "const"; value: ConstValue }
  | { op: "var"; var: Var }
  | { op: "unary"; fn: string; value: Var }
  | { op: "binop"; fn: string; lhs: Var; rhs: Var }
  | { op: "inplace_binop"; fn: string; immutableFn: string; lhs: Var; rhs: Var }
  | { op: "arrayexpr"; tree: ArrayExprTree }
  | { op: "cast"; value: Var }
  | { op: "call"; func: Var; args: Var[]; kws: [string, Var][] }
  | { op: "static_getitem"; value: Var; index: number; indexVar: Var | null };

export type ExprOp = Expr["op"];

// ============================================================================
// Instructions, Blocks, Functions
// ============================================================================

export type Assign = {
  kind: "assign";
  target: Var;
  value: Expr;
  loc?: Loc;
};

export type Instruction =
  | Assign
  | { kind: "return"; value: Var; loc?: Loc }
  | { kind: "jump"; target: number; loc?: Loc }
  | { kind: "branch"; cond: Var; truebr: number; falsebr: number; loc?: Loc }
  | { kind: "del"; value: string; loc?: Loc };

export type Block = {
  label: number;
  body: Instruction[];
};

export type FunctionIR = {
  name: string;
  argNames: string[];
  /** Iterated in insertion order, which need not be control-flow order. */
  blocks: Map<number, Block>;
};

/**
 * Every variable referenced by a fused expression tree, de-duplicated by name,
 * in order of first appearance.
 */
export function listArrayExprVars(tree: ArrayExprTree): Var[] {
  const seen = new Set<string>();
  const out: Var[] = [];
  const visit = (node: ArrayExprTree): void => {
    switch (node.kind) {
      case "leaf":
        if (!seen.has(node.var.name)) {
          seen.add(node.var.name);
          out.push(node.var);
        }
        return;
      case "const":
        return;
      case "op":
        for (const operand of node.operands) {
          visit(operand);
        }
        return;
    }
  };
  visit(tree);
  return out;
}

export function isArrayType(type: StaticType | undefined): type is ArrayType {
  return type !== undefined && type.kind === "array";
}
