import type {
  ArrayExprTree,
  Assign,
  ConstValue,
  Expr,
  GlobalValue,
  Loc,
  StaticType,
  Var,
} from "./ir";

// ============================================================================
// Unique Names
// ============================================================================

/**
 * Per-run variable name generator. Names take the form `<prefix>.<n>` and
 * skip anything `isTaken` reports, so a second run over an already-analyzed
 * function never reuses a name.
 */
export class UniqueNameGenerator {
  private next = 1;

  constructor(private readonly isTaken: (name: string) => boolean) {}

  fresh(prefix: string): string {
    for (;;) {
      const name = `${prefix}.${this.next}`;
      this.next += 1;
      if (!this.isTaken(name)) {
        return name;
      }
    }
  }
}

// ============================================================================
// Expression and Instruction Constructors
// ============================================================================

export function v(name: string): Var {
  return { name };
}

export function assign(target: string | Var, value: Expr, loc?: Loc): Assign {
  const inst: Assign = {
    kind: "assign",
    target: typeof target === "string" ? v(target) : target,
    value,
  };
  if (loc) inst.loc = loc;
  return inst;
}

export function globalRef(name: string, value: GlobalValue): Expr {
  return { op: "global", name, value };
}

export function arg(index: number, name: string): Expr {
  return { op: "arg", index, name };
}

export function getattr(value: string | Var, attr: string): Expr {
  return { op: "getattr", value: typeof value === "string" ? v(value) : value, attr };
}

export function buildTuple(items: (string | Var)[]): Expr {
  return { op: "build_tuple", items: items.map((item) => (typeof item === "string" ? v(item) : item)) };
}

export function constant(value: ConstValue): Expr {
  return { op: "const", value };
}

export function ref(name: string): Expr {
  return { op: "var", var: v(name) };
}

export function unary(fn: string, value: string): Expr {
  return { op: "unary", fn, value: v(value) };
}

export function binop(fn: string, lhs: string, rhs: string): Expr {
  return { op: "binop", fn, lhs: v(lhs), rhs: v(rhs) };
}

export function inplaceBinop(fn: string, immutableFn: string, lhs: string, rhs: string): Expr {
  return { op: "inplace_binop", fn, immutableFn, lhs: v(lhs), rhs: v(rhs) };
}

export function arrayExpr(tree: ArrayExprTree): Expr {
  return { op: "arrayexpr", tree };
}

export function cast(value: string): Expr {
  return { op: "cast", value: v(value) };
}

export function call(func: string, args: string[], kws: [string, string][] = []): Expr {
  return {
    op: "call",
    func: v(func),
    args: args.map(v),
    kws: kws.map(([key, value]) => [key, v(value)]),
  };
}

export function staticGetitem(value: string | Var, index: number, indexVar: Var | null): Expr {
  return {
    op: "static_getitem",
    value: typeof value === "string" ? v(value) : value,
    index,
    indexVar,
  };
}

// ============================================================================
// Static Type Constructors
// ============================================================================

export const int64: StaticType = { kind: "integer", bitwidth: 64, signed: true };
export const float64: StaticType = { kind: "float", bitwidth: 64 };

export function arrayOf(ndim: number, dtype: "float64" | "int64" | "float32" = "float64"): StaticType {
  return { kind: "array", ndim, dtype, layout: "C" };
}

export function uniTuple(dtype: StaticType, count: number): StaticType {
  return { kind: "unituple", dtype, count };
}
