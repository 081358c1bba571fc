import type { ArrayExprTree, Expr, FunctionIR, Instruction } from "./ir";

function formatTree(tree: ArrayExprTree): string {
  switch (tree.kind) {
    case "leaf":
      return tree.var.name;
    case "const":
      return String(tree.value);
    case "op":
      if (tree.operands.length === 2) {
        return `(${formatTree(tree.operands[0])} ${tree.fn} ${formatTree(tree.operands[1])})`;
      }
      return `${tree.fn}(${tree.operands.map(formatTree).join(", ")})`;
  }
}

export function formatExpr(expr: Expr): string {
  switch (expr.op) {
    case "global":
      return `global(${expr.name}: ${expr.value.name})`;
    case "arg":
      return `arg(${expr.index}, name=${expr.name})`;
    case "getattr":
      return `getattr(value=${expr.value.name}, attr=${expr.attr})`;
    case "build_tuple":
      return `build_tuple(items=[${expr.items.map((item) => item.name).join(", ")}])`;
    case "const":
      return `const(${Array.isArray(expr.value) ? `(${expr.value.join(", ")})` : String(expr.value)})`;
    case "var":
      return expr.var.name;
    case "unary":
      return `unary(fn=${expr.fn}, value=${expr.value.name})`;
    case "binop":
      return `${expr.lhs.name} ${expr.fn} ${expr.rhs.name}`;
    case "inplace_binop":
      return `${expr.lhs.name} ${expr.fn} ${expr.rhs.name}`;
    case "arrayexpr":
      return `arrayexpr(${formatTree(expr.tree)})`;
    case "cast":
      return `cast(value=${expr.value.name})`;
    case "call": {
      const args = expr.args.map((item) => item.name);
      const kws = expr.kws.map(([key, value]) => `${key}=${value.name}`);
      return `call ${expr.func.name}(${[...args, ...kws].join(", ")})`;
    }
    case "static_getitem":
      return `static_getitem(value=${expr.value.name}, index=${expr.index})`;
  }
}

export function formatInstruction(inst: Instruction): string {
  switch (inst.kind) {
    case "assign":
      return `${inst.target.name} = ${formatExpr(inst.value)}`;
    case "return":
      return `return ${inst.value.name}`;
    case "jump":
      return `jump ${inst.target}`;
    case "branch":
      return `branch ${inst.cond.name}, ${inst.truebr}, ${inst.falsebr}`;
    case "del":
      return `del ${inst.value}`;
  }
}

export function formatFunction(fn: FunctionIR): string {
  const lines = [`function ${fn.name}(${fn.argNames.join(", ")}):`];
  for (const block of fn.blocks.values()) {
    lines.push(`label ${block.label}:`);
    for (const inst of block.body) {
      lines.push(`    ${formatInstruction(inst)}`);
    }
  }
  return lines.join("\n");
}
