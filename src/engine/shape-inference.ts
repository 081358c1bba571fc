import { type ClassId, reversed, UNKNOWN_CLASS } from "../core/shape";
import {
  PreconditionViolationError,
  UnsupportedCallError,
  UnsupportedOperationError,
} from "./analysis-errors";
import { broadcastAndMatchShapes } from "./broadcast";
import { type AnalysisContext, isArrayVar, requireType } from "./context";
import { type Expr, listArrayExprVars, type Var } from "./ir";
import { namedCallCategory, TRANSPOSE_ATTR } from "./op-registry";

/**
 * Computes the shape-class vector an array-typed assignment produces.
 *
 * Throws `UnsupportedOperationError` for expressions without a rule; the
 * driver turns that into an unknown shape. Lookups of operands that were
 * never recorded throw `UnknownVariableError`, which is fatal.
 */
export class ShapeInferenceEngine {
  constructor(private readonly ctx: AnalysisContext) {}

  infer(target: Var, expr: Expr): ClassId[] {
    const { shapes, options } = this.ctx;
    switch (expr.op) {
      case "arg":
        return this.inferArg(expr.name);
      case "var":
        return shapes.lookup(expr.var.name);
      case "unary":
        if (!options.unaryOps.has(expr.fn)) {
          throw new UnsupportedOperationError("unary", `unary operator ${expr.fn} is not elementwise`);
        }
        return shapes.lookup(expr.value.name);
      case "binop":
        if (!options.binaryOps.has(expr.fn)) {
          throw new UnsupportedOperationError("binop", `binary operator ${expr.fn} is not elementwise`);
        }
        return this.broadcast([expr.lhs.name, expr.rhs.name]);
      case "inplace_binop":
        if (!options.binaryOps.has(expr.immutableFn)) {
          throw new UnsupportedOperationError(
            "inplace_binop",
            `binary operator ${expr.immutableFn} is not elementwise`,
          );
        }
        return this.broadcast([expr.lhs.name, expr.rhs.name]);
      case "arrayexpr":
        return this.broadcast(listArrayExprVars(expr.tree).map((item) => item.name));
      case "cast":
        return shapes.lookup(expr.value.name);
      case "getattr":
        if (expr.attr === TRANSPOSE_ATTR && isArrayVar(this.ctx, expr.value.name)) {
          return this.analyzeNamedCall("transpose", [expr.value.name]);
        }
        throw new UnsupportedOperationError("getattr", `attribute ${expr.attr} of ${expr.value.name}`);
      case "call":
        return this.inferCall(expr.func.name, expr.args.map((item) => item.name));
      case "global":
      case "const":
      case "build_tuple":
      case "static_getitem":
        throw new UnsupportedOperationError(expr.op, `${expr.op} producing array ${target.name}`);
      default: {
        const unreachable: never = expr;
        throw new Error(`unhandled expression ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Shape rules for array-math namespace functions and array methods. For a
   * method call the receiver is passed as the first argument.
   */
  analyzeNamedCall(callName: string, args: string[]): ClassId[] {
    const { shapes } = this.ctx;
    switch (namedCallCategory(callName)) {
      case "transpose":
        return reversed(shapes.lookup(argAt(args, 0, callName)));
      case "creation":
        return this.classesFromShapeArgs(args.slice(0, 1), callName);
      case "like":
        return shapes.lookup(argAt(args, 0, callName));
      case "reshape":
        // TODO: infer an elided (-1) dimension from the input's total size.
        return this.classesFromShapeArgs(args.slice(1), callName);
      case "dot":
        return this.inferDot(args, callName);
      case undefined:
        break;
    }
    if (this.ctx.options.ufuncs.has(callName)) {
      return this.broadcast(args);
    }
    throw new UnsupportedCallError(callName);
  }

  private inferArg(name: string): ClassId[] {
    const { shapes, classes } = this.ctx;
    const type = requireType(this.ctx, name);
    if (type.kind !== "array") {
      throw new PreconditionViolationError(`parameter ${name} is not an array`);
    }
    if (shapes.has(name)) {
      return shapes.lookup(name);
    }
    const shape: ClassId[] = [];
    for (let i = 0; i < type.ndim; i += 1) {
      shape.push(classes.allocate());
    }
    return shape;
  }

  private inferCall(func: string, args: string[]): ClassId[] {
    const { symbols, shapes } = this.ctx;
    if (symbols.mapCalls.has(func)) {
      const first = argAt(args, 0, func);
      // A scalar leading argument still broadcasts against the arrays after it.
      return isArrayVar(this.ctx, first) ? shapes.lookup(first) : this.broadcast(args);
    }
    const namespaceCall = symbols.arrayMathCalls.get(func);
    if (namespaceCall !== undefined) {
      return this.analyzeNamedCall(namespaceCall, args);
    }
    const attrCall = symbols.arrayAttrCalls.get(func);
    if (attrCall !== undefined) {
      return this.analyzeNamedCall(attrCall.method, [attrCall.receiver, ...args]);
    }
    throw new UnsupportedOperationError("call", `call target ${func} is not a recognized array call`);
  }

  /**
   * Matrix product: the last dimension of `a` and the contracted dimension of
   * `b` (its only one when 1-D, else its second to last) are proven equal,
   * unless either is unknown.
   */
  private inferDot(args: string[], callName: string): ClassId[] {
    if (args.length !== 2 && args.length !== 3) {
      throw new PreconditionViolationError(`${callName} expects 2 or 3 arguments, got ${args.length}`);
    }
    const { shapes, classes } = this.ctx;
    const [in1, in2] = args;
    const before1 = shapes.lookup(in1);
    const before2 = shapes.lookup(in2);
    const ndims1 = before1.length;
    const ndims2 = before2.length;
    if (ndims1 === 0 || ndims2 === 0) {
      throw new UnsupportedOperationError("call", `${callName} of a zero-dimensional array`);
    }
    const c1 = before1[ndims1 - 1];
    const c2 = ndims2 === 1 ? before2[0] : before2[ndims2 - 2];
    if (c1 !== UNKNOWN_CLASS && c2 !== UNKNOWN_CLASS) {
      classes.merge(c1, c2);
    }

    const shape1 = shapes.lookup(in1);
    const shape2 = shapes.lookup(in2);
    const out = shape1.slice(0, ndims1 - 1);
    for (let i = 0; i < ndims2 - 2; i += 1) {
      out.push(shape2[i]);
    }
    if (ndims2 > 1) {
      out.push(shape2[ndims2 - 1]);
    }
    return out;
  }

  /**
   * Classes for a shape given as one integer, one tuple, or (for the method
   * form of reshape) several integers. Each new class is backed by the value
   * that defines its length, when that value is known.
   */
  private classesFromShapeArgs(shapeArgs: string[], callName: string): ClassId[] {
    if (shapeArgs.length === 0) {
      throw new PreconditionViolationError(`${callName} called without a shape argument`);
    }
    if (shapeArgs.length === 1) {
      return this.classesFromShape(shapeArgs[0], callName);
    }
    return shapeArgs.map((item) => {
      if (requireType(this.ctx, item).kind !== "integer") {
        throw new UnsupportedOperationError("call", `${callName} shape element ${item} is not an integer`);
      }
      return this.backedClass({ name: item });
    });
  }

  private classesFromShape(shapeArg: string, callName: string): ClassId[] {
    const type = requireType(this.ctx, shapeArg);
    if (type.kind === "integer") {
      return [this.backedClass({ name: shapeArg })];
    }
    let count: number;
    if (type.kind === "unituple" && type.dtype.kind === "integer") {
      count = type.count;
    } else if (type.kind === "tuple" && type.items.every((item) => item.kind === "integer")) {
      count = type.items.length;
    } else {
      throw new UnsupportedOperationError("call", `${callName} shape argument ${shapeArg} is not an integer or integer tuple`);
    }
    const items = this.ctx.symbols.tupleTable.get(shapeArg);
    const out: ClassId[] = [];
    for (let i = 0; i < count; i += 1) {
      const item = items?.[i];
      // A negative literal is a placeholder, not a length.
      if (item === undefined || (typeof item === "number" && item < 0)) {
        out.push(this.ctx.classes.allocate());
      } else {
        out.push(this.backedClass(item));
      }
    }
    return out;
  }

  private backedClass(size: Var | number): ClassId {
    const c = this.ctx.classes.allocate();
    this.ctx.classes.setSizes(c, [size]);
    return c;
  }

  private broadcast(operands: string[]): ClassId[] {
    const { shapes, classes } = this.ctx;
    return broadcastAndMatchShapes(operands, (name) => isArrayVar(this.ctx, name), shapes, classes);
  }
}

function argAt(args: string[], index: number, callName: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new PreconditionViolationError(`${callName} is missing argument ${index}`);
  }
  return value;
}
