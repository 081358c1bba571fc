/**
 * Op Shape Registry: static configuration for every operation the array
 * analysis recognizes.
 *
 * Categories for array-math calls:
 * - "transpose" : output reverses the input's dimensions
 * - "creation"  : output shape comes from an integer or tuple shape argument
 * - "like"      : output shape copies the first argument
 * - "reshape"   : output shape comes from the second (shape) argument
 * - "dot"       : matrix product, contracted dimensions are proven equal
 *
 * Universal functions (broadcast over all arguments) live in ufuncs.json.
 */

import ufuncData from "./ufuncs.json";

export type NamedCallCategory =
  | "transpose"
  | "creation"
  | "like"
  | "reshape"
  | "dot";

export const NAMED_CALL_RULES: Readonly<Record<string, NamedCallCategory>> = {
  transpose: "transpose",

  empty: "creation",
  zeros: "creation",
  ones:  "creation",

  empty_like: "like",
  zeros_like: "like",
  ones_like:  "like",

  reshape: "reshape",

  dot: "dot",
};

export function namedCallCategory(name: string): NamedCallCategory | undefined {
  return Object.hasOwn(NAMED_CALL_RULES, name) ? NAMED_CALL_RULES[name] : undefined;
}

/** Unary operators that act elementwise on arrays. */
export const UNARY_MAP_OPS: ReadonlySet<string> = new Set(["+", "-", "~"]);

/** Binary operators that act elementwise (with broadcasting) on arrays. */
export const BINARY_MAP_OPS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "/?",
  "//",
  "%",
  "**",
  "<<",
  ">>",
  "&",
  "|",
  "^",
  "==",
  "!=",
  "<",
  "<=",
  ">",
  ">=",
]);

export const UFUNC_NAMES: ReadonlySet<string> = new Set(ufuncData.ufuncs);

/** Module name whose attribute accesses resolve to array-math calls. */
export const ARRAY_MATH_MODULE = "numpy";

/** Attribute on an array that denotes its transpose. */
export const TRANSPOSE_ATTR = "T";

/** Attribute on an array holding its runtime shape tuple. */
export const SHAPE_ATTR = "shape";
