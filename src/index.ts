export * from "./engine";
export {
  canonicalizeShapes,
  type ClassId,
  SIZE_ONE_CLASS,
  shapesEqual,
  UNKNOWN_CLASS,
} from "./core/shape";
