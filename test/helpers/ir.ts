import type { CallTypeMap, FunctionIR, Instruction, StaticType, TypeMap } from "../../src/engine/ir";

export function makeFunction(bodies: Instruction[][], argNames: string[] = []): FunctionIR {
  const blocks = new Map(bodies.map((body, label) => [label, { label, body }]));
  return { name: "test_fn", argNames, blocks };
}

export function makeTypes(entries: Record<string, StaticType>): TypeMap {
  return new Map(Object.entries(entries));
}

export function makeCallTypes(): CallTypeMap {
  return new Map();
}

/** Body of the block with `label`, failing loudly if it is missing. */
export function bodyOf(fn: FunctionIR, label = 0): Instruction[] {
  const block = fn.blocks.get(label);
  if (!block) {
    throw new Error(`Expected block ${label}`);
  }
  return block.body;
}

/** Target names of every assignment in a block, in order. */
export function assignedNames(fn: FunctionIR, label = 0): string[] {
  return bodyOf(fn, label).flatMap((inst) => (inst.kind === "assign" ? [inst.target.name] : []));
}
