import { describe, expect, it } from "vitest";

import {
  arg,
  arrayExpr,
  assign,
  binop,
  call,
  globalRef,
  getattr,
  staticGetitem,
  v,
} from "../src/engine/ir-builder";
import { formatExpr, formatFunction } from "../src/engine/ir-format";
import { makeFunction } from "./helpers/ir";

describe("IR printer", () => {
  it("prints blocks in stored order with indented instructions", () => {
    const fn = makeFunction(
      [
        [
          assign("a", arg(0, "a")),
          assign("$np", globalRef("np", { kind: "module", name: "numpy" })),
          assign("$dot", getattr("$np", "dot")),
          assign("c", call("$dot", ["a", "a"])),
          { kind: "jump", target: 1 },
        ],
        [{ kind: "return", value: v("c") }],
      ],
      ["a"],
    );

    expect(formatFunction(fn)).toBe(
      [
        "function test_fn(a):",
        "label 0:",
        "    a = arg(0, name=a)",
        "    $np = global(np: numpy)",
        "    $dot = getattr(value=$np, attr=dot)",
        "    c = call $dot(a, a)",
        "    jump 1",
        "label 1:",
        "    return c",
      ].join("\n"),
    );
  });

  it("prints fused trees and static indexing", () => {
    const tree = arrayExpr({
      kind: "op",
      fn: "+",
      operands: [
        { kind: "leaf", var: v("a") },
        { kind: "op", fn: "*", operands: [{ kind: "leaf", var: v("b") }, { kind: "const", value: 2 }] },
      ],
    });
    expect(formatExpr(tree)).toBe("arrayexpr((a + (b * 2)))");
    expect(formatExpr(binop("+", "a", "b"))).toBe("a + b");
    expect(formatExpr(staticGetitem("t", 1, null))).toBe("static_getitem(value=t, index=1)");
    expect(formatExpr(call("f", ["x"], [["axis", "k"]]))).toBe("call f(x, axis=k)");
  });
});
