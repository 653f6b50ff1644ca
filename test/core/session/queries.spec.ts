// test/core/session/queries.spec.ts
// Per-symbol lookups: direct and transitive dependencies, timestamps and code.

import { describe, expect, it } from "vitest";
import { UnknownSymbolError } from "../../../src/core/errors";
import type { DataSymbol } from "../../../src/core/model/symbol";
import { Timestamp } from "../../../src/core/model/timestamp";
import type { ScriptNotebook } from "../../../src/host/notebook";
import { runAll, testNotebook } from "../../helpers/flow";

function chain(): ScriptNotebook {
  const nb = testNotebook();
  runAll(nb, [
    ["A", "(define x 1)"],
    ["B", "(define y (+ x 1))"],
    ["C", "(define z (* y 2))"],
  ]);
  return nb;
}

const names = (syms: DataSymbol[]) => syms.map((s) => s.readableName);

describe("symbol queries", () => {
  it("lists direct dependencies and users", () => {
    const s = chain().session;
    expect(names(s.deps("z"))).toEqual(["y"]);
    expect(names(s.users("x"))).toEqual(["y"]);
    expect(s.deps("x")).toEqual([]);
  });

  it("follows dependencies and users transitively", () => {
    const s = chain().session;
    expect(names(s.rdeps("z"))).toEqual(["x", "y"]);
    expect(names(s.rusers("x"))).toEqual(["y", "z"]);
    expect(s.rusers("z")).toEqual([]);
  });

  it("reports the timestamp and code behind a value", () => {
    const s = chain().session;
    expect(s.timestamp("y")).toEqual(Timestamp.of(2, 0));
    expect(s.code("z")).toBe("(define x 1)\n\n(define y (+ x 1))\n\n(define z (* y 2))");
    expect(s.code("y", { headers: true, comment: ";" })).toBe("; Cell 1\n(define x 1)\n\n; Cell 2\n(define y (+ x 1))");
  });

  it("rejects names nothing is bound to", () => {
    const s = chain().session;
    expect(() => s.deps("nope")).toThrow(UnknownSymbolError);
    expect(() => s.timestamp("nope")).toThrow("no tracked symbol: nope");
  });
});
