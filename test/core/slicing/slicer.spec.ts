// test/core/slicing/slicer.spec.ts
// Backward and forward slices over dynamic and static edges.

import { describe, expect, it } from "vitest";
import { SliceTargetNotFoundError } from "../../../src/core/errors";
import { Timestamp } from "../../../src/core/model/timestamp";
import type { FlowSession } from "../../../src/core/session/session";
import { runAll, testNotebook } from "../../helpers/flow";

function expectNoFutureDependencies(session: FlowSession): void {
  for (const sym of session.allSymbols()) {
    for (const ctx of ["dynamic", "static"] as const) {
      for (const usage of sym.usages(ctx)) {
        expect(usage.valueTimestamp.lte(usage.usedAt)).toBe(true);
      }
    }
  }
}

describe("backward slices", () => {
  it("keeps only the statements a value came from", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define a 1)\n(define b 2)"],
      ["B", "(define c (+ a 1))"],
      ["C", "(define d 10)"],
    ]);
    const slice = nb.session.slice("c");
    expect(slice.timestamps).toEqual([Timestamp.of(1, 0), Timestamp.of(2, 0)]);
    expect(slice.cellCounters()).toEqual([1, 2]);
    expect(nb.slice("c")).toBe("; Cell 1\n(define a 1)\n\n; Cell 2\n(define c (+ a 1))");
    expectNoFutureDependencies(nb.session);
  });

  it("follows calls into user functions", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define (double v) (* v 2))"],
      ["B", "(define k 4)"],
      ["C", "(define unrelated 0)"],
      ["D", "(define r (double k))"],
    ]);
    expect(nb.valueOf("r")).toBe(8);
    expect(nb.session.slice("r").statements.map((s) => s.text)).toEqual([
      "(define (double v) (* v 2))",
      "(define k 4)",
      "(define r (double k))",
    ]);
    expectNoFutureDependencies(nb.session);
  });

  it("includes in-place mutations of a container", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define xs (list 1 2))"],
      ["B", "(define n 3)"],
      ["C", "(.push xs n)"],
      ["D", "(define total (len xs))"],
    ]);
    expect(nb.valueOf("total")).toBe(3);
    expect(nb.session.slice("total").statements.map((s) => s.text)).toEqual([
      "(define xs (list 1 2))",
      "(define n 3)",
      "(.push xs n)",
      "(define total (len xs))",
    ]);
  });

  it("slices an earlier value with `at`", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["A", "(define x (+ 2 3))"],
    ]);
    expect(nb.session.slice("x").statements.map((s) => s.text)).toEqual(["(define x (+ 2 3))"]);
    expect(nb.session.slice("x", { at: Timestamp.of(2, 0) }).statements.map((s) => s.text)).toEqual(["(define x 1)"]);
  });

  it("falls back to static edges when dynamic slicing is off", () => {
    const nb = testNotebook({ slicing: { dynamicEnabled: false } });
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define w 7)"],
      ["C", "(define y (+ x 1))"],
    ]);
    expect(nb.session.slice("y").statements.map((s) => s.text)).toEqual(["(define x 1)", "(define y (+ x 1))"]);
  });

  it("throws for a name that was never traced", () => {
    const nb = testNotebook();
    expect(() => nb.session.slice("ghost")).toThrow(SliceTargetNotFoundError);
  });
});

describe("forward slices and cell seeds", () => {
  it("walks consumers forward", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(define z 10)"],
    ]);
    const forward = nb.session.slice("x", { direction: "forward" });
    expect(forward.statements.map((s) => s.text)).toEqual(["(define x 1)", "(define y (+ x 1))"]);
  });

  it("seeds from whole cells", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define p 2)"],
      ["C", "(define y (+ x 1))\n(define q 5)"],
    ]);
    expect(nb.session.sliceCells([3]).statements.map((s) => s.text)).toEqual([
      "(define x 1)",
      "(define y (+ x 1))",
      "(define q 5)",
    ]);
    expect(() => nb.session.sliceCells([9])).toThrow("cell 9");
  });
});

describe("slice soundness", () => {
  it("reproduces the value when the slice is run on its own", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)\n(define noise 99)"],
      ["B", "(define xs (list x 2))"],
      ["C", "(.push xs 3)"],
      ["D", "(define y (+ (get xs 0) (len xs)))"],
    ]);
    expect(nb.valueOf("y")).toBe(4);

    const replay = testNotebook();
    runAll(replay, [["S", nb.slice("y")]]);
    expect(replay.valueOf("y")).toBe(4);
    expect(replay.valueOf("noise")).toBeUndefined();
  });

  it("slicing the replayed slice gives back the same statements", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define unused 5)"],
      ["C", "(define y (+ x 1))"],
    ]);
    const first = nb.session.slice("y").statements.map((s) => s.text);

    const replay = testNotebook();
    runAll(replay, [["S", nb.slice("y")]]);
    const second = replay.session.slice("y").statements.map((s) => s.text);
    expect(second).toEqual(first);
    expect(nb.session.slice("y").statements.map((s) => s.text)).toEqual(first);
  });
});
