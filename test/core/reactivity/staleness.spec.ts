// test/core/reactivity/staleness.spec.ts
// Waiting and unsafe propagation after a cell completes.

import { describe, expect, it } from "vitest";
import { DiagCodes } from "../../../src/core/diagnostic";
import { runAll, testNotebook } from "../../helpers/flow";

describe("update propagation", () => {
  it("marks a dependent waiting until it is recomputed", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
    ]);
    expect(nb.session.symbol("y")?.state).toBe("fresh");

    runAll(nb, [["A", "(define x 10)"]]);
    const y = nb.session.symbol("y");
    expect(y?.state).toBe("waiting");
    expect(y?.fresherAncestors).toEqual([nb.session.symbol("x")]);
    expect(y?.requiredTimestamp.toString()).toBe("3:0");

    runAll(nb, [["B", "(define y (+ x 1))"]]);
    expect(y?.state).toBe("fresh");
    expect(nb.valueOf("y")).toBe(11);
  });

  it("propagates through a chain", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(define z (* y 2))"],
      ["A", "(define x 2)"],
    ]);
    expect(nb.session.symbol("z")?.state).toBe("waiting");
  });

  it("leaves alone what was recomputed later in the same run", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define x 2)\n(define y (+ x 1))"],
    ]);
    expect(nb.session.symbol("y")?.state).toBe("fresh");
  });

  it("marks a container waiting when an element is", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define xs (list x 5))"],
      ["A", "(define x 2)"],
    ]);
    const xs = nb.session.symbol("xs");
    expect(xs?.isShallowWaiting).toBe(true);
    expect(xs?.state).toBe("waiting");
  });

  it("marks dependents of a deleted name unsafe", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(del! x)"],
    ]);
    expect(nb.session.symbol("x")).toBeUndefined();
    expect(nb.session.symbol("y")?.state).toBe("unsafe");
    expect(nb.session.symbol("y")?.unsafeReason).toBe("missing-ancestor");
    const diag = nb.session.diagnostics.find((d) => d.code === DiagCodes.MissingAncestor);
    expect(diag?.message).toBe("y depends on deleted x");
  });

  it("can mark values computed from waiting data unsafe", () => {
    const nb = testNotebook({ safety: { markWaitingUsagesUnsafe: true } });
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["A", "(define x 2)"],
      ["C", "(define z (* y 2))"],
    ]);
    expect(nb.session.symbol("z")?.unsafeReason).toBe("unresolved-dependency");
    expect(nb.session.check().unsafeCells).toEqual(["C"]);
  });
});

describe("queued re-runs", () => {
  it("skips dependents whose cell is queued after the updating cell", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(define z (* y 2))"],
    ]);
    nb.session.scheduler.schedule(["B"]);
    runAll(nb, [["A", "(define x 2)"]]);
    expect(nb.session.symbol("y")?.state).toBe("fresh");
    expect(nb.session.symbol("z")?.state).toBe("fresh");

    nb.session.scheduler.schedule([]);
    runAll(nb, [["A", "(define x 3)"]]);
    expect(nb.session.symbol("y")?.state).toBe("waiting");
  });

  it("still marks a queued cell that sits above the updater in notebook order", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
    ]);
    nb.order(["B", "A"]);
    nb.session.scheduler.schedule(["B"]);
    runAll(nb, [["A", "(define x 2)"]]);
    expect(nb.session.symbol("y")?.state).toBe("waiting");
  });

  it("ignores notebook order under any_order", () => {
    const nb = testNotebook({ reactivity: { flowOrder: "any_order" } });
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
    ]);
    nb.order(["B", "A"]);
    nb.session.scheduler.schedule(["B"]);
    runAll(nb, [["A", "(define x 2)"]]);
    expect(nb.session.symbol("y")?.state).toBe("fresh");
  });

  it("runs a batch with later cells queued", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(define z (* y 2))"],
    ]);
    nb.setCell("A", "(define x 5)");
    const results = nb.runCells(["A", "B"]);
    expect(results.map((r) => r.cell.id)).toEqual(["A", "B"]);
    expect(nb.valueOf("y")).toBe(6);
    expect(nb.session.symbol("y")?.state).toBe("fresh");
    expect(nb.session.symbol("z")?.state).toBe("waiting");
    expect(nb.session.scheduler.scheduled).toEqual([]);
  });
});
