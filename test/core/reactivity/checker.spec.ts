// test/core/reactivity/checker.spec.ts
// Readiness and staleness per execution schedule and flow order.

import { describe, expect, it } from "vitest";
import type { PartialFlowConfig } from "../../../src/core/config";
import { runAll, testNotebook } from "../../helpers/flow";

/** A defines x, B reads x, C reads B's y; then A is rerun. */
function rerunUpstream(overrides: PartialFlowConfig) {
  const nb = testNotebook(overrides);
  runAll(nb, [
    ["A", "(define x 1)"],
    ["B", "(define y (+ x 1))"],
    ["C", "(define z (* y 2))"],
    ["A", "(define x 5)"],
  ]);
  return nb.session.check();
}

describe("readiness under each schedule", () => {
  it("dag: the direct child is ready and cells below it wait", () => {
    const res = rerunUpstream({ reactivity: { execSchedule: "dag_based" } });
    expect(res.readyCells).toEqual(["B"]);
    expect(res.newReadyCells).toEqual(["B"]);
    expect(res.waitingCells).toEqual(["C"]);
    expect(res.waiterLinks).toEqual({ C: ["B"] });
    expect(res.readyMakerLinks).toEqual({ B: ["C"] });
    expect(res.waitingSymbols).toEqual({ C: ["y"] });
  });

  it("liveness: readiness comes from fresher live symbols", () => {
    const res = rerunUpstream({ reactivity: { execSchedule: "liveness_based" } });
    expect(res.readyCells).toEqual(["B"]);
    expect(res.waitingCells).toEqual(["C"]);
    expect(res.waiterLinks).toEqual({ C: ["B"] });
  });

  it("strict: only staleness is reported", () => {
    const res = rerunUpstream({ reactivity: { execSchedule: "strict" } });
    expect(res.readyCells).toEqual([]);
    expect(res.newReadyCells).toEqual([]);
    expect(res.waitingCells).toEqual(["C"]);
  });

  it("hybrid: cells without parents fall back to liveness", () => {
    const draft = (schedule: "dag_based" | "hybrid_dag_liveness_based") => {
      const nb = testNotebook({ reactivity: { execSchedule: schedule } });
      runAll(nb, [["A", "(define x 1)"]]);
      nb.setCell("D", "(define w q)");
      return nb.session.check();
    };
    expect(draft("dag_based").waitingCells).toEqual([]);
    expect(draft("hybrid_dag_liveness_based").waitingCells).toEqual(["D"]);
  });

  it("highlights only executed cells unless asked for all", () => {
    const draft = (highlights: "all" | "executed" | "none") => {
      const nb = testNotebook({ reactivity: { execSchedule: "liveness_based", highlights } });
      runAll(nb, [["A", "(define x 1)"]]);
      nb.setCell("D", "(define w q)");
      return nb.session.check();
    };
    expect(draft("all").highlightedCells).toEqual(["D"]);
    expect(draft("executed").highlightedCells).toEqual([]);
    expect(draft("none").highlightedCells).toEqual([]);
    expect(draft("executed").waitingCells).toEqual(["D"]);
  });

  it("nothing is ready right after a clean top-to-bottom run", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
    ]);
    const res = nb.session.check();
    expect(res.readyCells).toEqual([]);
    expect(res.waitingCells).toEqual([]);
  });
});

describe("flow order", () => {
  const setup = (flowOrder: "in_order" | "any_order") => {
    const nb = testNotebook({ reactivity: { flowOrder } });
    nb.order(["A", "B", "C"]);
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(set! x 5)"],
    ]);
    return nb.session.check();
  };

  it("in_order: updates from a later cell make the reader unsafe-ordered, not ready", () => {
    const res = setup("in_order");
    expect(res.unsafeOrderCells).toEqual({ B: ["C"] });
    expect(res.unsafeOrderUsages).toEqual({ B: ["x"] });
    expect(res.readyCells).toEqual([]);
  });

  it("any_order: the later cell makes the reader ready", () => {
    const res = setup("any_order");
    expect(res.unsafeOrderCells).toEqual({});
    expect(res.readyCells).toEqual(["B"]);
    expect(res.newReadyCells).toEqual(["B"]);
  });
});

describe("reactive execution", () => {
  it("reruns the cells a run made ready, each once", () => {
    const nb = testNotebook({ reactivity: { execMode: "reactive" } });
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
      ["C", "(define z (* y 2))"],
    ]);
    const res = nb.run("A", "(define x 3)");
    expect(res.cascade).toEqual(["B", "C"]);
    expect(nb.valueOf("z")).toBe(8);
    expect(nb.session.symbol("z")?.state).toBe("fresh");
  });

  it("stays put in normal mode", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define y (+ x 1))"],
    ]);
    expect(nb.run("A", "(define x 3)").cascade).toEqual([]);
    expect(nb.valueOf("y")).toBe(2);
  });
});
