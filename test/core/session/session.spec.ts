// test/core/session/session.spec.ts
// Session registry, metadata, garbage collection and diagnostics.

import { afterEach, describe, expect, it } from "vitest";
import { mergeConfigs } from "../../../src/core/config";
import { infoDiag } from "../../../src/core/diagnostic";
import { SessionConflictError, TracerStateError } from "../../../src/core/errors";
import {
  activeSessions,
  closeAllSessions,
  closeSession,
  getSession,
  openSession,
} from "../../../src/core/session/registry";
import { ScriptNotebook } from "../../../src/host/notebook";
import { defined, runAll, testNotebook, testSession } from "../../helpers/flow";

const quiet = mergeConfigs({ log: { level: "silent" } });

describe("session registry", () => {
  afterEach(() => closeAllSessions());

  it("opens, finds and closes sessions by id", () => {
    const s = openSession({ id: "nb-1", config: quiet });
    expect(getSession("nb-1")).toBe(s);
    expect(activeSessions()).toEqual(["nb-1"]);
    expect(closeSession("nb-1")).toBe(true);
    expect(s.isClosed).toBe(true);
    expect(getSession("nb-1")).toBeUndefined();
    expect(closeSession("nb-1")).toBe(false);
  });

  it("refuses a second session under the same id", () => {
    openSession({ id: "nb-2", config: quiet });
    expect(() => openSession({ id: "nb-2", config: quiet })).toThrow("session already open: nb-2");
    expect(() => openSession({ id: "nb-2", config: quiet })).toThrow(SessionConflictError);
  });

  it("closes everything at once", () => {
    const a = openSession({ config: quiet });
    const b = openSession({ config: quiet });
    expect(a.id).not.toBe(b.id);
    closeAllSessions();
    expect(activeSessions()).toEqual([]);
    expect(a.isClosed && b.isClosed).toBe(true);
  });

  it("refuses queries once closed", () => {
    const s = openSession({ id: "nb-3", config: quiet });
    closeSession("nb-3");
    expect(() => s.check()).toThrow(TracerStateError);
  });
});

describe("metadata", () => {
  it("describes global symbols and cells", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define xs (list 1 2))\n(import math sqrt)"],
    ]);
    const meta = nb.session.metadata();
    expect(meta.symbols.x).toEqual({ type: "number", state: "fresh", timestamp: [1, 0], cell: 1 });
    expect(meta.symbols.xs?.type).toBe("number[]");
    expect(meta.symbols.sqrt).toEqual({
      type: "Function",
      state: "fresh",
      timestamp: [2, 1],
      cell: 2,
      importedModule: "math",
      importedName: "sqrt",
    });
    expect(meta.cells[1]).toEqual({ id: "A", position: 0, waiting: false, ready: false, unsafe: false });
    expect(meta.cells[2]?.id).toBe("B");
  });
});

describe("garbage collection", () => {
  it("drops deleted symbols nothing refers to", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define t 2)"],
      ["C", "(del! t)"],
    ]);
    expect(nb.session.collectGarbage()).toBe(1);
    expect(nb.session.allSymbols().map((s) => s.name)).toEqual(["x"]);
    expect(nb.session.collectGarbage()).toBe(0);
  });

  it("keeps collected locals out of later mutations of the same object", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define (f l) (.push l 1))"],
      ["B", "(define xs (list 0))"],
      ["C", "(f xs)"],
      ["D", "(define n 7)"],
    ]);
    const aliases = nb.session.identities.aliasesOf(nb.valueOf("xs"));
    expect([...aliases].map((s) => s.readableName)).toEqual(["xs"]);
    expect(nb.session.collectGarbage()).toBe(1);

    runAll(nb, [["E", "(.push xs n)"]]);
    const n = defined(nb.session.symbol("n"));
    const children = [...n.children("dynamic").keys()];
    expect(children.map((s) => s.readableName)).toEqual(["xs", "xs[2]"]);
    const live = nb.session.allSymbols();
    expect(children.every((s) => live.includes(s))).toBe(true);
  });
});

describe("diagnostics", () => {
  it("keeps only the newest entries and drains on request", () => {
    const s = testSession({ log: { maxDiagnostics: 2 } });
    s.report(infoDiag("I_ONE", "one"));
    s.report(infoDiag("I_TWO", "two"));
    s.report(infoDiag("I_THREE", "three"));
    expect(s.diagnostics.map((d) => d.code)).toEqual(["I_TWO", "I_THREE"]);
    expect(s.drainDiagnostics().map((d) => d.message)).toEqual(["two", "three"]);
    expect(s.diagnostics).toEqual([]);
  });
});

describe("cell bookkeeping", () => {
  it("keeps every execution and records output", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", '(print "hello" 42)'],
      ["A", "(define x 2)"],
    ]);
    const cells = nb.session.cells;
    expect(cells.executions().map((c) => c.counter)).toEqual([1, 2]);
    expect(cells.current("A")?.counter).toBe(2);
    expect(cells.atCounter(1)?.output.stdout).toBe("hello 42\n");
    expect(cells.atCounter(1)?.isCurrent).toBe(false);
  });

  it("tracks drafts until they run", () => {
    const nb = testNotebook();
    nb.setCell("A", "(define x 1)");
    expect(nb.session.cells.draft("A")?.text).toBe("(define x 1)");
    nb.run("A");
    expect(nb.session.cells.draft("A")).toBeUndefined();
    expect(nb.valueOf("x")).toBe(1);
    expect(nb.session.cells.isUnchanged("A", "(define x 1)")).toBe(true);
  });

  it("logs through the session's pino logger", () => {
    const s = testSession();
    const nb = new ScriptNotebook(s);
    expect(s.log.level).toBe("silent");
    expect(nb.session).toBe(s);
  });
});
