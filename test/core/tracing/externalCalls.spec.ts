// test/core/tracing/externalCalls.spec.ts
// Effects of opaque calls: registry lookup, locating splices, applied effects.

import { describe, expect, it } from "vitest";
import { DiagCodes } from "../../../src/core/diagnostic";
import { Timestamp } from "../../../src/core/model/timestamp";
import { createDefaultRegistry, locateSplice, NO_EFFECT } from "../../../src/core/tracing/externalCalls";
import { defined, runAll, testNotebook } from "../../helpers/flow";

describe("call effect registry", () => {
  it("looks up by callee, then method, then receiver kind, then the global default", () => {
    const reg = createDefaultRegistry();
    expect(reg.lookup("array", "push", Array.prototype.push).tag).toBe("PositionalSplice");
    expect(reg.lookup("array", "map", Array.prototype.map).tag).toBe("NoEffect");
    expect(reg.lookup("map", "set", Map.prototype.set).tag).toBe("KeyedUpsert");
    expect(reg.lookup("none", undefined, Math.sqrt).tag).toBe("NoEffect");
    expect(reg.lookup("object", "refresh", () => 1).tag).toBe("StandardMutation");
    expect(reg.lookup("object", "assign", Object.assign)).toEqual({ tag: "MutateArgs", positions: [0] });
  });

  it("lets a registered callee win over its method entry", () => {
    const reg = createDefaultRegistry();
    const push = Array.prototype.push;
    reg.registerFunction(push, { tag: "MutateReceiver" });
    expect(reg.lookup("array", "push", push).tag).toBe("MutateReceiver");
  });

  it("applies a receiver entry to that object only", () => {
    const reg = createDefaultRegistry();
    const plot = { show: () => undefined };
    const other = { show: () => undefined };
    reg.registerReceiverMethod(plot, "show", NO_EFFECT);
    expect(reg.lookup("module", "show", plot.show, plot).tag).toBe("NoEffect");
    expect(reg.lookup("module", "show", other.show, other).tag).toBe("StandardMutation");
    expect(reg.lookup("module", "figure", plot.show, plot).tag).toBe("StandardMutation");
  });
});

describe("receiver kinds", () => {
  it("treats a receiver loaded through a module binding as a module", () => {
    const nb = testNotebook();
    runAll(nb, [["a", "(import plot)"]]);
    const plot = defined(nb.session.symbol("plot"));
    const resolver = nb.session.resolver;
    const site = { callee: () => 1, method: "show", receiver: {}, args: [] };
    expect(resolver.receiverKindOf({ ...site, receiverSymbols: [plot] })).toBe("module");
    expect(resolver.receiverKindOf(site)).toBe("object");
    expect(resolver.receiverKindOf({ ...site, receiver: nb.modules.get("plot") })).toBe("module");
  });
});

describe("locateSplice", () => {
  it("normalizes like Array.prototype.splice", () => {
    expect(locateSplice([1, 2, 3], [1])).toEqual({ start: 1, deleteCount: 2, insertCount: 0 });
    expect(locateSplice([1, 2, 3], [-1, 1, "a", "b"])).toEqual({ start: 2, deleteCount: 1, insertCount: 2 });
    expect(locateSplice([1, 2, 3], [5, 2, "z"])).toEqual({ start: 3, deleteCount: 0, insertCount: 1 });
  });

  it("finds nothing when nothing changes", () => {
    expect(locateSplice([1, 2, 3], [0, 0])).toBeUndefined();
    expect(locateSplice([], [])).toBeUndefined();
  });
});

describe("resolved effects", () => {
  it("splices element symbols on a positional removal", () => {
    const nb = testNotebook();
    runAll(nb, [["a", "(define xs (list 10 20 30 40 50))"]]);
    const xs = nb.valueOf("xs");
    const ns = defined(nb.session.namespaceOf(xs), "namespace");
    const third = defined(ns.lookupElement(2));
    const fourth = defined(ns.lookupElement(3));
    const fifth = defined(ns.lookupElement(4));

    runAll(nb, [["b", "(.splice xs 2 1)"]]);
    expect(xs).toEqual([10, 20, 40, 50]);
    expect(third.tombstoned).toBe(true);
    expect(ns.lookupElement(2)).toBe(fourth);
    expect(fourth.value).toBe(40);
    expect(ns.lookupElement(3)).toBe(fifth);
    expect(fifth.value).toBe(50);
    expect(ns.lookupElement(4)).toBeUndefined();
    expect(defined(ns.lookupElement(0)).timestamp).toEqual(Timestamp.of(1, 0));
    expect(nb.session.symbol("xs")?.timestamp).toEqual(Timestamp.of(2, 0));
  });

  it("creates symbols for pushed elements from the arguments", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["a", "(define xs (list 1 2))"],
      ["b", "(define n 3)"],
      ["c", "(.push xs n)"],
    ]);
    const ns = defined(nb.session.namespaceOf(nb.valueOf("xs")));
    const pushed = defined(ns.lookupElement(2));
    expect(pushed.value).toBe(3);
    expect(pushed.timestamp).toEqual(Timestamp.of(3, 0));
    expect([...pushed.parents("dynamic").keys()]).toEqual([nb.session.symbol("n")]);
  });

  it("upserts and deletes keyed elements", () => {
    const nb = testNotebook();
    runAll(nb, [["a", '(define m (dict "a" 1))']]);
    const ns = defined(nb.session.namespaceOf(nb.valueOf("m")));
    const a = defined(ns.lookupElement("a"));
    runAll(nb, [
      ["b", '(.set m "b" 2)'],
      ["c", '(.delete m "a")'],
    ]);
    expect(defined(ns.lookupElement("b")).value).toBe(2);
    expect(defined(ns.lookupElement("b")).timestamp).toEqual(Timestamp.of(2, 0));
    expect(ns.lookupElement("a")).toBeUndefined();
    expect(a.tombstoned).toBe(true);
    expect(nb.session.symbol("m")?.timestamp).toEqual(Timestamp.of(3, 0));
  });

  it("applies the effects registered for each module", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["a", "(import plot)\n(import math)"],
      ["b", '(.figure plot "first")'],
      ["c", "(.show plot)"],
      ["d", "(define r (.sqrt math 16))"],
    ]);
    expect(nb.session.symbol("plot")?.timestamp).toEqual(Timestamp.of(2, 0));
    expect(nb.session.symbol("math")?.timestamp).toEqual(Timestamp.of(1, 1));
    expect(nb.valueOf("r")).toBe(4);
  });

  it("exempts a method only on the module instance it was registered for", () => {
    const nb = testNotebook();
    nb.modules.set("viz", { show: () => undefined });
    runAll(nb, [
      ["a", "(import plot)\n(import viz)"],
      ["b", "(.show plot)"],
      ["c", "(.show viz)"],
    ]);
    expect(nb.session.symbol("plot")?.timestamp).toEqual(Timestamp.of(1, 0));
    expect(nb.session.symbol("viz")?.timestamp).toEqual(Timestamp.of(3, 0));
  });

  it("runs a substitute in place of the callee", () => {
    const nb = testNotebook();
    const sqrt = nb.modules.get("math")?.sqrt;
    nb.session.resolver.registry.substitute(sqrt, () => 99);
    runAll(nb, [["a", "(import math)\n(define r (.sqrt math 16))"]]);
    expect(nb.valueOf("r")).toBe(99);
  });

  it("reports a failing handler and leaves the graph alone", () => {
    const reg = createDefaultRegistry();
    reg.registerMethod("array", "push", {
      tag: "PositionalSplice",
      locate: () => {
        throw new Error("bad locate");
      },
    });
    const nb = testNotebook({}, reg);
    runAll(nb, [
      ["a", "(define xs (list 1))"],
      ["b", "(.push xs 2)"],
    ]);
    expect(nb.valueOf("xs")).toEqual([1, 2]);
    expect(nb.session.symbol("xs")?.timestamp).toEqual(Timestamp.of(1, 0));
    const diag = defined(nb.session.diagnostics.find((d) => d.code === DiagCodes.HandlerFailed));
    expect(diag.message).toBe("effect handler for push failed: bad locate");
  });
});
