// test/host/notebook.spec.ts
// Cell script notebook: runs, cascades, imports and slices.

import { describe, expect, it } from "vitest";
import { ScriptNotebook } from "../../src/host/notebook";
import { runAll, testNotebook, testSession } from "../helpers/flow";

describe("script notebook", () => {
  it("runs recursive definitions", () => {
    const nb = testNotebook();
    runAll(nb, [["A", "(define (fact n) (if (< n 2) 1 (* n (fact (- n 1)))))\n(define r (fact 5))"]]);
    expect(nb.valueOf("r")).toBe(120);
  });

  it("rebinds a global from inside a function", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define count 0)\n(define (bump) (set! count (+ count 1)))"],
      ["B", "(bump)\n(bump)"],
    ]);
    expect(nb.valueOf("count")).toBe(2);
    expect(nb.session.symbol("count")?.timestamp.toString()).toBe("2:1");
  });

  it("edits lists in place", () => {
    const nb = testNotebook();
    const res = nb.run("A", "(define xs (list 1 2 3))\n(del-item! xs 0)\n(.push xs 9)\n(get xs -1)");
    expect(res.error).toBeUndefined();
    expect(res.value).toBe(9);
    expect(nb.valueOf("xs")).toEqual([2, 3, 9]);
  });

  it("reads and writes record attributes", () => {
    const nb = testNotebook();
    const res = nb.run("A", "(define p (record w 2 h 3))\n(set-attr! p w 5)\n(* (attr p w) (attr p h))");
    expect(res.value).toBe(15);
  });

  it("hands closures to native methods", () => {
    const nb = testNotebook();
    runAll(nb, [["A", "(define ys (.map (list 1 2 3) (lambda (v) (* v 10))))"]]);
    expect(nb.valueOf("ys")).toEqual([10, 20, 30]);
  });

  it("calls imported module members", () => {
    const nb = testNotebook();
    expect(nb.run("A", "(import math)\n(.sqrt math 16)").value).toBe(4);
    expect(nb.run("B", "(import math floor)\n(floor 2.7)").value).toBe(2);
    expect(nb.run("C", "(.toUpperCase \"hi\")").value).toBe("HI");
  });

  it("captures printed output per execution", () => {
    const nb = testNotebook();
    runAll(nb, [["A", '(define d (dict "a" 1 "b" 2))\n(print d (get d "b") (len d))\n(print (str "n=" 3) #t null)']]);
    expect(nb.session.cells.current("A")?.output.stdout).toBe("{a: 1, b: 2} 2 2\nn=3 #t null\n");
  });

  it("stops a cell at the first failing statement", () => {
    const nb = testNotebook();
    const res = nb.run("A", "(define a 1)\n(define b q)\n(define c 3)");
    expect(res.error).toBe("unbound name: q");
    expect(nb.valueOf("a")).toBe(1);
    expect(nb.valueOf("c")).toBeUndefined();
    expect(nb.session.cells.current("A")?.output.stderr).toBe("unbound name: q\n");
  });

  it("reports evaluation errors", () => {
    const nb = testNotebook();
    expect(nb.run("A", "(define + 1)").error).toBe("cannot bind reserved name +");
    expect(nb.run("B", "(/ 1 0)").error).toBe("/: division by zero");
    expect(nb.run("C", "(import nope)").error).toBe("import: no module named nope");
    expect(nb.run("D", "(import math cube)").error).toBe("import: math has no member cube");
    expect(nb.run("E", "(define (f a) a)\n(f 1 2)").error).toBe("f: expected 1 arguments, got 2");
  });

  it("bounds recursion depth", () => {
    const nb = new ScriptNotebook(testSession(), { maxDepth: 10 });
    const res = nb.run("A", "(define (spin n) (spin (+ n 1)))\n(spin 0)");
    expect(res.error).toBe("spin: maximum call depth exceeded");
  });

  it("renders a slice as runnable script text", () => {
    const nb = testNotebook();
    runAll(nb, [
      ["A", "(define x 1)"],
      ["B", "(define noise 7)"],
      ["C", "(define y (+ x 1))"],
    ]);
    expect(nb.slice("y")).toBe("; Cell 1\n(define x 1)\n\n; Cell 3\n(define y (+ x 1))");
  });
});
