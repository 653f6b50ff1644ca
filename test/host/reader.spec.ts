// test/host/reader.spec.ts
// Reader spans and datum shapes.

import { describe, expect, it } from "vitest";
import { ReaderError } from "../../src/core/errors";
import { readForms, sym } from "../../src/host/reader";

describe("cell script reader", () => {
  it("reads one form per top-level expression with its exact text", () => {
    const src = "(define x 1) ; first\n  (define y\n    (+ x 2))";
    const forms = readForms(src);
    expect(forms.map((f) => f.text)).toEqual(["(define x 1)", "(define y\n    (+ x 2))"]);
    expect(forms[0]?.datum).toEqual([sym("define"), sym("x"), 1]);
    expect(forms[1]?.start).toBe(23);
  });

  it("reads atoms", () => {
    const [form] = readForms('(f #t #f null -2.5 "a\\nb" name)');
    expect(form?.datum).toEqual([sym("f"), true, false, null, -2.5, "a\nb", sym("name")]);
  });

  it("expands quote", () => {
    const [form] = readForms("'(1 2)");
    expect(form?.datum).toEqual([sym("quote"), [1, 2]]);
    expect(form?.text).toBe("'(1 2)");
  });

  it("rejects unbalanced input", () => {
    expect(() => readForms("(define x")).toThrow(ReaderError);
    expect(() => readForms("x)")).toThrow("unexpected ')' (at offset 1)");
    expect(() => readForms('"open')).toThrow("unterminated string (at offset 0)");
  });
});
