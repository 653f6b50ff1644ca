// src/host/refs.ts
// Syntactic reads and writes of each top-level form, so the engine can do
// liveness and static slicing before (and without) running a cell.

import type { StatementSource } from "../core/model/statement";
import { PRIM_NAMES } from "./prims";
import { type Datum, isSym, readForms } from "./reader";

export const SPECIAL_FORMS: ReadonlySet<string> = new Set([
  "define", "set!", "if", "begin", "lambda", "quote",
  "get", "attr", "set-item!", "set-attr!",
  "del!", "del-item!", "del-attr!", "import",
  "list", "dict", "record",
]);

/** Names no cell may bind. */
export const isReserved = (name: string): boolean => SPECIAL_FORMS.has(name) || PRIM_NAMES.has(name);

export type FormRefs = {
  reads: string[];
  writes: string[];
};

export type ParsedCell = {
  text: string;
  statements: StatementSource[];
  /** Parsed form of each statement, by index. */
  forms: Datum[];
};

export function parseCell(text: string): ParsedCell {
  const forms = readForms(text);
  const statements = forms.map((form): StatementSource => {
    const { reads, writes } = refsOf(form.datum);
    return { text: form.text, reads, writes, node: form.datum };
  });
  return { text, statements, forms: forms.map((f) => f.datum) };
}

export function refsOf(form: Datum): FormRefs {
  const reads = new Set<string>();
  const writes = new Set<string>();
  collect(form, new Set(), reads, writes, true);
  return { reads: [...reads], writes: [...writes] };
}

function headName(d: Datum[]): string | undefined {
  const [h] = d;
  return h !== undefined && isSym(h) ? h.sym : undefined;
}

function symNames(d: Datum | undefined): string[] {
  if (!Array.isArray(d)) return [];
  return d.flatMap((p) => (isSym(p) ? [p.sym] : []));
}

function collect(d: Datum, bound: ReadonlySet<string>, reads: Set<string>, writes: Set<string>, top: boolean): void {
  if (isSym(d)) {
    if (!bound.has(d.sym) && !isReserved(d.sym)) reads.add(d.sym);
    return;
  }
  if (!Array.isArray(d) || d.length === 0) return;

  const walk = (x: Datum | undefined, b: ReadonlySet<string> = bound) => {
    if (x !== undefined) collect(x, b, reads, writes, false);
  };
  const walkAll = (xs: Datum[], b: ReadonlySet<string> = bound) => xs.forEach((x) => walk(x, b));
  const bindTop = (name: string) => {
    if (top && !bound.has(name)) writes.add(name);
  };

  const head = headName(d);
  const rest = d.slice(1);

  switch (head) {
    case "quote":
      return;

    case "define": {
      const target = rest[0];
      if (Array.isArray(target)) {
        const [fname, ...params] = symNames(target);
        if (fname === undefined) return;
        bindTop(fname);
        walkAll(rest.slice(1), new Set([...bound, fname, ...params]));
        return;
      }
      if (target !== undefined && isSym(target)) bindTop(target.sym);
      walk(rest[1]);
      return;
    }

    case "set!": {
      const target = rest[0];
      if (target !== undefined && isSym(target)) bindTop(target.sym);
      walk(rest[1]);
      return;
    }

    case "del!": {
      const target = rest[0];
      if (target !== undefined && isSym(target)) bindTop(target.sym);
      return;
    }

    case "import": {
      const [mod, member] = rest;
      if (member !== undefined && isSym(member)) bindTop(member.sym);
      else if (mod !== undefined && isSym(mod)) bindTop(mod.sym);
      return;
    }

    case "lambda":
      walkAll(rest.slice(1), new Set([...bound, ...symNames(rest[0])]));
      return;

    // attribute names are literal
    case "attr":
    case "del-attr!":
      walk(rest[0]);
      return;

    case "set-attr!":
      walk(rest[0]);
      walk(rest[2]);
      return;

    case "record":
      rest.forEach((x, i) => {
        if (i % 2 === 1) walk(x);
      });
      return;

    default:
      // method call: (.name receiver args...)
      if (head !== undefined && head.startsWith(".") && head.length > 1) {
        walkAll(rest);
        return;
      }
      walkAll(head !== undefined && SPECIAL_FORMS.has(head) ? rest : d);
  }
}
