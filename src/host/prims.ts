// src/host/prims.ts
// Primitive procedures of the cell script language.

import { HostEvalError } from "../core/errors";

export type PrimFn = (...args: unknown[]) => unknown;

export const PRIM_NAMES: ReadonlySet<string> = new Set([
  "+", "-", "*", "/", "mod", "=", "<", ">", "<=", ">=", "not", "len", "str", "print",
]);

function num(name: string, x: unknown): number {
  if (typeof x !== "number") throw new HostEvalError(`${name}: expected a number, got ${show(x)}`);
  return x;
}

function nums(name: string, xs: unknown[]): number[] {
  return xs.map((x) => num(name, x));
}

function compare(name: string, test: (a: number, b: number) => boolean): PrimFn {
  return (...args) => {
    const ns = nums(name, args);
    for (let i = 1; i < ns.length; i++) {
      const a = ns[i - 1];
      const b = ns[i];
      if (a === undefined || b === undefined || !test(a, b)) return false;
    }
    return true;
  };
}

/** Printed form of a value, as `print` and `str` render it. */
export function show(v: unknown): string {
  if (v === null || v === undefined) return "null";
  if (v === true) return "#t";
  if (v === false) return "#f";
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  if (Array.isArray(v)) return `(${v.map(show).join(" ")})`;
  if (v instanceof Map) return `{${[...v].map(([k, x]) => `${show(k)}: ${show(x)}`).join(", ")}}`;
  if (typeof v === "function") return "#<procedure>";
  if (typeof v === "object") {
    return `{${Object.entries(v).map(([k, x]) => `${k}: ${show(x)}`).join(", ")}}`;
  }
  return String(v);
}

export function createPrims(print: (line: string) => void): Map<string, PrimFn> {
  const prims = new Map<string, PrimFn>();

  prims.set("+", (...args) => nums("+", args).reduce((a, b) => a + b, 0));
  prims.set("*", (...args) => nums("*", args).reduce((a, b) => a * b, 1));
  prims.set("-", (...args) => {
    const [first, ...more] = nums("-", args);
    if (first === undefined) throw new HostEvalError("-: expected at least one argument");
    return more.length === 0 ? -first : more.reduce((a, b) => a - b, first);
  });
  prims.set("/", (...args) => {
    const [first, ...more] = nums("/", args);
    if (first === undefined) throw new HostEvalError("/: expected at least one argument");
    return more.reduce((a, b) => {
      if (b === 0) throw new HostEvalError("/: division by zero");
      return a / b;
    }, first);
  });
  prims.set("mod", (a, b) => {
    const d = num("mod", b);
    if (d === 0) throw new HostEvalError("mod: division by zero");
    return num("mod", a) % d;
  });

  prims.set("=", (...args) => args.every((x) => x === args[0]));
  prims.set("<", compare("<", (a, b) => a < b));
  prims.set(">", compare(">", (a, b) => a > b));
  prims.set("<=", compare("<=", (a, b) => a <= b));
  prims.set(">=", compare(">=", (a, b) => a >= b));
  prims.set("not", (x) => x === false || x === null || x === undefined);

  prims.set("len", (x) => {
    if (typeof x === "string" || Array.isArray(x)) return x.length;
    if (x instanceof Map || x instanceof Set) return x.size;
    throw new HostEvalError(`len: no length for ${show(x)}`);
  });
  prims.set("str", (...args) => args.map(show).join(""));
  prims.set("print", (...args) => {
    print(args.map(show).join(" "));
    return null;
  });

  return prims;
}
