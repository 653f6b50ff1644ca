// src/host/reader.ts
// Reader for cell scripts: s-expressions, one top-level form per statement.

import { ReaderError } from "../core/errors";

export type Sym = { sym: string };

export type Datum = number | string | boolean | null | Sym | Datum[];

export const sym = (s: string): Sym => ({ sym: s });

export const isSym = (d: Datum): d is Sym => typeof d === "object" && d !== null && !Array.isArray(d) && "sym" in d;

export type Tok =
  | { tag: "LParen"; at: number }
  | { tag: "RParen"; at: number; end: number }
  | { tag: "Quote"; at: number }
  | { tag: "Str"; s: string; at: number; end: number }
  | { tag: "Atom"; s: string; at: number; end: number };

/** A top-level form with the exact source text it was read from. */
export type Form = {
  datum: Datum;
  text: string;
  start: number;
  end: number;
};

export function tokenize(src: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";

  while (i < src.length) {
    const c = src.charAt(i);

    // comments
    if (c === ";") {
      while (i < src.length && src.charAt(i) !== "\n") i++;
      continue;
    }

    if (isWS(c)) { i++; continue; }

    if (c === "(") { toks.push({ tag: "LParen", at: i }); i++; continue; }
    if (c === ")") { toks.push({ tag: "RParen", at: i, end: i + 1 }); i++; continue; }
    if (c === "'") { toks.push({ tag: "Quote", at: i }); i++; continue; }

    if (c === "\"") {
      const at = i;
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === "\"") { i++; closed = true; break; }
        if (d === "\\") {
          const e = src.charAt(i + 1);
          if (e === "n") { s += "\n"; i += 2; continue; }
          if (e === "t") { s += "\t"; i += 2; continue; }
          s += e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) throw new ReaderError("unterminated string", at);
      toks.push({ tag: "Str", s, at, end: i });
      continue;
    }

    // atom: read until whitespace or delimiter
    const at = i;
    let a = "";
    while (i < src.length) {
      const d = src.charAt(i);
      if (isWS(d) || d === "(" || d === ")" || d === "'" || d === ";" || d === "\"") break;
      a += d;
      i++;
    }
    toks.push({ tag: "Atom", s: a, at, end: i });
  }

  return toks;
}

export function readForms(src: string): Form[] {
  const toks = tokenize(src);
  const out: Form[] = [];
  let i = 0;

  function parseOne(): { datum: Datum; start: number; end: number } {
    const t = toks[i];
    if (!t) throw new ReaderError("unexpected end of input", src.length);

    if (t.tag === "Quote") {
      i++;
      const inner = parseOne();
      return { datum: [sym("quote"), inner.datum], start: t.at, end: inner.end };
    }

    if (t.tag === "LParen") {
      i++;
      const items: Datum[] = [];
      while (true) {
        const u = toks[i];
        if (!u) throw new ReaderError("missing ')'", t.at);
        if (u.tag === "RParen") {
          i++;
          return { datum: items, start: t.at, end: u.end };
        }
        items.push(parseOne().datum);
      }
    }

    if (t.tag === "RParen") {
      throw new ReaderError("unexpected ')'", t.at);
    }

    i++;
    if (t.tag === "Str") return { datum: t.s, start: t.at, end: t.end };
    return { datum: atom(t.s), start: t.at, end: t.end };
  }

  while (i < toks.length) {
    const { datum, start, end } = parseOne();
    out.push({ datum, text: src.slice(start, end), start, end });
  }
  return out;
}

function atom(s: string): Datum {
  if (s === "#t") return true;
  if (s === "#f") return false;
  if (s === "null") return null;
  if (/^-?\d+(\.\d+)?$/.test(s)) return Number(s);
  return sym(s);
}
