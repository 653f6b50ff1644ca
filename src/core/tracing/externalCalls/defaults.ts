// src/core/tracing/externalCalls/defaults.ts
// Built-in effects for JavaScript containers and common host functions.

import type { SpliceRange } from "../../model/namespace";
import { CallEffectRegistry } from "./registry";
import { type CallEffect, MUTATE_RECEIVER, NO_EFFECT, type SpliceLocator, STANDARD_MUTATION } from "./types";

const splice = (locate: SpliceLocator): CallEffect => ({ tag: "PositionalSplice", locate });

const toInt = (x: unknown, fallback: number): number => {
  const n = typeof x === "number" ? x : Number(x);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
};

/** Array.prototype.splice argument normalization. */
export function locateSplice(receiver: readonly unknown[], args: readonly unknown[]): SpliceRange | undefined {
  const len = receiver.length;
  if (args.length === 0) return undefined;
  const rel = toInt(args[0], 0);
  const start = rel < 0 ? Math.max(len + rel, 0) : Math.min(rel, len);
  const deleteCount = args.length < 2 ? len - start : Math.min(Math.max(toInt(args[1], 0), 0), len - start);
  const insertCount = Math.max(args.length - 2, 0);
  if (deleteCount === 0 && insertCount === 0) return undefined;
  return { start, deleteCount, insertCount };
}

const ARRAY_METHODS: Record<string, CallEffect> = {
  push: splice((recv, args) => (args.length ? { start: recv.length, deleteCount: 0, insertCount: args.length } : undefined)),
  pop: splice((recv) => (recv.length ? { start: recv.length - 1, deleteCount: 1, insertCount: 0 } : undefined)),
  shift: splice((recv) => (recv.length ? { start: 0, deleteCount: 1, insertCount: 0 } : undefined)),
  unshift: splice((_recv, args) => (args.length ? { start: 0, deleteCount: 0, insertCount: args.length } : undefined)),
  splice: splice(locateSplice),
  sort: MUTATE_RECEIVER,
  reverse: MUTATE_RECEIVER,
  fill: MUTATE_RECEIVER,
  copyWithin: MUTATE_RECEIVER,
};

const ARRAY_PURE = [
  "at", "concat", "entries", "every", "filter", "find", "findIndex", "flat", "flatMap", "forEach",
  "includes", "indexOf", "join", "keys", "lastIndexOf", "map", "reduce", "slice", "some", "values",
];

const MAP_METHODS: Record<string, CallEffect> = {
  set: { tag: "KeyedUpsert" },
  delete: { tag: "KeyedDelete" },
  clear: { tag: "ClearElements" },
  get: NO_EFFECT,
  has: NO_EFFECT,
  keys: NO_EFFECT,
  values: NO_EFFECT,
  entries: NO_EFFECT,
  forEach: NO_EFFECT,
};

const SET_METHODS: Record<string, CallEffect> = {
  add: MUTATE_RECEIVER,
  delete: MUTATE_RECEIVER,
  clear: MUTATE_RECEIVER,
  has: NO_EFFECT,
  values: NO_EFFECT,
  forEach: NO_EFFECT,
};

/**
 * Registry preloaded with container effects. Free functions default to no
 * effect; method calls on objects and modules fall through to the standard
 * mutation rule.
 */
export function createDefaultRegistry(): CallEffectRegistry {
  const reg = new CallEffectRegistry(STANDARD_MUTATION);

  for (const [m, effect] of Object.entries(ARRAY_METHODS)) reg.registerMethod("array", m, effect);
  for (const m of ARRAY_PURE) reg.registerMethod("array", m, NO_EFFECT);
  for (const [m, effect] of Object.entries(MAP_METHODS)) reg.registerMethod("map", m, effect);
  for (const [m, effect] of Object.entries(SET_METHODS)) reg.registerMethod("set", m, effect);

  reg.setKindDefault("none", NO_EFFECT);
  reg.setKindDefault("primitive", NO_EFFECT);
  reg.setKindDefault("function", NO_EFFECT);

  reg.registerFunction(Object.assign, { tag: "MutateArgs", positions: [0] });
  for (const fn of [console.log, console.info, console.warn, console.error, console.debug]) {
    reg.registerFunction(fn, NO_EFFECT);
  }
  reg.registerFunction(JSON.stringify, NO_EFFECT);

  return reg;
}
