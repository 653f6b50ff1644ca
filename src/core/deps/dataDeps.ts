// src/core/deps/dataDeps.ts
// Statement-level data dependencies: "statement used a value produced by
// statement". This is the graph the slicer and the dag schedule walk.

import type { Timestamp } from "../model/timestamp";
import type { DepContext } from "./context";

type Adjacency = Map<string, Map<string, Timestamp>>;

const EMPTY: ReadonlySet<Timestamp> = new Set();

export class DataDepIndex {
  private readonly producers: Record<DepContext, Adjacency> = { dynamic: new Map(), static: new Map() };
  private readonly consumers: Record<DepContext, Adjacency> = { dynamic: new Map(), static: new Map() };

  /** Record that the statement at `usedAt` read a value written at `producedAt`. */
  add(ctx: DepContext, usedAt: Timestamp, producedAt: Timestamp): boolean {
    if (!producedAt.lt(usedAt)) return false;
    const fwd = link(this.producers[ctx], usedAt);
    if (fwd.has(producedAt.key)) return false;
    fwd.set(producedAt.key, producedAt);
    link(this.consumers[ctx], producedAt).set(usedAt.key, usedAt);
    return true;
  }

  producersOf(ctx: DepContext, ts: Timestamp): ReadonlySet<Timestamp> {
    return valuesOf(this.producers[ctx], ts);
  }

  consumersOf(ctx: DepContext, ts: Timestamp): ReadonlySet<Timestamp> {
    return valuesOf(this.consumers[ctx], ts);
  }

  edgeCount(ctx: DepContext): number {
    let n = 0;
    for (const row of this.producers[ctx].values()) n += row.size;
    return n;
  }

  clear(): void {
    for (const ctx of ["dynamic", "static"] as const) {
      this.producers[ctx].clear();
      this.consumers[ctx].clear();
    }
  }
}

function valuesOf(adj: Adjacency, ts: Timestamp): ReadonlySet<Timestamp> {
  const row = adj.get(ts.key);
  return row === undefined ? EMPTY : new Set(row.values());
}

function link(adj: Adjacency, key: Timestamp): Map<string, Timestamp> {
  let row = adj.get(key.key);
  if (row === undefined) {
    row = new Map();
    adj.set(key.key, row);
  }
  return row;
}
