// src/core/slicing/slicer.ts
// Reachability over the statement-level data dependency index.

import type { Logger } from "pino";
import type { FlowConfig } from "../config";
import type { DepContext } from "../deps/context";
import type { DataDepIndex } from "../deps/dataDeps";
import { SliceTargetNotFoundError } from "../errors";
import type { CellRegistry } from "../model/cell";
import type { Scope } from "../model/scope";
import type { Statement } from "../model/statement";
import { DataSymbol } from "../model/symbol";
import type { Timestamp } from "../model/timestamp";
import { Slice } from "./slice";

export type SliceDirection = "backward" | "forward";

export type SliceOptions = {
  direction?: SliceDirection;
  /** Edge sets to walk; defaults to whatever slicing the config enables. */
  contexts?: readonly DepContext[];
  /** Slice the value the target had at this point instead of its latest one. */
  at?: Timestamp;
};

export interface SliceContext {
  readonly config: FlowConfig;
  readonly cells: CellRegistry;
  readonly dataDeps: DataDepIndex;
  readonly globalScope: Scope;
}

export class Slicer {
  constructor(
    private readonly ctx: SliceContext,
    private readonly log: Logger,
  ) {}

  sliceSymbol(target: DataSymbol | string, opts: SliceOptions = {}): Slice {
    const sym = target instanceof DataSymbol ? target : this.ctx.globalScope.lookup(target);
    const label = typeof target === "string" ? target : target.readableName;
    if (sym === undefined) throw new SliceTargetNotFoundError(label);
    const seed = opts.at === undefined ? sym.timestamp : sym.valueTimestampAt(opts.at);
    if (!seed.isInitialized) throw new SliceTargetNotFoundError(label);
    return this.sliceTimestamps([seed], opts);
  }

  /** Slice seeded with every statement of the given cell executions. */
  sliceCells(counters: readonly number[], opts: SliceOptions = {}): Slice {
    const seeds: Timestamp[] = [];
    for (const counter of counters) {
      const cell = this.ctx.cells.atCounter(counter);
      if (cell === undefined) throw new SliceTargetNotFoundError(`cell ${counter}`);
      for (const stmt of cell.statements) seeds.push(stmt.timestamp);
    }
    return this.sliceTimestamps(seeds, opts);
  }

  sliceTimestamps(seeds: readonly Timestamp[], opts: SliceOptions = {}): Slice {
    const contexts = opts.contexts ?? this.defaultContexts();
    const forward = opts.direction === "forward";
    const seen = new Map<string, Timestamp>();
    const stack = seeds.filter((ts) => ts.isInitialized);
    for (let ts = stack.pop(); ts !== undefined; ts = stack.pop()) {
      if (seen.has(ts.key)) continue;
      seen.set(ts.key, ts);
      for (const next of this.neighbors(ts, contexts, forward)) {
        if (!seen.has(next.key)) stack.push(next);
      }
    }
    const timestamps = [...seen.values()].sort((a, b) => a.compare(b));
    const statements: Statement[] = [];
    for (const ts of timestamps) {
      const stmt = this.ctx.cells.statementAt(ts);
      if (stmt !== undefined) statements.push(stmt);
    }
    this.log.debug({ seeds: seeds.length, size: statements.length, forward }, "slice");
    return new Slice(timestamps, statements);
  }

  /** Dynamic edges when the statement has any, static edges otherwise. */
  private neighbors(ts: Timestamp, contexts: readonly DepContext[], forward: boolean): ReadonlySet<Timestamp> {
    const deps = this.ctx.dataDeps;
    const edges = (ctx: DepContext) => (forward ? deps.consumersOf(ctx, ts) : deps.producersOf(ctx, ts));
    if (contexts.includes("dynamic")) {
      const dyn = edges("dynamic");
      if (dyn.size > 0 || !contexts.includes("static")) return dyn;
    }
    return contexts.includes("static") ? edges("static") : new Set();
  }

  private defaultContexts(): DepContext[] {
    const { dynamicEnabled, staticEnabled } = this.ctx.config.slicing;
    const out: DepContext[] = [];
    if (dynamicEnabled) out.push("dynamic");
    if (staticEnabled) out.push("static");
    return out.length ? out : ["dynamic"];
  }
}
