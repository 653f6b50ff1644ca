// src/core/session/session.ts
// FlowSession owns one notebook's graph and hands itself to every engine
// component as their context.

import type { Logger } from "pino";
import { loadConfig, type FlowConfig, type PartialFlowConfig } from "../config";
import { type DepContext, DepContextStack } from "../deps/context";
import { DataDepIndex } from "../deps/dataDeps";
import type { Diagnostic } from "../diagnostic";
import { TracerStateError, UnknownSymbolError } from "../errors";
import { createLogger, moduleLogger } from "../log/logger";
import { type CellOutput, CellRegistry, type Cell } from "../model/cell";
import { IdentityTable, isObjectLike, type ObjId } from "../model/identity";
import { Namespace } from "../model/namespace";
import { Scope } from "../model/scope";
import type { StatementSource } from "../model/statement";
import { DataSymbol } from "../model/symbol";
import { Timestamp } from "../model/timestamp";
import { type CheckResult, ReadinessChecker } from "../reactivity/checker";
import { UpdatePropagator } from "../reactivity/propagate";
import { ReactiveScheduler } from "../reactivity/scheduler";
import type { Slice, SliceTextOptions } from "../slicing/slice";
import { type SliceOptions, Slicer } from "../slicing/slicer";
import { type CallEffectRegistry, createDefaultRegistry, ExternalCallResolver } from "../tracing/externalCalls";
import { type TraceContext, Tracer } from "../tracing/tracer";
import { collectMetadata, type SessionMetadata } from "./metadata";

export type SessionOptions = {
  id?: string;
  /** Complete configuration; when absent it is loaded (env, config file) and `overrides` applied. */
  config?: FlowConfig;
  overrides?: PartialFlowConfig;
  logger?: Logger;
  callEffects?: CallEffectRegistry;
};

let sessionSeq = 0;

export class FlowSession implements TraceContext {
  readonly id: string;
  readonly config: FlowConfig;
  readonly log: Logger;

  readonly identities = new IdentityTable();
  readonly depContexts = new DepContextStack();
  readonly dataDeps = new DataDepIndex();
  readonly cells = new CellRegistry();
  readonly globalScope: Scope;
  readonly resolver: ExternalCallResolver;
  readonly tracer: Tracer;
  readonly scheduler: ReactiveScheduler;

  lastExecutedCellId: string | undefined;
  private lastCheck: CheckResult | undefined;
  private closed = false;
  private clock: Timestamp = Timestamp.uninitialized();
  private symbolSeq = 0;
  private readonly symbols = new Set<DataSymbol>();
  private diagLog: Diagnostic[] = [];
  private readonly namespaces = new Map<ObjId, Namespace>();
  private readonly propagator: UpdatePropagator;
  private readonly checker: ReadinessChecker;
  private readonly slicer: Slicer;

  constructor(opts: SessionOptions = {}) {
    this.id = opts.id ?? `session-${++sessionSeq}`;
    this.config = opts.config ?? loadConfig({ overrides: opts.overrides });
    this.log = opts.logger ?? createLogger(this.config.log.level, { session: this.id });
    this.globalScope = new Scope(this, "<global>", "global");
    const report = (d: Diagnostic) => this.report(d);
    this.resolver = new ExternalCallResolver(
      opts.callEffects ?? createDefaultRegistry(),
      this.identities,
      moduleLogger(this.log, "resolver"),
      report,
    );
    this.tracer = new Tracer(this, moduleLogger(this.log, "tracer"));
    this.propagator = new UpdatePropagator(moduleLogger(this.log, "propagator"), report);
    this.checker = new ReadinessChecker(this, moduleLogger(this.log, "checker"));
    this.slicer = new Slicer(this, moduleLogger(this.log, "slicer"));
    this.scheduler = new ReactiveScheduler(this);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  now(): Timestamp {
    return this.clock;
  }

  // ─────────────────────────────────────────────────────────────────
  // SymbolGraph / TraceContext
  // ─────────────────────────────────────────────────────────────────

  nextSymbolId(): number {
    return ++this.symbolSeq;
  }

  trackSymbol(sym: DataSymbol): void {
    this.symbols.add(sym);
  }

  namespaceOf(value: unknown): Namespace | undefined {
    const id = this.identities.idOf(value);
    if (id === undefined) return undefined;
    const ns = this.namespaces.get(id);
    if (ns !== undefined && ns.generation !== this.identities.generation(id)) {
      this.namespaces.delete(id);
      return undefined;
    }
    return ns;
  }

  ensureNamespace(value: unknown): Namespace | undefined {
    if (!isObjectLike(value)) return undefined;
    const existing = this.namespaceOf(value);
    if (existing !== undefined) return existing;
    const id = this.identities.idOf(value);
    if (id === undefined || this.identities.aliases(id).size === 0) return undefined;
    const ns = new Namespace(this, id, value, this.identities.generation(id));
    this.namespaces.set(id, ns);
    return ns;
  }

  /** Retained diagnostics, oldest first; at most `log.maxDiagnostics` of them. */
  get diagnostics(): readonly Diagnostic[] {
    return this.diagLog;
  }

  report(d: Diagnostic): void {
    this.diagLog.push(d);
    const excess = this.diagLog.length - this.config.log.maxDiagnostics;
    if (excess > 0) this.diagLog.splice(0, excess);
  }

  /** Hand over the retained diagnostics and start a fresh log. */
  drainDiagnostics(): Diagnostic[] {
    const out = this.diagLog;
    this.diagLog = [];
    return out;
  }

  advanceClock(ts: Timestamp): void {
    this.assertOpen();
    if (!ts.gt(this.clock)) {
      throw new TracerStateError(`timestamp ${ts} does not advance the clock past ${this.clock}`);
    }
    this.clock = ts;
  }

  cellCompleted(cell: Cell, updated: ReadonlySet<DataSymbol>): void {
    this.lastExecutedCellId = cell.id;
    this.propagator.propagate(updated, (sym) => this.rerunsAfter(cell, sym));
  }

  /** The cell that produced `sym` is queued to run after `cell` in flow order. */
  private rerunsAfter(cell: Cell, sym: DataSymbol): boolean {
    const producer = this.cells.atTimestamp(sym.timestamp);
    if (producer === undefined || producer.id === cell.id || !this.scheduler.isScheduled(producer.id)) return false;
    if (this.config.reactivity.flowOrder === "any_order") return true;
    const from = this.cells.positionOf(cell.id);
    const to = this.cells.positionOf(producer.id);
    return from !== undefined && to !== undefined && to > from;
  }

  // ─────────────────────────────────────────────────────────────────
  // Notebook
  // ─────────────────────────────────────────────────────────────────

  /** Register (possibly edited, not yet run) source for a cell id. */
  registerCell(id: string, text: string, statements: readonly StatementSource[]): void {
    this.cells.setDraft(id, text, statements);
  }

  setCellOrder(ids: readonly string[]): void {
    this.cells.setPositions(ids);
  }

  recordOutput(cellId: string, output: Partial<CellOutput>): void {
    const cell = this.cells.current(cellId);
    if (cell === undefined) return;
    cell.output = { ...cell.output, ...output };
  }

  // ─────────────────────────────────────────────────────────────────
  // Queries
  // ─────────────────────────────────────────────────────────────────

  check(): CheckResult {
    this.assertOpen();
    this.lastCheck = this.checker.check();
    return this.lastCheck;
  }

  /** Global symbol by name, if bound. */
  symbol(name: string): DataSymbol | undefined {
    return this.globalScope.lookupLocal(name);
  }

  allSymbols(): DataSymbol[] {
    return [...this.symbols];
  }

  slice(target: DataSymbol | string, opts?: SliceOptions): Slice {
    return this.slicer.sliceSymbol(target, opts);
  }

  sliceCells(counters: readonly number[], opts?: SliceOptions): Slice {
    return this.slicer.sliceCells(counters, opts);
  }

  sliceTimestamps(seeds: readonly Timestamp[], opts?: SliceOptions): Slice {
    return this.slicer.sliceTimestamps(seeds, opts);
  }

  // ─────────────────────────────────────────────────────────────────
  // Symbol queries
  // ─────────────────────────────────────────────────────────────────

  /** Direct parents of the symbol, anonymous ones left out. */
  deps(target: DataSymbol | string, ctx: DepContext = "dynamic"): DataSymbol[] {
    return named([...this.resolveSymbol(target).parents(ctx).keys()]);
  }

  /** Direct children of the symbol, anonymous ones left out. */
  users(target: DataSymbol | string, ctx: DepContext = "dynamic"): DataSymbol[] {
    return named([...this.resolveSymbol(target).children(ctx).keys()]);
  }

  /** Every ancestor, ordered by symbol id. */
  rdeps(target: DataSymbol | string, ctx: DepContext = "dynamic"): DataSymbol[] {
    return closure(this.resolveSymbol(target), (s) => s.parents(ctx).keys());
  }

  /** Every descendant, ordered by symbol id. */
  rusers(target: DataSymbol | string, ctx: DepContext = "dynamic"): DataSymbol[] {
    return closure(this.resolveSymbol(target), (s) => s.children(ctx).keys());
  }

  timestamp(target: DataSymbol | string): Timestamp {
    return this.resolveSymbol(target).timestamp;
  }

  /** Source of the statements the symbol's current value was computed from. */
  code(target: DataSymbol | string, opts?: SliceOptions & SliceTextOptions): string {
    return this.slice(this.resolveSymbol(target), opts).text(opts);
  }

  private resolveSymbol(target: DataSymbol | string): DataSymbol {
    if (target instanceof DataSymbol) return target;
    const sym = this.globalScope.lookup(target);
    if (sym === undefined || sym.tombstoned) throw new UnknownSymbolError(target);
    return sym;
  }

  metadata(): SessionMetadata {
    return collectMetadata(this.globalScope, this.cells, this.lastCheck ?? this.check());
  }

  /**
   * Drop symbols nothing can reach any more: not globally accessible, no
   * child edges, not used by any current cell. Repeats until nothing changes.
   */
  collectGarbage(): number {
    const referenced = new Set<DataSymbol>();
    for (const cell of this.cells.currentCells()) {
      for (const sym of cell.usedSymbols.dynamic.keys()) referenced.add(sym);
      for (const sym of cell.usedSymbols.static.keys()) referenced.add(sym);
    }
    let collected = 0;
    for (let changed = true; changed; ) {
      changed = false;
      for (const sym of this.symbols) {
        if (sym.isGloballyAccessible || referenced.has(sym)) continue;
        if (sym.children("dynamic").size > 0 || sym.children("static").size > 0) continue;
        sym.detach();
        sym.releaseIdentity();
        sym.containingScope.forget(sym);
        this.symbols.delete(sym);
        collected++;
        changed = true;
      }
    }
    for (const [id, ns] of this.namespaces) {
      if (ns.isOrphaned || ns.generation !== this.identities.generation(id)) this.namespaces.delete(id);
    }
    if (collected) this.log.debug({ collected, namespaces: this.namespaces.size }, "garbage collected");
    return collected;
  }

  close(): void {
    if (this.closed) return;
    for (const sym of this.symbols) sym.detach();
    this.symbols.clear();
    this.namespaces.clear();
    this.dataDeps.clear();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) throw new TracerStateError(`session ${this.id} is closed`);
  }
}

function named(syms: DataSymbol[]): DataSymbol[] {
  return syms.filter((s) => !s.isAnonymous);
}

function closure(start: DataSymbol, next: (s: DataSymbol) => Iterable<DataSymbol>): DataSymbol[] {
  const seen = new Set<DataSymbol>([start]);
  const stack = [start];
  for (let sym = stack.pop(); sym !== undefined; sym = stack.pop()) {
    for (const related of next(sym)) {
      if (seen.has(related)) continue;
      seen.add(related);
      stack.push(related);
    }
  }
  seen.delete(start);
  return named([...seen]).sort((a, b) => a.id - b.id);
}
