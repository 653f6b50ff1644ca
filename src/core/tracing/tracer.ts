// src/core/tracing/tracer.ts
// Hook surface the host calls while it executes a cell. Every read, write,
// call and scope change is turned into symbol updates and edges.

import type { Logger } from "pino";
import type { FlowConfig } from "../config";
import { DiagCodes, type Diagnostic, infoDiag, warnDiag } from "../diagnostic";
import { TracerStateError } from "../errors";
import type { Cell, CellRegistry } from "../model/cell";
import type { SymbolGraph } from "../model/graph";
import { Namespace, type SpliceRange } from "../model/namespace";
import type { Scope } from "../model/scope";
import type { StatementSource } from "../model/statement";
import type { DataSymbol, ElementKey, SymbolKind } from "../model/symbol";
import type { Timestamp } from "../model/timestamp";
import type { CallSite, ExternalCallResolver, MutationSink, ResolvedCall } from "./externalCalls";

/** What the tracer needs from its session. */
export interface TraceContext extends SymbolGraph {
  readonly config: FlowConfig;
  readonly cells: CellRegistry;
  readonly globalScope: Scope;
  readonly resolver: ExternalCallResolver;
  report(d: Diagnostic): void;
  advanceClock(ts: Timestamp): void;
  cellCompleted(cell: Cell, updated: ReadonlySet<DataSymbol>): void;
}

export type CellSource = {
  text: string;
  statements: readonly StatementSource[];
};

/** Positional or keyed children of a freshly built container, with what each was built from. */
export type ElementDeps = ReadonlyArray<readonly [ElementKey, readonly DataSymbol[]]>;

export type StoreOptions = {
  kind?: SymbolKind;
  /** Parents to use instead of the statement's reads (e.g. argument symbols for parameters). */
  deps?: readonly DataSymbol[];
  elements?: ElementDeps;
  /** Assign to the visible binding of the name (in an enclosing scope if need be). */
  rebind?: boolean;
};

export type CallFrame = {
  resolved?: ResolvedCall;
  /** Function the host should call instead of the original callee. */
  substitute?: unknown;
};

export type InterruptLevel = "soft" | "hard";

type OpenStatement = {
  ts: Timestamp;
  reads: Set<DataSymbol>;
  written: Set<DataSymbol>;
  unknown: boolean;
  interrupts: number;
};

type CellRun = {
  cell: Cell;
  nextIndex: number;
  stmt?: OpenStatement;
  scopes: Scope[];
  updated: Set<DataSymbol>;
};

export class Tracer implements MutationSink {
  private run: CellRun | undefined;

  constructor(
    private readonly ctx: TraceContext,
    private readonly log: Logger,
  ) {}

  private get enabled(): boolean {
    return this.ctx.config.tracing.enabled;
  }

  get activeCell(): Cell | undefined {
    return this.run?.cell;
  }

  get inStatement(): boolean {
    return this.run?.stmt !== undefined;
  }

  currentScope(): Scope {
    const scopes = this.run?.scopes;
    return scopes?.[scopes.length - 1] ?? this.ctx.globalScope;
  }

  // ─────────────────────────────────────────────────────────────────
  // Cell and statement boundaries
  // ─────────────────────────────────────────────────────────────────

  beginCell(id: string, source: CellSource): Cell {
    if (this.run !== undefined) {
      throw new TracerStateError(`cell ${this.run.cell.id} is still being traced`);
    }
    const cell = this.ctx.cells.create(id, source.text, source.statements);
    this.run = { cell, nextIndex: 0, scopes: [], updated: new Set() };
    this.log.debug({ cell: id, counter: cell.counter }, "begin cell");
    return cell;
  }

  /** Opens the next statement; the clock only ever advances here. */
  beginStatement(index?: number): Timestamp {
    const run = this.requireRun("beginStatement");
    if (run.stmt !== undefined) {
      throw new TracerStateError(`statement ${run.stmt.ts} is still open`);
    }
    const i = index ?? run.nextIndex;
    const statement = run.cell.statementAt(i);
    if (statement === undefined) {
      throw new TracerStateError(`cell ${run.cell.id} has no statement ${i}`);
    }
    run.nextIndex = i + 1;
    const ts = statement.timestamp;
    this.ctx.advanceClock(ts);
    run.stmt = { ts, reads: new Set(), written: new Set(), unknown: false, interrupts: 0 };

    if (this.enabled && this.ctx.config.slicing.staticEnabled) {
      for (const name of statement.reads) {
        const sym = this.ctx.globalScope.lookup(name);
        const usage = sym?.recordUsage(ts, "static");
        if (sym !== undefined && usage !== undefined && usage.valueTimestamp.cellNum !== run.cell.counter) {
          run.cell.usedSymbols.static.set(sym, usage.valueTimestamp);
        }
      }
    }
    return ts;
  }

  endStatement(): void {
    const run = this.requireRun("endStatement");
    const st = this.requireStatement("endStatement");
    const statement = run.cell.statementAt(st.ts.stmtNum);
    if (this.enabled && this.ctx.config.slicing.staticEnabled && statement !== undefined) {
      const scope = this.ctx.globalScope;
      const readSyms = statement.reads.flatMap((n) => {
        const s = scope.lookup(n);
        return s === undefined || s.tombstoned ? [] : [s];
      });
      this.ctx.depContexts.within("static", () => {
        for (const name of statement.writes) {
          const sym = scope.lookupLocal(name);
          if (sym !== undefined && !sym.tombstoned) sym.setParents(readSyms, st.ts, true);
        }
      });
    }
    if (st.unknown) {
      run.cell.unknownDependency = true;
      for (const sym of st.written) sym.unsafeReason = "unresolved-dependency";
    }
    run.stmt = undefined;
  }

  /** Close the open statement where it stands; writes that already landed stay. */
  abortStatement(reason?: string): void {
    const run = this.run;
    const st = run?.stmt;
    if (run === undefined || st === undefined) return;
    if (st.unknown) run.cell.unknownDependency = true;
    run.stmt = undefined;
    for (const scope of run.scopes.reverse()) scope.close();
    run.scopes = [];
    this.ctx.report(infoDiag(DiagCodes.StatementAborted, `statement ${st.ts} aborted${reason ? `: ${reason}` : ""}`));
  }

  /** First interrupt in a statement is soft; any further one is hard. */
  interrupt(): InterruptLevel {
    const st = this.run?.stmt;
    if (st === undefined) return "soft";
    st.interrupts += 1;
    return st.interrupts >= 2 ? "hard" : "soft";
  }

  endCell(opts: { error?: string } = {}): Cell {
    const run = this.requireRun("endCell");
    if (run.stmt !== undefined) this.abortStatement(opts.error ?? "cell ended");
    const cell = run.cell;
    cell.error = opts.error;
    cell.completed = true;
    this.run = undefined;
    this.ctx.cellCompleted(cell, run.updated);
    this.log.debug({ cell: cell.id, counter: cell.counter, updated: run.updated.size }, "end cell");
    return cell;
  }

  // ─────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────

  loadName(name: string): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("loadName");
    const sym = this.currentScope().lookup(name);
    if (sym === undefined || sym.tombstoned) {
      this.markUnknown(st, DiagCodes.UnresolvedRead, `cannot resolve name ${name}`);
      return undefined;
    }
    this.noteRead(st, sym);
    return sym;
  }

  loadAttribute(receiver: unknown, attr: string, value: unknown): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("loadAttribute");
    const ns = this.ctx.ensureNamespace(receiver);
    if (ns === undefined) return undefined;
    const sym = ns.lookupLocal(attr) ?? ns.implicitElement(attr, value, false);
    this.noteRead(st, sym);
    return sym;
  }

  loadSubscript(receiver: unknown, key: unknown, value: unknown): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("loadSubscript");
    const ns = this.ctx.ensureNamespace(receiver);
    if (ns === undefined || !isElementKey(key)) return undefined;
    const sym = ns.lookupElement(key) ?? ns.implicitElement(key, value, true);
    this.noteRead(st, sym);
    return sym;
  }

  private noteRead(st: OpenStatement, sym: DataSymbol): void {
    const run = this.requireRun("read");
    const usage = sym.recordUsage(st.ts, "dynamic");
    st.reads.add(sym);
    if (usage !== undefined && usage.valueTimestamp.cellNum !== run.cell.counter && !run.cell.usedSymbols.dynamic.has(sym)) {
      run.cell.usedSymbols.dynamic.set(sym, usage.valueTimestamp);
    }
    if (this.ctx.config.safety.markWaitingUsagesUnsafe && sym.isWaiting) {
      this.markUnknown(st, DiagCodes.UnresolvedRead, `${sym.readableName} was read while waiting`);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Writes (the host's write has already landed)
  // ─────────────────────────────────────────────────────────────────

  storeName(name: string, value: unknown, opts: StoreOptions = {}): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("storeName");
    const current = this.currentScope();
    const scope = (opts.rebind ? current.lookup(name)?.containingScope : undefined) ?? current;
    const deps = opts.deps ?? [...st.reads];
    const { symbol } = this.ctx.depContexts.within("dynamic", () =>
      scope.upsert(name, value, deps, { at: st.ts, kind: opts.kind, overwrite: true }),
    );
    this.afterWrite(st, symbol);
    if (opts.elements !== undefined) this.materialize(st, value, opts.elements);
    return symbol;
  }

  storeAttribute(receiver: unknown, attr: string, value: unknown, opts: StoreOptions = {}): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("storeAttribute");
    const ns = this.ctx.ensureNamespace(receiver);
    if (ns === undefined) {
      this.markUnknown(st, DiagCodes.UnresolvedWrite, `cannot resolve receiver of .${attr}`);
      return undefined;
    }
    const deps = opts.deps ?? this.readsExcludingChain(st, ns);
    const { symbol } = this.ctx.depContexts.within("dynamic", () =>
      ns.upsert(attr, value, deps, { at: st.ts, kind: opts.kind, overwrite: true }),
    );
    this.afterWrite(st, symbol);
    if (opts.elements !== undefined) this.materialize(st, value, opts.elements);
    return symbol;
  }

  storeSubscript(receiver: unknown, key: unknown, value: unknown, opts: StoreOptions = {}): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("storeSubscript");
    const ns = this.ctx.ensureNamespace(receiver);
    if (ns === undefined) {
      this.markUnknown(st, DiagCodes.UnresolvedWrite, "cannot resolve receiver of element store");
      return undefined;
    }
    if (!isElementKey(key)) {
      this.mutate(receiver, [...st.reads], false);
      return undefined;
    }
    const deps = opts.deps ?? this.readsExcludingChain(st, ns);
    const { symbol } = this.ctx.depContexts.within("dynamic", () =>
      ns.upsertElement(key, value, deps, { at: st.ts, kind: opts.kind, overwrite: true }),
    );
    this.afterWrite(st, symbol);
    if (opts.elements !== undefined) this.materialize(st, value, opts.elements);
    return symbol;
  }

  storeImport(name: string, value: unknown, moduleName: string, importedName?: string): DataSymbol | undefined {
    const sym = this.storeName(name, value, { kind: importedName === undefined ? "module" : "import", deps: [] });
    if (sym !== undefined) {
      sym.importedModule = moduleName;
      sym.importedName = importedName;
    }
    return sym;
  }

  deleteName(name: string): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("deleteName");
    const sym = this.currentScope().delete(name, st.ts);
    if (sym === undefined) {
      this.markUnknown(st, DiagCodes.UnresolvedWrite, `cannot resolve deleted name ${name}`);
      return undefined;
    }
    this.afterDelete(st, sym);
    return sym;
  }

  deleteAttribute(receiver: unknown, attr: string): DataSymbol | undefined {
    if (!this.enabled) return undefined;
    const st = this.requireStatement("deleteAttribute");
    const ns = this.ctx.namespaceOf(receiver);
    const sym = ns?.delete(attr, st.ts);
    if (sym === undefined) return undefined;
    this.afterDelete(st, sym);
    return sym;
  }

  /** Positional containers shift later elements down, as the host's removal did. */
  deleteSubscript(receiver: unknown, key: unknown): DataSymbol | undefined {
    if (!this.enabled || !isElementKey(key)) return undefined;
    const st = this.requireStatement("deleteSubscript");
    const ns = this.ctx.namespaceOf(receiver);
    if (ns === undefined) return undefined;
    if (ns.isPositional && typeof key === "number") {
      const gone = ns.lookupElement(key);
      // The element is already gone from the container, so its index is
      // taken as given rather than normalized against the new length.
      const start = key < 0 && Array.isArray(receiver) ? receiver.length + 1 + key : key;
      this.splice(receiver, { start, deleteCount: 1, insertCount: 0 }, []);
      return gone;
    }
    const sym = ns.deleteElement(key, st.ts);
    if (sym !== undefined) this.afterDelete(st, sym);
    return sym;
  }

  // ─────────────────────────────────────────────────────────────────
  // Scopes and calls
  // ─────────────────────────────────────────────────────────────────

  /** Enter a traced function body. `parent` is the scope the function closed over. */
  enterScope(name: string, parent?: Scope): Scope {
    const run = this.requireRun("enterScope");
    const scope = (parent ?? this.ctx.globalScope).childScope(name, "function");
    run.scopes.push(scope);
    return scope;
  }

  exitScope(): void {
    const run = this.requireRun("exitScope");
    const scope = run.scopes.pop();
    if (scope === undefined) throw new TracerStateError("exitScope without a matching enterScope");
    scope.close();
  }

  callEnter(site: CallSite): CallFrame {
    if (!this.enabled) return {};
    this.requireStatement("callEnter");
    const frame: CallFrame = { resolved: this.ctx.resolver.resolve(site) };
    const substitute = this.ctx.resolver.substitutionFor(site.callee);
    if (substitute !== undefined) frame.substitute = substitute;
    return frame;
  }

  callExit(frame: CallFrame, returnValue: unknown): void {
    if (!this.enabled || frame.resolved === undefined) return;
    this.requireStatement("callExit");
    this.ctx.resolver.apply(frame.resolved, returnValue, this);
  }

  /** The host observed `target` change in place. */
  notifyMutation(target: unknown, deps?: readonly DataSymbol[]): void {
    if (!this.enabled) return;
    const st = this.requireStatement("notifyMutation");
    this.mutate(target, deps ?? [...st.reads], true);
  }

  // ─────────────────────────────────────────────────────────────────
  // MutationSink
  // ─────────────────────────────────────────────────────────────────

  mutate(target: unknown, deps: readonly DataSymbol[], resync: boolean): void {
    const st = this.requireStatement("mutate");
    const aliases = [...this.ctx.identities.aliasesOf(target)].filter((s) => !s.tombstoned);
    if (aliases.length === 0) return;
    this.ctx.depContexts.within("dynamic", () => {
      for (const alias of aliases) {
        alias.recordUpdate(st.ts, false);
        alias.setParents(deps, st.ts, false);
        this.afterWrite(st, alias);
      }
      if (resync) {
        const ns = this.ctx.namespaceOf(target);
        for (const sym of ns?.resync(deps, st.ts) ?? []) this.touched(st, sym);
      }
    });
  }

  splice(target: unknown, range: SpliceRange, deps: readonly DataSymbol[]): void {
    const st = this.requireStatement("splice");
    this.mutate(target, deps, false);
    const ns = this.ctx.ensureNamespace(target);
    if (ns === undefined) return;
    const { touched, removed } = this.ctx.depContexts.within("dynamic", () => ns.spliceElements(range, deps, st.ts));
    for (const sym of touched) this.touched(st, sym);
    for (const sym of removed) this.touched(st, sym);
  }

  upsertKey(target: unknown, key: ElementKey, deps: readonly DataSymbol[]): void {
    const st = this.requireStatement("upsertKey");
    this.mutate(target, deps, false);
    const ns = this.ctx.ensureNamespace(target);
    if (ns === undefined) return;
    const { symbol } = this.ctx.depContexts.within("dynamic", () =>
      ns.upsertElement(key, ns.valueAt(key), deps, { at: st.ts }),
    );
    this.afterWrite(st, symbol);
  }

  deleteKey(target: unknown, key: ElementKey): void {
    const st = this.requireStatement("deleteKey");
    this.mutate(target, [], false);
    const sym = this.ctx.namespaceOf(target)?.deleteElement(key, st.ts);
    if (sym !== undefined) this.touched(st, sym);
  }

  clearElements(target: unknown): void {
    const st = this.requireStatement("clearElements");
    this.mutate(target, [], false);
    for (const sym of this.ctx.namespaceOf(target)?.clearElements(st.ts) ?? []) this.touched(st, sym);
  }

  // ─────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────

  private materialize(st: OpenStatement, container: unknown, elements: ElementDeps): void {
    const ns = this.ctx.ensureNamespace(container);
    if (ns === undefined) return;
    this.ctx.depContexts.within("dynamic", () => {
      for (const [key, deps] of elements) {
        const { symbol } = ns.upsertElement(key, ns.valueAt(key), deps, { at: st.ts });
        this.touched(st, symbol);
      }
    });
  }

  private afterWrite(st: OpenStatement, sym: DataSymbol): void {
    this.touched(st, sym);
    if (st.unknown) sym.unsafeReason = "unresolved-dependency";
    this.bumpContainers(st, sym, new Set());
    this.log.debug({ symbol: sym.readableName, at: st.ts.toString() }, "update");
  }

  private afterDelete(st: OpenStatement, sym: DataSymbol): void {
    this.touched(st, sym);
    this.bumpContainers(st, sym, new Set());
  }

  private touched(st: OpenStatement, sym: DataSymbol): void {
    const run = this.requireRun("write");
    st.written.add(sym);
    run.updated.add(sym);
    run.cell.updatedSymbols.add(sym);
  }

  /** A child's update is an update of every symbol bound to its container. */
  private bumpContainers(st: OpenStatement, sym: DataSymbol, seen: Set<DataSymbol>): void {
    const scope = sym.containingScope;
    if (!(scope instanceof Namespace)) return;
    for (const owner of scope.owners) {
      if (seen.has(owner)) continue;
      seen.add(owner);
      owner.recordUpdate(st.ts, false);
      if (!sym.isWaiting) owner.waitingElements.delete(sym);
      this.touched(st, owner);
      this.bumpContainers(st, owner, seen);
    }
  }

  private readsExcludingChain(st: OpenStatement, ns: Namespace): DataSymbol[] {
    const chain = new Set<DataSymbol>();
    const visit = (scope: Scope): void => {
      if (!(scope instanceof Namespace)) return;
      for (const owner of scope.owners) {
        if (chain.has(owner)) continue;
        chain.add(owner);
        visit(owner.containingScope);
      }
    };
    visit(ns);
    return [...st.reads].filter((s) => !chain.has(s));
  }

  private markUnknown(st: OpenStatement, code: string, message: string): void {
    st.unknown = true;
    this.ctx.report(warnDiag(code, message, { data: { at: st.ts.toJSON() } }));
    this.log.debug({ at: st.ts.toString() }, message);
  }

  private requireRun(hook: string): CellRun {
    if (this.run === undefined) throw new TracerStateError(`${hook} called outside a traced cell`);
    return this.run;
  }

  private requireStatement(hook: string): OpenStatement {
    const st = this.requireRun(hook).stmt;
    if (st === undefined) throw new TracerStateError(`${hook} called outside a statement`);
    return st;
  }
}

function isElementKey(x: unknown): x is ElementKey {
  return typeof x === "string" || typeof x === "number";
}
