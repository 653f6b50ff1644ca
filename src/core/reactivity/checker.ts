// src/core/reactivity/checker.ts
// Per-cell readiness and staleness for a front-end, under the configured
// execution schedule and flow order.

import type { Logger } from "pino";
import { computeLiveness, resolveLiveness } from "../analysis/liveness";
import type { ExecSchedule, FlowConfig } from "../config";
import type { DepContext } from "../deps/context";
import type { Cell, CellRegistry } from "../model/cell";
import type { Scope } from "../model/scope";
import type { StatementSource } from "../model/statement";
import type { DataSymbol } from "../model/symbol";

export type CheckResult = {
  waitingCells: string[];
  readyCells: string[];
  newReadyCells: string[];
  unsafeCells: string[];
  /** Cell -> later-positioned cells whose updates it uses. */
  unsafeOrderCells: Record<string, string[]>;
  /** Cell -> readable names of the symbols behind `unsafeOrderCells`. */
  unsafeOrderUsages: Record<string, string[]>;
  /** Waiting cell -> cells that must run to make it ready. */
  waiterLinks: Record<string, string[]>;
  /** Inverse of waiterLinks. */
  readyMakerLinks: Record<string, string[]>;
  /** Waiting cell -> names of the live symbols it is waiting on. */
  waitingSymbols: Record<string, string[]>;
  /** Cells a front-end should mark, per the highlights setting. */
  highlightedCells: string[];
};

export interface CheckContext {
  readonly config: FlowConfig;
  readonly cells: CellRegistry;
  readonly globalScope: Scope;
  readonly lastExecutedCellId: string | undefined;
}

type CellView = {
  id: string;
  position: number;
  counter: number;
  exec: Cell | undefined;
  live: DataSymbol[];
  unresolved: string[];
  dead: Set<string>;
  /** Producing cell id -> symbols this cell took from it. */
  parents: Map<string, Set<DataSymbol>>;
};

export class ReadinessChecker {
  private previousReady = new Set<string>();

  constructor(
    private readonly ctx: CheckContext,
    private readonly log: Logger,
  ) {}

  check(): CheckResult {
    const { config, cells } = this.ctx;
    const inOrder = config.reactivity.flowOrder === "in_order";
    const schedule = config.reactivity.execSchedule;
    const views = this.cellViews();
    const byId = new Map(views.map((v) => [v.id, v]));
    const positionOfTs = (ts: { cellNum: number; stmtNum: number }) => {
      const cell = cells.atCounter(ts.cellNum);
      return cell === undefined ? undefined : cells.positionOf(cell.id);
    };

    const waiting = new Set<string>();
    const ready = new Set<string>();
    const madeReadyByLast = new Set<string>();
    const unsafe = new Set<string>();
    const unsafeOrderCells: Record<string, string[]> = {};
    const unsafeOrderUsages: Record<string, string[]> = {};
    const waitingSymbols: Record<string, string[]> = {};
    const lastCounter = this.lastExecutedCounter();

    const considered = (v: CellView, parentId: string): boolean => {
      if (parentId === v.id) return false;
      if (!inOrder) return true;
      const p = byId.get(parentId)?.position ?? cells.positionOf(parentId);
      return p !== undefined && p < v.position;
    };

    const dagCells = new Set<string>();
    for (const v of views) {
      if (v.exec?.unknownDependency || v.live.some((s) => s.state === "unsafe")) unsafe.add(v.id);

      if (inOrder) {
        for (const sym of v.live) {
          const producer = cells.atTimestamp(sym.timestamp);
          const pos = producer === undefined ? undefined : cells.positionOf(producer.id);
          if (producer !== undefined && producer.id !== v.id && pos !== undefined && pos > v.position) {
            pushUnique(unsafeOrderCells, v.id, producer.id);
            pushUnique(unsafeOrderUsages, v.id, sym.readableName);
          }
        }
      }

      const stale = v.live.filter((s) =>
        inOrder ? s.isWaitingAtPosition(v.position, positionOfTs) : s.isWaiting,
      );
      if (stale.length) waitingSymbols[v.id] = stale.map((s) => s.readableName);

      const effective = this.effectiveSchedule(schedule, v, byId, considered);
      if (effective === "dag_based") {
        dagCells.add(v.id);
        for (const [parentId, syms] of v.parents) {
          if (!considered(v, parentId)) continue;
          const parent = cells.current(parentId);
          if (parent === undefined || parent.counter <= v.counter) continue;
          if ([...syms].some((s) => s.timestamp.cellNum === parent.counter)) {
            ready.add(v.id);
            if (parent.counter === lastCounter) madeReadyByLast.add(v.id);
          }
        }
        continue;
      }

      if (stale.length || v.unresolved.length) {
        waiting.add(v.id);
        continue;
      }
      if (effective === "strict") continue;

      let maxCounter = -1;
      for (const sym of v.live) {
        const producer = cells.atTimestamp(sym.timestamp);
        if (producer === undefined || !considered(v, producer.id)) continue;
        maxCounter = Math.max(maxCounter, sym.timestamp.cellNum);
      }
      if (maxCounter > v.counter) {
        ready.add(v.id);
        if (maxCounter === lastCounter) madeReadyByLast.add(v.id);
      }
    }

    // Ancestors complete first: a dag cell below a ready or waiting cell waits.
    for (let changed = true; changed; ) {
      changed = false;
      for (const id of dagCells) {
        const v = byId.get(id);
        if (v === undefined || waiting.has(id)) continue;
        const blocked = [...v.parents.keys()].some((p) => considered(v, p) && (ready.has(p) || waiting.has(p)));
        if (blocked) {
          waiting.add(id);
          ready.delete(id);
          changed = true;
        }
      }
    }
    for (const id of waiting) ready.delete(id);

    const lastPos = this.ctx.lastExecutedCellId === undefined ? undefined : cells.positionOf(this.ctx.lastExecutedCellId);
    const newReady = [...ready].filter((id) => {
      if (id === this.ctx.lastExecutedCellId) return false;
      if (!madeReadyByLast.has(id) && this.previousReady.has(id)) return false;
      if (inOrder && lastPos !== undefined) return (byId.get(id)?.position ?? -1) > lastPos;
      return true;
    });

    const waiterLinks: Record<string, string[]> = {};
    const readyMakerLinks: Record<string, string[]> = {};
    for (const id of waiting) {
      const v = byId.get(id);
      if (v === undefined) continue;
      const makers = new Set<string>();
      if (dagCells.has(id)) {
        for (const p of v.parents.keys()) if (considered(v, p) && (ready.has(p) || waiting.has(p))) makers.add(p);
      }
      const staleNames = new Set(waitingSymbols[id] ?? []);
      for (const other of views) {
        if (other.id === id || !considered(v, other.id)) continue;
        if ([...other.dead].some((n) => staleNames.has(n) || v.unresolved.includes(n))) makers.add(other.id);
      }
      const list = sortByPosition([...makers], byId);
      if (list.length) waiterLinks[id] = list;
      for (const m of list) pushUnique(readyMakerLinks, m, id);
    }

    this.previousReady = new Set(ready);
    const sorted = (s: Set<string>) => sortByPosition([...s], byId);
    const highlights = config.reactivity.highlights;
    const highlighted =
      highlights === "none"
        ? []
        : sorted(new Set([...waiting, ...ready].filter((id) => highlights === "all" || byId.get(id)?.exec !== undefined)));

    const result: CheckResult = {
      waitingCells: sorted(waiting),
      readyCells: sorted(ready),
      newReadyCells: sortByPosition(newReady, byId),
      unsafeCells: sorted(unsafe),
      unsafeOrderCells,
      unsafeOrderUsages,
      waiterLinks,
      readyMakerLinks,
      waitingSymbols,
      highlightedCells: highlighted,
    };
    this.log.debug({ waiting: result.waitingCells.length, ready: result.readyCells.length }, "check");
    return result;
  }

  /** Hybrid falls back to liveness for cells on a cycle or with no known parent. */
  private effectiveSchedule(
    schedule: ExecSchedule,
    v: CellView,
    byId: Map<string, CellView>,
    considered: (v: CellView, parentId: string) => boolean,
  ): ExecSchedule {
    if (schedule !== "hybrid_dag_liveness_based") return schedule;
    const parents = [...v.parents.keys()].filter((p) => considered(v, p));
    if (parents.length === 0 || onCycle(v.id, byId)) return "liveness_based";
    return "dag_based";
  }

  private lastExecutedCounter(): number | undefined {
    const id = this.ctx.lastExecutedCellId;
    return id === undefined ? undefined : this.ctx.cells.current(id)?.counter;
  }

  private cellViews(): CellView[] {
    const { cells, globalScope, config } = this.ctx;
    const views: CellView[] = [];
    for (const id of cells.ids()) {
      const exec = cells.current(id);
      const draft = cells.draft(id);
      const position = cells.positionOf(id);
      if (position === undefined) continue;
      if (exec === undefined && draft === undefined) continue;
      const statements: readonly StatementSource[] = draft?.statements ?? exec?.statements ?? [];
      const resolved = resolveLiveness(computeLiveness(statements), globalScope);
      const live = new Set(resolved.live);
      const unresolved = [...resolved.unresolved];
      const parents = new Map<string, Set<DataSymbol>>();
      const addParent = (producerId: string | undefined, sym: DataSymbol) => {
        if (producerId === undefined) return;
        let syms = parents.get(producerId);
        if (syms === undefined) {
          syms = new Set();
          parents.set(producerId, syms);
        }
        syms.add(sym);
      };
      if (exec !== undefined && draft === undefined) {
        for (const [sym, valueTs] of usedSymbols(exec, config)) {
          if (sym.tombstoned) continue;
          if (sym.isGloballyAccessible) live.add(sym);
          addParent(cells.atCounter(valueTs.cellNum)?.id, sym);
        }
      }
      for (const sym of live) addParent(cells.atTimestamp(sym.timestamp)?.id, sym);
      views.push({
        id,
        position,
        counter: exec?.counter ?? 0,
        exec,
        live: [...live],
        unresolved,
        dead: new Set(resolved.dead),
        parents,
      });
    }
    return views;
  }
}

/** Dynamic uses where dynamic slicing is on and recorded any; static uses otherwise. */
function usedSymbols(cell: Cell, config: FlowConfig): Array<[DataSymbol, { cellNum: number }]> {
  const contexts: DepContext[] = [];
  if (config.slicing.dynamicEnabled && cell.usedSymbols.dynamic.size > 0) contexts.push("dynamic");
  else if (config.slicing.staticEnabled) contexts.push("static");
  return contexts.flatMap((ctx) => [...cell.usedSymbols[ctx].entries()]);
}

function onCycle(start: string, byId: Map<string, CellView>): boolean {
  const seen = new Set<string>();
  const stack = [...(byId.get(start)?.parents.keys() ?? [])].filter((p) => p !== start);
  for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
    if (id === start) return true;
    if (seen.has(id)) continue;
    seen.add(id);
    for (const p of byId.get(id)?.parents.keys() ?? []) if (p !== id) stack.push(p);
  }
  return false;
}

function pushUnique(rec: Record<string, string[]>, key: string, value: string): void {
  const list = (rec[key] ??= []);
  if (!list.includes(value)) list.push(value);
}

function sortByPosition(ids: string[], byId: Map<string, CellView>): string[] {
  return ids.sort((a, b) => (byId.get(a)?.position ?? 0) - (byId.get(b)?.position ?? 0));
}
