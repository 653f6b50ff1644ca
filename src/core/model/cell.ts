// src/core/model/cell.ts
// Cell executions and the registry that keeps every one of them by counter.

import { createHash } from "node:crypto";
import type { DepContext } from "../deps/context";
import { Statement, type StatementSource } from "./statement";
import type { DataSymbol } from "./symbol";
import type { Timestamp } from "./timestamp";

export type CellOutput = {
  stdout: string;
  stderr: string;
  rich: unknown[];
};

export function emptyOutput(): CellOutput {
  return { stdout: "", stderr: "", rich: [] };
}

export function fingerprint(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/** Source registered for a cell id that has not run in its current form. */
export type CellDraft = {
  id: string;
  text: string;
  statements: readonly StatementSource[];
  fingerprint: string;
};

/** One execution of a cell id. */
export class Cell {
  /** Symbols read whose value came from outside this execution -> the value's timestamp. */
  readonly usedSymbols: Record<DepContext, Map<DataSymbol, Timestamp>> = { dynamic: new Map(), static: new Map() };
  readonly updatedSymbols = new Set<DataSymbol>();
  output: CellOutput = emptyOutput();
  error: string | undefined;
  unknownDependency = false;
  completed = false;

  constructor(
    readonly id: string,
    readonly counter: number,
    readonly text: string,
    readonly statements: readonly Statement[],
    readonly fingerprint: string,
    private readonly registry: CellRegistry,
  ) {}

  get position(): number | undefined {
    return this.registry.positionOf(this.id);
  }

  get isCurrent(): boolean {
    return this.registry.current(this.id) === this;
  }

  statementAt(index: number): Statement | undefined {
    return this.statements[index];
  }
}

export class CellRegistry {
  private readonly byCounter = new Map<number, Cell>();
  private readonly currentById = new Map<string, Cell>();
  private readonly drafts = new Map<string, CellDraft>();
  private readonly positions = new Map<string, number>();
  private counter = 0;

  get currentCounter(): number {
    return this.counter;
  }

  /** Register a new execution of `id`; the counter advances. */
  create(id: string, text: string, sources: readonly StatementSource[]): Cell {
    const counter = ++this.counter;
    const statements = sources.map((s, i) => new Statement(counter, i, s.text, s));
    const cell = new Cell(id, counter, text, statements, fingerprint(text), this);
    this.byCounter.set(counter, cell);
    this.currentById.set(id, cell);
    const draft = this.drafts.get(id);
    if (draft !== undefined && draft.fingerprint === cell.fingerprint) this.drafts.delete(id);
    this.ensurePosition(id);
    return cell;
  }

  setDraft(id: string, text: string, statements: readonly StatementSource[]): CellDraft {
    const draft = { id, text, statements, fingerprint: fingerprint(text) };
    if (this.currentById.get(id)?.fingerprint === draft.fingerprint) {
      this.drafts.delete(id);
    } else {
      this.drafts.set(id, draft);
    }
    this.ensurePosition(id);
    return draft;
  }

  draft(id: string): CellDraft | undefined {
    return this.drafts.get(id);
  }

  current(id: string): Cell | undefined {
    return this.currentById.get(id);
  }

  atCounter(counter: number): Cell | undefined {
    return this.byCounter.get(counter);
  }

  atTimestamp(ts: Timestamp): Cell | undefined {
    return this.byCounter.get(ts.cellNum);
  }

  statementAt(ts: Timestamp): Statement | undefined {
    return this.atTimestamp(ts)?.statementAt(ts.stmtNum);
  }

  isUnchanged(id: string, text: string): boolean {
    return this.currentById.get(id)?.fingerprint === fingerprint(text);
  }

  // ─────────────────────────────────────────────────────────────────
  // Positions
  // ─────────────────────────────────────────────────────────────────

  /** Replace the notebook order. Ids not listed keep no position. */
  setPositions(order: readonly string[]): void {
    this.positions.clear();
    order.forEach((id, i) => this.positions.set(id, i));
  }

  positionOf(id: string): number | undefined {
    return this.positions.get(id);
  }

  /** Position of the cell id whose execution produced `ts`. */
  positionOfTimestamp(ts: Timestamp): number | undefined {
    const cell = this.atTimestamp(ts);
    return cell === undefined ? undefined : this.positions.get(cell.id);
  }

  private ensurePosition(id: string): void {
    if (this.positions.has(id)) return;
    let next = 0;
    for (const pos of this.positions.values()) next = Math.max(next, pos + 1);
    this.positions.set(id, next);
  }

  // ─────────────────────────────────────────────────────────────────
  // Iteration
  // ─────────────────────────────────────────────────────────────────

  /** Ids with a position, in notebook order. */
  ids(): string[] {
    return [...this.positions.entries()].sort((a, b) => a[1] - b[1]).map(([id]) => id);
  }

  /** Latest execution of every positioned id, in notebook order. */
  currentCells(): Cell[] {
    const out: Cell[] = [];
    for (const id of this.ids()) {
      const cell = this.currentById.get(id);
      if (cell !== undefined) out.push(cell);
    }
    return out;
  }

  /** Every execution, oldest first. */
  executions(): Cell[] {
    return [...this.byCounter.values()];
  }
}
