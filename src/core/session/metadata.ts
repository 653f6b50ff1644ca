// src/core/session/metadata.ts
// Plain mappings for front-ends: what each global symbol is, and how each
// cell stands after the latest check.

import type { CellRegistry } from "../model/cell";
import type { Scope } from "../model/scope";
import type { SymbolState } from "../model/symbol";
import type { CheckResult } from "../reactivity/checker";

export type SymbolMetadata = {
  type: string;
  state: SymbolState;
  timestamp: [number, number];
  /** Execution counter of the cell that last updated the symbol. */
  cell: number;
  importedModule?: string;
  importedName?: string;
};

export type CellMetadata = {
  id: string;
  position: number | undefined;
  waiting: boolean;
  ready: boolean;
  unsafe: boolean;
};

export type SessionMetadata = {
  symbols: Record<string, SymbolMetadata>;
  /** Keyed by execution counter. */
  cells: Record<number, CellMetadata>;
};

export function collectMetadata(scope: Scope, cells: CellRegistry, check: CheckResult): SessionMetadata {
  const symbols: Record<string, SymbolMetadata> = {};
  for (const sym of scope.symbols()) {
    if (sym.tombstoned || sym.isAnonymous) continue;
    const entry: SymbolMetadata = {
      type: sym.typeAnnotation(),
      state: sym.state,
      timestamp: sym.timestamp.toJSON(),
      cell: sym.timestamp.cellNum,
    };
    if (sym.importedModule !== undefined) entry.importedModule = sym.importedModule;
    if (sym.importedName !== undefined) entry.importedName = sym.importedName;
    symbols[sym.readableName] = entry;
  }

  const waiting = new Set(check.waitingCells);
  const ready = new Set(check.readyCells);
  const unsafe = new Set(check.unsafeCells);
  const cellMeta: Record<number, CellMetadata> = {};
  for (const cell of cells.currentCells()) {
    cellMeta[cell.counter] = {
      id: cell.id,
      position: cell.position,
      waiting: waiting.has(cell.id),
      ready: ready.has(cell.id),
      unsafe: unsafe.has(cell.id),
    };
  }
  return { symbols, cells: cellMeta };
}
