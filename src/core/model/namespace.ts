// src/core/model/namespace.ts
// Scope backed by a container value: attributes live in the inherited table,
// subscript children (positions and keys) in `elements`.

import type { SymbolGraph } from "./graph";
import type { ObjId } from "./identity";
import { Scope, type Upserted, type UpsertOptions } from "./scope";
import { DataSymbol, type ElementKey } from "./symbol";
import type { Timestamp } from "./timestamp";

export type SpliceRange = {
  start: number;
  deleteCount: number;
  insertCount: number;
};

export class Namespace extends Scope {
  private readonly elements = new Map<ElementKey, DataSymbol>();

  constructor(
    graph: SymbolGraph,
    readonly objId: ObjId,
    readonly container: object,
    readonly generation: number,
  ) {
    super(graph, `<obj ${objId}>`, "namespace");
  }

  override get isNamespace(): boolean {
    return true;
  }

  /** Live symbols currently bound to the container. */
  get owners(): DataSymbol[] {
    return [...this.graph.identities.aliases(this.objId)].filter((s) => !s.tombstoned);
  }

  override get isGloballyAccessible(): boolean {
    return this.owners.some((o) => o.isGloballyAccessible);
  }

  override get fullPath(): string {
    const [owner] = this.owners;
    return owner === undefined ? this.scopeName : owner.readableName;
  }

  override qualify(name: ElementKey, isSubscript: boolean): string {
    if (!isSubscript) return `${this.fullPath}.${String(name)}`;
    return typeof name === "number" ? `${this.fullPath}[${name}]` : `${this.fullPath}[${JSON.stringify(name)}]`;
  }

  get isPositional(): boolean {
    return Array.isArray(this.container);
  }

  /** Negative positions count from the end of an array container. */
  normalizeKey(key: ElementKey): ElementKey {
    if (typeof key === "number" && key < 0 && Array.isArray(this.container)) return this.container.length + key;
    return key;
  }

  lookupElement(key: ElementKey): DataSymbol | undefined {
    return this.elements.get(this.normalizeKey(key));
  }

  upsertElement(key: ElementKey, value: unknown, deps: Iterable<DataSymbol>, opts: UpsertOptions): Upserted {
    const k = this.normalizeKey(key);
    let symbol = this.elements.get(k);
    const created = symbol === undefined;
    if (symbol === undefined) {
      symbol = new DataSymbol(this.graph, k, this, value, { kind: opts.kind, isSubscript: true });
      this.elements.set(k, symbol);
    }
    symbol.update(value, deps, opts);
    return { symbol, created };
  }

  /** Symbol for an element nobody stored through the tracer; it has no update history. */
  implicitElement(key: ElementKey, value: unknown, isSubscript: boolean): DataSymbol {
    const k = isSubscript ? this.normalizeKey(key) : String(key);
    const existing = isSubscript ? this.elements.get(k) : this.table.get(String(k));
    if (existing !== undefined) return existing;
    const symbol = new DataSymbol(this.graph, k, this, value, { isSubscript, implicit: true });
    if (isSubscript) this.elements.set(k, symbol);
    else this.table.set(String(k), symbol);
    return symbol;
  }

  deleteElement(key: ElementKey, at: Timestamp): DataSymbol | undefined {
    const k = this.normalizeKey(key);
    const symbol = this.elements.get(k);
    if (symbol === undefined) return undefined;
    this.elements.delete(k);
    symbol.tombstone(at);
    return symbol;
  }

  /**
   * Move every positional child at or after `from` by `delta`, keeping each
   * symbol's identity. Returns the moved symbols.
   */
  shiftFrom(from: number, delta: number, at: Timestamp): DataSymbol[] {
    if (delta === 0) return [];
    const moving = [...this.elements.entries()]
      .filter((e): e is [number, DataSymbol] => typeof e[0] === "number" && e[0] >= from)
      .sort((a, b) => (delta > 0 ? b[0] - a[0] : a[0] - b[0]));
    for (const [pos] of moving) this.elements.delete(pos);
    for (const [pos, sym] of moving) {
      sym.name = pos + delta;
      this.elements.set(pos + delta, sym);
      sym.bindValue(this.valueAt(pos + delta));
      sym.recordUpdate(at, false);
    }
    return moving.map(([, sym]) => sym);
  }

  /**
   * Apply a positional edit that already happened on the container: tombstone
   * removed positions, shift the tail, create symbols for inserted positions.
   */
  spliceElements(range: SpliceRange, deps: Iterable<DataSymbol>, at: Timestamp): { touched: DataSymbol[]; removed: DataSymbol[] } {
    const removed: DataSymbol[] = [];
    for (let i = range.start; i < range.start + range.deleteCount; i++) {
      const gone = this.deleteElement(i, at);
      if (gone !== undefined) removed.push(gone);
    }
    const touched = this.shiftFrom(range.start + range.deleteCount, range.insertCount - range.deleteCount, at);
    const depList = [...deps];
    for (let i = range.start; i < range.start + range.insertCount; i++) {
      touched.push(this.upsertElement(i, this.valueAt(i), depList, { at }).symbol);
    }
    return { touched, removed };
  }

  clearElements(at: Timestamp): DataSymbol[] {
    const removed = [...this.elements.values()];
    this.elements.clear();
    for (const sym of removed) sym.tombstone(at);
    return removed;
  }

  /**
   * Rebuild subscript children against the container's current membership.
   * Children whose value changed are updated; vanished members are tombstoned.
   */
  resync(deps: Iterable<DataSymbol>, at: Timestamp): DataSymbol[] {
    const current = this.members();
    const depList = [...deps];
    const touched: DataSymbol[] = [];
    for (const [key, sym] of [...this.elements.entries()]) {
      if (!current.has(key)) {
        this.elements.delete(key);
        sym.tombstone(at);
        touched.push(sym);
      }
    }
    for (const [key, value] of current) {
      const sym = this.elements.get(key);
      if (sym !== undefined && (sym.implicit || sym.value !== value)) {
        touched.push(this.upsertElement(key, value, depList, { at, overwrite: false, refresh: false }).symbol);
      }
    }
    return touched;
  }

  override forget(sym: DataSymbol): void {
    if (!sym.isSubscript) {
      super.forget(sym);
      return;
    }
    if (this.elements.get(sym.name) === sym) this.elements.delete(sym.name);
  }

  /** The container has no live owner left. */
  get isOrphaned(): boolean {
    return this.graph.identities.aliases(this.objId).size === 0;
  }

  elementEntries(): Array<[ElementKey, DataSymbol]> {
    return [...this.elements.entries()].sort(([a], [b]) => compareKeys(a, b));
  }

  /** Attribute and element children. */
  children(): DataSymbol[] {
    return [...this.table.values(), ...this.elements.values()];
  }

  valueAt(key: ElementKey): unknown {
    const c = this.container;
    if (Array.isArray(c)) return typeof key === "number" ? c[key] : undefined;
    if (c instanceof Map) return c.get(key);
    return Reflect.get(c, key);
  }

  private members(): Map<ElementKey, unknown> {
    const c = this.container;
    const out = new Map<ElementKey, unknown>();
    if (Array.isArray(c)) {
      c.forEach((v, i) => out.set(i, v));
    } else if (c instanceof Map) {
      for (const [k, v] of c) if (typeof k === "string" || typeof k === "number") out.set(k, v);
    } else if (!(c instanceof Set)) {
      for (const [k, v] of Object.entries(c)) out.set(k, v);
    }
    return out;
  }
}

function compareKeys(a: ElementKey, b: ElementKey): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a).localeCompare(String(b));
}
