// src/core/model/scope.ts
// Lexical scopes. Namespaces (container-backed scopes) extend this.

import type { SymbolGraph } from "./graph";
import { DataSymbol, type ElementKey, type SymbolKind } from "./symbol";
import type { Timestamp } from "./timestamp";

export type ScopeKind = "global" | "function" | "class" | "namespace";

export type UpsertOptions = {
  at: Timestamp;
  kind?: SymbolKind;
  overwrite?: boolean;
  refresh?: boolean;
};

export type Upserted = { symbol: DataSymbol; created: boolean };

export class Scope {
  protected readonly table = new Map<string, DataSymbol>();
  /** Function scopes are closed when the call returns. */
  closed = false;

  constructor(
    readonly graph: SymbolGraph,
    readonly scopeName: string,
    readonly kind: ScopeKind,
    readonly parent?: Scope,
  ) {}

  get isGlobal(): boolean {
    return this.kind === "global";
  }

  get isNamespace(): boolean {
    return false;
  }

  get isGloballyAccessible(): boolean {
    return this.isGlobal;
  }

  get fullPath(): string {
    if (this.isGlobal || this.parent === undefined) return "";
    const prefix = this.parent.fullPath;
    return prefix ? `${prefix}.${this.scopeName}` : this.scopeName;
  }

  qualify(name: ElementKey, _isSubscript: boolean): string {
    const path = this.fullPath;
    return path ? `${path}.${String(name)}` : String(name);
  }

  lookupLocal(name: string): DataSymbol | undefined {
    return this.table.get(name);
  }

  lookup(name: string): DataSymbol | undefined {
    for (let s: Scope | undefined = this; s !== undefined; s = s.parent) {
      const found = s.lookupLocal(name);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  /** Bind `name` here: rebinding keeps the existing handle. */
  upsert(name: string, value: unknown, deps: Iterable<DataSymbol>, opts: UpsertOptions): Upserted {
    let symbol = this.table.get(name);
    const created = symbol === undefined;
    if (symbol === undefined) {
      symbol = new DataSymbol(this.graph, name, this, value, { kind: opts.kind });
      this.table.set(name, symbol);
    } else if (opts.kind !== undefined) {
      symbol.kind = opts.kind;
    }
    symbol.update(value, deps, opts);
    return { symbol, created };
  }

  /** Unbind `name`; the handle is tombstoned so historical edges stay resolvable. */
  delete(name: string, at: Timestamp): DataSymbol | undefined {
    const symbol = this.table.get(name);
    if (symbol === undefined) return undefined;
    this.table.delete(name);
    symbol.tombstone(at);
    return symbol;
  }

  /** Drop `sym` from this table if it is still the handle bound here. */
  forget(sym: DataSymbol): void {
    const key = String(sym.name);
    if (this.table.get(key) === sym) this.table.delete(key);
  }

  /** The call returned: its bindings no longer alias anything live. */
  close(): void {
    this.closed = true;
    for (const sym of this.table.values()) sym.releaseIdentity();
  }

  childScope(name: string, kind: ScopeKind = "function"): Scope {
    return new Scope(this.graph, name, kind, this);
  }

  symbols(): IterableIterator<DataSymbol> {
    return this.table.values();
  }

  get size(): number {
    return this.table.size;
  }
}
