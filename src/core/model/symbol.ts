// src/core/model/symbol.ts
// DataSymbol: the stable handle for a named or positional binding.

import { TracerStateError } from "../errors";
import type { DepContext } from "../deps/context";
import type { SymbolGraph } from "./graph";
import type { ObjId } from "./identity";
import type { Scope } from "./scope";
import { Timestamp } from "./timestamp";

export type SymbolKind = "data" | "function" | "class" | "module" | "import" | "anonymous";
export type SymbolState = "fresh" | "waiting" | "unsafe";
export type UnsafeReason = "unresolved-dependency" | "missing-ancestor";

/** Attribute names are strings; container positions/keys are numbers or strings. */
export type ElementKey = string | number;

export type Usage = {
  usedAt: Timestamp;
  valueTimestamp: Timestamp;
};

export type SymbolOptions = {
  kind?: SymbolKind;
  isSubscript?: boolean;
  implicit?: boolean;
};

export type UpdateOptions = {
  at: Timestamp;
  /** Replace the parent set (rebinding) instead of adding to it (mutation). */
  overwrite?: boolean;
  /** Clear waiting state. Container bumps and mutations keep it. */
  refresh?: boolean;
};

type EdgeSet = Map<DataSymbol, Timestamp[]>;
type Edges = { parents: EdgeSet; children: EdgeSet };

export class DataSymbol {
  readonly id: number;
  readonly isSubscript: boolean;
  kind: SymbolKind;
  value: unknown;
  objId: ObjId | undefined;

  timestamp: Timestamp = Timestamp.uninitialized();
  lastUsedTimestamp: Timestamp = Timestamp.uninitialized();
  readonly updatedTimestamps: Timestamp[] = [];

  /** Ancestor -> the update of that ancestor this symbol has not caught up with. */
  readonly waitingCauses = new Map<DataSymbol, Timestamp>();
  /** Children of this symbol's namespace that are waiting. */
  readonly waitingElements = new Set<DataSymbol>();
  unsafeReason: UnsafeReason | undefined;
  tombstoned = false;
  /** Created on first read of an untraced attribute or element. */
  implicit: boolean;

  importedModule?: string;
  importedName?: string;

  private readonly edges: Record<DepContext, Edges> = {
    dynamic: { parents: new Map(), children: new Map() },
    static: { parents: new Map(), children: new Map() },
  };
  private readonly usageLog: Record<DepContext, Usage[]> = { dynamic: [], static: [] };

  constructor(
    readonly graph: SymbolGraph,
    public name: ElementKey,
    public containingScope: Scope,
    value: unknown,
    opts: SymbolOptions = {},
  ) {
    this.id = graph.nextSymbolId();
    this.kind = opts.kind ?? "data";
    this.isSubscript = opts.isSubscript ?? false;
    this.implicit = opts.implicit ?? false;
    this.value = undefined;
    this.objId = undefined;
    this.bindValue(value);
    graph.trackSymbol(this);
  }

  get isFunction(): boolean {
    return this.kind === "function";
  }

  get isClass(): boolean {
    return this.kind === "class";
  }

  get isModule(): boolean {
    return this.kind === "module";
  }

  get isImport(): boolean {
    return this.kind === "import" || this.kind === "module";
  }

  get isAnonymous(): boolean {
    return this.kind === "anonymous";
  }

  get isGloballyAccessible(): boolean {
    return !this.tombstoned && this.containingScope.isGloballyAccessible;
  }

  get readableName(): string {
    return this.containingScope.qualify(this.name, this.isSubscript);
  }

  get requiredTimestamp(): Timestamp {
    return Timestamp.max(...this.waitingCauses.values());
  }

  get fresherAncestors(): DataSymbol[] {
    return [...this.waitingCauses.keys()];
  }

  get isShallowWaiting(): boolean {
    return this.waitingCauses.size > 0;
  }

  get isWaiting(): boolean {
    return this.waitingIn(new Set(), undefined);
  }

  get state(): SymbolState {
    if (this.unsafeReason !== undefined) return "unsafe";
    return this.isWaiting ? "waiting" : "fresh";
  }

  /**
   * Waiting as seen from a cell at `position`. A cause only counts when the
   * cell that produced it sits before `position`; causes whose cell has no
   * position count everywhere.
   */
  isWaitingAtPosition(position: number, positionOf: (ts: Timestamp) => number | undefined): boolean {
    return this.waitingIn(new Set(), (ts) => {
      const p = positionOf(ts);
      return p === undefined || p < position;
    });
  }

  private waitingIn(seen: Set<DataSymbol>, counts: ((ts: Timestamp) => boolean) | undefined): boolean {
    if (seen.has(this) || this.tombstoned) return false;
    seen.add(this);
    for (const ts of this.waitingCauses.values()) {
      if (counts === undefined || counts(ts)) return true;
    }
    for (const el of this.waitingElements) {
      if (el.waitingIn(seen, counts)) return true;
    }
    return false;
  }

  // ─────────────────────────────────────────────────────────────────
  // Updates
  // ─────────────────────────────────────────────────────────────────

  bindValue(value: unknown): void {
    const nextId = this.graph.identities.idOf(value);
    if (nextId !== this.objId) {
      if (this.objId !== undefined) this.graph.identities.removeAlias(this.objId, this);
      if (nextId !== undefined) this.graph.identities.addAlias(nextId, this);
      this.objId = nextId;
    }
    this.value = value;
  }

  /** Append `at` to the update history. Repeated updates within one statement collapse. */
  recordUpdate(at: Timestamp, refresh = true): void {
    if (at.lt(this.timestamp)) {
      throw new TracerStateError(`update of ${this.readableName} at ${at} precedes its last update ${this.timestamp}`);
    }
    if (!at.equals(this.timestamp)) this.updatedTimestamps.push(at);
    this.timestamp = at;
    if (refresh) {
      this.waitingCauses.clear();
      this.waitingElements.clear();
      this.unsafeReason = undefined;
    }
  }

  update(value: unknown, deps: Iterable<DataSymbol>, opts: UpdateOptions): void {
    this.bindValue(value);
    this.tombstoned = false;
    this.implicit = false;
    this.recordUpdate(opts.at, opts.refresh ?? true);
    this.setParents(deps, opts.at, opts.overwrite ?? true);
  }

  /** Write parent edges into the active dependency context. */
  setParents(deps: Iterable<DataSymbol>, at: Timestamp, overwrite: boolean): void {
    const ctx = this.graph.depContexts.require();
    const own = this.edges[ctx];
    const next = new Set(deps);
    next.delete(this);
    if (overwrite) {
      for (const parent of [...own.parents.keys()]) {
        if (!next.has(parent)) this.unlink(parent, ctx);
      }
    }
    for (const parent of next) {
      appendEdge(own.parents, parent, at);
      appendEdge(parent.edges[ctx].children, this, at);
    }
  }

  private unlink(parent: DataSymbol, ctx: DepContext): void {
    this.edges[ctx].parents.delete(parent);
    parent.edges[ctx].children.delete(this);
  }

  tombstone(at: Timestamp): void {
    this.recordUpdate(at);
    this.releaseIdentity();
    this.value = undefined;
    this.tombstoned = true;
  }

  /** Stop counting as an alias of the bound object. A later rebind restores it. */
  releaseIdentity(): void {
    if (this.objId !== undefined) this.graph.identities.removeAlias(this.objId, this);
    this.objId = undefined;
  }

  /** Remove every edge touching this symbol. */
  detach(): void {
    for (const ctx of ["dynamic", "static"] as const) {
      for (const parent of [...this.edges[ctx].parents.keys()]) this.unlink(parent, ctx);
      for (const child of [...this.edges[ctx].children.keys()]) child.unlink(this, ctx);
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Reads
  // ─────────────────────────────────────────────────────────────────

  /** Latest update at or before `at` (strictly before when `strict`). */
  valueTimestampAt(at: Timestamp, strict = false): Timestamp {
    for (let i = this.updatedTimestamps.length - 1; i >= 0; i--) {
      const ts = this.updatedTimestamps[i];
      if (ts !== undefined && (strict ? ts.lt(at) : ts.lte(at))) return ts;
    }
    return Timestamp.uninitialized();
  }

  /**
   * Record a read at `usedAt`. A data dependency is only recorded when the
   * value read was produced strictly earlier.
   */
  recordUsage(usedAt: Timestamp, ctx: DepContext, strict = false): Usage | undefined {
    const valueTimestamp = this.valueTimestampAt(usedAt, strict);
    if (!valueTimestamp.isInitialized) return undefined;
    const usage = { usedAt, valueTimestamp };
    this.usageLog[ctx].push(usage);
    if (usedAt.gt(this.lastUsedTimestamp)) this.lastUsedTimestamp = usedAt;
    if (valueTimestamp.lt(usedAt)) this.graph.dataDeps.add(ctx, usedAt, valueTimestamp);
    return usage;
  }

  usages(ctx: DepContext = "dynamic"): readonly Usage[] {
    return this.usageLog[ctx];
  }

  parents(ctx: DepContext = "dynamic"): ReadonlyMap<DataSymbol, readonly Timestamp[]> {
    return this.edges[ctx].parents;
  }

  children(ctx: DepContext = "dynamic"): ReadonlyMap<DataSymbol, readonly Timestamp[]> {
    return this.edges[ctx].children;
  }

  hasEdges(): boolean {
    return DEP_KEYS.some((ctx) => this.edges[ctx].parents.size > 0 || this.edges[ctx].children.size > 0);
  }

  typeAnnotation(): string {
    return annotate(this.value, 0);
  }

  toString(): string {
    return `<${this.readableName}@${this.timestamp}>`;
  }
}

const DEP_KEYS: readonly DepContext[] = ["dynamic", "static"];

function appendEdge(set: EdgeSet, sym: DataSymbol, at: Timestamp): void {
  const stamps = set.get(sym);
  if (stamps === undefined) {
    set.set(sym, [at]);
  } else if (!stamps[stamps.length - 1]?.equals(at)) {
    stamps.push(at);
  }
}

function annotate(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "function") return "Function";
  if (typeof value !== "object") return typeof value;
  if (Array.isArray(value)) {
    if (depth > 1 || value.length === 0) return "unknown[]";
    const kinds = new Set(value.map((v) => annotate(v, depth + 1)));
    const [only] = kinds;
    return kinds.size === 1 && only !== undefined ? `${only}[]` : "unknown[]";
  }
  if (value instanceof Map) return "Map<unknown, unknown>";
  if (value instanceof Set) return "Set<unknown>";
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === Object.prototype || proto === null) return "Record<string, unknown>";
  const ctorName = value.constructor.name;
  return ctorName || "object";
}
