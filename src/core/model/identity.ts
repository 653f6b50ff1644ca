// src/core/model/identity.ts
// Object identity -> symbols currently bound to that object.

import type { DataSymbol } from "./symbol";

export type ObjId = number;

export function isObjectLike(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

/**
 * Ids are handed out through a WeakMap, so the table never keeps a host
 * object alive. When the last alias of an id goes away its generation is
 * bumped; anything cached against the old generation (a Namespace) is stale
 * from then on, even if the same object is later bound again.
 */
export class IdentityTable {
  private readonly ids = new WeakMap<object, ObjId>();
  private nextId = 1;
  private readonly aliasesById = new Map<ObjId, Set<DataSymbol>>();
  private readonly generations = new Map<ObjId, number>();

  idOf(value: unknown): ObjId | undefined {
    if (!isObjectLike(value)) return undefined;
    let id = this.ids.get(value);
    if (id === undefined) {
      id = this.nextId++;
      this.ids.set(value, id);
    }
    return id;
  }

  aliases(id: ObjId | undefined): ReadonlySet<DataSymbol> {
    if (id === undefined) return NO_ALIASES;
    return this.aliasesById.get(id) ?? NO_ALIASES;
  }

  aliasesOf(value: unknown): ReadonlySet<DataSymbol> {
    return this.aliases(this.idOf(value));
  }

  addAlias(id: ObjId, sym: DataSymbol): void {
    let set = this.aliasesById.get(id);
    if (set === undefined) {
      set = new Set();
      this.aliasesById.set(id, set);
    }
    set.add(sym);
  }

  removeAlias(id: ObjId, sym: DataSymbol): void {
    const set = this.aliasesById.get(id);
    if (set === undefined || !set.delete(sym)) return;
    if (set.size === 0) {
      this.aliasesById.delete(id);
      this.generations.set(id, this.generation(id) + 1);
    }
  }

  generation(id: ObjId): number {
    return this.generations.get(id) ?? 0;
  }
}

const NO_ALIASES: ReadonlySet<DataSymbol> = new Set();
