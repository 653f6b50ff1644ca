// src/core/analysis/liveness.ts
// Live references (read before any write in the cell) and dead references
// (names the cell binds), from the host's per-statement syntactic refs.

import type { Scope } from "../model/scope";
import type { DataSymbol } from "../model/symbol";

export type StatementRefs = {
  reads?: readonly string[];
  writes?: readonly string[];
};

export type Liveness = {
  live: string[];
  dead: string[];
};

export type ResolvedLiveness = {
  live: DataSymbol[];
  /** Live names with no (or only a deleted) binding. */
  unresolved: string[];
  dead: string[];
};

export function computeLiveness(statements: readonly StatementRefs[]): Liveness {
  const defined = new Set<string>();
  const live = new Set<string>();
  const dead = new Set<string>();
  for (const stmt of statements) {
    for (const name of stmt.reads ?? []) {
      if (!defined.has(name)) live.add(name);
    }
    for (const name of stmt.writes ?? []) {
      defined.add(name);
      dead.add(name);
    }
  }
  return { live: [...live], dead: [...dead] };
}

export function resolveLiveness(liveness: Liveness, scope: Scope): ResolvedLiveness {
  const live: DataSymbol[] = [];
  const unresolved: string[] = [];
  for (const name of liveness.live) {
    const sym = scope.lookup(name);
    if (sym === undefined || sym.tombstoned) unresolved.push(name);
    else live.push(sym);
  }
  return { live, unresolved, dead: liveness.dead };
}
