// src/core/model/graph.ts
// What the entity model needs from the session that owns it.

import type { DepContextStack } from "../deps/context";
import type { DataDepIndex } from "../deps/dataDeps";
import type { IdentityTable } from "./identity";
import type { Namespace } from "./namespace";
import type { DataSymbol } from "./symbol";

export interface SymbolGraph {
  readonly identities: IdentityTable;
  readonly depContexts: DepContextStack;
  readonly dataDeps: DataDepIndex;
  nextSymbolId(): number;
  trackSymbol(sym: DataSymbol): void;
  /** Live namespace for a container value, if one exists for its current generation. */
  namespaceOf(value: unknown): Namespace | undefined;
  /** Namespace for a tracked container, created on demand; undefined when nothing aliases it. */
  ensureNamespace(value: unknown): Namespace | undefined;
}
