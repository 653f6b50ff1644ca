// src/core/reactivity/propagate.ts
// After a cell completes, everything downstream of what it updated is marked
// waiting until it is recomputed.

import type { Logger } from "pino";
import { DiagCodes, type Diagnostic, warnDiag } from "../diagnostic";
import { Namespace } from "../model/namespace";
import type { DataSymbol } from "../model/symbol";

export type PropagationResult = {
  waiting: Set<DataSymbol>;
  unsafe: Set<DataSymbol>;
};

export class UpdatePropagator {
  constructor(
    private readonly log: Logger,
    private readonly report: (d: Diagnostic) => void,
  ) {}

  /**
   * `rerunsLater` names descendants whose own cell is already queued to run
   * after the updating one; they and everything below them are left alone.
   */
  propagate(updated: ReadonlySet<DataSymbol>, rerunsLater?: (sym: DataSymbol) => boolean): PropagationResult {
    const result: PropagationResult = { waiting: new Set(), unsafe: new Set() };
    const order = [...updated].sort((a, b) => a.timestamp.compare(b.timestamp));
    for (const sym of order) {
      if (sym.tombstoned) this.orphanChildren(sym, result);
      else this.propagateFrom(sym, result, rerunsLater);
    }
    if (result.waiting.size || result.unsafe.size) {
      this.log.debug({ waiting: result.waiting.size, unsafe: result.unsafe.size }, "propagated");
    }
    return result;
  }

  /**
   * Transitively mark dynamic descendants of `cause` waiting. A descendant at
   * or after the cause's timestamp (recomputed later in the same run, or
   * otherwise fresher) is left alone along with everything below it.
   */
  private propagateFrom(
    cause: DataSymbol,
    result: PropagationResult,
    rerunsLater: ((sym: DataSymbol) => boolean) | undefined,
  ): void {
    const at = cause.timestamp;
    const seen = new Set<DataSymbol>([cause]);
    const stack = [...cause.children("dynamic").keys()];
    for (let child = stack.pop(); child !== undefined; child = stack.pop()) {
      if (seen.has(child)) continue;
      seen.add(child);
      if (child.tombstoned || !child.timestamp.lt(at)) continue;
      if (rerunsLater?.(child)) continue;
      child.waitingCauses.set(cause, at);
      result.waiting.add(child);
      markContainersWaiting(child, new Set());
      for (const grandchild of child.children("dynamic").keys()) stack.push(grandchild);
    }
  }

  /** Children of a deleted symbol lost an ancestor with no replacement. */
  private orphanChildren(deleted: DataSymbol, result: PropagationResult): void {
    for (const child of deleted.children("dynamic").keys()) {
      if (child.tombstoned || !child.timestamp.lt(deleted.timestamp)) continue;
      child.unsafeReason = "missing-ancestor";
      result.unsafe.add(child);
      this.report(
        warnDiag(DiagCodes.MissingAncestor, `${child.readableName} depends on deleted ${deleted.readableName}`, {
          data: { symbol: child.readableName, ancestor: deleted.readableName },
        }),
      );
    }
  }
}

function markContainersWaiting(sym: DataSymbol, seen: Set<DataSymbol>): void {
  const scope = sym.containingScope;
  if (!(scope instanceof Namespace)) return;
  for (const owner of scope.owners) {
    if (seen.has(owner)) continue;
    seen.add(owner);
    owner.waitingElements.add(sym);
    markContainersWaiting(owner, seen);
  }
}
