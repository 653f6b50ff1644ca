// src/core/slicing/slice.ts

import type { Statement } from "../model/statement";
import type { Timestamp } from "../model/timestamp";

export type SliceTextOptions = {
  /** Put a "<comment> Cell N" line before each cell's statements. */
  headers?: boolean;
  /** Line comment prefix of the host language. */
  comment?: string;
};

/** Statements reachable from a seed, ordered by timestamp. */
export class Slice {
  constructor(
    readonly timestamps: readonly Timestamp[],
    readonly statements: readonly Statement[],
  ) {}

  get size(): number {
    return this.statements.length;
  }

  has(ts: Timestamp): boolean {
    return this.timestamps.some((t) => t.equals(ts));
  }

  /** Cell counter -> statements of that execution in the slice. */
  byCell(): Map<number, Statement[]> {
    const out = new Map<number, Statement[]>();
    for (const stmt of this.statements) {
      const list = out.get(stmt.cellCounter);
      if (list === undefined) out.set(stmt.cellCounter, [stmt]);
      else list.push(stmt);
    }
    return out;
  }

  cellCounters(): number[] {
    return [...this.byCell().keys()];
  }

  text(opts: SliceTextOptions = {}): string {
    const comment = opts.comment ?? "#";
    const blocks: string[] = [];
    for (const [counter, stmts] of this.byCell()) {
      const body = stmts.map((s) => s.text).join("\n");
      blocks.push(opts.headers ? `${comment} Cell ${counter}\n${body}` : body);
    }
    return blocks.join("\n\n");
  }
}
