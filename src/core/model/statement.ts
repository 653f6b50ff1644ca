// src/core/model/statement.ts

import { Timestamp } from "./timestamp";

/** What the host knows about one statement before it runs. */
export type StatementSource = {
  text: string;
  /** Names the statement reads, syntactically. */
  reads?: readonly string[];
  /** Names the statement binds, syntactically. */
  writes?: readonly string[];
  /** Opaque host node (parsed form), handed back to the host untouched. */
  node?: unknown;
};

export class Statement {
  readonly reads: readonly string[];
  readonly writes: readonly string[];
  readonly node: unknown;

  constructor(
    readonly cellCounter: number,
    readonly index: number,
    readonly text: string,
    refs: Omit<StatementSource, "text"> = {},
  ) {
    this.reads = refs.reads ?? [];
    this.writes = refs.writes ?? [];
    this.node = refs.node;
  }

  get timestamp(): Timestamp {
    return Timestamp.of(this.cellCounter, this.index);
  }
}
