// src/core/model/timestamp.ts
// Logical clock: (cell execution counter, statement index within that cell).

import { TimestampComparisonError } from "../errors";

/**
 * Totally ordered, lexicographic on (cellNum, stmtNum).
 *
 * Instances are immutable values. Compare with `equals`; index maps by `key`.
 */
export class Timestamp {
  private constructor(
    readonly cellNum: number,
    readonly stmtNum: number,
  ) {}

  static of(cellNum: number, stmtNum: number): Timestamp {
    return Object.freeze(new Timestamp(cellNum, stmtNum));
  }

  static uninitialized(): Timestamp {
    return UNINITIALIZED;
  }

  static max(...tss: Timestamp[]): Timestamp {
    let best = UNINITIALIZED;
    for (const ts of tss) if (ts.gt(best)) best = ts;
    return best;
  }

  /** Stable string form, for use as a Map or Set key. */
  get key(): string {
    return `${this.cellNum}:${this.stmtNum}`;
  }

  get isInitialized(): boolean {
    return this.cellNum > -1 && this.stmtNum > -1;
  }

  compare(other: unknown): number {
    if (!(other instanceof Timestamp)) throw new TimestampComparisonError(other);
    if (this.cellNum !== other.cellNum) return this.cellNum < other.cellNum ? -1 : 1;
    if (this.stmtNum !== other.stmtNum) return this.stmtNum < other.stmtNum ? -1 : 1;
    return 0;
  }

  lt(other: unknown): boolean {
    return this.compare(other) < 0;
  }

  lte(other: unknown): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: unknown): boolean {
    return this.compare(other) > 0;
  }

  gte(other: unknown): boolean {
    return this.compare(other) >= 0;
  }

  /** Equality never throws: anything that is not a Timestamp is simply unequal. */
  equals(other: unknown): boolean {
    return other instanceof Timestamp && this.cellNum === other.cellNum && this.stmtNum === other.stmtNum;
  }

  plus(cellDelta: number, stmtDelta: number): Timestamp {
    return Timestamp.of(this.cellNum + cellDelta, this.stmtNum + stmtDelta);
  }

  toString(): string {
    return this.key;
  }

  toJSON(): [number, number] {
    return [this.cellNum, this.stmtNum];
  }
}

const UNINITIALIZED = Timestamp.of(-1, -1);

export function compareTimestamps(a: Timestamp, b: Timestamp): number {
  return a.compare(b);
}
