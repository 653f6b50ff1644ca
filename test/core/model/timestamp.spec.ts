// test/core/model/timestamp.spec.ts
// Timestamp ordering, equality and printing.

import { describe, expect, it } from "vitest";
import { TimestampComparisonError } from "../../../src/core/errors";
import { compareTimestamps, Timestamp } from "../../../src/core/model/timestamp";

describe("Timestamp", () => {
  it("orders by cell counter, then statement index", () => {
    expect(Timestamp.of(1, 5).lt(Timestamp.of(2, 0))).toBe(true);
    expect(Timestamp.of(2, 1).gt(Timestamp.of(2, 0))).toBe(true);
    expect(Timestamp.of(3, 3).lte(Timestamp.of(3, 3))).toBe(true);
    expect(Timestamp.of(3, 3).gte(Timestamp.of(3, 4))).toBe(false);
  });

  it("compares equal coordinates by value", () => {
    expect(Timestamp.of(4, 2)).not.toBe(Timestamp.of(4, 2));
    expect(Timestamp.of(4, 2).equals(Timestamp.of(4, 2))).toBe(true);
    expect(Timestamp.of(4, 2).key).toBe("4:2");
  });

  it("treats (-1, -1) as uninitialized", () => {
    expect(Timestamp.uninitialized().isInitialized).toBe(false);
    expect(Timestamp.uninitialized()).toEqual(Timestamp.of(-1, -1));
    expect(Timestamp.of(0, 0).isInitialized).toBe(true);
  });

  it("refuses to order against anything else", () => {
    expect(() => Timestamp.of(1, 0).lt(5)).toThrow(TimestampComparisonError);
    expect(() => Timestamp.of(1, 0).compare("1:0")).toThrow("cannot compare Timestamp with string");
  });

  it("answers equality against anything without throwing", () => {
    expect(Timestamp.of(1, 0).equals([1, 0])).toBe(false);
    expect(Timestamp.of(1, 0).equals(null)).toBe(false);
  });

  it("takes the max, defaulting to uninitialized", () => {
    expect(Timestamp.max()).toBe(Timestamp.uninitialized());
    expect(Timestamp.max(Timestamp.of(1, 0), Timestamp.of(2, 1), Timestamp.of(2, 0))).toEqual(Timestamp.of(2, 1));
  });

  it("sorts and prints", () => {
    const sorted = [Timestamp.of(2, 0), Timestamp.of(1, 1), Timestamp.of(1, 0)].sort(compareTimestamps);
    expect(sorted.map(String)).toEqual(["1:0", "1:1", "2:0"]);
    expect(JSON.stringify(Timestamp.of(2, 1))).toBe("[2,1]");
    expect(Timestamp.of(2, 1).plus(1, -1)).toEqual(Timestamp.of(3, 0));
  });
});
