// src/core/deps/context.ts
// Which edge set (dynamic or static) graph writes go to.

import { TracerStateError } from "../errors";

export type DepContext = "dynamic" | "static";

export const DEP_CONTEXTS: readonly DepContext[] = ["dynamic", "static"];

/**
 * Explicit context stack. Each task that writes edges owns one; a session
 * owns the stack used by its tracer.
 */
export class DepContextStack {
  private readonly frames: DepContext[] = [];

  current(): DepContext | undefined {
    return this.frames[this.frames.length - 1];
  }

  /** Active context, or throw: edges are never written outside a context. */
  require(): DepContext {
    const ctx = this.current();
    if (ctx === undefined) throw new TracerStateError("no dependency context is active");
    return ctx;
  }

  push(ctx: DepContext): void {
    this.frames.push(ctx);
  }

  pop(): DepContext {
    const ctx = this.frames.pop();
    if (ctx === undefined) throw new TracerStateError("dependency context stack underflow");
    return ctx;
  }

  get depth(): number {
    return this.frames.length;
  }

  within<T>(ctx: DepContext, fn: () => T): T {
    this.push(ctx);
    try {
      return fn();
    } finally {
      this.pop();
    }
  }

  forEach(contexts: readonly DepContext[], fn: (ctx: DepContext) => void): void {
    for (const ctx of contexts) this.within(ctx, () => fn(ctx));
  }
}
