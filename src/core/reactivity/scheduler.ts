// src/core/reactivity/scheduler.ts
// Reactive mode: which newly ready cells the host should run next, and which
// cells are queued to run during the current batch.

import type { FlowConfig } from "../config";
import type { CheckResult } from "./checker";

export class ReactiveScheduler {
  private ran = new Set<string>();
  private queued: string[] = [];

  constructor(private readonly ctx: { readonly config: FlowConfig }) {}

  get active(): boolean {
    return this.ctx.config.reactivity.execMode === "reactive";
  }

  /** A user-triggered run starts a new cascade. */
  start(cellId: string): void {
    this.ran = new Set([cellId]);
  }

  markRan(cellId: string): void {
    this.ran.add(cellId);
    this.unschedule(cellId);
  }

  /** Cells the host is about to run, in run order. Replaces the previous queue. */
  schedule(cellIds: readonly string[]): void {
    this.queued = [...cellIds];
  }

  unschedule(cellId: string): void {
    this.queued = this.queued.filter((id) => id !== cellId);
  }

  isScheduled(cellId: string): boolean {
    return this.queued.includes(cellId);
  }

  get scheduled(): readonly string[] {
    return this.queued;
  }

  /** Newly ready cells not yet run in this cascade, in notebook order. */
  next(result: CheckResult): string[] {
    if (!this.active) return [];
    return result.newReadyCells.filter((id) => !this.ran.has(id));
  }
}
