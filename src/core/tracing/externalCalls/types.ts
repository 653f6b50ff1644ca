// src/core/tracing/externalCalls/types.ts
// Effects of calls into code the tracer cannot see inside.

import type { SpliceRange } from "../../model/namespace";
import type { DataSymbol, ElementKey } from "../../model/symbol";

export type ReceiverKind = "array" | "map" | "set" | "object" | "module" | "function" | "primitive" | "none";

/** Where a positional edit lands, computed against the receiver before the call runs. */
export type SpliceLocator = (receiver: readonly unknown[], args: readonly unknown[]) => SpliceRange | undefined;

export type CallEffect =
  | { tag: "NoEffect" }
  /** Mutate the receiver when the call returns nothing or the receiver itself. */
  | { tag: "StandardMutation" }
  | { tag: "MutateReceiver" }
  | { tag: "MutateArgs"; positions: readonly number[] }
  | { tag: "PositionalSplice"; locate: SpliceLocator }
  | { tag: "KeyedUpsert" }
  | { tag: "KeyedDelete" }
  | { tag: "ClearElements" };

export type CallEffectTag = CallEffect["tag"];

export type CallArg = {
  value: unknown;
  /** Symbols loaded while evaluating the argument. */
  symbols: readonly DataSymbol[];
};

export type CallSite = {
  callee: unknown;
  /** Present for method calls. */
  method?: string;
  receiver?: unknown;
  /** Symbols loaded while evaluating the receiver; the last one is its own binding. */
  receiverSymbols?: readonly DataSymbol[];
  args: readonly CallArg[];
};

export type ResolvedCall = {
  site: CallSite;
  receiverKind: ReceiverKind;
  effect: CallEffect;
  splice?: SpliceRange;
};

/** Graph writes an effect can ask for. Implemented by the tracer. */
export interface MutationSink {
  mutate(target: unknown, deps: readonly DataSymbol[], resync: boolean): void;
  splice(target: unknown, range: SpliceRange, deps: readonly DataSymbol[]): void;
  upsertKey(target: unknown, key: ElementKey, deps: readonly DataSymbol[]): void;
  deleteKey(target: unknown, key: ElementKey): void;
  clearElements(target: unknown): void;
}

export const NO_EFFECT: CallEffect = { tag: "NoEffect" };
export const STANDARD_MUTATION: CallEffect = { tag: "StandardMutation" };
export const MUTATE_RECEIVER: CallEffect = { tag: "MutateReceiver" };
