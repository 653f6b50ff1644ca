// src/core/tracing/externalCalls/registry.ts
// Strategy table for opaque calls. Lookup order: callee identity, then
// (receiver identity, method), then (receiver kind, method), then the
// receiver kind's default, then the global default.

import { type CallEffect, type ReceiverKind, STANDARD_MUTATION } from "./types";

export class CallEffectRegistry {
  private readonly byFunction = new Map<unknown, CallEffect>();
  private readonly byReceiver = new WeakMap<object, Map<string, CallEffect>>();
  private readonly byMethod = new Map<ReceiverKind, Map<string, CallEffect>>();
  private readonly kindDefaults = new Map<ReceiverKind, CallEffect>();
  private readonly substitutions = new Map<unknown, unknown>();

  constructor(private readonly globalDefault: CallEffect = STANDARD_MUTATION) {}

  registerFunction(fn: unknown, effect: CallEffect): this {
    this.byFunction.set(fn, effect);
    return this;
  }

  /** Effect of `method` called on this particular object (a module instance, say). */
  registerReceiverMethod(receiver: object, method: string, effect: CallEffect): this {
    let methods = this.byReceiver.get(receiver);
    if (methods === undefined) {
      methods = new Map();
      this.byReceiver.set(receiver, methods);
    }
    methods.set(method, effect);
    return this;
  }

  registerMethod(kind: ReceiverKind, method: string, effect: CallEffect): this {
    let methods = this.byMethod.get(kind);
    if (methods === undefined) {
      methods = new Map();
      this.byMethod.set(kind, methods);
    }
    methods.set(method, effect);
    return this;
  }

  setKindDefault(kind: ReceiverKind, effect: CallEffect): this {
    this.kindDefaults.set(kind, effect);
    return this;
  }

  /** Calls to `fn` run `replacement` instead. */
  substitute(fn: unknown, replacement: unknown): this {
    this.substitutions.set(fn, replacement);
    return this;
  }

  substitutionFor(fn: unknown): unknown {
    return this.substitutions.get(fn);
  }

  lookup(kind: ReceiverKind, method: string | undefined, callee: unknown, receiver?: unknown): CallEffect {
    const byFn = this.byFunction.get(callee);
    if (byFn !== undefined) return byFn;
    if (method !== undefined) {
      if (typeof receiver === "object" && receiver !== null) {
        const byRecv = this.byReceiver.get(receiver)?.get(method);
        if (byRecv !== undefined) return byRecv;
      }
      const byMethod = this.byMethod.get(kind)?.get(method);
      if (byMethod !== undefined) return byMethod;
    }
    return this.kindDefaults.get(kind) ?? this.globalDefault;
  }
}
