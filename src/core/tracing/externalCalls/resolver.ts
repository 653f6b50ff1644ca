// src/core/tracing/externalCalls/resolver.ts
// Turns a call site into a ResolvedCall on entry, and applies its effect on exit.

import type { Logger } from "pino";
import { DiagCodes, type Diagnostic, warnDiag } from "../../diagnostic";
import type { IdentityTable } from "../../model/identity";
import type { DataSymbol, ElementKey } from "../../model/symbol";
import type { CallEffectRegistry } from "./registry";
import { type CallSite, type MutationSink, NO_EFFECT, type ReceiverKind, type ResolvedCall } from "./types";

export class ExternalCallResolver {
  constructor(
    readonly registry: CallEffectRegistry,
    private readonly identities: IdentityTable,
    private readonly log: Logger,
    private readonly report: (d: Diagnostic) => void,
  ) {}

  receiverKindOf(site: CallSite): ReceiverKind {
    if (site.method === undefined) return "none";
    const recv = site.receiver;
    if (Array.isArray(recv)) return "array";
    if (recv instanceof Map) return "map";
    if (recv instanceof Set) return "set";
    if (typeof recv === "function") return "function";
    if (typeof recv === "object" && recv !== null) {
      const syms = site.receiverSymbols ?? [];
      if (syms[syms.length - 1]?.isModule) return "module";
      for (const alias of this.identities.aliasesOf(recv)) {
        if (alias.isModule) return "module";
      }
      return "object";
    }
    return "primitive";
  }

  /** Runs before the callee; positional effects are located here. */
  resolve(site: CallSite): ResolvedCall {
    const receiverKind = this.receiverKindOf(site);
    const effect = this.registry.lookup(receiverKind, site.method, site.callee, site.receiver);
    const call: ResolvedCall = { site, receiverKind, effect };
    if (effect.tag === "PositionalSplice" && Array.isArray(site.receiver)) {
      try {
        call.splice = effect.locate(site.receiver, site.args.map((a) => a.value));
      } catch (e) {
        this.handlerFailed(call, e);
        return { site, receiverKind, effect: NO_EFFECT };
      }
    }
    return call;
  }

  substitutionFor(callee: unknown): unknown {
    return this.registry.substitutionFor(callee);
  }

  /** Apply the resolved effect. A failing handler is logged and has no effect. */
  apply(call: ResolvedCall, returnValue: unknown, sink: MutationSink): void {
    try {
      this.applyEffect(call, returnValue, sink);
    } catch (e) {
      this.handlerFailed(call, e);
    }
  }

  private applyEffect(call: ResolvedCall, returnValue: unknown, sink: MutationSink): void {
    const { site, effect } = call;
    const argDeps = site.args.flatMap((a) => a.symbols);
    switch (effect.tag) {
      case "NoEffect":
        return;
      case "StandardMutation": {
        if (site.method === undefined) return;
        const mutated = returnValue === undefined || returnValue === null || returnValue === site.receiver;
        if (mutated) sink.mutate(site.receiver, argDeps, true);
        return;
      }
      case "MutateReceiver":
        sink.mutate(site.receiver, argDeps, true);
        return;
      case "MutateArgs":
        effect.positions.forEach((pos) => {
          const target = site.args[pos];
          if (target === undefined) return;
          const others = site.args.filter((_, i) => i !== pos).flatMap((a) => a.symbols);
          sink.mutate(target.value, others, true);
        });
        return;
      case "PositionalSplice":
        if (call.splice !== undefined) sink.splice(site.receiver, call.splice, argDeps);
        return;
      case "KeyedUpsert": {
        const key = elementKey(site.args[0]?.value);
        if (key === undefined) {
          sink.mutate(site.receiver, argDeps, false);
          return;
        }
        sink.upsertKey(site.receiver, key, depsOf(site.args.slice(1).flatMap((a) => a.symbols)));
        return;
      }
      case "KeyedDelete": {
        const key = elementKey(site.args[0]?.value);
        if (key === undefined) sink.mutate(site.receiver, argDeps, false);
        else sink.deleteKey(site.receiver, key);
        return;
      }
      case "ClearElements":
        sink.clearElements(site.receiver);
        return;
    }
  }

  private handlerFailed(call: ResolvedCall, e: unknown): void {
    const message = e instanceof Error ? e.message : String(e);
    const name = call.site.method ?? "<function>";
    this.log.warn({ method: name, effect: call.effect.tag, err: message }, "call effect handler failed");
    this.report(warnDiag(DiagCodes.HandlerFailed, `effect handler for ${name} failed: ${message}`, { data: { effect: call.effect.tag } }));
  }
}

function elementKey(x: unknown): ElementKey | undefined {
  return typeof x === "string" || typeof x === "number" ? x : undefined;
}

function depsOf(syms: readonly DataSymbol[]): readonly DataSymbol[] {
  return [...new Set(syms)];
}
