// src/host/modules.ts
// Modules a cell can import. Each notebook gets its own instances.

import {
  type CallEffect,
  type CallEffectRegistry,
  MUTATE_RECEIVER,
  NO_EFFECT,
} from "../core/tracing/externalCalls";

export type Figure = { id: number; title: string };

export type HostModule = Record<string, unknown>;

function mathModule(): HostModule {
  return {
    pi: Math.PI,
    sqrt: (x: number) => Math.sqrt(x),
    floor: (x: number) => Math.floor(x),
    max: (...xs: number[]) => Math.max(...xs),
    min: (...xs: number[]) => Math.min(...xs),
  };
}

function plotModule(): HostModule {
  const figures: Figure[] = [];
  return {
    figures,
    figure: (title?: string) => {
      const fig: Figure = { id: figures.length + 1, title: title ?? "" };
      figures.push(fig);
      return fig;
    },
    show: () => undefined,
  };
}

function timeModule(): HostModule {
  return {
    sleep: () => undefined,
  };
}

export function createModules(): Map<string, HostModule> {
  return new Map([
    ["math", mathModule()],
    ["plot", plotModule()],
    ["time", timeModule()],
  ]);
}

/** Module methods whose return value says nothing about whether the module changed. */
const MODULE_EFFECTS: Record<string, Record<string, CallEffect>> = {
  plot: { figure: MUTATE_RECEIVER, show: NO_EFFECT },
  time: { sleep: NO_EFFECT },
};

/** Register the method effects of these module instances, keyed by the instance. */
export function registerModuleEffects(registry: CallEffectRegistry, modules: ReadonlyMap<string, HostModule>): void {
  for (const [name, mod] of modules) {
    for (const [method, effect] of Object.entries(MODULE_EFFECTS[name] ?? {})) {
      registry.registerReceiverMethod(mod, method, effect);
    }
  }
}
