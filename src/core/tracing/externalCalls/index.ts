// src/core/tracing/externalCalls/index.ts

export * from "./types";
export { CallEffectRegistry } from "./registry";
export { createDefaultRegistry, locateSplice } from "./defaults";
export { ExternalCallResolver } from "./resolver";
