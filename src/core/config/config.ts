// src/core/config/config.ts
// Session configuration: schedules, flow order, slicing and tracing switches.

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "../errors";

// =========================================================================
// Schemas
// =========================================================================

export const ExecModeSchema = z.enum(["normal", "reactive"]);
export const ExecScheduleSchema = z.enum(["liveness_based", "dag_based", "hybrid_dag_liveness_based", "strict"]);
export const FlowOrderSchema = z.enum(["any_order", "in_order"]);
export const HighlightsSchema = z.enum(["all", "none", "executed"]);
export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export type ExecMode = z.infer<typeof ExecModeSchema>;
export type ExecSchedule = z.infer<typeof ExecScheduleSchema>;
export type FlowOrder = z.infer<typeof FlowOrderSchema>;
export type Highlights = z.infer<typeof HighlightsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

const ReactivitySchema = z
  .object({
    execMode: ExecModeSchema.default("reactive"),
    execSchedule: ExecScheduleSchema.default("dag_based"),
    flowOrder: FlowOrderSchema.default("in_order"),
    highlights: HighlightsSchema.default("executed"),
  })
  .strict();

const SlicingSchema = z
  .object({
    dynamicEnabled: z.boolean().default(true),
    staticEnabled: z.boolean().default(true),
  })
  .strict();

const TracingSchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .strict();

const SafetySchema = z
  .object({
    /** Writes derived from a waiting symbol are marked unsafe. */
    markWaitingUsagesUnsafe: z.boolean().default(false),
  })
  .strict();

const LogSchema = z
  .object({
    level: LogLevelSchema.default("warn"),
    /** Diagnostics kept per session; older ones are dropped first. */
    maxDiagnostics: z.number().int().positive().default(1000),
  })
  .strict();

export const FlowConfigSchema = z
  .object({
    reactivity: ReactivitySchema.default({}),
    slicing: SlicingSchema.default({}),
    tracing: TracingSchema.default({}),
    safety: SafetySchema.default({}),
    log: LogSchema.default({}),
  })
  .strict();

export type FlowConfig = z.infer<typeof FlowConfigSchema>;

export type PartialFlowConfig = {
  [K in keyof FlowConfig]?: Partial<FlowConfig[K]>;
};

// =========================================================================
// Defaults
// =========================================================================

export const DEFAULT_CONFIG: FlowConfig = FlowConfigSchema.parse({});

// =========================================================================
// Loading
// =========================================================================

type EnvEntry = {
  section: keyof FlowConfig;
  key: string;
  parse: (raw: string) => unknown;
};

const bool = (raw: string): boolean | undefined => {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "yes" || v === "on") return true;
  if (v === "0" || v === "false" || v === "no" || v === "off") return false;
  return undefined;
};

const int = (raw: string): number | undefined => {
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : undefined;
};

/** Unknown enum values from the environment are ignored (the default stays). */
const oneOf =
  <T extends [string, ...string[]]>(schema: z.ZodEnum<T>) =>
  (raw: string): T[number] | undefined => {
    const res = schema.safeParse(raw.trim().toLowerCase());
    return res.success ? res.data : undefined;
  };

const ENV_KEYS: Record<string, EnvEntry> = {
  EXEC_MODE: { section: "reactivity", key: "execMode", parse: oneOf(ExecModeSchema) },
  EXEC_SCHEDULE: { section: "reactivity", key: "execSchedule", parse: oneOf(ExecScheduleSchema) },
  FLOW_ORDER: { section: "reactivity", key: "flowOrder", parse: oneOf(FlowOrderSchema) },
  HIGHLIGHTS: { section: "reactivity", key: "highlights", parse: oneOf(HighlightsSchema) },
  DYNAMIC_SLICING: { section: "slicing", key: "dynamicEnabled", parse: bool },
  STATIC_SLICING: { section: "slicing", key: "staticEnabled", parse: bool },
  TRACING: { section: "tracing", key: "enabled", parse: bool },
  MARK_WAITING_UNSAFE: { section: "safety", key: "markWaitingUsagesUnsafe", parse: bool },
  LOG_LEVEL: { section: "log", key: "level", parse: oneOf(LogLevelSchema) },
  MAX_DIAGNOSTICS: { section: "log", key: "maxDiagnostics", parse: int },
};

/** Settings present in the environment under `${prefix}_...`, and nothing else. */
export function readEnv(prefix = "CELLFLOW", env: NodeJS.ProcessEnv = process.env): PartialFlowConfig {
  const out: Record<string, Record<string, unknown>> = {};
  for (const [suffix, entry] of Object.entries(ENV_KEYS)) {
    const raw = env[`${prefix}_${suffix}`];
    if (raw === undefined || raw === "") continue;
    const value = entry.parse(raw);
    if (value === undefined) continue;
    (out[entry.section] ??= {})[entry.key] = value;
  }
  return parsePartial(out);
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "CELLFLOW", env: NodeJS.ProcessEnv = process.env): FlowConfig {
  return mergeConfigs(readEnv(prefix, env));
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): FlowConfig {
  return mergeConfigs(partialFromFile(filePath));
}

/**
 * Create configuration from a plain object (e.g., parsed JSON). Keys may be
 * camelCase or snake_case.
 */
export function configFromObject(data: unknown): FlowConfig {
  return validate(FlowConfigSchema, camelizeKeys(data));
}

/**
 * Merge partial configs over the defaults, later ones winning.
 */
export function mergeConfigs(...configs: PartialFlowConfig[]): FlowConfig {
  const merged: FlowConfig = {
    reactivity: { ...DEFAULT_CONFIG.reactivity },
    slicing: { ...DEFAULT_CONFIG.slicing },
    tracing: { ...DEFAULT_CONFIG.tracing },
    safety: { ...DEFAULT_CONFIG.safety },
    log: { ...DEFAULT_CONFIG.log },
  };
  for (const cfg of configs) {
    if (cfg.reactivity) merged.reactivity = { ...merged.reactivity, ...cfg.reactivity };
    if (cfg.slicing) merged.slicing = { ...merged.slicing, ...cfg.slicing };
    if (cfg.tracing) merged.tracing = { ...merged.tracing, ...cfg.tracing };
    if (cfg.safety) merged.safety = { ...merged.safety, ...cfg.safety };
    if (cfg.log) merged.log = { ...merged.log, ...cfg.log };
  }
  return validate(FlowConfigSchema, merged);
}

/**
 * Priority: overrides > config file > environment > defaults.
 */
export function loadConfig(options?: { configFile?: string; overrides?: PartialFlowConfig; envPrefix?: string }): FlowConfig {
  const layers: PartialFlowConfig[] = [readEnv(options?.envPrefix)];
  if (options?.configFile) {
    layers.push(partialFromFile(options.configFile));
  } else {
    for (const p of ["cellflow.config.json", ".cellflowrc.json"]) {
      if (fs.existsSync(p)) {
        layers.push(partialFromFile(p));
        break;
      }
    }
  }
  if (options?.overrides) layers.push(options.overrides);
  return mergeConfigs(...layers);
}

// =========================================================================
// Helpers
// =========================================================================

const PartialSchema = z
  .object({
    reactivity: ReactivitySchema.partial().optional(),
    slicing: SlicingSchema.partial().optional(),
    tracing: TracingSchema.partial().optional(),
    safety: SafetySchema.partial().optional(),
    log: LogSchema.partial().optional(),
  })
  .strict();

function parsePartial(data: unknown): PartialFlowConfig {
  const parsed = validate(PartialSchema, camelizeKeys(data));
  // Drop keys zod filled with undefined so spreads in mergeConfigs keep earlier layers.
  const out: PartialFlowConfig = {};
  if (parsed.reactivity) out.reactivity = definedOnly(parsed.reactivity);
  if (parsed.slicing) out.slicing = definedOnly(parsed.slicing);
  if (parsed.tracing) out.tracing = definedOnly(parsed.tracing);
  if (parsed.safety) out.safety = definedOnly(parsed.safety);
  if (parsed.log) out.log = definedOnly(parsed.log);
  return out;
}

function partialFromFile(filePath: string): PartialFlowConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new ConfigError(`Unsupported config file format: ${ext}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Config file is not valid JSON: ${filePath}`, [e instanceof Error ? e.message : String(e)]);
  }
  return parsePartial(data);
}

function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const res = schema.safeParse(data);
  if (!res.success) {
    throw new ConfigError(
      "Invalid configuration",
      res.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`),
    );
  }
  return res.data;
}

function definedOnly<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    const v = obj[key];
    if (v !== undefined) out[key] = v;
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function camelizeKeys(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(camelizeKeys);
  if (typeof data !== "object" || data === null) return data;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(data)) {
    out[k.replace(/_([a-z])/g, (_m, c: string) => c.toUpperCase())] = camelizeKeys(v);
  }
  return out;
}
