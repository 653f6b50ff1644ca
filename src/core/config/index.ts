// src/core/config/index.ts
// Configuration system exports

export {
  type ExecMode,
  type ExecSchedule,
  type FlowOrder,
  type Highlights,
  type LogLevel,
  type FlowConfig,
  type PartialFlowConfig,
  ExecModeSchema,
  ExecScheduleSchema,
  FlowOrderSchema,
  HighlightsSchema,
  LogLevelSchema,
  FlowConfigSchema,
  DEFAULT_CONFIG,
  readEnv,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
} from "./config";
