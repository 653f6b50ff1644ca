// src/core/log/logger.ts
// pino loggers: one root per session, a child per engine module.

import { pino, type Logger } from "pino";
import type { LogLevel } from "../config";

export type { Logger };

export type LogModule = "session" | "tracer" | "resolver" | "propagator" | "checker" | "slicer" | "host";

export function createLogger(level: LogLevel, bindings: Record<string, unknown> = {}): Logger {
  return pino({ name: "cellflow", level }).child(bindings);
}

export function moduleLogger(root: Logger, module: LogModule): Logger {
  return root.child({ module });
}
