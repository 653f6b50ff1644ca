// src/core/errors.ts
// Error classes raised by the engine. Recoverable conditions are reported as
// diagnostics instead (see ./diagnostic).

export class FlowError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "FlowError";
  }
}

/** Ordering a Timestamp against something that is not one. */
export class TimestampComparisonError extends FlowError {
  constructor(public readonly other: unknown) {
    super(`cannot compare Timestamp with ${describe(other)}`, "E_TIMESTAMP_COMPARE");
    this.name = "TimestampComparisonError";
  }
}

export class SliceTargetNotFoundError extends FlowError {
  constructor(public readonly target: string) {
    super(`no tracked symbol or statement for slice target: ${target}`, "E_SLICE_TARGET");
    this.name = "SliceTargetNotFoundError";
  }
}

export class UnknownSymbolError extends FlowError {
  constructor(public readonly target: string) {
    super(`no tracked symbol: ${target}`, "E_UNKNOWN_SYMBOL");
    this.name = "UnknownSymbolError";
  }
}

/** A tracer hook was called in an order the hook contract does not allow. */
export class TracerStateError extends FlowError {
  constructor(message: string) {
    super(message, "E_TRACER_STATE");
    this.name = "TracerStateError";
  }
}

export class SessionConflictError extends FlowError {
  constructor(public readonly sessionId: string) {
    super(`session already open: ${sessionId}`, "E_SESSION_CONFLICT");
    this.name = "SessionConflictError";
  }
}

export class ConfigError extends FlowError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message, "E_CONFIG");
    this.name = "ConfigError";
  }
}

export class ReaderError extends FlowError {
  constructor(message: string, public readonly offset?: number) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`, "E_READER");
    this.name = "ReaderError";
  }
}

/** A cell script failed while running. */
export class HostEvalError extends FlowError {
  constructor(message: string) {
    super(message, "E_EVAL");
    this.name = "HostEvalError";
  }
}

function describe(x: unknown): string {
  if (x === null) return "null";
  if (Array.isArray(x)) return "array";
  return typeof x;
}
