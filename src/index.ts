// src/index.ts
// cellflow - Public API
//
// Dataflow tracing, staleness detection and slicing for notebook sessions.

// ═══════════════════════════════════════════════════════════════════════════════
// SESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { FlowSession, type SessionOptions } from "./core/session/session";
export { openSession, getSession, closeSession, closeAllSessions, activeSessions } from "./core/session/registry";
export { collectMetadata, type SessionMetadata, type SymbolMetadata, type CellMetadata } from "./core/session/metadata";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION AND LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { createLogger, moduleLogger, type Logger, type LogModule } from "./core/log/logger";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS AND DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  FlowError,
  TimestampComparisonError,
  SliceTargetNotFoundError,
  UnknownSymbolError,
  TracerStateError,
  SessionConflictError,
  ConfigError,
  ReaderError,
  HostEvalError,
} from "./core/errors";
export { type Diagnostic, type DiagnosticSeverity, DiagCodes } from "./core/diagnostic";

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH MODEL
// ═══════════════════════════════════════════════════════════════════════════════

export { Timestamp, compareTimestamps } from "./core/model/timestamp";
export { DataSymbol, type SymbolKind, type SymbolState, type UnsafeReason, type ElementKey, type Usage } from "./core/model/symbol";
export { Scope, type ScopeKind } from "./core/model/scope";
export { Namespace, type SpliceRange } from "./core/model/namespace";
export { Cell, CellRegistry, type CellOutput, type CellDraft } from "./core/model/cell";
export { Statement, type StatementSource } from "./core/model/statement";
export { IdentityTable } from "./core/model/identity";
export { type DepContext, DepContextStack } from "./core/deps/context";
export { DataDepIndex } from "./core/deps/dataDeps";
export { computeLiveness, resolveLiveness, type Liveness, type ResolvedLiveness } from "./core/analysis/liveness";

// ═══════════════════════════════════════════════════════════════════════════════
// TRACING, REACTIVITY, SLICING
// ═══════════════════════════════════════════════════════════════════════════════

export { Tracer, type CellSource, type StoreOptions, type CallFrame, type ElementDeps } from "./core/tracing/tracer";
export * from "./core/tracing/externalCalls";
export { type CheckResult, ReadinessChecker } from "./core/reactivity/checker";
export { type PropagationResult, UpdatePropagator } from "./core/reactivity/propagate";
export { ReactiveScheduler } from "./core/reactivity/scheduler";
export { Slice, type SliceTextOptions } from "./core/slicing/slice";
export { Slicer, type SliceDirection, type SliceOptions } from "./core/slicing/slicer";

// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPT HOST
// ═══════════════════════════════════════════════════════════════════════════════

export { ScriptNotebook, type RunResult } from "./host/notebook";
export { parseCell, refsOf, type ParsedCell } from "./host/refs";
export { readForms, type Datum, type Form } from "./host/reader";
