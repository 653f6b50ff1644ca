// src/core/diagnostic.ts
// Diagnostics for conditions the engine degrades on instead of throwing.

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

export function infoDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "info", ...opts };
}

export const DiagCodes = {
  UnresolvedRead: "W_UNRESOLVED_READ",
  UnresolvedWrite: "W_UNRESOLVED_WRITE",
  HandlerFailed: "W_CALL_HANDLER_FAILED",
  MissingAncestor: "W_MISSING_ANCESTOR",
  StatementAborted: "I_STATEMENT_ABORTED",
} as const;
