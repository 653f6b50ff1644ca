// src/core/session/registry.ts
// Process-wide lookup of open sessions. Sessions are opened and closed
// explicitly; nothing here is created implicitly.

import { SessionConflictError } from "../errors";
import { FlowSession, type SessionOptions } from "./session";

const sessions = new Map<string, FlowSession>();

export function openSession(opts: SessionOptions = {}): FlowSession {
  if (opts.id !== undefined && sessions.has(opts.id)) {
    throw new SessionConflictError(opts.id);
  }
  const session = new FlowSession(opts);
  sessions.set(session.id, session);
  return session;
}

export function getSession(id: string): FlowSession | undefined {
  return sessions.get(id);
}

export function closeSession(id: string): boolean {
  const session = sessions.get(id);
  if (session === undefined) return false;
  session.close();
  sessions.delete(id);
  return true;
}

export function closeAllSessions(): void {
  for (const session of sessions.values()) session.close();
  sessions.clear();
}

export function activeSessions(): string[] {
  return [...sessions.keys()];
}
