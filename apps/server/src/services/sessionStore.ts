import { randomUUID } from "node:crypto";
import jwt from "jsonwebtoken";
import type { ArchiveKind, Language, Role, SessionContext } from "../types/auth.js";

export interface SessionStoreOptions {
  jwtSecret: string;
  ttlHours: number;
  archiveListTtlSeconds: number;
}

interface SessionClaims {
  sub?: string;
  role?: Role;
  typ?: string;
}

/**
 * Holds per-session context (role, display language, cached archive batch lists).
 * The bearer token only names the session; logout drops the context so the token dies with it.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionContext>();

  constructor(private readonly options: SessionStoreOptions) {}

  create(role: Role, language: Language = "en", now = Date.now()): SessionContext {
    const context: SessionContext = {
      sessionId: randomUUID(),
      role,
      language,
      archiveBatchLists: {},
      createdAt: new Date(now).toISOString(),
      expiresAt: now + this.options.ttlHours * 60 * 60 * 1000
    };
    this.sessions.set(context.sessionId, context);
    return context;
  }

  get(sessionId: string, now = Date.now()): SessionContext | null {
    const context = this.sessions.get(sessionId);
    if (!context) return null;
    if (context.expiresAt <= now) {
      this.sessions.delete(sessionId);
      return null;
    }
    return context;
  }

  setLanguage(sessionId: string, language: Language): SessionContext | null {
    const context = this.get(sessionId);
    if (!context) return null;
    context.language = language;
    return context;
  }

  cachedBatchList(sessionId: string, kind: ArchiveKind, now = Date.now()): string[] | null {
    const cached = this.get(sessionId, now)?.archiveBatchLists[kind];
    if (!cached) return null;
    if (now - cached.fetchedAt >= this.options.archiveListTtlSeconds * 1000) return null;
    return cached.names;
  }

  cacheBatchList(sessionId: string, kind: ArchiveKind, names: string[], now = Date.now()) {
    const context = this.get(sessionId, now);
    if (!context) return;
    context.archiveBatchLists[kind] = { names, fetchedAt: now };
  }

  destroy(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  prune(now = Date.now()): number {
    let removed = 0;
    for (const [sessionId, context] of this.sessions) {
      if (context.expiresAt <= now) {
        this.sessions.delete(sessionId);
        removed += 1;
      }
    }
    return removed;
  }

  issueToken(context: SessionContext): string {
    return jwt.sign({ sub: context.sessionId, role: context.role, typ: "session" }, this.options.jwtSecret, {
      expiresIn: `${this.options.ttlHours}h`
    });
  }

  resolveToken(token: string): SessionContext | null {
    try {
      const decoded = jwt.verify(token, this.options.jwtSecret);
      if (typeof decoded === "string") return null;
      const claims: SessionClaims = decoded;
      if (claims.typ !== "session" || !claims.sub) return null;
      const context = this.get(claims.sub);
      if (!context || context.role !== claims.role) return null;
      return context;
    } catch {
      return null;
    }
  }
}
