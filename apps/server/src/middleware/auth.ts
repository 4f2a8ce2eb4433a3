import type { NextFunction, Request, Response } from "express";
import { can } from "../services/accessGate.js";
import { sessionStore } from "../services/runtime.js";
import { accessDeniedBody } from "../services/sessionView.js";
import type { GateAction } from "../types/auth.js";

export const SESSION_COOKIE = "vatcheck_session";

export function bearerTokenFromRequest(req: Request): string | null {
  const header = req.header("authorization");
  if (!header) return null;
  const [scheme, token] = header.split(" ");
  if (!scheme || !token || scheme.toLowerCase() !== "bearer") return null;
  return token;
}

export function cookieTokenFromRequest(req: Request): string | null {
  const rawCookie = req.header("cookie");
  if (!rawCookie) return null;
  const segments = rawCookie.split(";").map((part) => part.trim());
  for (const segment of segments) {
    if (!segment.startsWith(`${SESSION_COOKIE}=`)) continue;
    const value = segment.slice(SESSION_COOKIE.length + 1);
    return decodeURIComponent(value);
  }
  return null;
}

export function attachSession(req: Request, _res: Response, next: NextFunction) {
  const token = bearerTokenFromRequest(req) ?? cookieTokenFromRequest(req);
  req.sessionContext = token ? sessionStore.resolveToken(token) ?? undefined : undefined;
  next();
}

export function requireSession(req: Request, res: Response, next: NextFunction) {
  if (!req.sessionContext) {
    return res.status(401).json({ error: "auth_required" });
  }
  next();
}

export function requireAction(action: GateAction) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.sessionContext) {
      return res.status(401).json({ error: "auth_required" });
    }
    if (!can(req.sessionContext.role, action)) {
      return res.status(403).json(accessDeniedBody(action, req.sessionContext.language));
    }
    next();
  };
}
