import { Router } from "express";
import { z } from "zod";
import { env } from "../config/env.js";
import { SESSION_COOKIE, requireSession } from "../middleware/auth.js";
import { languageSchema, translate } from "../services/i18n.js";
import { accessGate, sessionStore } from "../services/runtime.js";
import { sessionView } from "../services/sessionView.js";

export const sessionRouter = Router();

const loginSchema = z.object({
  password: z.string().min(1).max(512),
  language: languageSchema.default("en")
});

const languageUpdateSchema = z.object({
  language: languageSchema
});

sessionRouter.post("/api/session/login", (req, res) => {
  const parsed = loginSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });

  const { password, language } = parsed.data;
  try {
    const role = accessGate.authenticate(password, req.ip ?? "unknown");
    if (!role) {
      return res.status(401).json({ error: "invalid_credential", notices: [translate(language, "wrong_password")] });
    }

    const context = sessionStore.create(role, language);
    const token = sessionStore.issueToken(context);
    const secure = env.NODE_ENV === "production" ? "; Secure" : "";
    res.setHeader(
      "Set-Cookie",
      `${SESSION_COOKIE}=${encodeURIComponent(token)}; Path=/; HttpOnly; SameSite=Lax${secure}; Max-Age=${env.SESSION_TTL_HOURS * 60 * 60}`
    );
    return res.json({
      token,
      session: sessionView(context),
      notices: [translate(language, role === "reporting" ? "reporting_access_granted" : "access_granted")]
    });
  } catch (error) {
    if (error instanceof Error && error.message === "rate_limited") {
      return res.status(429).json({ error: "rate_limited" });
    }
    return res.status(500).json({
      error: "login_failed",
      detail: error instanceof Error ? error.message : "unknown_error"
    });
  }
});

sessionRouter.get("/api/session", requireSession, (req, res) => {
  if (!req.sessionContext) return res.status(401).json({ error: "auth_required" });
  return res.json({ session: sessionView(req.sessionContext) });
});

sessionRouter.put("/api/session/language", requireSession, (req, res) => {
  const parsed = languageUpdateSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
  if (!req.sessionContext) return res.status(401).json({ error: "auth_required" });

  const context = sessionStore.setLanguage(req.sessionContext.sessionId, parsed.data.language);
  if (!context) return res.status(401).json({ error: "auth_required" });
  return res.json({ session: sessionView(context) });
});

sessionRouter.post("/api/session/logout", requireSession, (req, res) => {
  if (req.sessionContext) sessionStore.destroy(req.sessionContext.sessionId);
  const secure = env.NODE_ENV === "production" ? "; Secure" : "";
  res.setHeader("Set-Cookie", `${SESSION_COOKIE}=; Path=/; HttpOnly; SameSite=Lax${secure}; Max-Age=0`);
  return res.json({ ok: true });
});
