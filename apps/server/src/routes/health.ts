import { Router } from "express";
import { requireSession } from "../middleware/auth.js";
import { translate } from "../services/i18n.js";
import { batchLock, queryClient } from "../services/runtime.js";
import { WAREHOUSE_PING_STATEMENT } from "../services/sqlStatements.js";

export const healthRouter = Router();

healthRouter.get("/api/health", (_req, res) => {
  return res.json({ status: "ok", lock: batchLock.status() });
});

healthRouter.get("/api/health/warehouse", requireSession, async (req, res) => {
  const language = req.sessionContext?.language ?? "en";
  try {
    const outcome = await queryClient.execute(WAREHOUSE_PING_STATEMENT);
    if (!outcome.ok) {
      return res.status(502).json({ ok: false, reason: outcome.reason, notices: [translate(language, "connection_fail")] });
    }
    const today = outcome.rows[0]?.today ?? null;
    return res.json({ ok: true, today, notices: [translate(language, "connection_ok", { date: String(today) })] });
  } catch (error) {
    return res.status(502).json({
      ok: false,
      reason: error instanceof Error ? error.message : "unknown_error",
      notices: [translate(language, "connection_fail")]
    });
  }
});
