import { Router } from "express";
import { z } from "zod";
import { requireAction } from "../middleware/auth.js";
import { isValidBatchName } from "../services/batchIntake.js";
import { translate } from "../services/i18n.js";
import { archiveService, sessionStore } from "../services/runtime.js";
import { sendError } from "./httpErrors.js";

const kindSchema = z.enum(["invoices", "checks"]);

export const archiveRouter = Router();

archiveRouter.use("/api/archives", requireAction("browse_archive"));

archiveRouter.get("/api/archives/:kind/batches", async (req, res) => {
  const kind = kindSchema.safeParse(req.params.kind);
  if (!kind.success) return res.status(400).json({ error: "invalid_archive_kind" });
  const context = req.sessionContext;
  if (!context) return res.status(401).json({ error: "auth_required" });

  const refresh = req.query.refresh === "1" || req.query.refresh === "true";
  try {
    let names = refresh ? null : sessionStore.cachedBatchList(context.sessionId, kind.data);
    const cached = names !== null;
    if (names === null) {
      names = await archiveService.listBatchNames(kind.data);
      sessionStore.cacheBatchList(context.sessionId, kind.data, names);
    }
    return res.json({
      kind: kind.data,
      batches: names,
      cached,
      notices: names.length === 0 ? [translate(context.language, "no_archives")] : []
    });
  } catch (error) {
    return sendError(res, error, "archive_list_failed", context.language);
  }
});

archiveRouter.get("/api/archives/:kind/:batchName", async (req, res) => {
  const kind = kindSchema.safeParse(req.params.kind);
  if (!kind.success) return res.status(400).json({ error: "invalid_archive_kind" });
  if (!isValidBatchName(req.params.batchName)) return res.status(400).json({ error: "invalid_batch_name" });

  try {
    const table = await archiveService.fetchArchive(kind.data, req.params.batchName);
    return res.json({ kind: kind.data, batchName: req.params.batchName, ...table });
  } catch (error) {
    return sendError(res, error, "archive_fetch_failed", req.sessionContext?.language ?? "en");
  }
});

archiveRouter.get("/api/archives/:kind/:batchName/csv", async (req, res) => {
  const kind = kindSchema.safeParse(req.params.kind);
  if (!kind.success) return res.status(400).json({ error: "invalid_archive_kind" });
  if (!isValidBatchName(req.params.batchName)) return res.status(400).json({ error: "invalid_batch_name" });

  try {
    const artifact = await archiveService.exportCsv(kind.data, req.params.batchName);
    res.attachment(artifact.filename);
    res.type(artifact.contentType);
    return res.send(artifact.data);
  } catch (error) {
    return sendError(res, error, "archive_export_failed", req.sessionContext?.language ?? "en");
  }
});
