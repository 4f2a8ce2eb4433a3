import { Router, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { env } from "../config/env.js";
import { requireAction } from "../middleware/auth.js";
import { cappedMemoryStorage } from "../middleware/uploadStorage.js";
import { megabytesToBytes } from "../services/batchIntake.js";
import { batchView, exportKindFromPath } from "../services/batchView.js";
import { translate } from "../services/i18n.js";
import { batchLock, batchOrchestrator } from "../services/runtime.js";
import type { UploadedFile } from "../types/batch.js";
import { sendError } from "./httpErrors.js";

const limits = { maxFiles: env.MAX_FILES_PER_BATCH, maxUploadMb: env.MAX_UPLOAD_MB };

// Oversized files reach the orchestrator with no content and are screened out there.
const uploadMemory = multer({
  storage: cappedMemoryStorage(megabytesToBytes(env.MAX_UPLOAD_MB)),
  limits: {
    files: env.MAX_FILES_PER_BATCH + 1
  }
});

const submitSchema = z.object({
  batchName: z.string().max(120).optional()
});

export const batchRouter = Router();

batchRouter.use("/api/batches", requireAction("submit_batch"));

function acceptUploads(req: Request, res: Response, next: NextFunction) {
  uploadMemory.array("files")(req, res, (error: unknown) => {
    if (!error) return next();
    const language = req.sessionContext?.language ?? "en";
    if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_COUNT") {
      return res.status(400).json({
        error: "batch_rejected",
        reason: "too_many_files",
        detail: `You can only upload up to ${env.MAX_FILES_PER_BATCH} files at once`,
        notices: [translate(language, "too_many_files", { max: env.MAX_FILES_PER_BATCH })]
      });
    }
    return res.status(400).json({
      error: "upload_parse_failed",
      detail: error instanceof Error ? error.message : "unknown_error"
    });
  });
}

batchRouter.post("/api/batches", acceptUploads, (req, res) => {
  const language = req.sessionContext?.language ?? "en";
  const parsed = submitSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: parsed.error.flatten() });
  if (!req.sessionContext) return res.status(401).json({ error: "auth_required" });

  const files: UploadedFile[] = (Array.isArray(req.files) ? req.files : []).map((file) => ({
    name: file.originalname,
    size: file.size,
    content: file.buffer
  }));

  try {
    const record = batchOrchestrator.submit({
      batchName: parsed.data.batchName,
      files,
      submittedBy: req.sessionContext.role
    });
    const encoded = encodeURIComponent(record.batchName);
    return res.status(202).json({
      batch: batchView(record, language, env.MAX_UPLOAD_MB),
      statusUrl: `/api/batches/${encoded}`,
      eventsUrl: `/api/events/stream?batchName=${encoded}`,
      notices: [translate(language, "batch_started", { batch: record.batchName })]
    });
  } catch (error) {
    return sendError(res, error, "batch_submit_failed", language, limits);
  }
});

batchRouter.get("/api/batches", (req, res) => {
  const language = req.sessionContext?.language ?? "en";
  return res.json({
    lock: batchLock.status(),
    batches: batchOrchestrator.listBatches().map((record) => batchView(record, language, env.MAX_UPLOAD_MB))
  });
});

batchRouter.get("/api/batches/current", (req, res) => {
  const language = req.sessionContext?.language ?? "en";
  const current = batchOrchestrator.getCurrent();
  return res.json({
    lock: batchLock.status(),
    batch: current ? batchView(current, language, env.MAX_UPLOAD_MB) : null
  });
});

batchRouter.post("/api/batches/reset", requireAction("manage_batch"), async (req, res) => {
  try {
    const result = await batchOrchestrator.resetScratch();
    return res.json({ ok: true, ...result, lock: batchLock.status() });
  } catch (error) {
    return sendError(res, error, "batch_reset_failed", req.sessionContext?.language ?? "en");
  }
});

batchRouter.get("/api/batches/:batchName", (req, res) => {
  const record = batchOrchestrator.getBatch(req.params.batchName);
  if (!record) return res.status(404).json({ error: "batch_not_found" });
  return res.json({ batch: batchView(record, req.sessionContext?.language ?? "en", env.MAX_UPLOAD_MB) });
});

batchRouter.get("/api/batches/:batchName/export/:kind", (req, res) => {
  const kind = exportKindFromPath(req.params.kind);
  if (!kind) return res.status(400).json({ error: "invalid_export_kind" });

  const artifact = batchOrchestrator.getExport(req.params.batchName, kind);
  if (!artifact) return res.status(404).json({ error: "export_not_found" });

  res.attachment(artifact.filename);
  res.type(artifact.contentType);
  return res.send(artifact.data);
});

batchRouter.post("/api/batches/:batchName/cancel", requireAction("manage_batch"), (req, res) => {
  if (!batchOrchestrator.getBatch(req.params.batchName)) {
    return res.status(404).json({ error: "batch_not_found" });
  }
  const cancelled = batchOrchestrator.cancel(req.params.batchName);
  if (!cancelled) return res.status(409).json({ error: "batch_not_running" });
  return res.status(202).json({ ok: true, batchName: req.params.batchName });
});
