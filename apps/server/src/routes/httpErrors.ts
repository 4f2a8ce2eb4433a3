import type { Response } from "express";
import { BatchRejectedError, VatCheckError, type VatCheckErrorCode } from "../errors.js";
import { translate } from "../services/i18n.js";
import type { Language } from "../types/auth.js";

const STATUS_BY_CODE: Record<VatCheckErrorCode, number> = {
  batch_rejected: 400,
  batch_in_progress: 409,
  batch_cancelled: 409,
  upload_failed: 502,
  job_trigger_failed: 502,
  query_failed: 502,
  store_list_failed: 502,
  store_delete_failed: 502,
  store_read_failed: 502,
  remote_response_invalid: 502,
  poll_timeout: 504
};

export interface RejectionLimits {
  maxFiles: number;
  maxUploadMb: number;
}

function noticeFor(error: VatCheckError, language: Language, limits: RejectionLimits): string | undefined {
  if (error instanceof BatchRejectedError) {
    return translate(language, error.reason, { max: limits.maxFiles, mb: limits.maxUploadMb });
  }
  if (error.code === "batch_in_progress") return translate(language, "batch_in_progress");
  return undefined;
}

export function sendError(
  res: Response,
  error: unknown,
  fallbackCode: string,
  language: Language = "en",
  limits: RejectionLimits = { maxFiles: 0, maxUploadMb: 0 }
) {
  if (error instanceof VatCheckError) {
    const notice = noticeFor(error, language, limits);
    return res.status(STATUS_BY_CODE[error.code]).json({
      error: error.code,
      ...(error instanceof BatchRejectedError ? { reason: error.reason } : {}),
      detail: error.message,
      ...(notice ? { notices: [notice] } : {})
    });
  }
  return res.status(500).json({
    error: fallbackCode,
    detail: error instanceof Error ? error.message : "unknown_error"
  });
}
