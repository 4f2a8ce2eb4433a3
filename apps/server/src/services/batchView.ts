import type { Language } from "../types/auth.js";
import type { BatchRecord, ExportKind } from "../types/batch.js";
import { translate } from "./i18n.js";

const EXPORT_PATHS: Record<ExportKind, string> = {
  xlsx: "xlsx",
  invoices_csv: "invoices.csv",
  checks_csv: "checks.csv"
};

const EXPORT_KINDS: ExportKind[] = ["xlsx", "invoices_csv", "checks_csv"];

export function exportKindFromPath(segment: string): ExportKind | null {
  return EXPORT_KINDS.find((kind) => EXPORT_PATHS[kind] === segment) ?? null;
}

/** Localized, user-facing lines describing where a batch stands. */
export function batchNotices(record: BatchRecord, language: Language, maxUploadMb: number): string[] {
  const notices = [translate(language, "received", { n: record.acceptedFiles.length })];
  const tooBig = record.rejectedFiles.filter((file) => file.reason === "file_too_large");
  if (tooBig.length > 0) {
    notices.push(
      translate(language, "too_big", {
        n: tooBig.length,
        mb: maxUploadMb,
        files: tooBig.map((file) => file.name).join(", ")
      })
    );
  }
  const notPdf = record.rejectedFiles.filter((file) => file.reason === "unsupported_type");
  if (notPdf.length > 0) {
    notices.push(
      translate(language, "unsupported_type", { n: notPdf.length, files: notPdf.map((file) => file.name).join(", ") })
    );
  }

  if (record.results) {
    notices.push(
      record.results.allPassed
        ? translate(language, "all_passed")
        : translate(language, "failed_checks", { n: record.results.failures.length })
    );
  } else if (record.state === "aborted" && record.failedStep === "fetch") {
    notices.push(translate(language, "results_unavailable"));
  }

  if (record.state === "reset") {
    notices.push(translate(language, "archived", { batch: record.batchName }));
  }
  return notices;
}

/** API projection of a batch record: export bytes are replaced by download links. */
export function batchView(record: BatchRecord, language: Language, maxUploadMb: number) {
  const base = `/api/batches/${encodeURIComponent(record.batchName)}`;
  return {
    batchName: record.batchName,
    state: record.state,
    submittedBy: record.submittedBy,
    acceptedFiles: record.acceptedFiles,
    rejectedFiles: record.rejectedFiles,
    uploadedFiles: record.uploadedFiles,
    runId: record.runId,
    jobResultState: record.jobResultState,
    results: record.results
      ? {
          allPassed: record.results.allPassed,
          invoices: record.results.invoices,
          failedChecks: record.results.failures
        }
      : undefined,
    downloads: (record.exports ?? []).map((artifact) => ({
      kind: artifact.kind,
      filename: artifact.filename,
      url: `${base}/export/${EXPORT_PATHS[artifact.kind]}`
    })),
    failedStep: record.failedStep,
    errorCode: record.errorCode,
    errorSummary: record.errorSummary,
    notices: batchNotices(record, language, maxUploadMb),
    createdAt: record.createdAt,
    updatedAt: record.updatedAt
  };
}
