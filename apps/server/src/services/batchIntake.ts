import { BatchRejectedError } from "../errors.js";
import type { RejectedFile, UploadedFile } from "../types/batch.js";

export interface IntakeLimits {
  maxFileBytes: number;
  maxFiles: number;
}

export interface ScreenedFiles {
  accepted: UploadedFile[];
  rejected: RejectedFile[];
}

const BATCH_NAME_PATTERN = /^[\p{L}\p{N}._-]+$/u;

/** Whole bytes; fractional megabyte settings round down. */
export function megabytesToBytes(megabytes: number): number {
  return Math.floor(megabytes * 1024 * 1024);
}

/**
 * "Sept14 Invoices" becomes "Sept14_Invoices"; each inner whitespace character
 * becomes one underscore. A blank name falls back to the UTC timestamp of `now`
 * as YYYYMMDD_HHMMSS.
 */
export function normalizeBatchName(input: string | undefined, now: Date = new Date()): string {
  const trimmed = (input ?? "").trim();
  const name = trimmed ? trimmed.replace(/\s/g, "_") : utcStamp(now);
  if (!isValidBatchName(name)) {
    throw new BatchRejectedError("batch_name_invalid", `Batch name "${name}" may only contain letters, digits, '.', '_' and '-'`);
  }
  return name;
}

export function isValidBatchName(name: string): boolean {
  return BATCH_NAME_PATTERN.test(name) && name !== "." && name !== "..";
}

/** Keeps only the last path segment so an upload name cannot escape its batch prefix. */
export function safeFileName(name: string): string {
  const last = name.replace(/\\/g, "/").split("/").filter(Boolean).pop() ?? "";
  return last === "." || last === ".." || last === "" ? "unnamed" : last;
}

export function isPdfName(name: string): boolean {
  return name.toLowerCase().endsWith(".pdf");
}

function utcStamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `_${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

/**
 * The count cap applies to everything uploaded, before any filtering, and rejects the
 * whole batch. Non-PDF and oversized files are then dropped one by one without touching
 * their siblings.
 */
export function screenFiles(files: UploadedFile[], limits: IntakeLimits): ScreenedFiles {
  if (files.length > limits.maxFiles) {
    throw new BatchRejectedError(
      "too_many_files",
      `You can only upload up to ${limits.maxFiles} files at once (received ${files.length})`
    );
  }

  const accepted: UploadedFile[] = [];
  const rejected: RejectedFile[] = [];
  for (const file of files) {
    const name = safeFileName(file.name);
    if (!isPdfName(name)) {
      rejected.push({ name, size: file.size, reason: "unsupported_type" });
    } else if (file.size > limits.maxFileBytes) {
      rejected.push({ name, size: file.size, reason: "file_too_large" });
    } else {
      accepted.push({ ...file, name });
    }
  }

  if (accepted.length === 0) {
    throw new BatchRejectedError("no_acceptable_files", "No PDF files within the size limit were uploaded");
  }
  return { accepted, rejected };
}
