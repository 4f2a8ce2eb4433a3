import type { QueryRow } from "./remote.js";

export interface UploadedFile {
  name: string;
  size: number;
  content: Buffer;
}

export interface RejectedFile {
  name: string;
  size: number;
  reason: "file_too_large" | "unsupported_type";
}

export type BatchState =
  | "created"
  | "files_accepted"
  | "uploaded"
  | "job_running"
  | "job_done"
  | "results_fetched"
  | "exported"
  | "archived"
  | "reset"
  | "aborted";

export type PipelineStep = "upload" | "job" | "fetch" | "export" | "archive" | "reset";

export interface InvoiceResultRow {
  path: string;
  invoiceNumber: string | null;
  issueDate: string | null;
  finalDecision: string | null;
}

export interface CheckFailureRow extends InvoiceResultRow {
  ruleId: string;
  ruleName: string | null;
  reason: string | null;
}

export interface ResultTable {
  columns: string[];
  rows: QueryRow[];
}

export interface BatchResults {
  summary: ResultTable;
  failedChecks: ResultTable;
  invoices: InvoiceResultRow[];
  failures: CheckFailureRow[];
  allPassed: boolean;
}

export type ExportKind = "xlsx" | "invoices_csv" | "checks_csv";

export interface ExportArtifact {
  kind: ExportKind;
  filename: string;
  contentType: string;
  data: Buffer;
}

export interface BatchRecord {
  batchName: string;
  state: BatchState;
  submittedBy: string;
  acceptedFiles: string[];
  rejectedFiles: RejectedFile[];
  uploadedFiles: string[];
  runId?: number;
  jobResultState?: string;
  results?: BatchResults;
  exports?: ExportArtifact[];
  failedStep?: PipelineStep;
  errorCode?: string;
  errorSummary?: string;
  createdAt: string;
  updatedAt: string;
}
