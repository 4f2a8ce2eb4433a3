export type VatCheckErrorCode =
  | "upload_failed"
  | "job_trigger_failed"
  | "query_failed"
  | "store_list_failed"
  | "store_delete_failed"
  | "store_read_failed"
  | "poll_timeout"
  | "batch_cancelled"
  | "batch_in_progress"
  | "batch_rejected"
  | "remote_response_invalid";

/**
 * Base for every failure raised by the batch pipeline and its remote clients.
 * `code` is stable and is what routes and batch records expose.
 */
export class VatCheckError extends Error {
  readonly code: VatCheckErrorCode;
  readonly statusCode?: number;

  constructor(code: VatCheckErrorCode, message: string, statusCode?: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class UploadError extends VatCheckError {
  constructor(message: string, statusCode?: number) {
    super("upload_failed", message, statusCode);
  }
}

export class JobTriggerError extends VatCheckError {
  constructor(message: string, statusCode?: number) {
    super("job_trigger_failed", message, statusCode);
  }
}

export class QueryError extends VatCheckError {
  readonly state: string;

  constructor(message: string, state: string) {
    super("query_failed", message);
    this.state = state;
  }
}

export class StoreListError extends VatCheckError {
  constructor(message: string, statusCode?: number) {
    super("store_list_failed", message, statusCode);
  }
}

export class StoreDeleteError extends VatCheckError {
  constructor(message: string, statusCode?: number) {
    super("store_delete_failed", message, statusCode);
  }
}

export class StoreReadError extends VatCheckError {
  constructor(message: string, statusCode?: number) {
    super("store_read_failed", message, statusCode);
  }
}

export class PollTimeoutError extends VatCheckError {
  readonly attempts: number;

  constructor(what: string, attempts: number) {
    super("poll_timeout", `${what} did not reach a terminal state after ${attempts} polls`);
    this.attempts = attempts;
  }
}

export class BatchCancelledError extends VatCheckError {
  constructor(message = "Batch was cancelled") {
    super("batch_cancelled", message);
  }
}

export type LockHold = "running" | "dirty" | "resetting";

const LOCK_HOLD_MESSAGES: Record<LockHold, (holder: string) => string> = {
  running: (holder) => `Batch ${holder} is still being processed`,
  dirty: (holder) => `Working area still holds batch ${holder}; run a reset before submitting`,
  resetting: () => "Working area reset is in progress"
};

export class BatchInProgressError extends VatCheckError {
  readonly holder: string;
  readonly hold: LockHold;

  constructor(holder: string, hold: LockHold) {
    super("batch_in_progress", LOCK_HOLD_MESSAGES[hold](holder));
    this.holder = holder;
    this.hold = hold;
  }
}

export type BatchRejectionReason = "too_many_files" | "no_acceptable_files" | "batch_name_invalid";

export class BatchRejectedError extends VatCheckError {
  readonly reason: BatchRejectionReason;

  constructor(reason: BatchRejectionReason, message: string) {
    super("batch_rejected", message);
    this.reason = reason;
  }
}

export class RemoteResponseError extends VatCheckError {
  constructor(message: string) {
    super("remote_response_invalid", message);
  }
}

export function errorCodeOf(error: unknown): string {
  if (error instanceof VatCheckError) return error.code;
  return "unknown_error";
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : "unknown_error";
}
