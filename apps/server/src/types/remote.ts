export type QueryValue = string | number | boolean | null;

export type QueryRow = Record<string, QueryValue>;

export type StatementState = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED" | "CANCELED" | "CLOSED";

export interface StatementParameter {
  name: string;
  value: string;
  type?: string;
}

export type QueryOutcome =
  | { ok: true; statementId: string; columns: string[]; rows: QueryRow[] }
  | { ok: false; statementId?: string; state: StatementState | "REJECTED"; reason: string };

export type LifeCycleState =
  | "QUEUED"
  | "PENDING"
  | "RUNNING"
  | "TERMINATING"
  | "TERMINATED"
  | "SKIPPED"
  | "INTERNAL_ERROR"
  | "BLOCKED"
  | "WAITING_FOR_RETRY";

export interface JobRunState {
  runId: number;
  lifeCycleState: LifeCycleState;
  resultState?: string;
  stateMessage?: string;
}

export interface StoreEntry {
  name: string;
  path: string;
  isDirectory: boolean;
  fileSize?: number;
}
