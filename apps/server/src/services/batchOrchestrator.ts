import type pino from "pino";
import { BatchCancelledError, errorCodeOf, errorMessageOf } from "../errors.js";
import type { Role } from "../types/auth.js";
import type {
  BatchRecord,
  BatchResults,
  BatchState,
  CheckFailureRow,
  ExportArtifact,
  ExportKind,
  InvoiceResultRow,
  PipelineStep,
  ResultTable,
  UploadedFile
} from "../types/batch.js";
import type { QueryRow, QueryValue } from "../types/remote.js";
import { normalizeBatchName, screenFiles, type IntakeLimits } from "./batchIntake.js";
import type { BatchLock } from "./batchLock.js";
import type { RealtimeEventBus } from "./realtimeEventBus.js";
import type { JobRunner } from "./remote/jobClient.js";
import { rowsOrThrow, type QueryEngine } from "./remote/queryClient.js";
import { topLevelNames, type ObjectStore } from "./remote/storeClient.js";
import { buildBatchExports } from "./resultExport.js";
import {
  archiveStatements,
  failedChecksStatement,
  summaryStatement,
  truncateStatements,
  type WarehouseTables
} from "./sqlStatements.js";

export interface OrchestratorSettings {
  jobId: number;
  workingRoot: string;
  archiveRoot: string;
  tables: WarehouseTables;
  limits: IntakeLimits;
  /** Settled batch records (and their export buffers) kept in memory. */
  retainedBatches: number;
}

export interface BatchOrchestratorDeps {
  store: ObjectStore;
  query: QueryEngine;
  jobs: JobRunner;
  lock: BatchLock;
  events: RealtimeEventBus;
  logger: pino.Logger;
  settings: OrchestratorSettings;
  now?: () => Date;
}

export interface SubmitBatchInput {
  batchName?: string;
  files: UploadedFile[];
  submittedBy: Role;
}

interface RunningBatch {
  controller: AbortController;
  completion: Promise<BatchRecord>;
}

/**
 * Drives one batch from upload to reset:
 * upload -> job run -> result fetch -> export -> archive insert -> scratch reset.
 *
 * The working prefix and working tables are shared scratch space, so only one batch
 * may hold them (see BatchLock). A batch that fails after touching scratch leaves the
 * lock dirty until `resetScratch()` runs.
 */
export class BatchOrchestrator {
  private readonly records = new Map<string, BatchRecord>();
  private readonly running = new Map<string, RunningBatch>();
  private readonly logger: pino.Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: BatchOrchestratorDeps) {
    this.logger = deps.logger.child({ component: "batch_orchestrator" });
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Screens the files and claims the scratch area. Rejections happen here, before
   * anything is uploaded. The pipeline continues in the background.
   */
  submit(input: SubmitBatchInput): BatchRecord {
    const batchName = normalizeBatchName(input.batchName, this.now());
    const { accepted, rejected } = screenFiles(input.files, this.deps.settings.limits);

    this.deps.lock.acquire(batchName);
    if (this.records.has(batchName)) {
      this.logger.warn({ batchName }, "Batch name reused; archive rows will share the tag");
    }

    const timestamp = this.now().toISOString();
    const record: BatchRecord = {
      batchName,
      state: "files_accepted",
      submittedBy: input.submittedBy,
      acceptedFiles: accepted.map((file) => file.name),
      rejectedFiles: rejected,
      uploadedFiles: [],
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.records.set(batchName, record);
    this.publishProgress(record);

    if (rejected.length > 0) {
      this.logger.info({ batchName, rejected: rejected.map((file) => `${file.name}:${file.reason}`) }, "Files skipped");
    }

    const controller = new AbortController();
    const running: RunningBatch = { controller, completion: Promise.resolve(record) };
    this.running.set(batchName, running);
    running.completion = this.runPipeline(batchName, accepted, controller.signal);
    return record;
  }

  /** Resolves with the final record once the batch reaches `reset` or `aborted`. */
  async whenSettled(batchName: string): Promise<BatchRecord | null> {
    const running = this.running.get(batchName);
    if (running) return running.completion;
    return this.records.get(batchName) ?? null;
  }

  cancel(batchName: string): boolean {
    const running = this.running.get(batchName);
    if (!running || running.controller.signal.aborted) return false;
    this.logger.info({ batchName }, "Batch cancellation requested");
    running.controller.abort();
    return true;
  }

  getBatch(batchName: string): BatchRecord | null {
    return this.records.get(batchName) ?? null;
  }

  getCurrent(): BatchRecord | null {
    const { holder } = this.deps.lock.status();
    return holder ? this.records.get(holder) ?? null : null;
  }

  listBatches(): BatchRecord[] {
    return Array.from(this.records.values()).sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  getExport(batchName: string, kind: ExportKind): ExportArtifact | null {
    return this.records.get(batchName)?.exports?.find((artifact) => artifact.kind === kind) ?? null;
  }

  /**
   * Operator recovery: empties the working tables and every prefix under the working root,
   * then frees the lock. Safe to repeat. The lock is held for the whole reset, so no batch
   * can start while scratch is being cleared; a running batch makes it refuse.
   */
  async resetScratch(): Promise<{ batchName: string | null }> {
    const holder = this.deps.lock.beginReset();
    try {
      await this.resetWorkingArea(null);
    } catch (error) {
      this.deps.lock.finishReset(false);
      throw error;
    }
    this.deps.lock.finishReset(true);
    this.logger.info({ batchName: holder }, "Working area reset");
    this.deps.events.publish({ type: "scratch.reset", batchName: holder ?? undefined, data: { batchName: holder } });
    return { batchName: holder };
  }

  private async runPipeline(batchName: string, files: UploadedFile[], signal: AbortSignal): Promise<BatchRecord> {
    let step: PipelineStep = "upload";
    let scratchTouched = false;

    try {
      for (const file of files) {
        // Archive copy first: it is never deleted, and the job only reads the working prefix.
        await this.deps.store.put(`${this.deps.settings.archiveRoot}/${batchName}/${file.name}`, file.content, signal);
        scratchTouched = true;
        await this.deps.store.put(`${this.deps.settings.workingRoot}/${batchName}/${file.name}`, file.content, signal);
        const current = this.mustGet(batchName);
        this.update(batchName, { uploadedFiles: [...current.uploadedFiles, file.name] });
      }
      this.transition(batchName, "uploaded");

      step = "job";
      const runId = await this.deps.jobs.start(this.deps.settings.jobId, { batch_name: batchName }, signal);
      this.transition(batchName, "job_running", { runId });
      const runState = await this.awaitJob(batchName, runId, signal);
      if (runState.resultState && runState.resultState !== "SUCCESS") {
        this.logger.warn({ batchName, ...runState }, "Remote job terminated without success; results may be incomplete");
      }
      this.transition(batchName, "job_done", { jobResultState: runState.resultState ?? runState.lifeCycleState });

      step = "fetch";
      const results = await this.fetchResults(signal);
      this.transition(batchName, "results_fetched", { results });

      step = "export";
      this.transition(batchName, "exported", { exports: buildBatchExports(batchName, results) });

      step = "archive";
      for (const statement of archiveStatements(this.deps.settings.tables)) {
        rowsOrThrow(await this.deps.query.execute(statement, [{ name: "batch_name", value: batchName }], signal));
      }
      this.transition(batchName, "archived");

      step = "reset";
      await this.resetWorkingArea(batchName, signal);
      const finished = this.transition(batchName, "reset");
      this.deps.lock.release(batchName);
      this.deps.events.publish({
        type: "batch.completed",
        batchName,
        data: { allPassed: results.allPassed, invoices: results.invoices.length, failedChecks: results.failures.length }
      });
      this.logger.info({ batchName, runId, allPassed: results.allPassed }, "Batch archived and working area reset");
      return finished;
    } catch (error) {
      return this.abort(batchName, step, error, scratchTouched);
    } finally {
      this.running.delete(batchName);
      this.pruneRecords();
    }
  }

  private async awaitJob(batchName: string, runId: number, signal: AbortSignal) {
    try {
      return await this.deps.jobs.awaitTerminal(runId, signal);
    } catch (error) {
      if (error instanceof BatchCancelledError) {
        await this.deps.jobs.cancel(runId).catch((cancelError: unknown) => {
          this.logger.warn({ batchName, runId, err: cancelError }, "Remote job cancel failed");
        });
      }
      throw error;
    }
  }

  private async fetchResults(signal: AbortSignal): Promise<BatchResults> {
    const tables = this.deps.settings.tables;
    // Both statements are issued before either outcome is judged.
    const summaryOutcome = await this.deps.query.execute(summaryStatement(tables), undefined, signal);
    const detailOutcome = await this.deps.query.execute(failedChecksStatement(tables), undefined, signal);

    const summaryRows = rowsOrThrow(summaryOutcome);
    const detailRows = rowsOrThrow(detailOutcome);
    const summary: ResultTable = { columns: summaryOutcome.ok ? summaryOutcome.columns : [], rows: summaryRows };
    const failedChecks: ResultTable = { columns: detailOutcome.ok ? detailOutcome.columns : [], rows: detailRows };

    return {
      summary,
      failedChecks,
      invoices: summaryRows.map(toInvoiceRow),
      failures: detailRows.map(toCheckFailureRow),
      allPassed: detailRows.length === 0
    };
  }

  private async resetWorkingArea(batchName: string | null, signal?: AbortSignal): Promise<void> {
    for (const statement of truncateStatements(this.deps.settings.tables)) {
      rowsOrThrow(await this.deps.query.execute(statement, undefined, signal));
    }

    const root = this.deps.settings.workingRoot;
    if (batchName) {
      await this.deps.store.delete(`${root}/${batchName}`, true);
      return;
    }
    for (const name of topLevelNames(root, await this.deps.store.list(root, true))) {
      await this.deps.store.delete(`${root}/${name}`, true);
    }
  }

  /** Drops the oldest settled records beyond `retainedBatches`; the running batch and the lock holder stay. */
  private pruneRecords() {
    const excess = this.records.size - this.deps.settings.retainedBatches;
    if (excess <= 0) return;
    const { holder } = this.deps.lock.status();
    Array.from(this.records.values())
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .filter((record) => !this.running.has(record.batchName) && record.batchName !== holder)
      .slice(0, excess)
      .forEach((record) => this.records.delete(record.batchName));
  }

  private abort(batchName: string, step: PipelineStep, error: unknown, scratchTouched: boolean): BatchRecord {
    const code = errorCodeOf(error);
    const summary = errorMessageOf(error);
    const aborted = this.transition(batchName, "aborted", { failedStep: step, errorCode: code, errorSummary: summary });

    if (scratchTouched) {
      this.deps.lock.markDirty(batchName);
    } else {
      this.deps.lock.release(batchName);
    }

    this.logger.error({ batchName, step, code, err: error, scratchDirty: scratchTouched }, "Batch aborted");
    this.deps.events.publish({
      type: "batch.aborted",
      batchName,
      data: { failedStep: step, errorCode: code, errorSummary: summary, resetRequired: scratchTouched }
    });
    return aborted;
  }

  private transition(batchName: string, state: BatchState, patch: Partial<BatchRecord> = {}): BatchRecord {
    const next = this.update(batchName, { ...patch, state });
    this.publishProgress(next);
    return next;
  }

  private update(batchName: string, patch: Partial<BatchRecord>): BatchRecord {
    const next: BatchRecord = { ...this.mustGet(batchName), ...patch, updatedAt: this.now().toISOString() };
    this.records.set(batchName, next);
    return next;
  }

  private mustGet(batchName: string): BatchRecord {
    const record = this.records.get(batchName);
    if (!record) throw new Error(`batch_record_missing:${batchName}`);
    return record;
  }

  private publishProgress(record: BatchRecord) {
    this.deps.events.publish({
      type: "batch.progress",
      batchName: record.batchName,
      data: {
        state: record.state,
        acceptedFiles: record.acceptedFiles.length,
        rejectedFiles: record.rejectedFiles.length,
        uploadedFiles: record.uploadedFiles.length,
        runId: record.runId
      }
    });
  }
}

function text(value: QueryValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

function toInvoiceRow(row: QueryRow): InvoiceResultRow {
  return {
    path: text(row.path) ?? "",
    invoiceNumber: text(row.invoice_number),
    issueDate: text(row.issue_date),
    finalDecision: text(row.final_decision)
  };
}

function toCheckFailureRow(row: QueryRow): CheckFailureRow {
  return {
    ...toInvoiceRow(row),
    ruleId: text(row.failed_rule_id) ?? "",
    ruleName: text(row.failed_rule_name),
    reason: text(row.failed_reason)
  };
}
