import pino from "pino";
import { z } from "zod";
import { BatchLock } from "../../src/services/batchLock.js";
import { BatchOrchestrator } from "../../src/services/batchOrchestrator.js";
import { RealtimeEventBus } from "../../src/services/realtimeEventBus.js";
import { JobClient } from "../../src/services/remote/jobClient.js";
import { QueryClient } from "../../src/services/remote/queryClient.js";
import { RemoteHttp, type FetchLike } from "../../src/services/remote/remoteHttp.js";
import { StoreClient } from "../../src/services/remote/storeClient.js";
import { warehouseTables } from "../../src/services/sqlStatements.js";
import type { QueryRow } from "../../src/types/remote.js";

export const WORKING_ROOT = "/Volumes/test/incoming";
export const ARCHIVE_ROOT = "/Volumes/test/archive";
export const TABLES = warehouseTables("test.vat");
export const silentLogger = pino({ level: "silent" });

export interface FakeWorkspaceOptions {
  /** Rows the job writes into invoices_head when its run completes. */
  invoices?: QueryRow[];
  /** Rows the job writes into checks_flat when its run completes. */
  checks?: QueryRow[];
  jobPollsUntilDone?: number;
  jobResultState?: string;
  jobTriggerStatus?: number;
  statementPendingPolls?: number;
  failPut?: (path: string) => boolean;
  /** Returns an error message to end the statement in FAILED. */
  failStatement?: (statement: string) => string | null;
  rejectStatement?: (statement: string) => boolean;
}

export interface RecordedRequest {
  method: string;
  path: string;
}

export interface RecordedStatement {
  statement: string;
  parameters: Record<string, string>;
}

export interface FakeJobRun {
  runId: number;
  jobId: number;
  params: Record<string, string>;
  polls: number;
  cancelled: boolean;
  /** Working files visible when the run completed. */
  inputs: string[];
}

interface StatementResult {
  columns: string[];
  rows: QueryRow[];
}

interface PendingStatement {
  remaining: number;
  final: unknown;
}

const statementBodySchema = z.object({
  statement: z.string(),
  parameters: z.array(z.object({ name: z.string(), value: z.string() })).optional()
});

const runNowBodySchema = z.object({
  job_id: z.number(),
  notebook_params: z.record(z.string(), z.string()).optional()
});

const cancelBodySchema = z.object({ run_id: z.number() });

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), { status, headers: { "content-type": "application/json" } });
}

function compareBy(keys: string[]) {
  return (a: QueryRow, b: QueryRow) => {
    for (const key of keys) {
      const left = String(a[key] ?? "");
      const right = String(b[key] ?? "");
      if (left < right) return -1;
      if (left > right) return 1;
    }
    return 0;
  };
}

/**
 * In-process stand-in for the remote workspace: Files API, SQL statements and Jobs,
 * reachable through the `fetch` property.
 */
export class FakeWorkspace {
  readonly files = new Map<string, Buffer>();
  readonly requests: RecordedRequest[] = [];
  readonly statements: RecordedStatement[] = [];
  readonly runs: FakeJobRun[] = [];
  readonly tables = new Map<string, QueryRow[]>();
  private readonly pending = new Map<string, PendingStatement>();
  private statementCounter = 0;

  constructor(private readonly options: FakeWorkspaceOptions = {}) {
    for (const name of ["invoices_head", "checks_flat", "invoice_check_parsed", "invoices_head_archive", "checks_flat_archive"]) {
      this.tables.set(name, []);
    }
  }

  readonly fetch: FetchLike = async (input, init) => this.handle(input, init);

  table(name: string): QueryRow[] {
    const short = name.split(".").pop() ?? name;
    const rows = this.tables.get(short);
    if (!rows) throw new Error(`fake workspace has no table ${name}`);
    return rows;
  }

  filesUnder(prefix: string): string[] {
    return Array.from(this.files.keys())
      .filter((key) => key.startsWith(`${prefix}/`))
      .sort();
  }

  executed(pattern: RegExp): number[] {
    return this.statements.flatMap((entry, index) => (pattern.test(entry.statement) ? [index] : []));
  }

  private async handle(input: string, init?: RequestInit): Promise<Response> {
    const url = new URL(input);
    const method = init?.method ?? "GET";
    const path = decodeURIComponent(url.pathname);
    this.requests.push({ method, path });
    const body = init?.body;

    if (path.startsWith("/api/2.0/fs/files/")) {
      return this.handleFile(method, path.slice("/api/2.0/fs/files".length), url.searchParams, body);
    }
    if (path === "/api/2.0/sql/statements/" && method === "POST") {
      return this.submitStatement(typeof body === "string" ? JSON.parse(body) : undefined);
    }
    if (path.startsWith("/api/2.0/sql/statements/") && method === "GET") {
      return this.pollStatement(path.slice("/api/2.0/sql/statements/".length));
    }
    if (path === "/api/2.1/jobs/run-now" && method === "POST") {
      return this.runNow(typeof body === "string" ? JSON.parse(body) : undefined);
    }
    if (path === "/api/2.1/jobs/runs/get" && method === "GET") {
      return this.getRun(Number(url.searchParams.get("run_id")));
    }
    if (path === "/api/2.1/jobs/runs/cancel" && method === "POST") {
      const { run_id: runId } = cancelBodySchema.parse(typeof body === "string" ? JSON.parse(body) : undefined);
      const run = this.runs.find((entry) => entry.runId === runId);
      if (!run) return json({ error_code: "RESOURCE_DOES_NOT_EXIST" }, 404);
      run.cancelled = true;
      return json({});
    }
    return json({ error_code: "ENDPOINT_NOT_FOUND", message: `${method} ${path}` }, 404);
  }

  private handleFile(method: string, path: string, query: URLSearchParams, body: RequestInit["body"]): Response {
    if (method === "PUT") {
      if (this.options.failPut?.(path)) return new Response("volume is read-only", { status: 500 });
      this.files.set(path, body instanceof Uint8Array ? Buffer.from(body) : Buffer.alloc(0));
      return new Response(null, { status: 204 });
    }
    if (method === "GET") {
      const bytes = this.files.get(path);
      if (bytes) return new Response(new Uint8Array(bytes), { status: 200 });
      return this.handleListing(path, query.get("recursive") === "true");
    }
    if (method === "DELETE") {
      const doomed = Array.from(this.files.keys()).filter((key) => key === path || key.startsWith(`${path}/`));
      if (doomed.length === 0) return json({ error_code: "NOT_FOUND" }, 404);
      if (!doomed.includes(path) && query.get("recursive") !== "true") {
        return json({ error_code: "DIRECTORY_NOT_EMPTY" }, 400);
      }
      for (const key of doomed) this.files.delete(key);
      return new Response(null, { status: 204 });
    }
    return json({ error_code: "METHOD_NOT_ALLOWED" }, 405);
  }

  private handleListing(path: string, recursive: boolean): Response {
    const prefix = `${path.replace(/\/+$/, "")}/`;
    const entries = new Map<string, { name: string; path: string; is_directory: boolean; file_size?: number }>();
    for (const [key, bytes] of this.files) {
      if (!key.startsWith(prefix)) continue;
      const rest = key.slice(prefix.length);
      if (recursive) {
        entries.set(key, { name: rest.split("/").pop() ?? rest, path: key, is_directory: false, file_size: bytes.length });
        continue;
      }
      const name = rest.split("/")[0];
      const isDirectory = rest.includes("/");
      entries.set(name, {
        name,
        path: `${prefix}${name}`,
        is_directory: isDirectory,
        ...(isDirectory ? {} : { file_size: bytes.length })
      });
    }
    if (entries.size === 0) return json({ error_code: "NOT_FOUND" }, 404);
    return json({ files: Array.from(entries.values()).sort((a, b) => a.path.localeCompare(b.path)) });
  }

  private submitStatement(payload: unknown): Response {
    const { statement, parameters = [] } = statementBodySchema.parse(payload);
    const params = Object.fromEntries(parameters.map((parameter) => [parameter.name, parameter.value]));
    this.statements.push({ statement, parameters: params });

    if (this.options.rejectStatement?.(statement)) {
      return json({ error_code: "BAD_REQUEST", message: "warehouse is stopped" }, 400);
    }

    this.statementCounter += 1;
    const statementId = `stmt-${this.statementCounter}`;
    const failure = this.options.failStatement?.(statement) ?? null;
    const final = failure
      ? { statement_id: statementId, status: { state: "FAILED", error: { error_code: "TABLE_OR_VIEW_NOT_FOUND", message: failure } } }
      : this.succeeded(statementId, this.evaluate(statement, params));

    const pendingPolls = this.options.statementPendingPolls ?? 0;
    if (pendingPolls > 0) {
      this.pending.set(statementId, { remaining: pendingPolls, final });
      return json({ statement_id: statementId, status: { state: "PENDING" } });
    }
    return json(final);
  }

  private pollStatement(statementId: string): Response {
    const pending = this.pending.get(statementId);
    if (!pending) return json({ error_code: "NOT_FOUND" }, 404);
    pending.remaining -= 1;
    if (pending.remaining > 0) return json({ statement_id: statementId, status: { state: "RUNNING" } });
    this.pending.delete(statementId);
    return json(pending.final);
  }

  private succeeded(statementId: string, result: StatementResult) {
    return {
      statement_id: statementId,
      status: { state: "SUCCEEDED" },
      manifest: { schema: { columns: result.columns.map((name) => ({ name, type_name: "STRING" })) } },
      result: { data_array: result.rows.map((row) => result.columns.map((column) => row[column] ?? null)) }
    };
  }

  private evaluate(statement: string, params: Record<string, string>): StatementResult {
    const sql = statement.trim();
    let match = /^TRUNCATE TABLE (\S+)$/.exec(sql);
    if (match) {
      this.table(match[1]).length = 0;
      return { columns: [], rows: [] };
    }

    match = /^INSERT INTO (\S+) SELECT \*, :batch_name AS batch_name FROM (\S+)$/.exec(sql);
    if (match) {
      const copies = this.table(match[2]).map((row) => ({ ...row, batch_name: params.batch_name ?? null }));
      this.table(match[1]).push(...copies);
      return { columns: ["num_affected_rows"], rows: [{ num_affected_rows: copies.length }] };
    }

    if (sql.startsWith("SELECT current_date()")) {
      return { columns: ["today"], rows: [{ today: "2026-10-19" }] };
    }

    match = /^SELECT DISTINCT batch_name FROM (\S+) ORDER BY batch_name DESC$/.exec(sql);
    if (match) {
      const names = Array.from(new Set(this.table(match[1]).map((row) => String(row.batch_name)))).sort().reverse();
      return { columns: ["batch_name"], rows: names.map((name) => ({ batch_name: name })) };
    }

    match = /^SELECT \* FROM (\S+) WHERE batch_name = :batch_name ORDER BY (.+)$/.exec(sql);
    if (match) {
      const rows = this.table(match[1])
        .filter((row) => row.batch_name === params.batch_name)
        .sort(compareBy(match[2].split(",").map((key) => key.trim())));
      return { columns: rows.length > 0 ? Object.keys(rows[0]) : [], rows };
    }

    if (sql.includes(" JOIN ")) {
      const heads = this.table(TABLES.invoicesHead);
      const rows = this.table(TABLES.checksFlat)
        .filter((check) => check.result === "fail")
        .flatMap((check) =>
          heads
            .filter((head) => head.path === check.path)
            .map((head) => ({
              path: head.path,
              invoice_number: head.invoice_number ?? null,
              issue_date: head.issue_date ?? null,
              final_decision: head.final_decision ?? null,
              failed_rule_id: check.id ?? null,
              failed_rule_name: check.name ?? null,
              failed_reason: check.reason ?? null
            }))
        )
        .sort(compareBy(["path", "failed_rule_id"]));
      return {
        columns: ["path", "invoice_number", "issue_date", "final_decision", "failed_rule_id", "failed_rule_name", "failed_reason"],
        rows
      };
    }

    match = /^SELECT path, invoice_number, issue_date, final_decision\s+FROM (\S+)/.exec(sql);
    if (match) {
      return {
        columns: ["path", "invoice_number", "issue_date", "final_decision"],
        rows: [...this.table(match[1])].sort(compareBy(["path"]))
      };
    }

    throw new Error(`fake workspace cannot evaluate: ${sql}`);
  }

  private runNow(payload: unknown): Response {
    if (this.options.jobTriggerStatus) {
      return new Response("job quota exceeded", { status: this.options.jobTriggerStatus });
    }
    const { job_id: jobId, notebook_params: params = {} } = runNowBodySchema.parse(payload);
    const runId = 1000 + this.runs.length + 1;
    this.runs.push({ runId, jobId, params, polls: 0, cancelled: false, inputs: [] });
    return json({ run_id: runId, number_in_job: this.runs.length });
  }

  private getRun(runId: number): Response {
    const run = this.runs.find((entry) => entry.runId === runId);
    if (!run) return json({ error_code: "RESOURCE_DOES_NOT_EXIST" }, 404);
    if (run.cancelled) {
      return json({ state: { life_cycle_state: "TERMINATED", result_state: "CANCELED" } });
    }

    run.polls += 1;
    if (run.polls < (this.options.jobPollsUntilDone ?? 1)) {
      return json({ state: { life_cycle_state: "RUNNING" } });
    }
    if (run.polls === (this.options.jobPollsUntilDone ?? 1)) {
      run.inputs = this.filesUnder(WORKING_ROOT);
      this.table(TABLES.invoicesHead).push(...(this.options.invoices ?? []).map((row) => ({ ...row })));
      this.table(TABLES.checksFlat).push(...(this.options.checks ?? []).map((row) => ({ ...row })));
    }
    return json({ state: { life_cycle_state: "TERMINATED", result_state: this.options.jobResultState ?? "SUCCESS" } });
  }
}

export interface Harness {
  workspace: FakeWorkspace;
  store: StoreClient;
  query: QueryClient;
  jobs: JobClient;
  lock: BatchLock;
  events: RealtimeEventBus;
  orchestrator: BatchOrchestrator;
}

export interface HarnessOptions extends FakeWorkspaceOptions {
  maxFileBytes?: number;
  maxFiles?: number;
  maxPolls?: number;
  retainedBatches?: number;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const workspace = new FakeWorkspace(options);
  const http = new RemoteHttp({ baseUrl: "https://workspace.test/", token: "test-token", fetch: workspace.fetch });
  const poll = { intervalMs: 0, maxPolls: options.maxPolls ?? 20 };
  const store = new StoreClient(http);
  const query = new QueryClient(http, { warehouseId: "wh-test", waitTimeout: "30s", poll, logger: silentLogger });
  const jobs = new JobClient(http, poll, silentLogger);
  const lock = new BatchLock();
  const events = new RealtimeEventBus();
  const orchestrator = new BatchOrchestrator({
    store,
    query,
    jobs,
    lock,
    events,
    logger: silentLogger,
    settings: {
      jobId: 42,
      workingRoot: WORKING_ROOT,
      archiveRoot: ARCHIVE_ROOT,
      tables: TABLES,
      limits: { maxFileBytes: options.maxFileBytes ?? 1024, maxFiles: options.maxFiles ?? 8 },
      retainedBatches: options.retainedBatches ?? 20
    },
    now: () => new Date("2026-10-19T08:30:05.000Z")
  });
  return { workspace, store, query, jobs, lock, events, orchestrator };
}

export function pdf(name: string, body = `%PDF-1.4 ${name}`) {
  const content = Buffer.from(body, "utf8");
  return { name, size: content.length, content };
}
