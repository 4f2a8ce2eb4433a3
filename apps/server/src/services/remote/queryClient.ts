import type pino from "pino";
import { QueryError } from "../../errors.js";
import type { QueryOutcome, QueryRow, QueryValue, StatementParameter, StatementState } from "../../types/remote.js";
import { pollUntil, type PollPolicy } from "../polling.js";
import { statementResponseSchema, type StatementCell, type StatementResponse } from "./remoteSchemas.js";
import { describeFailure, type RemoteHttp } from "./remoteHttp.js";

const TERMINAL_STATES = new Set<StatementState>(["SUCCEEDED", "FAILED", "CANCELED", "CLOSED"]);

export interface QueryClientOptions {
  warehouseId: string;
  waitTimeout: string;
  poll: PollPolicy;
  logger: pino.Logger;
}

export interface QueryEngine {
  execute(statement: string, parameters?: StatementParameter[], signal?: AbortSignal): Promise<QueryOutcome>;
}

/**
 * Runs SQL on the remote warehouse and reports the outcome as a tagged value,
 * so callers can tell "no rows" apart from "the statement failed".
 */
export class QueryClient implements QueryEngine {
  constructor(
    private readonly http: RemoteHttp,
    private readonly options: QueryClientOptions
  ) {}

  async execute(statement: string, parameters?: StatementParameter[], signal?: AbortSignal): Promise<QueryOutcome> {
    const submitted = await this.http.request("POST", "/api/2.0/sql/statements/", {
      json: {
        statement,
        warehouse_id: this.options.warehouseId,
        wait_timeout: this.options.waitTimeout,
        ...(parameters && parameters.length > 0 ? { parameters } : {})
      },
      signal
    });
    if (!submitted.ok) {
      const reason = await describeFailure(submitted, "sql_submit");
      this.options.logger.warn({ reason }, "SQL statement rejected");
      return { ok: false, state: "REJECTED", reason };
    }

    const initial = await this.http.readJson(submitted, statementResponseSchema, "sql_submit");
    const final = TERMINAL_STATES.has(initial.status.state)
      ? initial
      : await pollUntil(
          `statement ${initial.statement_id}`,
          () => this.fetchStatement(initial.statement_id, signal),
          (response) => TERMINAL_STATES.has(response.status.state),
          this.options.poll,
          signal
        );

    if (final.status.state !== "SUCCEEDED") {
      const reason = final.status.error?.message ?? `statement ended in ${final.status.state}`;
      this.options.logger.warn({ statementId: final.statement_id, state: final.status.state, reason }, "SQL statement did not succeed");
      return { ok: false, statementId: final.statement_id, state: final.status.state, reason };
    }

    return { ok: true, statementId: final.statement_id, ...mapResultTable(final) };
  }

  private async fetchStatement(statementId: string, signal?: AbortSignal): Promise<StatementResponse> {
    const response = await this.http.request("GET", `/api/2.0/sql/statements/${encodeURIComponent(statementId)}`, { signal });
    if (!response.ok) {
      throw new QueryError(await describeFailure(response, "sql_poll"), "UNKNOWN");
    }
    return this.http.readJson(response, statementResponseSchema, "sql_poll");
  }
}

export function rowsOrThrow(outcome: QueryOutcome): QueryRow[] {
  if (!outcome.ok) throw new QueryError(outcome.reason, outcome.state);
  return outcome.rows;
}

export function mapResultTable(response: StatementResponse): { columns: string[]; rows: QueryRow[] } {
  const columns = response.manifest?.schema.columns.map((column) => column.name) ?? [];
  const data = response.result?.data_array ?? [];
  const rows = data.map((tuple) => {
    const row: QueryRow = {};
    columns.forEach((column, index) => {
      row[column] = unwrapCell(tuple[index]);
    });
    return row;
  });
  return { columns, rows };
}

function unwrapCell(cell: StatementCell | undefined): QueryValue {
  if (cell === undefined) return null;
  if (cell !== null && typeof cell === "object") return cell.value ?? null;
  return cell;
}
