import type pino from "pino";
import { JobTriggerError } from "../../errors.js";
import type { JobRunState, LifeCycleState } from "../../types/remote.js";
import { pollUntil, type PollPolicy } from "../polling.js";
import { runNowResponseSchema, runStatusResponseSchema } from "./remoteSchemas.js";
import { describeFailure, type RemoteHttp } from "./remoteHttp.js";

const TERMINAL_LIFE_CYCLE_STATES = new Set<LifeCycleState>(["TERMINATED", "SKIPPED", "INTERNAL_ERROR"]);

export interface JobRunner {
  start(jobId: number, params: Record<string, string>, signal?: AbortSignal): Promise<number>;
  awaitTerminal(runId: number, signal?: AbortSignal): Promise<JobRunState>;
  cancel(runId: number): Promise<void>;
}

export class JobClient implements JobRunner {
  constructor(
    private readonly http: RemoteHttp,
    private readonly poll: PollPolicy,
    private readonly logger: pino.Logger
  ) {}

  async start(jobId: number, params: Record<string, string>, signal?: AbortSignal): Promise<number> {
    const response = await this.http.request("POST", "/api/2.1/jobs/run-now", {
      json: {
        job_id: jobId,
        ...(Object.keys(params).length > 0 ? { notebook_params: params } : {})
      },
      signal
    });
    if (!response.ok) {
      throw new JobTriggerError(await describeFailure(response, "job_run_now"), response.status);
    }
    const { run_id: runId } = await this.http.readJson(response, runNowResponseSchema, "job_run_now");
    this.logger.info({ jobId, runId }, "Remote job triggered");
    return runId;
  }

  async awaitTerminal(runId: number, signal?: AbortSignal): Promise<JobRunState> {
    return pollUntil(
      `job run ${runId}`,
      () => this.getRunState(runId, signal),
      (state) => TERMINAL_LIFE_CYCLE_STATES.has(state.lifeCycleState),
      this.poll,
      signal
    );
  }

  async cancel(runId: number): Promise<void> {
    const response = await this.http.request("POST", "/api/2.1/jobs/runs/cancel", { json: { run_id: runId } });
    if (!response.ok) {
      throw new JobTriggerError(await describeFailure(response, "job_run_cancel"), response.status);
    }
  }

  private async getRunState(runId: number, signal?: AbortSignal): Promise<JobRunState> {
    const response = await this.http.request("GET", "/api/2.1/jobs/runs/get", {
      query: { run_id: String(runId) },
      signal
    });
    if (!response.ok) {
      throw new JobTriggerError(await describeFailure(response, "job_run_get"), response.status);
    }
    const { state } = await this.http.readJson(response, runStatusResponseSchema, "job_run_get");
    return {
      runId,
      lifeCycleState: state.life_cycle_state,
      resultState: state.result_state,
      stateMessage: state.state_message
    };
  }
}
