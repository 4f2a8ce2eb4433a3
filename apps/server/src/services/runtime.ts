import pino from "pino";
import { env } from "../config/env.js";
import { AccessGate } from "./accessGate.js";
import { ArchiveService } from "./archiveService.js";
import { megabytesToBytes } from "./batchIntake.js";
import { BatchLock } from "./batchLock.js";
import { BatchOrchestrator } from "./batchOrchestrator.js";
import { realtimeEventBus } from "./realtimeEventBus.js";
import { JobClient } from "./remote/jobClient.js";
import { QueryClient } from "./remote/queryClient.js";
import { RemoteHttp } from "./remote/remoteHttp.js";
import { StoreClient } from "./remote/storeClient.js";
import { SessionStore } from "./sessionStore.js";
import { warehouseTables } from "./sqlStatements.js";

export const logger = pino({ level: env.LOG_LEVEL, name: "vat-compliance" });

const remoteHttp = new RemoteHttp({ baseUrl: env.REMOTE_BASE_URL, token: env.REMOTE_TOKEN });

export const tables = warehouseTables(env.SQL_NAMESPACE);
export const storeClient = new StoreClient(remoteHttp);
export const queryClient = new QueryClient(remoteHttp, {
  warehouseId: env.WAREHOUSE_ID,
  waitTimeout: env.SQL_WAIT_TIMEOUT,
  poll: { intervalMs: env.QUERY_POLL_INTERVAL_MS, maxPolls: env.QUERY_MAX_POLLS },
  logger: logger.child({ component: "query_client" })
});
export const jobClient = new JobClient(
  remoteHttp,
  { intervalMs: env.JOB_POLL_INTERVAL_MS, maxPolls: env.JOB_MAX_POLLS },
  logger.child({ component: "job_client" })
);

export const batchLock = new BatchLock();
export const batchOrchestrator = new BatchOrchestrator({
  store: storeClient,
  query: queryClient,
  jobs: jobClient,
  lock: batchLock,
  events: realtimeEventBus,
  logger,
  settings: {
    jobId: env.JOB_ID,
    workingRoot: env.WORKING_ROOT,
    archiveRoot: env.ARCHIVE_ROOT,
    tables,
    limits: { maxFileBytes: megabytesToBytes(env.MAX_UPLOAD_MB), maxFiles: env.MAX_FILES_PER_BATCH },
    retainedBatches: env.RETAINED_BATCHES
  }
});

export const archiveService = new ArchiveService(queryClient, tables);

export const accessGate = new AccessGate({
  operationalSecret: env.OPERATIONAL_PASSWORD,
  reportingSecret: env.REPORTING_PASSWORD,
  rateLimitMax: env.LOGIN_RATE_LIMIT_MAX,
  rateLimitWindowSeconds: env.LOGIN_RATE_LIMIT_WINDOW_SEC
});

export const sessionStore = new SessionStore({
  jwtSecret: env.JWT_SECRET,
  ttlHours: env.SESSION_TTL_HOURS,
  archiveListTtlSeconds: env.ARCHIVE_LIST_CACHE_SECONDS
});
