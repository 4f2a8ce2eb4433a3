import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.string().default("info"),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  REMOTE_BASE_URL: z.string().url().default("https://workspace.invalid"),
  REMOTE_TOKEN: z.string().default(""),
  WORKING_ROOT: z.string().default("/Volumes/main/default/invoices_incoming"),
  ARCHIVE_ROOT: z.string().default("/Volumes/main/default/invoices_archive"),
  JOB_ID: z.coerce.number().int().default(0),
  WAREHOUSE_ID: z.string().default(""),
  SQL_NAMESPACE: z.string().regex(/^[A-Za-z0-9_]+(\.[A-Za-z0-9_]+)*$/).default("main.default"),
  SQL_WAIT_TIMEOUT: z.string().default("30s"),
  OPERATIONAL_PASSWORD: z.string().default(""),
  REPORTING_PASSWORD: z.string().default(""),
  LOGIN_RATE_LIMIT_MAX: z.coerce.number().int().default(10),
  LOGIN_RATE_LIMIT_WINDOW_SEC: z.coerce.number().int().default(300),
  JWT_SECRET: z.string().default("dev-only-change-me"),
  SESSION_TTL_HOURS: z.coerce.number().default(8),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(75),
  MAX_FILES_PER_BATCH: z.coerce.number().int().positive().default(8),
  QUERY_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(2000),
  QUERY_MAX_POLLS: z.coerce.number().int().positive().default(150),
  JOB_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(5000),
  JOB_MAX_POLLS: z.coerce.number().int().positive().default(720),
  ARCHIVE_LIST_CACHE_SECONDS: z.coerce.number().int().min(0).default(60),
  RETAINED_BATCHES: z.coerce.number().int().positive().default(20)
});

export const env = envSchema.parse(process.env);
