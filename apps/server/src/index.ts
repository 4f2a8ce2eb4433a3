import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import { env } from "./config/env.js";
import { attachSession } from "./middleware/auth.js";
import { archiveRouter } from "./routes/archives.js";
import { batchRouter } from "./routes/batches.js";
import { eventsRouter } from "./routes/events.js";
import { healthRouter } from "./routes/health.js";
import { sessionRouter } from "./routes/session.js";
import { accessGate, batchLock, logger, sessionStore, storeClient } from "./services/runtime.js";
import { reconcileWorkingArea } from "./services/startupReconciliation.js";

const app = express();

const allowedOrigins = new Set([env.CORS_ORIGIN, "http://localhost:5173"]);

app.use(
  cors({
    credentials: true,
    origin: (origin, callback) => {
      if (!origin || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error("cors_not_allowed"));
    }
  })
);
app.use((req, res, next) => {
  const requestId = req.header("x-request-id") || randomUUID();
  res.setHeader("x-request-id", requestId);
  req.headers["x-request-id"] = requestId;
  next();
});
app.use(express.json());
app.use(attachSession);

app.use(healthRouter);
app.use(sessionRouter);
app.use(eventsRouter);
app.use(batchRouter);
app.use(archiveRouter);

app.use("/api", (_req, res) => {
  res.status(404).json({ error: "not_found" });
});

try {
  await reconcileWorkingArea(storeClient, batchLock, env.WORKING_ROOT, logger.child({ component: "startup" }));
} catch (error) {
  logger.warn({ err: error }, "Working area reconciliation failed; continuing with a clean lock");
}

setInterval(() => {
  const pruned = sessionStore.prune();
  const counters = accessGate.prune();
  if (pruned > 0 || counters > 0) logger.debug({ prunedSessions: pruned, prunedLoginCounters: counters }, "Session heartbeat");
}, 15 * 60 * 1000).unref();

app.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, "VAT compliance API listening");
});
