import { Router } from "express";
import { requireSession } from "../middleware/auth.js";
import { realtimeEventBus, type RealtimeEventEnvelope } from "../services/realtimeEventBus.js";

export const eventsRouter = Router();

function writeSseEvent(res: { write: (chunk: string) => void }, event: RealtimeEventEnvelope) {
  res.write(`id: ${event.eventId}\n`);
  res.write(`event: ${event.type}\n`);
  res.write(`data: ${JSON.stringify(event)}\n\n`);
}

eventsRouter.get("/api/events/stream", requireSession, (req, res) => {
  const batchName = typeof req.query.batchName === "string" ? req.query.batchName : undefined;

  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
  res.flushHeaders();

  writeSseEvent(res, {
    eventId: "connected",
    type: "batch.progress",
    timestamp: new Date().toISOString(),
    batchName,
    data: { status: "connected" }
  });

  const unsubscribe = realtimeEventBus.subscribe({ batchName }, (event) => writeSseEvent(res, event));

  const keepAlive = setInterval(() => {
    res.write(": keepalive\n\n");
  }, 20000);

  req.on("close", () => {
    clearInterval(keepAlive);
    unsubscribe();
  });
});
