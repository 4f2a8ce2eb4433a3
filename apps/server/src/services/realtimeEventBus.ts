import { randomUUID } from "node:crypto";

export type RealtimeEventType = "batch.progress" | "batch.aborted" | "batch.completed" | "scratch.reset";

export interface RealtimeEventEnvelope {
  eventId: string;
  type: RealtimeEventType;
  timestamp: string;
  batchName?: string;
  data: Record<string, unknown>;
}

interface SubscriberFilter {
  batchName?: string;
}

type SubscriberHandler = (event: RealtimeEventEnvelope) => void;

interface Subscriber {
  filter: SubscriberFilter;
  handler: SubscriberHandler;
}

/**
 * In-process pub/sub bus for SSE fanout.
 * No history or replay: late subscribers only see events published after they join.
 */
export class RealtimeEventBus {
  private readonly subscribers = new Map<string, Subscriber>();

  subscribe(filter: SubscriberFilter, handler: SubscriberHandler) {
    const subscriberId = randomUUID();
    this.subscribers.set(subscriberId, { filter, handler });
    return () => {
      this.subscribers.delete(subscriberId);
    };
  }

  publish(event: Omit<RealtimeEventEnvelope, "eventId" | "timestamp">) {
    const envelope: RealtimeEventEnvelope = {
      ...event,
      eventId: randomUUID(),
      timestamp: new Date().toISOString()
    };

    for (const subscriber of this.subscribers.values()) {
      if (subscriber.filter.batchName && subscriber.filter.batchName !== envelope.batchName) continue;
      subscriber.handler(envelope);
    }
  }
}

export const realtimeEventBus = new RealtimeEventBus();
