import { timingSafeEqual } from "node:crypto";
import type { GateAction, Role } from "../types/auth.js";

export interface AccessGateOptions {
  operationalSecret: string;
  reportingSecret: string;
  rateLimitMax: number;
  rateLimitWindowSeconds: number;
}

interface RateCounter {
  count: number;
  resetAt: number;
}

const PERMISSIONS: Record<Role, ReadonlySet<GateAction>> = {
  operational: new Set<GateAction>(["submit_batch", "manage_batch"]),
  reporting: new Set<GateAction>(["submit_batch", "manage_batch", "browse_archive"])
};

function secretMatches(supplied: string, configured: string): boolean {
  if (!configured) return false;
  const left = Buffer.from(supplied, "utf8");
  const right = Buffer.from(configured, "utf8");
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function can(role: Role | null | undefined, action: GateAction): boolean {
  if (!role) return false;
  return PERMISSIONS[role].has(action);
}

/**
 * Maps a shared credential to a role. The configured secrets are placeholders for a
 * real identity provider; failed attempts are counted per client key.
 */
export class AccessGate {
  private readonly failures = new Map<string, RateCounter>();

  constructor(private readonly options: AccessGateOptions) {}

  authenticate(credential: string, clientKey = "global", now = Date.now()): Role | null {
    if (this.isLockedOut(clientKey, now)) {
      throw new Error("rate_limited");
    }

    // Both comparisons always run so timing does not reveal which secret matched.
    const operational = secretMatches(credential, this.options.operationalSecret);
    const reporting = secretMatches(credential, this.options.reportingSecret);
    if (reporting) return this.succeed(clientKey, "reporting");
    if (operational) return this.succeed(clientKey, "operational");

    this.recordFailure(clientKey, now);
    return null;
  }

  /** Drops counters whose window has closed. Returns how many were removed. */
  prune(now = Date.now()): number {
    let removed = 0;
    for (const [clientKey, counter] of this.failures) {
      if (counter.resetAt > now) continue;
      this.failures.delete(clientKey);
      removed += 1;
    }
    return removed;
  }

  private succeed(clientKey: string, role: Role): Role {
    this.failures.delete(clientKey);
    return role;
  }

  private isLockedOut(clientKey: string, now: number): boolean {
    const existing = this.failures.get(clientKey);
    if (!existing) return false;
    if (existing.resetAt <= now) {
      this.failures.delete(clientKey);
      return false;
    }
    return existing.count >= this.options.rateLimitMax;
  }

  private recordFailure(clientKey: string, now: number) {
    const existing = this.failures.get(clientKey);
    if (!existing || existing.resetAt <= now) {
      this.failures.set(clientKey, { count: 1, resetAt: now + this.options.rateLimitWindowSeconds * 1000 });
      return;
    }
    existing.count += 1;
  }
}
