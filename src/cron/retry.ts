export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryDecision = "attempt" | "deferred" | "exhausted";

interface AttemptState {
  attempts: number;
  nextAttemptAt: number;
}

/**
 * Per-occurrence backoff for transient channel failures. Retries are driven
 * by later scheduler cycles: a failed occurrence stays out of dispatch until
 * its backoff elapses, and is given up after `maxAttempts` sends.
 */
export class RetryTracker {
  private policy: RetryPolicy;
  private states: Map<string, AttemptState> = new Map();

  constructor(policy: RetryPolicy) {
    this.policy = policy;
  }

  check(occurrenceId: string, now: Date): RetryDecision {
    const state = this.states.get(occurrenceId);
    if (!state) return "attempt";
    if (state.attempts >= this.policy.maxAttempts) return "exhausted";
    return now.getTime() >= state.nextAttemptAt ? "attempt" : "deferred";
  }

  recordFailure(occurrenceId: string, now: Date, retryAfterMs?: number): number {
    const attempts = (this.states.get(occurrenceId)?.attempts ?? 0) + 1;
    const backoff = Math.min(this.policy.maxDelayMs, this.policy.baseDelayMs * 2 ** (attempts - 1));
    const delay = Math.max(backoff, retryAfterMs ?? 0);
    this.states.set(occurrenceId, { attempts, nextAttemptAt: now.getTime() + delay });
    return attempts;
  }

  clear(occurrenceId: string): void {
    this.states.delete(occurrenceId);
  }

  /** Forgets occurrences whose window has closed. */
  retain(openOccurrenceIds: ReadonlySet<string>): void {
    for (const id of this.states.keys()) {
      if (!openOccurrenceIds.has(id)) this.states.delete(id);
    }
  }

  attempts(occurrenceId: string): number {
    return this.states.get(occurrenceId)?.attempts ?? 0;
  }
}
