import { describe, it, expect } from "vitest";
import { RetryTracker } from "../cron/retry.js";

const t0 = new Date("2024-03-10T00:35:00Z");
const after = (ms: number) => new Date(t0.getTime() + ms);

describe("RetryTracker", () => {
  it("lets an unseen occurrence through", () => {
    const tracker = new RetryTracker({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 5000 });
    expect(tracker.check("1:2024-03-10", t0)).toBe("attempt");
  });

  it("backs off exponentially between attempts", () => {
    const tracker = new RetryTracker({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 5000 });

    expect(tracker.recordFailure("a", t0)).toBe(1);
    expect(tracker.check("a", after(999))).toBe("deferred");
    expect(tracker.check("a", after(1000))).toBe("attempt");

    expect(tracker.recordFailure("a", after(1000))).toBe(2);
    expect(tracker.check("a", after(2999))).toBe("deferred");
    expect(tracker.check("a", after(3000))).toBe("attempt");

    tracker.recordFailure("a", after(3000));
    expect(tracker.check("a", after(60_000))).toBe("exhausted");
  });

  it("caps the delay", () => {
    const tracker = new RetryTracker({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 1500 });
    tracker.recordFailure("a", t0);
    tracker.recordFailure("a", t0);
    expect(tracker.check("a", after(1500))).toBe("attempt");
  });

  it("honours a longer retry-after from the channel", () => {
    const tracker = new RetryTracker({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 5000 });
    tracker.recordFailure("a", t0, 10_000);
    expect(tracker.check("a", after(9_999))).toBe("deferred");
    expect(tracker.check("a", after(10_000))).toBe("attempt");
  });

  it("forgets cleared and closed occurrences", () => {
    const tracker = new RetryTracker({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 5000 });
    tracker.recordFailure("a", t0);
    tracker.recordFailure("b", t0);
    tracker.recordFailure("c", t0);

    tracker.clear("a");
    tracker.retain(new Set(["a", "b"]));

    expect(tracker.attempts("a")).toBe(0);
    expect(tracker.attempts("b")).toBe(1);
    expect(tracker.attempts("c")).toBe(0);
  });
});
