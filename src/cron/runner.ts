import type { Clock, WindowGate } from "../window.js";
import type { CycleContext } from "./pipeline.js";

/**
 * Wraps a job for a timer: reads the clock and window gate once per tick,
 * skips a tick while the previous one is still running, and logs failures
 * instead of rethrowing so the schedule keeps firing.
 */
export function createCycleRunner<T>(
  label: string,
  job: (context: CycleContext) => Promise<T>,
  clock: Clock,
  gate: WindowGate,
): () => Promise<T | null> {
  let inFlight = false;

  return async function tick(): Promise<T | null> {
    if (inFlight) {
      console.warn(`[${label}] Previous run still in progress, skipping tick`);
      return null;
    }
    inFlight = true;
    try {
      const now = clock.now();
      return await job({ now, windowOpen: gate(now) });
    } catch (err) {
      console.error(`[${label}] Run failed:`, err);
      return null;
    } finally {
      inFlight = false;
    }
  };
}
