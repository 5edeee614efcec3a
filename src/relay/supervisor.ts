import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";
import { sleepUnlessAborted } from "../utils/sleep.js";

const monitorLog = log.withScope("monitor");

export type SupervisorOptions = {
  name: string;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Restarts allowed inside `windowMs` before the breaker opens. */
  maxRestarts: number;
  windowMs: number;
  now?: () => number;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
};

export type SupervisorExit = "stopped" | "circuit_open";

/** Backoff for the n-th restart inside the window (n starts at 1). */
export function restartDelay(n: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, n - 1));
}

/**
 * Keep a long-running task alive. A crash restarts it after an
 * exponentially growing delay; too many crashes inside the window open
 * the breaker and the supervisor gives up. Aborting `signal` stops it.
 */
export async function supervise(
  task: (signal: AbortSignal) => Promise<void>,
  opts: SupervisorOptions,
  signal: AbortSignal
): Promise<SupervisorExit> {
  const now = opts.now ?? Date.now;
  const wait = opts.wait ?? sleepUnlessAborted;
  let restarts: number[] = [];

  while (!signal.aborted) {
    try {
      await task(signal);
      if (signal.aborted) break;
      monitorLog.warn(`${opts.name} returned without being stopped; restarting`);
    } catch (err: unknown) {
      if (signal.aborted) break;
      monitorLog.error(`${opts.name} crashed: ${describeError(err)}`);
    }

    const t = now();
    restarts = restarts.filter((at) => t - at < opts.windowMs);
    restarts.push(t);

    if (restarts.length > opts.maxRestarts) {
      monitorLog.error(
        `${opts.name}: ${restarts.length} restarts within ${Math.round(opts.windowMs / 1000)}s, giving up`
      );
      return "circuit_open";
    }

    const delay = restartDelay(restarts.length, opts.baseDelayMs, opts.maxDelayMs);
    monitorLog.info(`${opts.name}: restart ${restarts.length}/${opts.maxRestarts} in ${delay}ms`);
    await wait(delay, signal);
  }

  return "stopped";
}
