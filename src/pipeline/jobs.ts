import { describeError } from "../errors.js";
import { log } from "../utils/logger.js";

const pipelineLog = log.withScope("pipeline");

/**
 * Runs request jobs in the background so update handlers return at once,
 * and keeps track of them for shutdown.
 */
export class JobTracker {
  private readonly inflight = new Set<Promise<void>>();

  get size(): number {
    return this.inflight.size;
  }

  run(label: string, job: () => Promise<void>): void {
    const started = Date.now();
    const promise = job()
      .catch((err: unknown) => {
        pipelineLog.error(`Job ${label} failed: ${describeError(err)}`);
      })
      .finally(() => {
        this.inflight.delete(promise);
        pipelineLog.debug(`Job ${label} finished in ${Date.now() - started}ms`);
      });
    this.inflight.add(promise);
  }

  /** Resolves once every job started so far has settled. */
  async drain(): Promise<void> {
    await Promise.all([...this.inflight]);
  }
}
