import { describeError } from "../lib/logging";
import type { Logger } from "../lib/logging";

/**
 * Runs fire-and-forget jobs after the response has left. A failing job is
 * logged and dropped; nothing it throws reaches the request that spawned it.
 */
export class BackgroundSupervisor {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.inFlight.size;
  }

  spawn(job: string, work: () => Promise<void>, logger: Logger = this.logger): void {
    const log = logger.withDomain("background");
    const startedAt = Date.now();

    const run = (async () => {
      log.log("info", "job_started", { job });
      try {
        await work();
        log.log("info", "job_completed", { job, duration_ms: Date.now() - startedAt });
      } catch (err) {
        log.log("error", "job_failed", { job, duration_ms: Date.now() - startedAt, ...describeError(err) });
      }
    })();

    const tracked: Promise<void> = run.finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
  }

  /** Resolves once every job, including ones spawned while waiting, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
