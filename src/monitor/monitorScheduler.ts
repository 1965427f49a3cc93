import type { Logger } from "../observability";
import { errorMessage } from "../observability";
import type { CredentialStore } from "../store";
import type { BatchSummary, CycleOutcome, CycleTrigger } from "../types";

export interface MonitorSchedulerOptions {
  store: Pick<CredentialStore, "listActiveUsers">;
  runCycle: (userId: number, trigger: CycleTrigger) => Promise<CycleOutcome>;
  logger: Logger;
  intervalMinutes: number;
  concurrency: number;
}

function emptySummary(): BatchSummary {
  return { processed: 0, delivered: 0, notReady: 0, failed: 0, skipped: 0, abandoned: 0 };
}

function tally(summary: BatchSummary, outcome: CycleOutcome): void {
  switch (outcome.state) {
    case "DEREGISTERED":
      summary.delivered += 1;
      break;
    case "NOT_READY":
      summary.notReady += 1;
      break;
    case "FAILED":
      summary.failed += 1;
      break;
    case "SKIPPED":
      summary.skipped += 1;
      break;
  }
}

async function processWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  let index = 0;
  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      await worker(items[current]);
    }
  });
  await Promise.all(slots);
}

/**
 * Drives monitor cycles: one batch at start, then one per interval, plus
 * single-user checks on demand. The next batch is scheduled only after the
 * previous one settles, and at most one cycle per user is in flight.
 */
export class MonitorScheduler {
  private readonly options: MonitorSchedulerOptions;
  private readonly inFlight = new Map<number, Promise<CycleOutcome>>();
  private timer?: NodeJS.Timeout;
  private currentBatch?: Promise<BatchSummary>;
  private controller = new AbortController();
  private running = false;

  constructor(options: MonitorSchedulerOptions) {
    this.options = options;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get intervalMs(): number {
    return Math.max(1, this.options.intervalMinutes) * 60 * 1000;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.controller = new AbortController();
    this.options.logger.info("scheduler_started", { intervalMinutes: this.options.intervalMinutes });
    this.launchScheduledBatch();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.controller.abort();

    const batch = this.currentBatch;
    if (batch) {
      try {
        await batch;
      } catch (error) {
        this.options.logger.warn("scheduler_stop_batch_failed", { error: errorMessage(error) });
      }
    }
    await Promise.allSettled([...this.inFlight.values()]);
    this.options.logger.info("scheduler_stopped");
  }

  /** Runs a batch now, or joins the batch that is already running. */
  runNow(): Promise<BatchSummary> {
    if (!this.currentBatch) {
      this.currentBatch = this.runBatch(this.controller.signal).finally(() => {
        this.currentBatch = undefined;
      });
    }
    return this.currentBatch;
  }

  /** On-demand check for one user; joins a cycle already running for that user. */
  checkUser(userId: number, trigger: CycleTrigger = "manual"): Promise<CycleOutcome> {
    const existing = this.inFlight.get(userId);
    if (existing) {
      return existing;
    }

    const cycle = this.options.runCycle(userId, trigger).finally(() => {
      this.inFlight.delete(userId);
    });
    this.inFlight.set(userId, cycle);
    return cycle;
  }

  async runBatch(signal: AbortSignal = this.controller.signal): Promise<BatchSummary> {
    const { logger } = this.options;
    const summary = emptySummary();
    const users = await this.options.store.listActiveUsers();
    logger.info("batch_start", { users: users.length });

    await processWithConcurrency(users, this.options.concurrency, async (user) => {
      if (signal.aborted) {
        summary.abandoned += 1;
        return;
      }

      summary.processed += 1;
      try {
        tally(summary, await this.checkUser(user.userId, "scheduled"));
      } catch (error) {
        summary.failed += 1;
        logger.error("batch_cycle_crashed", { userId: user.userId, error: errorMessage(error) });
      }
    });

    logger.info("batch_complete", { ...summary });
    return summary;
  }

  private launchScheduledBatch(): void {
    this.timer = undefined;
    void this.runNow()
      .catch((error: unknown) => {
        this.options.logger.error("batch_failed", { error: errorMessage(error) });
      })
      .finally(() => {
        if (this.running) {
          this.timer = setTimeout(() => this.launchScheduledBatch(), this.intervalMs);
        }
      });
  }
}
