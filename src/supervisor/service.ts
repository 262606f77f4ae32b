import type { Config } from "../config/schema.js";
import { CronService } from "../cron/service.js";
import { JobExecutor } from "../runner/executor.js";
import type { RunOutcome } from "../runner/types.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/helpers.js";

export interface SupervisorOptions {
  logger: Logger;
  /** Built from `config.job` when omitted. */
  executor?: Pick<JobExecutor, "run" | "sink">;
}

/**
 * Drives one job from its cron schedule. Overlapping firings run side by side
 * unless the overlap policy is "skip". Stopping halts the schedule and waits
 * for firings already in flight; it never kills them.
 */
export class Supervisor {
  private readonly logger: Logger;
  private readonly executor: Pick<JobExecutor, "run" | "sink">;
  private readonly cron: CronService;
  private readonly inFlight = new Set<Promise<RunOutcome | null>>();
  private stopping: Promise<void> | null = null;

  constructor(private readonly config: Config, options: SupervisorOptions) {
    this.logger = options.logger;
    this.executor = options.executor ?? new JobExecutor(config.job, { logger: options.logger });
    this.cron = new CronService(config.schedule, (firedAt) => this.fire(firedAt));
  }

  get activeFirings(): number {
    return this.inFlight.size;
  }

  start(): void {
    this.logger.info(`Starting cron runner with schedule: ${this.config.schedule.expr}`);
    if (this.config.schedule.tz) this.logger.info(`Using CRON_TZ timezone: ${this.config.schedule.tz}`);
    this.logger.info(`Command to execute: ${this.config.job.commandLine}`);
    this.cron.start();
    const next = this.cron.status().nextRunAtMs;
    this.logger.info(`Cron runner started successfully; next run ${next === null ? "never" : new Date(next).toISOString()}`);
  }

  /** One firing outside the schedule. */
  runOnce(): Promise<RunOutcome | null> {
    return this.track(new Date());
  }

  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    this.cron.stop();
    this.logger.info(`Shutting down cron runner; waiting for ${this.inFlight.size} running firing(s)`);
    this.stopping = Promise.allSettled([...this.inFlight]).then(() => {
      this.executor.sink.close();
      this.logger.info("Cron runner stopped");
    });
    return this.stopping;
  }

  private fire(firedAt: Date): void {
    if (this.config.overlap === "skip" && this.inFlight.size > 0) {
      this.logger.warn(`Skipping firing at ${firedAt.toISOString()}: previous firing still running (CRON_OVERLAP=skip)`);
      return;
    }
    void this.track(firedAt);
  }

  private track(firedAt: Date): Promise<RunOutcome | null> {
    this.logger.info(`Firing at ${firedAt.toISOString()}`);
    const firing = this.executor.run().catch((err: unknown) => {
      this.logger.error(`Firing at ${firedAt.toISOString()} failed: ${errorMessage(err)}`);
      return null;
    });
    this.inFlight.add(firing);
    void firing.finally(() => this.inFlight.delete(firing));
    return firing;
  }
}
