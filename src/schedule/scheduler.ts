/**
 * Recurring dispatch on a cron expression.
 * A tick that fires while the previous run is still going is skipped.
 */

import cron from "node-cron";
import { StartupConfigError, describeError } from "../errors.js";
import type { Logger } from "../log/logger.js";
import type { DispatchReport } from "../dispatch/types.js";

/** The part of node-cron's scheduler this module uses */
export type CronScheduler = (
  expression: string,
  task: () => void,
  options?: { scheduled?: boolean; timezone?: string }
) => { stop(): void };

export interface ScheduleOptions {
  /** Five- or six-field cron expression */
  cron: string;
  /** IANA timezone the expression is evaluated in. Defaults to the host's. */
  timezone?: string;
  /** One dispatch run. Called with a fresh client each time. */
  run: () => Promise<DispatchReport>;
  logger: Logger;
  /** Called after every completed run */
  onReport?: (report: DispatchReport) => void;
  /** Scheduler implementation. Defaults to node-cron. */
  scheduler?: CronScheduler;
}

export interface DispatchSchedule {
  /** Run now, unless a run is already in progress. Resolves when the run ends. */
  trigger(): Promise<void>;
  /** Stop firing. A run in progress is not interrupted. */
  stop(): void;
  readonly running: boolean;
  readonly runs: number;
}

export function scheduleDispatch(options: ScheduleOptions): DispatchSchedule {
  if (!cron.validate(options.cron)) {
    throw new StartupConfigError([`invalid cron expression "${options.cron}"`]);
  }

  const { logger } = options;
  let running = false;
  let runs = 0;

  const trigger = async (): Promise<void> => {
    if (running) {
      logger.warn("Previous ingest run still in progress; skipping this tick");
      return;
    }
    running = true;
    runs++;
    try {
      logger.info(`Scheduled ingest run ${runs} starting`);
      const report = await options.run();
      options.onReport?.(report);
    } catch (err) {
      logger.error(`Scheduled ingest run ${runs} failed: ${describeError(err)}`);
    } finally {
      running = false;
    }
  };

  const schedule = options.scheduler ?? cron.schedule;
  const task = schedule(options.cron, () => void trigger(), { timezone: options.timezone });
  logger.info(`Ingest scheduled @ ${options.cron}${options.timezone ? ` (${options.timezone})` : ""}`);

  return {
    trigger,
    stop: () => task.stop(),
    get running() {
      return running;
    },
    get runs() {
      return runs;
    },
  };
}
