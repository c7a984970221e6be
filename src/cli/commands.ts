/**
 * Command implementations behind the CLI. Each returns the process exit code:
 * 0 when the run completed (whatever happened to individual directories),
 * 1 when the invocation itself failed.
 */

import { writeFileSync } from "node:fs";
import chalk from "chalk";
import { loadEnvironment } from "../config/env.js";
import { resolveConfig } from "../config/resolve.js";
import type { ConfigOverrides, Environment, IngestConfig } from "../config/types.js";
import { runDispatch } from "../dispatch/dispatcher.js";
import type { DispatchReport } from "../dispatch/types.js";
import { describeError } from "../errors.js";
import { IngestorRegistry } from "../ingestors/registry.js";
import {
  createConsoleLogger,
  createMemoryLogger,
  isLogLevel,
  teeLogger,
  type Logger,
} from "../log/logger.js";
import { scheduleDispatch, type CronScheduler, type DispatchSchedule } from "../schedule/scheduler.js";

// ── Inputs ──

export interface IngestArgs {
  spec?: string;
  rootFolder?: string;
  ownerUsername?: string;
  scicatUrl?: string;
}

export interface IngestFlags {
  username?: string;
  password?: string;
  timeout?: string;
  pattern?: string;
  envFile?: string;
  dryRun?: boolean;
  json?: boolean;
  logLevel?: string;
  /** Also write the run's log lines to this file */
  logFile?: string;
}

export interface ScheduleFlags extends IngestFlags {
  cron: string;
  timezone?: string;
}

export interface CliDeps {
  /** Environment to resolve from. Defaults to process.env over the env file. */
  env?: Environment;
  logger?: Logger;
  /** Where reports go. Defaults to stdout. */
  print?: (text: string) => void;
  registry?: IngestorRegistry;
  dispatch?: typeof runDispatch;
  scheduler?: CronScheduler;
}

// ── Output ──

/** Coloured summary of a report, one line per entry */
export function formatReport(report: DispatchReport): string {
  const lines = [
    chalk.green("Ingest complete:"),
    `  Directories processed: ${report.processed}`,
    `  Succeeded:             ${report.succeeded}`,
    `  Unmatched:             ${report.unmatched}`,
    `  Extraction failures:   ${report.extractionFailed}`,
    `  Submission failures:   ${report.submissionFailed}`,
  ];
  for (const dataset of report.datasets) {
    lines.push(`    ${dataset.pid ?? "(not submitted)"}  ${dataset.datasetName}  ← ${dataset.directory}`);
  }
  for (const directory of report.directories.unmatched) {
    lines.push(chalk.yellow(`    unmatched  ${directory}`));
  }
  if (report.dryRun) {
    lines.push(chalk.yellow("  (dry run — nothing submitted)"));
  }
  if (report.errors.length) {
    lines.push(chalk.red(`  Errors: ${report.errors.length}`));
    for (const e of report.errors) {
      lines.push(`    [${e.stage}] ${e.directory}: ${e.message}`);
    }
  }
  return lines.join("\n");
}

// ── Helpers ──

function overridesFrom(args: IngestArgs, flags: IngestFlags): ConfigOverrides {
  return {
    ingestSpec: args.spec,
    rootFolder: args.rootFolder,
    ownerUsername: args.ownerUsername,
    scicatUrl: args.scicatUrl,
    username: flags.username,
    password: flags.password,
    timeoutMs: flags.timeout,
    candidatePattern: flags.pattern,
    dryRun: flags.dryRun,
  };
}

function loggerFor(flags: IngestFlags, deps: CliDeps): Logger {
  if (deps.logger) return deps.logger;
  const level = flags.logLevel && isLogLevel(flags.logLevel) ? flags.logLevel : "info";
  return createConsoleLogger({ level });
}

/** Resolve configuration and check the specification against the registry */
function prepare(
  args: IngestArgs,
  flags: IngestFlags,
  deps: CliDeps,
  registry: IngestorRegistry,
  logger: Logger
): IngestConfig {
  if (flags.logLevel && !isLogLevel(flags.logLevel)) {
    throw new Error(`Unknown log level "${flags.logLevel}" (debug, info, warn, error)`);
  }
  const env = deps.env ?? loadEnvironment(flags.envFile);
  const config = resolveConfig(env, overridesFrom(args, flags), logger);
  registry.resolve(config.ingestSpec);
  return config;
}

// ── Commands ──

export async function runIngestCommand(
  args: IngestArgs,
  flags: IngestFlags,
  deps: CliDeps = {}
): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));
  const registry = deps.registry ?? new IngestorRegistry();
  const dispatch = deps.dispatch ?? runDispatch;
  const baseLogger = loggerFor(flags, deps);
  const runLog = flags.logFile ? createMemoryLogger("info") : null;
  const logger = runLog ? teeLogger(baseLogger, runLog) : baseLogger;

  try {
    const config = prepare(args, flags, deps, registry, logger);
    const report = await dispatch(config, { logger, registry });
    print(flags.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return 0;
  } catch (err) {
    logger.error(describeError(err));
    return 1;
  } finally {
    if (flags.logFile && runLog) {
      writeFileSync(flags.logFile, `${runLog.lines.join("\n")}\n`, "utf8");
    }
  }
}

export function runIngestorsCommand(deps: Pick<CliDeps, "print" | "registry"> = {}): number {
  const print = deps.print ?? ((text: string) => console.log(text));
  const registry = deps.registry ?? new IngestorRegistry();
  for (const ingestor of registry.list()) {
    print(`${chalk.cyan(ingestor.name.padEnd(24))} ${ingestor.description}`);
  }
  return 0;
}

/**
 * Start recurring runs. Returns the schedule, or null (with exit code 1)
 * when the configuration or the cron expression is invalid.
 */
export function runScheduleCommand(
  args: IngestArgs,
  flags: ScheduleFlags,
  deps: CliDeps = {}
): { code: number; schedule: DispatchSchedule | null } {
  const print = deps.print ?? ((text: string) => console.log(text));
  const registry = deps.registry ?? new IngestorRegistry();
  const dispatch = deps.dispatch ?? runDispatch;
  const logger = loggerFor(flags, deps);

  try {
    const config = prepare(args, flags, deps, registry, logger);
    const schedule = scheduleDispatch({
      cron: flags.cron,
      timezone: flags.timezone,
      logger,
      scheduler: deps.scheduler,
      run: () => dispatch(config, { logger, registry }),
      onReport: (report) => print(flags.json ? JSON.stringify(report) : formatReport(report)),
    });
    return { code: 0, schedule };
  } catch (err) {
    logger.error(describeError(err));
    return { code: 1, schedule: null };
  }
}
