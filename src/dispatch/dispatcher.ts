/**
 * Ingest dispatcher.
 * Wires: resolve ingestors → discover candidates → match → extract → submit → report.
 *
 * Directories are handled one at a time. Each ends in exactly one terminal
 * state (unmatched, extraction failed, submission failed, submitted) and is
 * never retried within the run.
 */

import {
  AuthenticationError,
  ExtractionError,
  StartupConfigError,
  SubmissionError,
  describeError,
} from "../errors.js";
import type { IngestConfig } from "../config/types.js";
import { IngestorRegistry } from "../ingestors/registry.js";
import type { DatasetRecord, Ingestor } from "../ingestors/types.js";
import { isDirectory } from "../ingestors/common.js";
import { createConsoleLogger, type Logger } from "../log/logger.js";
import { SciCatClient } from "../scicat/client.js";
import { submitRecord } from "../scicat/submit.js";
import { discoverCandidates } from "./discover.js";
import { createReport, recordOutcome } from "./report.js";
import type { DirectoryOutcome, DispatchReport } from "./types.js";

export interface DispatchDeps {
  /** Ingestors to resolve the specification against. Defaults to the built-ins. */
  registry?: IngestorRegistry;
  /** SciCat client. Defaults to one built from the configuration. */
  client?: SciCatClient;
  logger?: Logger;
}

/** Session state of one run: a client, logged in on first use */
class SubmissionSession {
  private loggedIn = false;

  constructor(
    private readonly client: SciCatClient,
    private readonly logger: Logger
  ) {}

  async submit(record: DatasetRecord): Promise<string> {
    if (!this.loggedIn) {
      this.logger.info(`Logging in to ${this.client.baseUrl}`);
      await this.client.login();
      this.loggedIn = true;
    }
    return submitRecord(this.client, record);
  }
}

/** First ingestor, in specification order, that accepts the directory */
async function selectIngestor(
  directory: string,
  ingestors: Ingestor[],
  logger: Logger
): Promise<Ingestor | null> {
  for (const ingestor of ingestors) {
    let accepted: boolean;
    try {
      accepted = await ingestor.matches(directory);
    } catch (err) {
      logger.warn(`${ingestor.name} could not inspect ${directory}: ${describeError(err)}`);
      accepted = false;
    }
    if (accepted) return ingestor;
  }
  return null;
}

async function dispatchDirectory(
  directory: string,
  ingestors: Ingestor[],
  config: IngestConfig,
  session: SubmissionSession,
  logger: Logger
): Promise<DirectoryOutcome> {
  const ingestor = await selectIngestor(directory, ingestors, logger);
  if (!ingestor) {
    logger.warn(`No ingestor accepts ${directory}; skipping`);
    return { status: "unmatched", directory };
  }

  logger.info(`Extracting ${directory} with ${ingestor.name}`);
  let record: DatasetRecord;
  try {
    record = await ingestor.extract(directory, { ownerUsername: config.ownerUsername, logger });
  } catch (err) {
    const error = new ExtractionError(directory, ingestor.name, err);
    logger.error(error.message);
    return { status: "extraction-failed", directory, error };
  }

  if (config.dryRun) {
    logger.info(`Dry run: extracted "${record.datasetName}" (${record.files.length} files)`);
    return { status: "submitted", directory, ingestor: ingestor.name, datasetName: record.datasetName };
  }

  try {
    const pid = await session.submit(record);
    logger.info(`Registered "${record.datasetName}" as ${pid}`);
    return { status: "submitted", directory, ingestor: ingestor.name, datasetName: record.datasetName, pid };
  } catch (err) {
    if (err instanceof AuthenticationError) throw err;
    const message = describeError(err);
    logger.error(`Submission of ${directory} failed: ${message}`);
    return {
      status: "submission-failed",
      directory,
      ingestor: ingestor.name,
      message,
      httpStatus: err instanceof SubmissionError ? err.status : undefined,
    };
  }
}

/**
 * Run one dispatch over the configured root folder.
 *
 * Throws StartupConfigError before scanning when the specification names
 * unknown ingestors or the root folder is missing, and AuthenticationError
 * when login fails. Every other failure is recorded in the report.
 */
export async function runDispatch(
  config: IngestConfig,
  deps: DispatchDeps = {}
): Promise<DispatchReport> {
  const logger = deps.logger ?? createConsoleLogger();
  const registry = deps.registry ?? new IngestorRegistry();
  const ingestors = registry.resolve(config.ingestSpec);

  if (!isDirectory(config.rootFolder)) {
    throw new StartupConfigError([`root folder does not exist: ${config.rootFolder}`]);
  }

  const client =
    deps.client ??
    new SciCatClient({
      baseUrl: config.scicatUrl,
      username: config.credentials.username,
      password: config.credentials.password,
      timeoutMs: config.timeoutMs,
    });
  const session = new SubmissionSession(client, logger);
  const report = createReport(config.dryRun);

  const candidates = await discoverCandidates(config.rootFolder, config.candidatePattern);
  logger.info(
    `Found ${candidates.length} candidate director${candidates.length === 1 ? "y" : "ies"} under ${config.rootFolder}; ` +
      `ingestors: ${ingestors.map((i) => i.name).join(", ")}`
  );

  for (const directory of candidates) {
    recordOutcome(report, await dispatchDirectory(directory, ingestors, config, session, logger));
  }

  logger.info(
    `Done: ${report.succeeded} succeeded, ${report.unmatched} unmatched, ` +
      `${report.extractionFailed} extraction failures, ${report.submissionFailed} submission failures`
  );
  return report;
}
