/**
 * beamline-ingest — register beamline experiment folders with SciCat.
 * Public API facade.
 */

import { loadEnvironment } from "./config/env.js";
import { resolveConfig } from "./config/resolve.js";
import type { ConfigOverrides, IngestConfig } from "./config/types.js";
import type { Logger } from "./log/logger.js";

// Re-export types
export type {
  IngestConfig,
  ConfigOverrides,
  Environment,
} from "./config/types.js";
export type {
  DatasetRecord,
  DataFileEntry,
  ScientificMetadata,
  Ingestor,
  IngestContext,
  DatasetDerivation,
  Thumbnail,
} from "./ingestors/types.js";
export type {
  DispatchReport,
  DispatchError,
  DirectoryOutcome,
  SubmittedDataset,
} from "./dispatch/types.js";
export type {
  SciCatDataset,
  SciCatRawDataset,
  SciCatDerivedDataset,
  SciCatAttachment,
  SciCatOrigDatablock,
  Ownable,
} from "./scicat/types.js";
export type { Logger, LogLevel, MemoryLogger } from "./log/logger.js";
export type { DispatchSchedule, ScheduleOptions } from "./schedule/scheduler.js";

export {
  IngestError,
  StartupConfigError,
  AuthenticationError,
  ExtractionError,
  SubmissionError,
} from "./errors.js";
export { resolveConfig, ENV_SETTINGS } from "./config/resolve.js";
export { loadEnvironment } from "./config/env.js";
export { runDispatch, type DispatchDeps } from "./dispatch/dispatcher.js";
export { discoverCandidates } from "./dispatch/discover.js";
export { IngestorRegistry, BUILTIN_INGESTORS, parseIngestSpec } from "./ingestors/registry.js";
export {
  listDataFiles,
  parseKeyValueHeader,
  buildSearchTerms,
} from "./ingestors/common.js";
export { readFitsHeader } from "./ingestors/fits.js";
export { SciCatClient, type SciCatClientConfig } from "./scicat/client.js";
export { submitRecord, toSciCatDataset } from "./scicat/submit.js";
export { calculateAccessControls } from "./scicat/access.js";
export { createConsoleLogger, createMemoryLogger } from "./log/logger.js";
export { scheduleDispatch } from "./schedule/scheduler.js";

/** Resolve configuration from process.env (over an optional env file) and overrides */
export function loadConfig(overrides: ConfigOverrides = {}, envFile?: string, logger?: Logger): IngestConfig {
  return resolveConfig(loadEnvironment(envFile), overrides, logger);
}
