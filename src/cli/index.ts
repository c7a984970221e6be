#!/usr/bin/env node
/**
 * CLI entrypoint — Commander-based CLI for beamline-ingest.
 * Commands: ingest, ingestors, schedule
 */

import { Command } from "commander";
import {
  runIngestCommand,
  runIngestorsCommand,
  runScheduleCommand,
  type IngestArgs,
  type IngestFlags,
  type ScheduleFlags,
} from "./commands.js";

const program = new Command();

program
  .name("beamline-ingest")
  .description("Register beamline experiment folders as SciCat datasets")
  .version("0.1.0");

/** Arguments and options shared by `ingest` and `schedule` */
function withIngestOptions(command: Command): Command {
  return command
    .argument("[spec]", "Ingestor names, separated by ';', ',' or OR (SCICAT_INGEST_SPEC)")
    .argument("[rootFolder]", "Folder whose subdirectories are datasets (SCICAT_INGEST_BASE_FOLDER)")
    .argument("[ownerUsername]", "User the datasets belong to (SCICAT_INGEST_OWNER_USERNAME)")
    .argument("[scicatUrl]", "SciCat API base URL (SCICAT_INGEST_URL)")
    .option("-u, --username <username>", "SciCat username (SCICAT_INGEST_USERNAME)")
    .option("-p, --password <password>", "SciCat password (SCICAT_INGEST_PASSWORD)")
    .option("--timeout <ms>", "Per-request timeout in milliseconds (SCICAT_INGEST_TIMEOUT_MS)")
    .option("--pattern <glob>", "Glob selecting candidate directories (SCICAT_INGEST_CANDIDATE_PATTERN)")
    .option("--env-file <path>", "Read variables from this file instead of ./.env")
    .option("--dry-run", "Extract records but submit nothing")
    .option("--json", "Print the report as JSON")
    .option("--log-level <level>", "debug, info, warn or error", "info")
    .option("--log-file <path>", "Also write the run log to this file");
}

function toArgs(
  spec: string | undefined,
  rootFolder: string | undefined,
  ownerUsername: string | undefined,
  scicatUrl: string | undefined
): IngestArgs {
  return { spec, rootFolder, ownerUsername, scicatUrl };
}

// ingest
withIngestOptions(
  program.command("ingest").description("Scan the root folder once and register every recognised dataset")
).action(
  async (
    spec: string | undefined,
    rootFolder: string | undefined,
    ownerUsername: string | undefined,
    scicatUrl: string | undefined,
    opts: IngestFlags
  ) => {
    process.exitCode = await runIngestCommand(toArgs(spec, rootFolder, ownerUsername, scicatUrl), opts);
  }
);

// ingestors
program
  .command("ingestors")
  .description("List the available ingestors")
  .action(() => {
    process.exitCode = runIngestorsCommand();
  });

// schedule
withIngestOptions(
  program.command("schedule").description("Run ingest on a cron schedule until interrupted")
)
  .requiredOption("--cron <expression>", "Cron expression, e.g. \"*/30 * * * *\"")
  .option("--timezone <tz>", "IANA timezone for the cron expression")
  .action(
    (
      spec: string | undefined,
      rootFolder: string | undefined,
      ownerUsername: string | undefined,
      scicatUrl: string | undefined,
      opts: ScheduleFlags
    ) => {
      const { code, schedule } = runScheduleCommand(
        toArgs(spec, rootFolder, ownerUsername, scicatUrl),
        opts
      );
      process.exitCode = code;
      if (!schedule) return;

      const shutdown = () => {
        schedule.stop();
        process.exitCode = 0;
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    }
  );

await program.parseAsync();
