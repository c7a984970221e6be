/**
 * Report accumulation. The report is the only state shared across directories.
 */

import type { DirectoryOutcome, DispatchReport } from "./types.js";

export function createReport(dryRun = false): DispatchReport {
  return {
    processed: 0,
    succeeded: 0,
    unmatched: 0,
    extractionFailed: 0,
    submissionFailed: 0,
    directories: {
      succeeded: [],
      unmatched: [],
      extractionFailed: [],
      submissionFailed: [],
    },
    datasets: [],
    errors: [],
    dryRun,
  };
}

/** Count one directory's outcome into the report */
export function recordOutcome(report: DispatchReport, outcome: DirectoryOutcome): void {
  report.processed++;

  switch (outcome.status) {
    case "unmatched":
      report.unmatched++;
      report.directories.unmatched.push(outcome.directory);
      break;
    case "extraction-failed":
      report.extractionFailed++;
      report.directories.extractionFailed.push(outcome.directory);
      report.errors.push({
        directory: outcome.directory,
        ingestor: outcome.error.ingestor,
        stage: "extraction",
        message: outcome.error.reason,
      });
      break;
    case "submission-failed":
      report.submissionFailed++;
      report.directories.submissionFailed.push(outcome.directory);
      report.errors.push({
        directory: outcome.directory,
        ingestor: outcome.ingestor,
        stage: "submission",
        message: outcome.message,
        httpStatus: outcome.httpStatus,
      });
      break;
    case "submitted":
      report.succeeded++;
      report.directories.succeeded.push(outcome.directory);
      report.datasets.push({
        directory: outcome.directory,
        ingestor: outcome.ingestor,
        datasetName: outcome.datasetName,
        pid: outcome.pid,
      });
      break;
  }
}
