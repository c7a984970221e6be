/**
 * Dispatch outcomes and the report a run returns.
 */

import type { ExtractionError } from "../errors.js";

/** Terminal state of one candidate directory within a run */
export type DirectoryOutcome =
  | { status: "unmatched"; directory: string }
  | { status: "extraction-failed"; directory: string; error: ExtractionError }
  | { status: "submission-failed"; directory: string; ingestor: string; message: string; httpStatus?: number }
  | { status: "submitted"; directory: string; ingestor: string; datasetName: string; pid?: string };

export interface SubmittedDataset {
  directory: string;
  ingestor: string;
  datasetName: string;
  /** Absent on a dry run */
  pid?: string;
}

export interface DispatchError {
  directory: string;
  ingestor: string;
  stage: "extraction" | "submission";
  message: string;
  httpStatus?: number;
}

export interface DispatchReport {
  /** Candidate directories examined */
  processed: number;
  succeeded: number;
  unmatched: number;
  extractionFailed: number;
  submissionFailed: number;
  /** Directory paths per outcome */
  directories: {
    succeeded: string[];
    unmatched: string[];
    extractionFailed: string[];
    submissionFailed: string[];
  };
  datasets: SubmittedDataset[];
  /** Non-fatal errors, one per failed directory */
  errors: DispatchError[];
  /** True when nothing was submitted by request */
  dryRun: boolean;
}
