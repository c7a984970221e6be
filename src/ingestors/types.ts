/**
 * Ingestor contract and the dataset record it produces.
 */

import type { Logger } from "../log/logger.js";

// ── Dataset record ──

export interface DataFileEntry {
  /** Path relative to the record's sourceFolder */
  path: string;
  /** Size in bytes */
  size: number;
  /** Last modification time, ISO 8601 in UTC */
  time: string;
}

export type ScientificMetadata = Record<string, unknown>;

/** Where a derived dataset comes from */
export interface DatasetDerivation {
  /** datasetName of each input; resolved to pids when the record is submitted */
  inputDatasetNames: string[];
  usedSoftware: string[];
}

/** Image uploaded as the dataset's attachment */
export interface Thumbnail {
  /** Absolute path of a .png or .jpg file */
  path: string;
  caption: string;
}

export interface DatasetRecord {
  /** Username owning the dataset */
  owner: string;
  /** Human-readable identifier */
  datasetName: string;
  /** Absolute folder the data files live in */
  sourceFolder: string;
  files: DataFileEntry[];
  scientificMetadata: ScientificMetadata;
  /** ISO 8601 time the data became available on disk */
  creationTime: string;
  description?: string;
  keywords?: string[];
  instrumentId?: string;
  creationLocation?: string;
  dataFormat?: string;
  principalInvestigator?: string;
  contactEmail?: string;
  sampleId?: string;
  proposalId?: string;
  /** Beamline name used to derive access groups */
  beamline?: string;
  /** Set for analysis results; the record is then registered as a derived dataset */
  derivation?: DatasetDerivation;
  thumbnail?: Thumbnail;
}

// ── Ingestor ──

export interface IngestContext {
  /** Username the dataset is registered for */
  ownerUsername: string;
  logger: Logger;
}

export interface Ingestor {
  /** Identifier used in ingest specifications, e.g. "als_11012_igor" */
  name: string;
  description: string;
  /** Does this directory have the layout this ingestor understands? */
  matches(directory: string): boolean | Promise<boolean>;
  /** Build the dataset record. Throws when the directory cannot be read. */
  extract(directory: string, context: IngestContext): Promise<DatasetRecord>;
}
