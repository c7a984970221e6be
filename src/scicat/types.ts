/**
 * Request and response shapes of the SciCat v3 REST API, as far as this tool uses them.
 */

import { z } from "zod";
import type { DataFileEntry, ScientificMetadata } from "../ingestors/types.js";

/** Contact address used when an instrument records none */
export const UNKNOWN_EMAIL = "unknown@example.com";

export interface Ownable {
  ownerGroup: string;
  accessGroups: string[];
}

interface SciCatDatasetBase extends Ownable {
  owner: string;
  contactEmail: string;
  creationTime: string;
  datasetName: string;
  sourceFolder: string;
  size: number;
  numberOfFiles: number;
  scientificMetadata: ScientificMetadata;
  keywords: string[];
  isPublished: boolean;
  description?: string;
  instrumentId?: string;
  dataFormat?: string;
  sampleId?: string;
  proposalId?: string;
}

export interface SciCatRawDataset extends SciCatDatasetBase {
  type: "raw";
  principalInvestigator: string;
  creationLocation: string;
}

export interface SciCatDerivedDataset extends SciCatDatasetBase {
  type: "derived";
  investigator: string;
  /** pids of the datasets this one was computed from */
  inputDatasets: string[];
  usedSoftware: string[];
}

export type SciCatDataset = SciCatRawDataset | SciCatDerivedDataset;

export interface SciCatAttachment extends Ownable {
  datasetId: string;
  /** Image as a data URL */
  thumbnail: string;
  caption: string;
}

export interface SciCatOrigDatablock extends Ownable {
  datasetId: string;
  size: number;
  dataFileList: DataFileEntry[];
}

// ── Responses ──

/** POST auth/login */
export const tokenResponseSchema = z.object({ access_token: z.string().min(1) });

/** POST Users/login (older deployments) */
export const legacyTokenResponseSchema = z.object({ id: z.string().min(1) });

/** POST datasets */
export const createdDatasetSchema = z.object({ pid: z.string().min(1) });

/** GET datasets?filter=... */
export const datasetListSchema = z.array(z.object({ pid: z.string().min(1) }));
