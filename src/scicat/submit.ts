/**
 * Dataset record → SciCat payloads, and the calls that register them.
 */

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import type { DatasetDerivation, DatasetRecord, Thumbnail } from "../ingestors/types.js";
import { totalSize } from "../ingestors/common.js";
import { calculateAccessControls } from "./access.js";
import type { SciCatClient } from "./client.js";
import {
  UNKNOWN_EMAIL,
  type SciCatAttachment,
  type SciCatDataset,
  type SciCatOrigDatablock,
} from "./types.js";
import { SubmissionError, describeError } from "../errors.js";

/** Image subtype for the data URL, by lower-cased extension */
const IMAGE_TYPES: Record<string, string> = {
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
  ".png": "png",
};

/**
 * The dataset payload. A record with a derivation becomes a derived dataset
 * whose inputs are the given pids.
 */
export function toSciCatDataset(record: DatasetRecord, inputDatasets: string[] = []): SciCatDataset {
  const access = calculateAccessControls(record.owner, record.beamline, record.proposalId);
  const common = {
    ...access,
    owner: record.owner,
    contactEmail: record.contactEmail ?? UNKNOWN_EMAIL,
    creationTime: record.creationTime,
    datasetName: record.datasetName,
    sourceFolder: record.sourceFolder,
    size: totalSize(record.files),
    numberOfFiles: record.files.length,
    scientificMetadata: record.scientificMetadata,
    keywords: record.keywords ?? [],
    isPublished: false,
    description: record.description,
    instrumentId: record.instrumentId,
    dataFormat: record.dataFormat,
    sampleId: record.sampleId,
    proposalId: record.proposalId,
  };

  if (record.derivation) {
    return {
      ...common,
      type: "derived",
      investigator: record.principalInvestigator ?? record.owner,
      inputDatasets,
      usedSoftware: [...record.derivation.usedSoftware],
    };
  }
  return {
    ...common,
    type: "raw",
    principalInvestigator: record.principalInvestigator ?? record.owner,
    creationLocation: record.creationLocation ?? "unknown",
  };
}

export function toOrigDatablock(pid: string, record: DatasetRecord): SciCatOrigDatablock {
  const { ownerGroup, accessGroups } = calculateAccessControls(
    record.owner,
    record.beamline,
    record.proposalId
  );
  return {
    datasetId: pid,
    size: totalSize(record.files),
    dataFileList: record.files,
    ownerGroup,
    accessGroups,
  };
}

/** Image file as a "data:image/<type>;base64,..." URL */
export function encodeThumbnail(path: string): string {
  const type = IMAGE_TYPES[extname(path).toLowerCase()] ?? "jpeg";
  return `data:image/${type};base64,${readFileSync(path).toString("base64")}`;
}

export function toAttachment(pid: string, record: DatasetRecord, thumbnail: Thumbnail): SciCatAttachment {
  const { ownerGroup, accessGroups } = calculateAccessControls(
    record.owner,
    record.beamline,
    record.proposalId
  );
  return {
    datasetId: pid,
    thumbnail: encodeThumbnail(thumbnail.path),
    caption: thumbnail.caption,
    ownerGroup,
    accessGroups,
  };
}

/** pid of each named input; the first match is taken when a name is registered twice */
async function resolveInputs(client: SciCatClient, derivation: DatasetDerivation): Promise<string[]> {
  const pids: string[] = [];
  for (const name of derivation.inputDatasetNames) {
    const [pid] = await client.findDatasetPids(name);
    if (pid === undefined) {
      throw new SubmissionError(`Input dataset "${name}" is not registered`);
    }
    pids.push(pid);
  }
  return pids;
}

async function afterCreation(pid: string, what: string, step: () => Promise<void>): Promise<void> {
  try {
    await step();
  } catch (err) {
    throw new SubmissionError(
      `Dataset ${pid} was created but its ${what} could not be attached: ${describeError(err)}`,
      { status: err instanceof SubmissionError ? err.status : undefined, cause: err }
    );
  }
}

/**
 * Look up the inputs of a derived record, create the dataset, then attach
 * its files and its thumbnail. Returns the new pid.
 * The client must already be logged in.
 */
export async function submitRecord(client: SciCatClient, record: DatasetRecord): Promise<string> {
  const inputs = record.derivation ? await resolveInputs(client, record.derivation) : [];
  const pid = await client.createDataset(toSciCatDataset(record, inputs));

  await afterCreation(pid, "files", () => client.createOrigDatablock(pid, toOrigDatablock(pid, record)));

  const { thumbnail } = record;
  if (thumbnail) {
    await afterCreation(pid, "thumbnail", () => client.createAttachment(pid, toAttachment(pid, record, thumbnail)));
  }
  return pid;
}
