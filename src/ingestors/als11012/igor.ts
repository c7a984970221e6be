/**
 * Igor/Irena/Nika reduction output for 11.0.1.2 scattering scans,
 * registered as a dataset derived from the scan's raw scattering dataset.
 *
 * Expected layout:
 *   <sample>/*.txt       the scan's AI file (its name gives the description)
 *   <sample>/dat/*.dat   reduced curves, each with a "# key = value" header
 *   <sample>/dat/*.jpg   plots; the first one becomes the thumbnail
 */

import { readFileSync } from "node:fs";
import { basename, join } from "node:path";
import type { Ingestor, ScientificMetadata } from "../types.js";
import {
  fileModTime,
  filesWithExtension,
  isDirectory,
  listDataFiles,
  parseKeyValueHeader,
  toMetadata,
} from "../common.js";
import { BEAMLINE_11012, humanizeSampleName } from "./beamline.js";
import { aiFileStem } from "./scattering.js";

const DAT_FOLDER = "dat";

const KEYWORDS = ["scattering", "rsoxs", "11.0.1.2", "als", "ccd", "igor", "analysis"];

const USED_SOFTWARE = ["Igor", "Irena", "Nika"];

const ENERGY_KEY = "Nika_XrayEnergy";

const PROCESSED_KEY = "Processed on";

const THUMBNAIL_CAPTION = "scattering image";

/** Header of a .dat file: the leading block of blank and "#" lines, "#" removed */
export function parseDatHeader(text: string): ScientificMetadata {
  const headerLines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "") continue;
    if (!trimmed.startsWith("#")) break;
    headerLines.push(trimmed.replace(/^#+/, ""));
  }
  return parseKeyValueHeader(headerLines.join("\n"));
}

/** Entries from "Processed on" to the end, then the ones before it */
export function processedFirst(header: ScientificMetadata): ScientificMetadata {
  const entries = Object.entries(header);
  const split = entries.findIndex(([key]) => key === PROCESSED_KEY);
  if (split === -1) return header;
  return toMetadata([...entries.slice(split), ...entries.slice(0, split)]);
}

/**
 * One entry per curve, keyed by its X-ray energy with "." replaced by "_"
 * ("284.5" → "284_5"), falling back to the file name. Repeated keys get
 * " (1)", " (2)", ... Entries are sorted by key.
 */
export function curvesByEnergy(curves: Array<{ name: string; header: ScientificMetadata }>): ScientificMetadata {
  const byKey = new Map<string, ScientificMetadata>();
  for (const { name, header } of curves) {
    const energy = header[ENERGY_KEY];
    const base = typeof energy === "string" ? energy.replaceAll(".", "_") : name;
    let key = base;
    for (let i = 1; byKey.has(key); i++) key = `${base} (${i})`;
    byKey.set(key, processedFirst(header));
  }
  return toMetadata([...byKey].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export const igorIngestor: Ingestor = {
  name: "als_11012_igor",
  description: "Igor analysis of a scattering scan: a dat/ folder of .dat curves",

  matches(directory) {
    const datFolder = join(directory, DAT_FOLDER);
    return isDirectory(datFolder) && filesWithExtension(datFolder, ".dat").length > 0;
  },

  async extract(directory, { ownerUsername, logger }) {
    const datFolder = join(directory, DAT_FOLDER);
    const sampleName = basename(directory);
    const datasetName = `${sampleName}_IGOR_ANALYSIS`;

    const scientificMetadata = curvesByEnergy(
      filesWithExtension(datFolder, ".dat").map((name) => ({
        name,
        header: parseDatHeader(readFileSync(join(datFolder, name), "utf8")),
      }))
    );

    const [aiFile] = filesWithExtension(directory, ".txt");
    const description = humanizeSampleName(aiFile === undefined ? sampleName : aiFileStem(aiFile));
    const [plot] = filesWithExtension(datFolder, ".jpg");

    return {
      ...BEAMLINE_11012,
      owner: ownerUsername,
      datasetName,
      sampleId: datasetName,
      sourceFolder: datFolder,
      files: await listDataFiles(datFolder, { logger }),
      scientificMetadata,
      creationTime: fileModTime(datFolder),
      description,
      dataFormat: "dat",
      keywords: [...KEYWORDS, ...description.split(" ").filter(Boolean)],
      derivation: {
        inputDatasetNames: [humanizeSampleName(sampleName)],
        usedSoftware: [...USED_SOFTWARE],
      },
      thumbnail: plot === undefined ? undefined : { path: join(datFolder, plot), caption: THUMBNAIL_CAPTION },
    };
  },
};
