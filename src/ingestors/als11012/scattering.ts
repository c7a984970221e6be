/**
 * Raw RSoXS scattering scans from the 11.0.1.2 CCD.
 * A scan folder holds the detector frames (.fits) and the beamline's AI
 * text file, whose header describes the scan. A dat/ subfolder, when present,
 * belongs to the Igor analysis and is left out of this dataset.
 *
 * Scientific metadata:
 *   <AI field>       value from the AI header, up to the "Time" table
 *   headers          the AI header lines themselves
 *   <FITS keyword>   { <frame file stem>: value } over every frame
 * A FITS keyword that names an AI field is stored as "<keyword> (FITS)".
 */

import { readFileSync } from "node:fs";
import { basename, join } from "node:path";
import type { Ingestor, ScientificMetadata } from "../types.js";
import { fileModTime, filesWithExtension, listDataFiles, parseKeyValueHeader, toMetadata } from "../common.js";
import { readFitsHeader, type FitsValue } from "../fits.js";
import { BEAMLINE_11012, humanizeSampleName } from "./beamline.js";

const KEYWORDS = ["scattering", "RSoXS", "ALS", "11.0.1.2", "11.0.1.2 RSoXS"];

const THUMBNAIL_CAPTION = "scattering image";

const isTableStart = (line: string) => line.startsWith("Time");

/** "PS_film-AI.txt" → "PS_film" */
export function aiFileStem(fileName: string): string {
  return fileName.replace(/\.txt$/i, "").replace(/[-_ ]?AI$/i, "");
}

/** Non-blank AI header lines before the table, trailing blanks removed */
export function aiHeaderLines(text: string): string[] {
  const lines: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    if (isTableStart(line)) break;
    if (line.trim() !== "") lines.push(line.trimEnd());
  }
  return lines;
}

/** AI header fields and lines, then each FITS keyword across the frames */
export async function buildScatteringMetadata(
  aiText: string,
  frames: Array<{ stem: string; path: string }>
): Promise<ScientificMetadata> {
  const metadata = new Map<string, unknown>(
    Object.entries(parseKeyValueHeader(aiText, { stopWhen: isTableStart }))
  );
  metadata.set("headers", aiHeaderLines(aiText));

  const byKeyword = new Map<string, Map<string, FitsValue>>();
  for (const frame of frames) {
    for (const [keyword, value] of await readFitsHeader(frame.path)) {
      const key = metadata.has(keyword) ? `${keyword} (FITS)` : keyword;
      let perFrame = byKeyword.get(key);
      if (!perFrame) {
        perFrame = new Map();
        byKeyword.set(key, perFrame);
      }
      perFrame.set(frame.stem, value);
    }
  }
  for (const [key, perFrame] of byKeyword) {
    metadata.set(key, toMetadata(perFrame));
  }
  return toMetadata(metadata);
}

export const scatteringIngestor: Ingestor = {
  name: "als_11012_scattering",
  description: "RSoXS scan: .fits detector frames with an AI .txt header file",

  matches(directory) {
    return (
      filesWithExtension(directory, ".fits").length > 0 &&
      filesWithExtension(directory, ".txt").length > 0
    );
  },

  async extract(directory, { ownerUsername, logger }) {
    const [aiFile] = filesWithExtension(directory, ".txt");
    if (aiFile === undefined) {
      throw new Error(`No AI .txt file in ${directory}`);
    }
    const aiPath = join(directory, aiFile);

    const sampleName = humanizeSampleName(basename(directory));
    const aiDescription = humanizeSampleName(aiFileStem(aiFile));
    const frames = filesWithExtension(directory, ".fits").map((name) => ({
      stem: name.replace(/\.fits$/i, ""),
      path: join(directory, name),
    }));
    const [image] = filesWithExtension(directory, ".png");

    return {
      ...BEAMLINE_11012,
      owner: ownerUsername,
      datasetName: sampleName,
      sampleId: sampleName,
      sourceFolder: directory,
      files: await listDataFiles(directory, {
        recursive: true,
        exclude: (path) => path === "dat" || path.startsWith("dat/"),
        logger,
      }),
      scientificMetadata: await buildScatteringMetadata(readFileSync(aiPath, "utf8"), frames),
      creationTime: fileModTime(aiPath),
      description: `${sampleName} ${aiDescription}`,
      dataFormat: "fits",
      keywords: [...KEYWORDS],
      thumbnail: image === undefined ? undefined : { path: join(directory, image), caption: THUMBNAIL_CAPTION },
    };
  },
};
