/**
 * NEXAFS energy scans from 11.0.1.2.
 * Each scan is a .txt file: a key/value header, then a tab-separated table
 * whose column row starts with "Time of".
 */

import { readFileSync } from "node:fs";
import { basename, join } from "node:path";
import type { Ingestor, ScientificMetadata } from "../types.js";
import { fileModTime, filesWithExtension, listDataFiles, parseKeyValueHeader, toMetadata } from "../common.js";
import { BEAMLINE_11012, humanizeSampleName } from "./beamline.js";

const TABLE_START = "Time of";

const KEYWORDS = ["nexafs", "11.0.1.2", "als", "absorption", "11.0.1.2 NEXAFS"];

export type TableCell = number | string | null;

function parseCell(raw: string): TableCell {
  const value = raw.trim();
  if (value === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : value;
}

/**
 * Read a tab-separated table into columns.
 * The first line names the columns; short rows are padded with null.
 */
export function parseTable(lines: string[]): Record<string, TableCell[]> {
  const [headerLine, ...rows] = lines.filter((l) => l.trim() !== "");
  if (headerLine === undefined) return {};

  const names = headerLine.split("\t").map((n) => n.trim());
  const columns = names.map((): TableCell[] => []);

  for (const row of rows) {
    const cells = row.split("\t");
    columns.forEach((column, i) => {
      column.push(i < cells.length ? parseCell(cells[i]) : null);
    });
  }
  return Object.fromEntries(names.map((name, i): [string, TableCell[]] => [name, columns[i]]));
}

/** Split a NEXAFS scan into its header metadata and its table */
export function parseNexafsScan(text: string): { header: ScientificMetadata; table: Record<string, TableCell[]> } {
  const lines = text.split(/\r?\n/);
  const start = lines.findIndex((l) => l.startsWith(TABLE_START));
  return {
    header: parseKeyValueHeader(text, { stopWhen: (l) => l.startsWith(TABLE_START) }),
    table: start === -1 ? {} : parseTable(lines.slice(start)),
  };
}

function isNexafsScan(path: string): boolean {
  return readFileSync(path, "utf8")
    .split(/\r?\n/)
    .some((l) => l.startsWith(TABLE_START));
}

function scanFiles(directory: string): string[] {
  return filesWithExtension(directory, ".txt").filter((name) => isNexafsScan(join(directory, name)));
}

export const nexafsIngestor: Ingestor = {
  name: "als_11012_nexafs",
  description: "NEXAFS scans: .txt files with a header and a \"Time of ...\" table",

  matches(directory) {
    return scanFiles(directory).length > 0;
  },

  async extract(directory, { ownerUsername, logger }) {
    const sampleName = basename(directory);
    const scientificMetadata = toMetadata(
      scanFiles(directory).map((name): [string, unknown] => [
        name,
        parseNexafsScan(readFileSync(join(directory, name), "utf8")),
      ])
    );

    const description = humanizeSampleName(sampleName);

    return {
      ...BEAMLINE_11012,
      owner: ownerUsername,
      datasetName: sampleName,
      sampleId: sampleName,
      sourceFolder: directory,
      files: await listDataFiles(directory, { logger }),
      scientificMetadata,
      creationTime: fileModTime(directory),
      description,
      dataFormat: "ALS BCS",
      keywords: [...KEYWORDS, ...description.split(" ").filter(Boolean)],
    };
  },
};
