/**
 * Helpers shared by the instrument ingestors:
 * data file listing, header text parsing, search terms.
 */

import { readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import { glob } from "glob";
import type { Logger } from "../log/logger.js";
import type { DataFileEntry, ScientificMetadata } from "./types.js";

// ── Files ──

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Names of the non-hidden files directly inside a folder having one of the given extensions, sorted */
export function filesWithExtension(folder: string, ...extensions: string[]): string[] {
  const wanted = extensions.map((e) => e.toLowerCase());
  return readdirSync(folder, { withFileTypes: true })
    .filter((d) => d.isFile() && !d.name.startsWith("."))
    .map((d) => d.name)
    .filter((name) => wanted.some((ext) => name.toLowerCase().endsWith(ext)))
    .sort();
}

/** Last modification time of a path as an ISO 8601 UTC string */
export function fileModTime(path: string): string {
  return statSync(path).mtime.toISOString();
}

export interface ListDataFilesOptions {
  /** Descend into subdirectories. Defaults to false. */
  recursive?: boolean;
  /** Return true to leave a file (given by its relative path) out */
  exclude?: (relativePath: string) => boolean;
  /** Receives a warning for each symbolic link left out */
  logger?: Logger;
}

/**
 * List the non-hidden files of a folder as data file entries, sorted by path.
 * Paths are relative to the folder and use forward slashes. Symbolic links
 * are skipped.
 */
export async function listDataFiles(
  folder: string,
  options: ListDataFilesOptions = {}
): Promise<DataFileEntry[]> {
  const found = await glob(options.recursive ? "**/*" : "*", {
    cwd: folder,
    nodir: true,
    dot: false,
    withFileTypes: true,
  });

  const entries: DataFileEntry[] = [];
  for (const file of found.sort((a, b) => compare(a.relativePosix(), b.relativePosix()))) {
    const relativePath = file.relativePosix();
    if (options.exclude?.(relativePath)) continue;
    if (file.isSymbolicLink()) {
      options.logger?.warn(`Skipping symbolic link ${join(folder, relativePath)}`);
      continue;
    }
    const st = statSync(join(folder, relativePath));
    entries.push({
      path: relativePath,
      size: st.size,
      time: st.mtime.toISOString(),
    });
  }
  return entries;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Sum of the sizes of a list of data files */
export function totalSize(files: DataFileEntry[]): number {
  return files.reduce((sum, f) => sum + f.size, 0);
}

// ── Header text ──

export interface HeaderParseOptions {
  /** Stop reading at (and excluding) the first line for which this returns true */
  stopWhen?: (line: string) => boolean;
}

/**
 * Read "key=value" or "key: value" lines into a metadata map.
 *
 * A line is split on "=" first, then on ":"; it must split into exactly two
 * parts with a non-blank key. Other lines are kept whole under
 * unknown_field0, unknown_field1, ... A key seen again with a different value
 * collects its values into an array.
 */
export function parseKeyValueHeader(
  text: string,
  options: HeaderParseOptions = {}
): ScientificMetadata {
  const metadata = new Map<string, unknown>();
  let unknownCount = 0;

  const setValue = (key: string, value: string) => {
    if (!metadata.has(key)) {
      metadata.set(key, value);
      return;
    }
    const existing = metadata.get(key);
    if (Array.isArray(existing)) {
      existing.push(value);
    } else if (existing !== value) {
      metadata.set(key, [existing, value]);
    }
  };

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === "") continue;
    if (options.stopWhen?.(line)) break;

    const pair = splitPair(line, "=") ?? splitPair(line, ":");
    if (pair) {
      setValue(pair[0], pair[1]);
      continue;
    }
    metadata.set(`unknown_field${unknownCount}`, line.trim());
    unknownCount++;
  }

  return toMetadata(metadata);
}

/**
 * Plain object from a key/value map. Keys become own properties, so names
 * such as "constructor" or "__proto__" are kept as data.
 */
export function toMetadata(entries: Iterable<readonly [string, unknown]>): ScientificMetadata {
  return Object.fromEntries(entries);
}

function splitPair(line: string, delimiter: string): [string, string] | null {
  const parts = line.split(delimiter);
  if (parts.length !== 2) return null;
  const key = parts[0].trim();
  if (key === "") return null;
  return [key, parts[1].trim()];
}

// ── Naming ──

/** Lower-cased alphanumeric terms of a sample name, joined by spaces */
export function buildSearchTerms(sampleName: string): string {
  return sampleName
    .split(/[^a-zA-Z0-9]/)
    .filter((term) => term.length > 0)
    .map((term) => term.toLowerCase())
    .join(" ");
}
