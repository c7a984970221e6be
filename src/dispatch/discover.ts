/**
 * Candidate directory discovery under the root folder.
 */

import { resolve } from "node:path";
import { glob } from "glob";
import { isDirectory } from "../ingestors/common.js";
import { DEFAULT_CANDIDATE_PATTERN } from "../config/types.js";

// Directories under rootFolder matched by pattern, as absolute paths sorted
// by path. The default pattern selects the immediate subdirectories.
// Hidden directories and rootFolder itself are never candidates.
export async function discoverCandidates(rootFolder: string, pattern = DEFAULT_CANDIDATE_PATTERN): Promise<string[]> {
  const matches = await glob(pattern, {
    cwd: rootFolder,
    absolute: true,
    dot: false,
  });

  const root = resolve(rootFolder);
  const directories = new Set<string>();
  for (const match of matches) {
    const path = match.length > 1 ? match.replace(/[\\/]+$/, "") : match;
    if (path !== root && isDirectory(path)) directories.add(path);
  }
  return [...directories].sort();
}
