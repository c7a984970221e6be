/**
 * Ingestor registry — name lookups and ingest specification resolution.
 */

import { StartupConfigError } from "../errors.js";
import type { Ingestor } from "./types.js";
import { igorIngestor } from "./als11012/igor.js";
import { nexafsIngestor } from "./als11012/nexafs.js";
import { scatteringIngestor } from "./als11012/scattering.js";

// ── Built-in ingestors ──

export const BUILTIN_INGESTORS: Ingestor[] = [
  igorIngestor,
  nexafsIngestor,
  scatteringIngestor,
];

// ── Ingest specifications ──

/**
 * Parse an ingest specification into an ordered list of unique names.
 * Names are separated by ";", ",", whitespace or the word OR:
 *   "als_11012_igor OR als_11012_nexafs" → ["als_11012_igor", "als_11012_nexafs"]
 */
export function parseIngestSpec(spec: string | string[]): string[] {
  const tokens = (Array.isArray(spec) ? spec : [spec])
    .flatMap((part) => part.split(/[;,\s]+/))
    .map((t) => t.trim())
    .filter((t) => t !== "" && t.toUpperCase() !== "OR");
  return [...new Set(tokens)];
}

export class IngestorRegistry {
  private ingestors = new Map<string, Ingestor>();

  constructor(ingestors: Ingestor[] = BUILTIN_INGESTORS) {
    for (const ingestor of ingestors) {
      if (this.ingestors.has(ingestor.name)) {
        throw new Error(`Duplicate ingestor name "${ingestor.name}"`);
      }
      this.ingestors.set(ingestor.name, ingestor);
    }
  }

  has(name: string): boolean {
    return this.ingestors.has(name);
  }

  get(name: string): Ingestor | undefined {
    return this.ingestors.get(name);
  }

  /** All registered ingestors, in registration order */
  list(): Ingestor[] {
    return [...this.ingestors.values()];
  }

  /**
   * Resolve specification names to ingestors, keeping specification order.
   * Throws StartupConfigError for an empty specification or unknown names.
   */
  resolve(names: string[]): Ingestor[] {
    if (names.length === 0) {
      throw new StartupConfigError(["ingest specification names no ingestors"]);
    }
    const unknown = names.filter((n) => !this.ingestors.has(n));
    if (unknown.length) {
      throw new StartupConfigError(
        unknown.map(
          (n) => `unknown ingestor "${n}". Valid ingestors: ${[...this.ingestors.keys()].join(", ")}`
        )
      );
    }
    return names.flatMap((n) => {
      const ingestor = this.ingestors.get(n);
      return ingestor ? [ingestor] : [];
    });
  }
}
