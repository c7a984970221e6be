/**
 * Resolved configuration of one dispatch invocation.
 * Built once at startup and passed down; nothing below the CLI reads the environment.
 */

import { z } from "zod";

export const ingestConfigSchema = z.object({
  /** Folder whose immediate subdirectories are candidate datasets */
  rootFolder: z.string().min(1),
  /** Ingestor names, tried in this order */
  ingestSpec: z.array(z.string().min(1)).min(1),
  /** Username datasets are registered for */
  ownerUsername: z.string().min(1),
  /** SciCat API base URL */
  scicatUrl: z.string().url(),
  credentials: z.object({
    username: z.string().min(1),
    password: z.string().min(1),
  }),
  /** Per-request timeout for SciCat calls */
  timeoutMs: z.number().int().positive(),
  /** Glob, relative to rootFolder, selecting candidate directories */
  candidatePattern: z.string().min(1),
  /** Extract records but submit nothing */
  dryRun: z.boolean(),
});

export type IngestConfig = Readonly<z.infer<typeof ingestConfigSchema>>;

export type Environment = Record<string, string | undefined>;

/** Values given on the command line. Each one takes precedence over the environment. */
export interface ConfigOverrides {
  rootFolder?: string;
  ingestSpec?: string;
  ownerUsername?: string;
  scicatUrl?: string;
  username?: string;
  password?: string;
  timeoutMs?: string | number;
  candidatePattern?: string;
  dryRun?: boolean;
}

export const DEFAULT_CANDIDATE_PATTERN = "*/";
