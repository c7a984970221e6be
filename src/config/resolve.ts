/**
 * Configuration resolution: command-line overrides, then environment.
 *
 * Two generations of variable names are in use (SCICAT_INGEST_* and the older
 * bare names). The SCICAT_INGEST_* name wins; a legacy name set to a different
 * value is reported as a warning, since names such as USERNAME are often set
 * by the operating system.
 */

import { resolve } from "node:path";
import { isDirectory } from "../ingestors/common.js";
import { parseIngestSpec } from "../ingestors/registry.js";
import { DEFAULT_TIMEOUT_MS } from "../scicat/client.js";
import { StartupConfigError } from "../errors.js";
import type { Logger } from "../log/logger.js";
import {
  DEFAULT_CANDIDATE_PATTERN,
  ingestConfigSchema,
  type ConfigOverrides,
  type Environment,
  type IngestConfig,
} from "./types.js";

// ── Variable names ──

export interface EnvSetting {
  /** What the setting is, for error messages */
  label: string;
  /** Command-line option that overrides it */
  flag: string;
  /** SCICAT_INGEST_* name */
  current: string;
  /** Older name, when there is one */
  legacy?: string;
}

export const ENV_SETTINGS = {
  rootFolder: {
    label: "root folder",
    flag: "<rootFolder>",
    current: "SCICAT_INGEST_BASE_FOLDER",
    legacy: "ROOT_FOLDER",
  },
  scicatUrl: {
    label: "SciCat URL",
    flag: "<scicatUrl>",
    current: "SCICAT_INGEST_URL",
    legacy: "SCICAT_URL",
  },
  username: {
    label: "SciCat username",
    flag: "--username",
    current: "SCICAT_INGEST_USERNAME",
    legacy: "USERNAME",
  },
  password: {
    label: "SciCat password",
    flag: "--password",
    current: "SCICAT_INGEST_PASSWORD",
    legacy: "PASSWORD",
  },
  ownerUsername: {
    label: "owner username",
    flag: "<ownerUsername>",
    current: "SCICAT_INGEST_OWNER_USERNAME",
    legacy: "INGEST_USER",
  },
  ingestSpec: {
    label: "ingest specification",
    flag: "<spec>",
    current: "SCICAT_INGEST_SPEC",
    legacy: "INGEST_SPEC",
  },
  timeoutMs: {
    label: "request timeout",
    flag: "--timeout",
    current: "SCICAT_INGEST_TIMEOUT_MS",
  },
  candidatePattern: {
    label: "candidate pattern",
    flag: "--pattern",
    current: "SCICAT_INGEST_CANDIDATE_PATTERN",
  },
} satisfies Record<string, EnvSetting>;

/** Mount point of the same data inside a container; replaces the root folder when set */
export const INTERNAL_BASE_FOLDER_VAR = "SCICAT_INGEST_INTERNAL_BASE_FOLDER";

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Value of a setting from the override or the environment.
 * Records a warning when the legacy name holds a value the current name overrides.
 */
export function readSetting(
  setting: EnvSetting,
  env: Environment,
  override: string | undefined,
  warnings: string[]
): string | undefined {
  const fromOverride = nonEmpty(override);
  if (fromOverride !== undefined) return fromOverride;

  const current = nonEmpty(env[setting.current]);
  const legacy = setting.legacy ? nonEmpty(env[setting.legacy]) : undefined;
  if (current !== undefined && legacy !== undefined && current !== legacy) {
    warnings.push(`${setting.legacy} differs from ${setting.current}; using ${setting.current}`);
  }
  return current ?? legacy;
}

function missing(setting: EnvSetting): string {
  const names = [setting.flag, setting.current, setting.legacy].filter(Boolean).join(", ");
  return `${setting.label} is not set (${names})`;
}

/**
 * Build the configuration for one invocation.
 * Throws StartupConfigError listing every problem found. Overridden legacy
 * variables are reported to the logger at warn level.
 */
export function resolveConfig(
  env: Environment,
  overrides: ConfigOverrides = {},
  logger?: Logger
): IngestConfig {
  const problems: string[] = [];
  const warnings: string[] = [];
  const read = (key: keyof typeof ENV_SETTINGS, override?: string) =>
    readSetting(ENV_SETTINGS[key], env, override, warnings);

  const rootFolder =
    nonEmpty(overrides.rootFolder) ??
    nonEmpty(env[INTERNAL_BASE_FOLDER_VAR]) ??
    read("rootFolder");
  const scicatUrl = read("scicatUrl", overrides.scicatUrl);
  const username = read("username", overrides.username);
  const password = read("password", overrides.password);
  const ownerUsername = read("ownerUsername", overrides.ownerUsername) ?? username;
  const spec = read("ingestSpec", overrides.ingestSpec);
  const timeout = read(
    "timeoutMs",
    overrides.timeoutMs === undefined ? undefined : String(overrides.timeoutMs)
  );
  const candidatePattern = read("candidatePattern", overrides.candidatePattern);

  if (rootFolder === undefined) problems.push(missing(ENV_SETTINGS.rootFolder));
  if (scicatUrl === undefined) problems.push(missing(ENV_SETTINGS.scicatUrl));
  if (username === undefined) problems.push(missing(ENV_SETTINGS.username));
  if (password === undefined) problems.push(missing(ENV_SETTINGS.password));
  if (spec === undefined) problems.push(missing(ENV_SETTINGS.ingestSpec));

  const timeoutMs = timeout === undefined ? DEFAULT_TIMEOUT_MS : Number(timeout);

  for (const warning of warnings) logger?.warn(warning);

  if (problems.length) {
    throw new StartupConfigError(problems);
  }

  const parsed = ingestConfigSchema.safeParse({
    rootFolder: rootFolder === undefined ? undefined : resolve(rootFolder),
    ingestSpec: spec === undefined ? [] : parseIngestSpec(spec),
    ownerUsername,
    scicatUrl,
    credentials: { username, password },
    timeoutMs,
    candidatePattern: candidatePattern ?? DEFAULT_CANDIDATE_PATTERN,
    dryRun: overrides.dryRun ?? false,
  });

  if (!parsed.success) {
    throw new StartupConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  if (!isDirectory(parsed.data.rootFolder)) {
    throw new StartupConfigError([`root folder does not exist: ${parsed.data.rootFolder}`]);
  }

  return Object.freeze(parsed.data);
}
