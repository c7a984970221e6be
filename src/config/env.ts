/**
 * Environment loading: process.env over an optional .env file.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "dotenv";
import { StartupConfigError } from "../errors.js";
import type { Environment } from "./types.js";

export const DEFAULT_ENV_FILE = ".env";

/**
 * Read variables from an env file and overlay the process environment on top.
 * A missing default ".env" is fine; a missing file named explicitly is not.
 */
export function loadEnvironment(
  envFile?: string,
  processEnv: Environment = process.env
): Environment {
  const path = resolve(envFile ?? DEFAULT_ENV_FILE);
  if (!existsSync(path)) {
    if (envFile !== undefined) {
      throw new StartupConfigError([`env file not found: ${path}`]);
    }
    return { ...processEnv };
  }
  return { ...parse(readFileSync(path)), ...processEnv };
}
