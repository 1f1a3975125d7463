/**
 * Env-based defaults for rendering.
 * Load from .env.local (or process.env).
 *
 * Env:
 *   SSML_FLAVOR          - generic | azure | google | amazon-polly | songbird (default: generic)
 *   SSML_PRETTY          - true | 1 for tab-indented output (default: false)
 *   SSML_PERFORM_CHECKS  - false | 0 to render without validating (default: true)
 *   LOG_LEVEL            - debug | info | warn | error (default: info)
 */

import * as path from "path";
import { config as loadEnv } from "dotenv";
import { isFlavor, type Flavor } from "../flavors/types";
import { isLogLevel, type LogLevel } from "../logging";

// Load .env.local from project root when not set
const envPath = path.resolve(process.cwd(), ".env.local");
loadEnv({ path: envPath });

export interface SsmlConfig {
  /** Flavor used when a call does not name one */
  flavor: Flavor;
  /** Tab-indented output, one node per line */
  pretty: boolean;
  /** Validate before rendering */
  performChecks: boolean;

  log: {
    level: LogLevel;
  };
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnv(env: Env, key: string, defaultValue?: string): string | undefined {
  const v = env[key];
  if (v === undefined || v.trim() === "") return defaultValue;
  return v.trim();
}

function getEnvFlag(env: Env, key: string, defaultValue: boolean): boolean {
  const v = getEnv(env, key)?.toLowerCase();
  if (v === undefined) return defaultValue;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  throw new Error(`Invalid ${key}: expected true, false, 1 or 0, got "${v}"`);
}

/**
 * Build config from environment variables.
 * An unknown SSML_FLAVOR is an error rather than a silent fallback to generic.
 */
export function loadConfig(env: Env = process.env): SsmlConfig {
  const flavor = getEnv(env, "SSML_FLAVOR", "generic") ?? "generic";
  if (!isFlavor(flavor)) throw new Error(`Unknown SSML_FLAVOR: ${flavor}`);
  const level = getEnv(env, "LOG_LEVEL", "info") ?? "info";

  return {
    flavor,
    pretty: getEnvFlag(env, "SSML_PRETTY", false),
    performChecks: getEnvFlag(env, "SSML_PERFORM_CHECKS", true),
    log: {
      level: isLogLevel(level) ? level : "info",
    },
  };
}
