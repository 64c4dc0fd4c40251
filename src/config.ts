/**
 * Runtime configuration.
 *
 * Every setting has a default in DEFAULT_CONFIG and may be overridden by
 * an environment variable.  Values are validated with zod so a typo in a
 * deployment fails at startup instead of at the first vote.
 *
 * @module config
 * @license AGPL-3.0-or-later
 */

import path from "path";
import { z } from "zod";

// ============================================================
// Types
// ============================================================

export interface ServiceConfig {
  /** HTTP port */
  port: number;
  /** pino log level */
  logLevel: "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
  /** SQLite database file, or ":memory:" */
  dbPath: string;
  /** JSON file listing the candidates */
  candidatesFile: string;
  /** Administrative undo; off in production */
  undoEnabled: boolean;
  /** Maximum number of candidates */
  tallyCapacity: number;
  /** Bucket count of the voter status index */
  indexBuckets: number;
  /** Maximum number of voters held by the index */
  indexCapacity: number;
  /** Longest wait for the global operation lock */
  lockTimeoutMs: number;
  /** SQLite busy timeout */
  busyTimeoutMs: number;
  /** Salt mixed into every identity digest */
  identitySalt: string;
  /** Bearer token for /v1/admin routes; unset disables the check */
  adminToken?: string;
}

/**
 * Defaults for local development and testing.
 */
export const DEFAULT_CONFIG: ServiceConfig = {
  port: 3001,
  logLevel: "info",
  dbPath: path.resolve(__dirname, "..", "data", "ballots.db"),
  candidatesFile: path.resolve(__dirname, "..", "config", "candidates.json"),
  undoEnabled: false,
  tallyCapacity: 50,
  indexBuckets: 1024,
  indexCapacity: 10000,
  lockTimeoutMs: 5000,
  busyTimeoutMs: 2000,
  identitySalt: "development-salt",
};

// ============================================================
// Environment Parsing
// ============================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  VOTING_DB_PATH: z.string().min(1).optional(),
  VOTING_CANDIDATES_FILE: z.string().min(1).optional(),
  VOTING_UNDO_ENABLED: booleanFlag.optional(),
  VOTING_TALLY_CAPACITY: z.coerce.number().int().positive().optional(),
  VOTING_INDEX_BUCKETS: z.coerce.number().int().positive().optional(),
  VOTING_INDEX_CAPACITY: z.coerce.number().int().positive().optional(),
  VOTING_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  VOTING_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  VOTING_IDENTITY_SALT: z.string().min(8).optional(),
  VOTING_ADMIN_TOKEN: z.string().min(1).optional(),
});

/**
 * Builds the service configuration from environment variables.
 *
 * @param env - Usually `process.env`
 * @throws ZodError when a variable is present but malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServiceConfig {
  const parsed = EnvSchema.parse(env);

  return {
    port: parsed.PORT ?? DEFAULT_CONFIG.port,
    logLevel: parsed.LOG_LEVEL ?? DEFAULT_CONFIG.logLevel,
    dbPath: parsed.VOTING_DB_PATH ?? DEFAULT_CONFIG.dbPath,
    candidatesFile: parsed.VOTING_CANDIDATES_FILE ?? DEFAULT_CONFIG.candidatesFile,
    undoEnabled: parsed.VOTING_UNDO_ENABLED ?? DEFAULT_CONFIG.undoEnabled,
    tallyCapacity: parsed.VOTING_TALLY_CAPACITY ?? DEFAULT_CONFIG.tallyCapacity,
    indexBuckets: parsed.VOTING_INDEX_BUCKETS ?? DEFAULT_CONFIG.indexBuckets,
    indexCapacity: parsed.VOTING_INDEX_CAPACITY ?? DEFAULT_CONFIG.indexCapacity,
    lockTimeoutMs: parsed.VOTING_LOCK_TIMEOUT_MS ?? DEFAULT_CONFIG.lockTimeoutMs,
    busyTimeoutMs: parsed.VOTING_BUSY_TIMEOUT_MS ?? DEFAULT_CONFIG.busyTimeoutMs,
    identitySalt: parsed.VOTING_IDENTITY_SALT ?? DEFAULT_CONFIG.identitySalt,
    adminToken: parsed.VOTING_ADMIN_TOKEN,
  };
}
