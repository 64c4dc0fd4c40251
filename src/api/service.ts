/**
 * Ballot Service API -- Service Wiring
 *
 * Builds the VoteCastingTransaction the routes talk to: SQLite
 * persistence, the candidate catalog and the credential hasher, all taken
 * from the service configuration.
 *
 * @module api/service
 * @license AGPL-3.0-or-later
 */

import { DEFAULT_CONFIG, ServiceConfig } from "../config";
import { CandidateCatalog, loadCandidateCatalog } from "../core/candidate-catalog";
import { VoteCastingTransaction, createVoteCasting } from "../core/vote-casting";
import { SqlitePersistence } from "../storage/sqlite";
import { createCredentialHasher } from "../utils/crypto";
import { getLogger } from "../utils/logger";

export interface ServiceOverrides {
  /** Candidate catalog (defaults to the configured candidates file) */
  catalog?: CandidateCatalog;
  clock?: () => Date;
}

/**
 * Opens the database and assembles a VoteCastingTransaction.
 */
export function createVotingService(
  config: ServiceConfig,
  overrides: ServiceOverrides = {}
): VoteCastingTransaction {
  const persistence = new SqlitePersistence(config.dbPath, {
    busyTimeoutMs: config.busyTimeoutMs,
  });

  const voting = createVoteCasting({
    persistence,
    catalog: overrides.catalog ?? loadCandidateCatalog(config.candidatesFile),
    hasher: createCredentialHasher(config.identitySalt),
    undoEnabled: config.undoEnabled,
    tallyCapacity: config.tallyCapacity,
    indexBuckets: config.indexBuckets,
    indexCapacity: config.indexCapacity,
    lockTimeoutMs: config.lockTimeoutMs,
    logger: getLogger(),
    clock: overrides.clock,
  });

  getLogger().info(
    { dbPath: config.dbPath, undoEnabled: config.undoEnabled },
    "voting service ready"
  );

  return voting;
}

/**
 * Fresh in-memory service (for testing).
 */
export function createInMemoryService(
  config: Partial<ServiceConfig> = {},
  overrides: ServiceOverrides = {}
): VoteCastingTransaction {
  return createVotingService({ ...DEFAULT_CONFIG, ...config, dbPath: ":memory:" }, overrides);
}
