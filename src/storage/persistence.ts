/**
 * Persistence contracts.
 *
 * The core never holds a global database session.  Every mutating
 * operation receives an explicit TransactionHandle from
 * `Persistence.withTransaction()`, and any exit from that scope that did
 * not call `commit()` rolls the transaction back.
 *
 * @module storage/persistence
 * @license AGPL-3.0-or-later
 */

import type {
  AccessCode,
  AuditEvent,
  Ballot,
  NewAuditEvent,
  VoterRecord,
} from "../types";

/**
 * Read-only queries, available both inside and outside a transaction.
 */
export interface StoreReader {
  getVoter(identityDigest: string): VoterRecord | undefined;
  listVoters(): VoterRecord[];
  countVoters(): number;
  countVoted(): number;

  getAccessCode(codeDigest: string): AccessCode | undefined;
  listAccessCodes(): AccessCode[];

  findBallotByDigest(ballotDigest: string): Ballot | undefined;
  getBallot(sequence: number): Ballot | undefined;
  /** Highest sequence in the ledger, 0 when empty */
  maxSequence(): number;
  countBallots(): number;
  /** Ballots ordered by sequence */
  listBallots(): Ballot[];
  /** candidateId -> number of ballots */
  ballotCountsByCandidate(): Map<string, number>;

  /** Audit events not yet popped, oldest first */
  listActiveAuditEvents(): AuditEvent[];
}

/**
 * Scoped write access.  Obtained only through `Persistence`.
 */
export interface TransactionHandle extends StoreReader {
  /** True once committed or rolled back */
  readonly finished: boolean;

  commit(): void;
  rollback(): void;

  /** @returns false if the voter already exists */
  insertVoter(identityDigest: string, registeredAt: string): boolean;
  /** Compare-and-set hasVoted false -> true; false if not applied */
  markVoted(identityDigest: string): boolean;
  /** Compare-and-set hasVoted true -> false; false if not applied */
  clearVoted(identityDigest: string): boolean;

  insertAccessCode(code: AccessCode, issuedAt: string): void;
  /** Deletes every unused code bound to the voter; returns the count */
  revokeUnusedCodes(identityDigest: string): number;
  /** Compare-and-set used false -> true; false if not applied */
  consumeAccessCode(codeDigest: string): boolean;
  /** Compare-and-set used true -> false; false if not applied */
  releaseAccessCode(codeDigest: string): boolean;

  insertBallot(ballot: Ballot): void;
  /** @returns false if no ballot has that sequence */
  deleteBallot(sequence: number): boolean;

  /** Persists an event and returns it with its assigned id */
  insertAuditEvent(event: NewAuditEvent): AuditEvent;
  /** @returns false if the event does not exist or was already popped */
  markAuditEventPopped(id: number): boolean;
}

export interface Persistence extends StoreReader {
  /**
   * Starts an immediate (write-locking) transaction.  Prefer
   * `withTransaction`, which guarantees release.
   *
   * @throws VotingError(TRANSIENT_CONFLICT) if the database stays busy
   */
  beginTransaction(): TransactionHandle;

  /**
   * Runs `fn` inside a transaction.  If `fn` returns or throws without
   * having called `tx.commit()`, the transaction is rolled back.
   */
  withTransaction<T>(fn: (tx: TransactionHandle) => T): T;

  close(): void;
}
