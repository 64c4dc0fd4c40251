/**
 * Vote Casting Transaction -- Main Orchestrator
 *
 * Wires the sub-systems into the atomic cast-or-reject and undo
 * operations:
 *
 *   CredentialVerifier -- one-time access code redemption
 *   VoterStatusIndex   -- fast-path duplicate check (projection)
 *   BallotLedger       -- append-only ballot store (source of truth)
 *   CandidateTally     -- per-candidate counts (projection)
 *   AuditLog           -- LIFO record of mutations, drives undo
 *
 * A cast moves through
 *   Received -> CodeValidated -> DuplicateChecked -> Appended
 *   -> TalliedAndIndexed -> Logged -> Committed
 * or stops at Rejected(reason).  The three gates (code, duplicate,
 * candidate) reject without any state change.  From Appended onwards the
 * ledger append, voter update and audit row are one database transaction;
 * a failure anywhere rolls all of it back and reports INTERNAL_ERROR.
 * Projections are updated only after the transaction has committed.
 *
 * Every mutating operation runs under one SerialLock, which also makes
 * undo mutually exclusive with casts.
 *
 * @module vote-casting
 * @license AGPL-3.0-or-later
 */

import type pino from "pino";
import type {
  AuditEvent,
  CandidateEntry,
  CastEvent,
  CastOutcome,
  ConsistencyReport,
  ElectionResults,
  IssuedCode,
  Rejection,
  RegistrationResult,
  IssuanceResult,
  SanitizedAuditEvent,
  SystemStats,
  Ballot,
  UndoEvent,
  UndoOutcome,
} from "../types";
import type { Persistence } from "../storage/persistence";
import type { CredentialHasher } from "../utils/crypto";
import { getLogger } from "../utils/logger";
import { AuditLog } from "./audit-log";
import { BallotLedger } from "./ballot-ledger";
import type { CandidateCatalog } from "./candidate-catalog";
import { CandidateTally } from "./candidate-tally";
import { StoreCredentialVerifier, type CredentialVerifier } from "./credential-verifier";
import { VotingError, isVotingError, reject } from "./errors";
import { SerialLock } from "./serial-lock";
import { VoterStatusIndex } from "./voter-index";

// ============================================================
// Types
// ============================================================

export interface VoteCastingOptions {
  persistence: Persistence;
  catalog: CandidateCatalog;
  hasher: CredentialHasher;
  /** Defaults to the access_codes-backed verifier */
  verifier?: CredentialVerifier;
  /** Administrative undo (default false) */
  undoEnabled?: boolean;
  tallyCapacity?: number;
  indexBuckets?: number;
  indexCapacity?: number;
  /** Longest wait for the operation lock (default 5000) */
  lockTimeoutMs?: number;
  logger?: pino.Logger;
  /** Time source, for deterministic tests */
  clock?: () => Date;
}

/** Parameters for casting a vote */
export interface CastVoteParams {
  /** The voter's one-time access code */
  code: string;
  candidateId: string;
  /** Abandons the attempt while it is still waiting to start */
  signal?: AbortSignal;
}

export type RegistrationOutcome = ({ status: "committed" } & RegistrationResult) | Rejection;

export type IssuanceOutcome = ({ status: "committed" } & IssuanceResult) | Rejection;

interface StagedCast {
  status: "staged";
  ballot: Ballot;
  event: CastEvent;
  identityDigest: string;
}

interface StagedUndo {
  status: "staged";
  event: UndoEvent;
  reversed: CastEvent;
}

// ============================================================
// VoteCastingTransaction
// ============================================================

/**
 * @example
 * ```ts
 * const voting = createVoteCasting({
 *   persistence: new SqlitePersistence(":memory:"),
 *   catalog: new StaticCandidateCatalog([
 *     { candidateId: "A", name: "Alice" },
 *     { candidateId: "B", name: "Bob" },
 *   ]),
 *   hasher: createCredentialHasher("test-salt-1"),
 * });
 *
 * await voting.registerVoters(["V001"]);
 * const issued = await voting.issueCodes(["V001"]);
 *
 * const outcome = await voting.cast({ code: issued.codes[0].code, candidateId: "A" });
 * // { status: "committed", sequence: 1, ballotDigest: "...", timestamp: "..." }
 * ```
 */
export class VoteCastingTransaction {
  private readonly persistence: Persistence;
  private readonly hasher: CredentialHasher;
  private readonly verifier: CredentialVerifier;
  private readonly ledger: BallotLedger;
  private readonly tally: CandidateTally;
  private readonly index: VoterStatusIndex;
  private readonly auditLog: AuditLog;
  private readonly lock = new SerialLock();
  private readonly lockTimeoutMs: number;
  private readonly logger: pino.Logger;
  private readonly clock: () => Date;

  readonly undoEnabled: boolean;

  constructor(options: VoteCastingOptions) {
    this.persistence = options.persistence;
    this.hasher = options.hasher;
    this.verifier = options.verifier ?? new StoreCredentialVerifier(options.hasher);
    this.ledger = new BallotLedger(options.persistence);
    this.tally = new CandidateTally(options.tallyCapacity ?? 50);
    this.index = new VoterStatusIndex(
      options.indexBuckets ?? 1024,
      options.indexCapacity ?? 10000
    );
    this.auditLog = new AuditLog();
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.undoEnabled = options.undoEnabled ?? false;
    this.logger = (options.logger ?? getLogger()).child({ component: "vote-casting" });
    this.clock = options.clock ?? (() => new Date());

    for (const candidate of options.catalog.list()) {
      if (this.tally.insert(candidate.candidateId, candidate.name)) continue;
      if (this.tally.isFull()) {
        throw new VotingError(
          "CAPACITY",
          `Candidate table is full (${this.tally.capacity}); cannot add ${candidate.candidateId}`
        );
      }
      throw new VotingError(
        "VALIDATION_ERROR",
        `Duplicate candidate id in catalog: ${candidate.candidateId}`
      );
    }

    this.rebuildProjections();
  }

  // --------------------------------------------------------
  // Casting
  // --------------------------------------------------------

  /**
   * Redeems an access code and records one vote.
   *
   * Never throws: every failure comes back as a Rejection.
   */
  async cast(params: CastVoteParams): Promise<CastOutcome> {
    try {
      return await this.lock.runExclusive(() => this.castExclusive(params), {
        timeoutMs: this.lockTimeoutMs,
        signal: params.signal,
      });
    } catch (err) {
      return this.toRejection(err, "cast");
    }
  }

  private castExclusive({ code, candidateId, signal }: CastVoteParams): CastOutcome {
    // last point at which the caller may walk away
    if (signal?.aborted) {
      return reject("CANCELLED", "Operation was cancelled");
    }

    const timestamp = this.clock().toISOString();

    const result = this.persistence.withTransaction((tx): StagedCast | Rejection => {
      // Gate 1: code redemption
      const redeemed = this.verifier.redeem(tx, code);
      if (!redeemed.ok) {
        return reject("INVALID_OR_USED_CODE", "Access code is invalid or has already been used");
      }
      const { identityDigest, codeDigest } = redeemed;

      // Gate 2: duplicate check, cache first
      if (this.index.lookup(identityDigest)?.hasVoted) {
        return reject("ALREADY_VOTED", "Voter has already voted");
      }
      const voter = tx.getVoter(identityDigest);
      if (!voter) {
        return reject("INVALID_OR_USED_CODE", "Access code is not bound to a registered voter");
      }
      if (voter.hasVoted) {
        return reject("ALREADY_VOTED", "Voter has already voted");
      }

      // Gate 3: candidate
      if (!this.tally.has(candidateId)) {
        return reject("UNKNOWN_CANDIDATE", `Unknown candidate: ${candidateId}`);
      }

      // Appended and beyond: all or nothing
      try {
        const ballot = this.ledger.append(tx, candidateId, timestamp);

        if (!tx.markVoted(identityDigest)) {
          throw new VotingError("INTERNAL_ERROR", "Voter status changed during the transaction");
        }

        const event = tx.insertAuditEvent({
          kind: "CAST",
          timestamp,
          payload: {
            voterDigest: identityDigest,
            codeDigest,
            ballotDigest: ballot.ballotDigest,
            candidateId,
            sequence: ballot.sequence,
          },
        });
        if (event.kind !== "CAST") {
          throw new VotingError("INTERNAL_ERROR", "Audit store returned the wrong event kind");
        }

        tx.commit();
        return { status: "staged", ballot, event, identityDigest };
      } catch (err) {
        tx.rollback();
        this.logger.error({ err, candidateId }, "cast rolled back");
        return reject("INTERNAL_ERROR", "The vote could not be recorded; no changes were made");
      }
    });

    if (result.status === "rejected") {
      this.logger.warn({ reason: result.reason }, "cast rejected");
      return result;
    }

    this.applyProjections(() => {
      this.tally.increment(result.ballot.candidateId);
      this.index.upsert(result.identityDigest, true);
      this.auditLog.push(result.event);
    });

    this.logger.info(
      { sequence: result.ballot.sequence, candidateId: result.ballot.candidateId },
      "vote committed"
    );

    return {
      status: "committed",
      ballotDigest: result.ballot.ballotDigest,
      sequence: result.ballot.sequence,
      timestamp: result.ballot.createdAt,
    };
  }

  // --------------------------------------------------------
  // Undo
  // --------------------------------------------------------

  /**
   * Reverses the most recent audit event if it is a CAST.
   *
   * A non-CAST event on top is discarded (not restored) and reported as
   * UNSUPPORTED_UNDO_TARGET.  If the CAST no longer names the highest
   * ledger sequence, nothing changes and SEQUENCE_CONFLICT is reported.
   */
  async undo(): Promise<UndoOutcome> {
    if (!this.undoEnabled) {
      return reject("UNDO_DISABLED", "Undo is disabled");
    }

    try {
      return await this.lock.runExclusive(() => this.undoExclusive(), {
        timeoutMs: this.lockTimeoutMs,
      });
    } catch (err) {
      return this.toRejection(err, "undo");
    }
  }

  private undoExclusive(): UndoOutcome {
    if (this.auditLog.isEmpty()) {
      return reject("EMPTY", "There is nothing to undo");
    }

    const top = this.auditLog.peek();
    const timestamp = this.clock().toISOString();

    if (top.kind !== "CAST") {
      this.persistence.withTransaction((tx) => {
        if (!tx.markAuditEventPopped(top.id)) {
          throw new VotingError("INTERNAL_ERROR", `Audit event ${top.id} is not on the log`);
        }
        tx.commit();
      });
      this.auditLog.pop();

      this.logger.warn({ eventId: top.id, kind: top.kind }, "non-cast event discarded by undo");
      return reject(
        "UNSUPPORTED_UNDO_TARGET",
        `Cannot undo a ${top.kind} event; it has been removed from the log`
      );
    }

    const { voterDigest, codeDigest, ballotDigest, candidateId, sequence } = top.payload;

    const result = this.persistence.withTransaction((tx): StagedUndo | Rejection => {
      let removed: Ballot;
      try {
        removed = this.ledger.removeHighestSequence(tx, sequence);
      } catch (err) {
        if (isVotingError(err) && err.kind === "NOT_FOUND") {
          return reject("SEQUENCE_CONFLICT", `Ballot ${sequence} is no longer the latest entry`);
        }
        throw err;
      }
      if (removed.ballotDigest !== ballotDigest) {
        return reject("SEQUENCE_CONFLICT", `Ballot at sequence ${sequence} does not match the event`);
      }

      if (!tx.clearVoted(voterDigest)) {
        throw new VotingError("INTERNAL_ERROR", "Voter was not marked as voted");
      }
      if (!this.verifier.release(tx, codeDigest)) {
        throw new VotingError("INTERNAL_ERROR", "Access code was not marked as used");
      }
      if (!tx.markAuditEventPopped(top.id)) {
        throw new VotingError("INTERNAL_ERROR", `Audit event ${top.id} is not on the log`);
      }

      const event = tx.insertAuditEvent({
        kind: "UNDO",
        timestamp,
        payload: {
          reversedEventId: top.id,
          reversedKind: "CAST",
          ballotDigest,
          candidateId,
          sequence,
        },
      });
      if (event.kind !== "UNDO") {
        throw new VotingError("INTERNAL_ERROR", "Audit store returned the wrong event kind");
      }

      tx.commit();
      return { status: "staged", event, reversed: top };
    });

    if (result.status === "rejected") {
      this.logger.warn({ reason: result.reason, eventId: top.id }, "undo rejected");
      return result;
    }

    this.applyProjections(() => {
      this.tally.decrement(candidateId);
      this.index.upsert(voterDigest, false);
      this.auditLog.pop();
      this.auditLog.push(result.event);
    });

    this.logger.info({ sequence, candidateId, eventId: top.id }, "cast undone");

    return {
      status: "committed",
      reversedEventId: result.reversed.id,
      undoEventId: result.event.id,
      ballotDigest,
      candidateId,
      sequence,
    };
  }

  // --------------------------------------------------------
  // Registration & Issuance
  // --------------------------------------------------------

  /**
   * Registers voters by the digest of their identifiers.  Already
   * registered voters (and repeats within the batch) are counted as
   * duplicates.
   */
  async registerVoters(voterIds: string[]): Promise<RegistrationOutcome> {
    const ids = voterIds.filter((id) => id.trim() !== "");
    if (ids.length === 0) {
      return reject("VALIDATION_ERROR", "At least one voter id is required");
    }

    try {
      return await this.lock.runExclusive(
        () => this.registerExclusive(ids),
        { timeoutMs: this.lockTimeoutMs }
      );
    } catch (err) {
      return this.toRejection(err, "register");
    }
  }

  private registerExclusive(ids: string[]): RegistrationOutcome {
    const timestamp = this.clock().toISOString();
    const digests = [...new Set(ids.map((id) => this.hasher.hashIdentity(id)))];
    const fresh = digests.filter((d) => !this.persistence.getVoter(d));

    if (this.index.size + fresh.length > this.index.capacity) {
      return reject(
        "CAPACITY",
        `Registering ${fresh.length} voters would exceed the index capacity of ${this.index.capacity}`
      );
    }

    const event = this.persistence.withTransaction((tx) => {
      for (const digest of fresh) {
        tx.insertVoter(digest, timestamp);
      }
      const recorded = tx.insertAuditEvent({
        kind: "REGISTER",
        timestamp,
        payload: {
          registeredCount: fresh.length,
          duplicateCount: ids.length - fresh.length,
          totalAttempted: ids.length,
        },
      });
      tx.commit();
      return recorded;
    });

    this.applyProjections(() => {
      for (const digest of fresh) {
        this.index.upsert(digest, false);
      }
      this.auditLog.push(event);
    });

    this.logger.info({ registered: fresh.length, attempted: ids.length }, "voters registered");

    return {
      status: "committed",
      registeredCount: fresh.length,
      duplicateCount: ids.length - fresh.length,
      totalVoters: this.persistence.countVoters(),
    };
  }

  /**
   * Issues a fresh access code to each registered voter who has not voted.
   * Any earlier unused code of that voter stops working.  The plain codes
   * are returned once and never stored.
   */
  async issueCodes(voterIds: string[]): Promise<IssuanceOutcome> {
    const ids = voterIds.filter((id) => id.trim() !== "");
    if (ids.length === 0) {
      return reject("VALIDATION_ERROR", "At least one voter id is required");
    }

    try {
      return await this.lock.runExclusive(
        () => this.issueExclusive(ids),
        { timeoutMs: this.lockTimeoutMs }
      );
    } catch (err) {
      return this.toRejection(err, "issue");
    }
  }

  private issueExclusive(ids: string[]): IssuanceOutcome {
    const timestamp = this.clock().toISOString();
    const codes: IssuedCode[] = [];
    const skipped: string[] = [];

    const event = this.persistence.withTransaction((tx) => {
      const seen = new Set<string>();

      for (const voterId of ids) {
        const identityDigest = this.hasher.hashIdentity(voterId);
        const voter = tx.getVoter(identityDigest);
        if (!voter || voter.hasVoted || seen.has(identityDigest)) {
          skipped.push(voterId);
          continue;
        }
        seen.add(identityDigest);

        tx.revokeUnusedCodes(identityDigest);
        const { code, digest } = this.hasher.generateCode();
        tx.insertAccessCode({ codeDigest: digest, identityDigest, used: false }, timestamp);
        codes.push({ voterId, code });
      }

      const recorded = tx.insertAuditEvent({
        kind: "ISSUE",
        timestamp,
        payload: { issuedCount: codes.length, requestedCount: ids.length },
      });
      tx.commit();
      return recorded;
    });

    this.applyProjections(() => this.auditLog.push(event));

    this.logger.info({ issued: codes.length, requested: ids.length }, "access codes issued");

    return { status: "committed", codes, issuedCount: codes.length, skipped };
  }

  // --------------------------------------------------------
  // Reads
  // --------------------------------------------------------

  /** Candidates ranked by votes, with totals and the current leader. */
  getResults(): ElectionResults {
    return {
      results: this.tally.ranked(),
      totalVotes: this.tally.totalVotes(),
      winner: this.tally.winner(),
      computedAt: this.clock().toISOString(),
    };
  }

  getCandidate(candidateId: string): CandidateEntry | undefined {
    return this.tally.get(candidateId);
  }

  /** Looks a ballot up by the digest on the voter's receipt. */
  lookupBallot(ballotDigest: string): Ballot | undefined {
    return this.ledger.findByDigest(ballotDigest);
  }

  /**
   * Whether a ballot with this digest is in the ledger.  This is a
   * membership check, not a cryptographic inclusion proof.
   */
  verifyBallot(ballotDigest: string): boolean {
    return this.ledger.findByDigest(ballotDigest) !== undefined;
  }

  /** Newest audit events first, with voter and code digests redacted. */
  recentEvents(limit = 50): SanitizedAuditEvent[] {
    return this.auditLog.recentEvents(limit);
  }

  /** Voter status as seen by the fast-path index. */
  voterStatus(voterId: string): { registered: boolean; hasVoted: boolean } {
    const record = this.index.lookup(this.hasher.hashIdentity(voterId));
    return { registered: record !== undefined, hasVoted: record?.hasVoted ?? false };
  }

  getStats(): SystemStats {
    const totalVoters = this.persistence.countVoters();
    const votedCount = this.persistence.countVoted();

    return {
      totalVoters,
      votedCount,
      remainingVoters: totalVoters - votedCount,
      totalBallots: this.ledger.count(),
      highestSequence: this.ledger.highestSequence(),
      undoEnabled: this.undoEnabled,
      tally: this.tally.getStats(),
      index: this.index.getStats(),
      auditLog: {
        size: this.auditLog.size,
        top: this.auditLog.isEmpty() ? null : this.auditLog.peek().kind,
      },
    };
  }

  // --------------------------------------------------------
  // Consistency
  // --------------------------------------------------------

  /**
   * Recomputes every projection from the persistent store and reports
   * the consistency of the result.
   */
  async resynchronize(): Promise<ConsistencyReport> {
    return this.lock.runExclusive(
      () => {
        this.rebuildProjections();
        return this.checkConsistency();
      },
      { timeoutMs: this.lockTimeoutMs }
    );
  }

  /**
   * Compares the projections with the ledger and the voter records.
   */
  checkConsistency(): ConsistencyReport {
    const problems: string[] = [];
    const verification = this.ledger.verify();
    const ledgerBallots = verification.ballotsChecked;
    const tallyTotal = this.tally.totalVotes();
    const voters = this.persistence.listVoters();
    const votersMarked = voters.filter((v) => v.hasVoted).length;

    const casts = this.auditLog
      .entries()
      .filter((e): e is CastEvent => e.kind === "CAST");

    if (tallyTotal !== ledgerBallots) {
      problems.push(`tally total ${tallyTotal} != ledger ballots ${ledgerBallots}`);
    }

    const counts = this.ledger.countsByCandidate();
    for (const entry of this.tally.list()) {
      const expected = counts.get(entry.candidateId) ?? 0;
      if (entry.voteCount !== expected) {
        problems.push(`${entry.candidateId}: tally ${entry.voteCount} != ledger ${expected}`);
      }
    }

    if (votersMarked !== ledgerBallots) {
      problems.push(`voters marked ${votersMarked} != ledger ballots ${ledgerBallots}`);
    }
    if (casts.length !== ledgerBallots) {
      problems.push(`outstanding casts ${casts.length} != ledger ballots ${ledgerBallots}`);
    }

    const castVoters = new Set<string>();
    for (const cast of casts) {
      const { voterDigest, codeDigest, ballotDigest } = cast.payload;
      if (castVoters.has(voterDigest)) {
        problems.push(`voter traced by more than one cast (event ${cast.id})`);
      }
      castVoters.add(voterDigest);
      if (!this.ledger.findByDigest(ballotDigest)) {
        problems.push(`cast event ${cast.id} has no ballot in the ledger`);
      }
      if (!this.persistence.getAccessCode(codeDigest)?.used) {
        problems.push(`cast event ${cast.id} refers to an unused access code`);
      }
    }

    for (const voter of voters) {
      if (voter.hasVoted !== castVoters.has(voter.identityDigest)) {
        problems.push("voter status disagrees with the audit trail");
      }
      if (this.index.lookup(voter.identityDigest)?.hasVoted !== voter.hasVoted) {
        problems.push("voter index disagrees with the voter records");
      }
    }

    if (verification.duplicateDigests > 0) {
      problems.push(`${verification.duplicateDigests} duplicate ballot digests`);
    }
    if (verification.duplicateSequences > 0) {
      problems.push(`${verification.duplicateSequences} duplicate sequences`);
    }

    return {
      isConsistent: problems.length === 0,
      ledgerBallots,
      tallyTotal,
      votersMarked,
      outstandingCasts: casts.length,
      duplicateDigests: verification.duplicateDigests,
      duplicateSequences: verification.duplicateSequences,
      problems,
    };
  }

  /** Audit events from oldest to newest (unsanitised; internal use). */
  auditEntries(): AuditEvent[] {
    return this.auditLog.entries();
  }

  close(): void {
    this.persistence.close();
  }

  // --------------------------------------------------------
  // Internals
  // --------------------------------------------------------

  private rebuildProjections(): void {
    const unknown = this.tally.applyCounts(this.ledger.countsByCandidate());
    if (unknown.length > 0) {
      this.logger.error({ candidates: unknown }, "ledger holds ballots for unknown candidates");
    }
    this.index.rebuild(this.persistence.listVoters());
    this.auditLog.restore(this.persistence.listActiveAuditEvents());
  }

  /**
   * Applies in-memory projection updates after a commit.  If one fails
   * the projections are recomputed from the store.
   */
  private applyProjections(update: () => void): void {
    try {
      update();
    } catch (err) {
      this.logger.error({ err }, "projection update failed; rebuilding from store");
      this.rebuildProjections();
    }
  }

  private toRejection(err: unknown, operation: string): Rejection {
    if (isVotingError(err)) {
      const level = err.kind === "INTERNAL_ERROR" ? "error" : "warn";
      this.logger[level]({ operation, reason: err.kind }, err.message);
      return err.toRejection();
    }

    this.logger.error({ err, operation }, "unexpected failure");
    return reject("INTERNAL_ERROR", `Unexpected failure during ${operation}`);
  }
}

/**
 * Creates a new VoteCastingTransaction.
 */
export function createVoteCasting(options: VoteCastingOptions): VoteCastingTransaction {
  return new VoteCastingTransaction(options);
}
