/**
 * Ballot Ledger -- append-only, sequence-ordered store of cast ballots
 *
 * The ledger is the single source of truth for "has this vote happened".
 * Every ballot gets `sequence = highest + 1` and a digest computed from a
 * fresh random nonce and the candidate id, so the receipt proves the cast
 * without naming the voter.
 *
 * Ballots are never modified.  The only removal allowed is of the entry
 * holding the current highest sequence, and only when the caller names
 * that sequence: an undo that raced with a newer cast cannot delete the
 * wrong row.
 *
 * @module ballot-ledger
 * @license AGPL-3.0-or-later
 */

import type { Ballot } from "../types";
import type { StoreReader, TransactionHandle } from "../storage/persistence";
import { createBallotDigest } from "../utils/crypto";
import { VotingError } from "./errors";

/** Result of checking the ledger's structural invariants */
export interface LedgerVerification {
  ballotsChecked: number;
  duplicateSequences: number;
  duplicateDigests: number;
}

/**
 * @example
 * ```ts
 * const ledger = new BallotLedger(persistence);
 *
 * persistence.withTransaction((tx) => {
 *   const ballot = ledger.append(tx, "CAND001");
 *   tx.commit();
 *   console.log(ballot.sequence); // 1
 * });
 * ```
 */
export class BallotLedger {
  constructor(
    private readonly reader: StoreReader,
    private readonly digest: (candidateId: string) => string = createBallotDigest
  ) {}

  /**
   * Appends a ballot inside the caller's transaction.
   *
   * @throws VotingError(INTERNAL_ERROR) if the generated digest already
   *   exists in the ledger
   */
  append(tx: TransactionHandle, candidateId: string, createdAt = new Date().toISOString()): Ballot {
    const ballotDigest = this.digest(candidateId);
    if (tx.findBallotByDigest(ballotDigest)) {
      throw new VotingError("INTERNAL_ERROR", "Ballot digest collision");
    }

    const ballot: Ballot = {
      sequence: tx.maxSequence() + 1,
      ballotDigest,
      candidateId,
      createdAt,
    };

    tx.insertBallot(ballot);
    return ballot;
  }

  /**
   * Removes the ballot holding the highest sequence.
   *
   * @param expectedSequence - The sequence the caller believes is highest
   * @throws VotingError(NOT_FOUND) if the ledger is empty or
   *   `expectedSequence` is not the current highest
   */
  removeHighestSequence(tx: TransactionHandle, expectedSequence: number): Ballot {
    const highest = tx.maxSequence();
    if (highest === 0) {
      throw new VotingError("NOT_FOUND", "Ledger is empty");
    }
    if (highest !== expectedSequence) {
      throw new VotingError(
        "NOT_FOUND",
        `Sequence ${expectedSequence} is not the highest (current highest is ${highest})`
      );
    }

    const ballot = tx.getBallot(highest);
    if (!ballot || !tx.deleteBallot(highest)) {
      throw new VotingError("NOT_FOUND", `No ballot at sequence ${highest}`);
    }
    return ballot;
  }

  findByDigest(ballotDigest: string): Ballot | undefined {
    return this.reader.findBallotByDigest(ballotDigest);
  }

  highestSequence(): number {
    return this.reader.maxSequence();
  }

  count(): number {
    return this.reader.countBallots();
  }

  list(): Ballot[] {
    return this.reader.listBallots();
  }

  /** candidateId -> ballots recorded for it */
  countsByCandidate(): Map<string, number> {
    return this.reader.ballotCountsByCandidate();
  }

  /**
   * Counts repeated sequences and digests.  The schema's keys keep both at
   * zero; the check covers stores that were written to by other means.
   */
  verify(): LedgerVerification {
    const ballots = this.reader.listBallots();
    const sequences = new Set<number>();
    const digests = new Set<string>();
    let duplicateSequences = 0;
    let duplicateDigests = 0;

    for (const ballot of ballots) {
      if (sequences.has(ballot.sequence)) duplicateSequences++;
      if (digests.has(ballot.ballotDigest)) duplicateDigests++;
      sequences.add(ballot.sequence);
      digests.add(ballot.ballotDigest);
    }

    return {
      ballotsChecked: ballots.length,
      duplicateSequences,
      duplicateDigests,
    };
  }
}
