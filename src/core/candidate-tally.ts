/**
 * Candidate Tally -- fixed-capacity per-candidate vote counts
 *
 * The tally is a projection of the ballot ledger: its counts are only
 * changed after the corresponding ledger write has committed, and can be
 * recomputed from the ledger at any time with `applyCounts()`.
 *
 * Candidates keep their insertion order.  That order breaks ties both in
 * the ranked view and when choosing a winner.
 *
 * @module candidate-tally
 * @license AGPL-3.0-or-later
 */

import type { CandidateEntry, TallyStats } from "../types";

/**
 * Fixed-capacity candidate table.
 *
 * @example
 * ```ts
 * const tally = new CandidateTally(10);
 * tally.insert("CAND001", "Alice Johnson");
 * tally.insert("CAND002", "Bob Smith");
 *
 * tally.increment("CAND002");
 * tally.winner(); // { candidateId: "CAND002", name: "Bob Smith", voteCount: 1 }
 * ```
 */
export class CandidateTally {
  /** Entries in insertion order */
  private entries: CandidateEntry[] = [];

  /** candidateId -> position in `entries` */
  private positions: Map<string, number> = new Map();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Tally capacity must be a positive integer");
    }
  }

  /**
   * Adds a candidate with a zero count.
   *
   * @returns false (and leaves the table untouched) when the table is full
   *   or the id is already present
   */
  insert(candidateId: string, name: string): boolean {
    if (this.isFull() || this.positions.has(candidateId)) {
      return false;
    }

    this.positions.set(candidateId, this.entries.length);
    this.entries.push({ candidateId, name, voteCount: 0 });
    return true;
  }

  /**
   * Adds one vote.
   *
   * @returns false if the candidate is unknown
   */
  increment(candidateId: string): boolean {
    const entry = this.find(candidateId);
    if (!entry) return false;

    entry.voteCount += 1;
    return true;
  }

  /**
   * Removes one vote, never going below zero.
   *
   * @returns false if the candidate is unknown
   */
  decrement(candidateId: string): boolean {
    const entry = this.find(candidateId);
    if (!entry) return false;

    if (entry.voteCount > 0) {
      entry.voteCount -= 1;
    }
    return true;
  }

  has(candidateId: string): boolean {
    return this.positions.has(candidateId);
  }

  /** Returns a copy of the entry, or undefined. */
  get(candidateId: string): CandidateEntry | undefined {
    const entry = this.find(candidateId);
    return entry ? { ...entry } : undefined;
  }

  /**
   * Entries sorted by vote count, highest first.  Array.prototype.sort is
   * stable, so equal counts stay in insertion order.
   */
  ranked(): CandidateEntry[] {
    return this.list().sort((a, b) => b.voteCount - a.voteCount);
  }

  /**
   * The entry with the highest count; on a tie, the one inserted first.
   *
   * @returns null when there are no candidates
   */
  winner(): CandidateEntry | null {
    let best: CandidateEntry | null = null;

    for (const entry of this.entries) {
      if (best === null || entry.voteCount > best.voteCount) {
        best = entry;
      }
    }

    return best ? { ...best } : null;
  }

  /** Entries in insertion order (copies). */
  list(): CandidateEntry[] {
    return this.entries.map((e) => ({ ...e }));
  }

  totalVotes(): number {
    return this.entries.reduce((sum, e) => sum + e.voteCount, 0);
  }

  /**
   * Overwrites every count from a recomputed source.  Candidates absent
   * from `counts` are set to zero.
   *
   * @returns candidate ids present in `counts` that the table does not know
   */
  applyCounts(counts: Map<string, number>): string[] {
    for (const entry of this.entries) {
      entry.voteCount = counts.get(entry.candidateId) ?? 0;
    }

    return Array.from(counts.keys()).filter((id) => !this.positions.has(id));
  }

  get size(): number {
    return this.entries.length;
  }

  isFull(): boolean {
    return this.entries.length >= this.capacity;
  }

  getStats(): TallyStats {
    return {
      capacity: this.capacity,
      size: this.entries.length,
      totalVotes: this.totalVotes(),
      utilizationPercent: parseFloat(
        ((this.entries.length / this.capacity) * 100).toFixed(1)
      ),
    };
  }

  private find(candidateId: string): CandidateEntry | undefined {
    const position = this.positions.get(candidateId);
    return position === undefined ? undefined : this.entries[position];
  }
}
