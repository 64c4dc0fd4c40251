/**
 * Voter Status Index -- in-memory cache of who has voted
 *
 * The cast fast-path consults this index before touching the database so
 * obvious duplicate attempts are rejected cheaply.  Authoritative voter
 * state lives in the persistent store; the index is rebuilt from it on
 * startup and by every resynchronisation pass.
 *
 * Entries are placed in buckets derived from the digest itself: the first
 * eight hex characters, read as an integer, modulo the bucket count.
 * Identity digests are uniformly distributed SHA-256 output, so chains
 * stay short and lookups are O(1) on average.
 *
 * @module voter-index
 * @license AGPL-3.0-or-later
 */

import type { IndexStats, VoterRecord } from "../types";
import { VotingError } from "./errors";

const HEX_DIGEST = /^[a-f0-9]{8,}$/;

export class VoterStatusIndex {
  private buckets: VoterRecord[][];

  private count = 0;

  /**
   * @param bucketCount - Number of buckets
   * @param capacity - Maximum number of voters held
   */
  constructor(
    readonly bucketCount: number,
    readonly capacity: number
  ) {
    if (!Number.isInteger(bucketCount) || bucketCount <= 0) {
      throw new Error("Bucket count must be a positive integer");
    }
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error("Index capacity must be a positive integer");
    }
    this.buckets = Array.from({ length: bucketCount }, () => []);
  }

  /**
   * Bucket position for a digest.
   */
  bucketOf(identityDigest: string): number {
    if (!HEX_DIGEST.test(identityDigest)) {
      throw new VotingError(
        "VALIDATION_ERROR",
        "Identity digest must be a lowercase hex string"
      );
    }
    return parseInt(identityDigest.slice(0, 8), 16) % this.bucketCount;
  }

  /** Returns a copy of the record, or undefined. */
  lookup(identityDigest: string): VoterRecord | undefined {
    const record = this.find(identityDigest);
    return record ? { ...record } : undefined;
  }

  /**
   * Inserts or updates a voter's status.
   *
   * @throws VotingError(CAPACITY) when inserting a new digest into a full index
   */
  upsert(identityDigest: string, hasVoted: boolean): void {
    const existing = this.find(identityDigest);
    if (existing) {
      existing.hasVoted = hasVoted;
      return;
    }

    if (this.count >= this.capacity) {
      throw new VotingError(
        "CAPACITY",
        `Voter index is full (${this.capacity} entries)`
      );
    }

    this.buckets[this.bucketOf(identityDigest)].push({ identityDigest, hasVoted });
    this.count++;
  }

  /**
   * Replaces the whole index with the given records.
   *
   * @throws VotingError(CAPACITY) if there are more records than capacity
   */
  rebuild(records: Iterable<VoterRecord>): void {
    this.buckets = Array.from({ length: this.bucketCount }, () => []);
    this.count = 0;
    for (const record of records) {
      this.upsert(record.identityDigest, record.hasVoted);
    }
  }

  get size(): number {
    return this.count;
  }

  getStats(): IndexStats {
    let nonEmptyBuckets = 0;
    let longestChain = 0;
    for (const bucket of this.buckets) {
      if (bucket.length > 0) nonEmptyBuckets++;
      longestChain = Math.max(longestChain, bucket.length);
    }

    return {
      buckets: this.bucketCount,
      size: this.count,
      capacity: this.capacity,
      loadFactor: this.count / this.bucketCount,
      nonEmptyBuckets,
      longestChain,
    };
  }

  private find(identityDigest: string): VoterRecord | undefined {
    return this.buckets[this.bucketOf(identityDigest)].find(
      (r) => r.identityDigest === identityDigest
    );
  }
}
