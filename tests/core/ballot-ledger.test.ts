/**
 * Unit Tests for the BallotLedger
 *
 * Covers:
 * - Sequence assignment (highest + 1)
 * - Digest collision refusal
 * - Guarded removal of the highest entry
 * - Structural verification
 *
 * @license AGPL-3.0-or-later
 */

import { BallotLedger } from "../../src/core/ballot-ledger";
import { SqlitePersistence } from "../../src/storage/sqlite";
import { computeBallotDigest } from "../../src/utils/crypto";
import { thrownKind } from "../helpers";

const NOW = "2026-03-01T12:00:00.000Z";

describe("BallotLedger", () => {
  let db: SqlitePersistence;
  let ledger: BallotLedger;
  let nonce: number;

  beforeEach(() => {
    db = new SqlitePersistence(":memory:");
    nonce = 0;
    // deterministic digests: one fresh nonce per ballot
    ledger = new BallotLedger(db, (candidateId) => computeBallotDigest(`n${++nonce}`, candidateId));
  });

  afterEach(() => {
    db.close();
  });

  function append(candidateId: string) {
    return db.withTransaction((tx) => {
      const ballot = ledger.append(tx, candidateId, NOW);
      tx.commit();
      return ballot;
    });
  }

  // ============================================================
  // Append
  // ============================================================

  describe("append", () => {
    it("should start at sequence 1 and increase by one", () => {
      expect(append("A").sequence).toBe(1);
      expect(append("B").sequence).toBe(2);
      expect(append("A").sequence).toBe(3);
      expect(ledger.highestSequence()).toBe(3);
    });

    it("should bind the digest to nonce and candidate", () => {
      const ballot = append("A");
      expect(ballot).toEqual({
        sequence: 1,
        ballotDigest: computeBallotDigest("n1", "A"),
        candidateId: "A",
        createdAt: NOW,
      });
      expect(ledger.findByDigest(ballot.ballotDigest)).toEqual(ballot);
    });

    it("should refuse a digest that already exists", () => {
      const fixed = new BallotLedger(db, () => "f".repeat(64));
      db.withTransaction((tx) => {
        fixed.append(tx, "A", NOW);
        tx.commit();
      });

      const kind = thrownKind(() =>
        db.withTransaction((tx) => {
          fixed.append(tx, "A", NOW);
          tx.commit();
        })
      );

      expect(kind).toBe("INTERNAL_ERROR");
      expect(ledger.count()).toBe(1);
    });

    it("should use the random default digest", () => {
      const random = new BallotLedger(db);
      const a = db.withTransaction((tx) => {
        const b = random.append(tx, "A");
        tx.commit();
        return b;
      });
      expect(a.ballotDigest).toMatch(/^[a-f0-9]{64}$/);
    });
  });

  // ============================================================
  // Removal
  // ============================================================

  describe("removeHighestSequence", () => {
    it("should remove the entry with the named highest sequence", () => {
      append("A");
      const last = append("B");

      const removed = db.withTransaction((tx) => {
        const b = ledger.removeHighestSequence(tx, 2);
        tx.commit();
        return b;
      });

      expect(removed).toEqual(last);
      expect(ledger.highestSequence()).toBe(1);
      expect(ledger.findByDigest(last.ballotDigest)).toBeUndefined();
    });

    it("should refuse a sequence that is not the highest", () => {
      append("A");
      append("B");

      expect(thrownKind(() => db.withTransaction((tx) => ledger.removeHighestSequence(tx, 1)))).toBe(
        "NOT_FOUND"
      );
      expect(ledger.count()).toBe(2);
    });

    it("should refuse on an empty ledger", () => {
      expect(thrownKind(() => db.withTransaction((tx) => ledger.removeHighestSequence(tx, 1)))).toBe(
        "NOT_FOUND"
      );
    });

    it("should make the next append reuse the freed sequence", () => {
      append("A");
      append("B");
      db.withTransaction((tx) => {
        ledger.removeHighestSequence(tx, 2);
        tx.commit();
      });

      expect(append("C").sequence).toBe(2);
    });
  });

  // ============================================================
  // Reads
  // ============================================================

  describe("countsByCandidate / verify", () => {
    it("should count ballots per candidate", () => {
      append("A");
      append("B");
      append("A");

      expect(ledger.countsByCandidate()).toEqual(new Map([["A", 2], ["B", 1]]));
      expect(ledger.list().map((b) => b.sequence)).toEqual([1, 2, 3]);
    });

    it("should verify a well-formed ledger", () => {
      append("A");
      append("B");

      expect(ledger.verify()).toEqual({
        ballotsChecked: 2,
        duplicateSequences: 0,
        duplicateDigests: 0,
      });
    });
  });
});
