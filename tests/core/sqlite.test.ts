/**
 * Unit Tests for the SQLite persistence layer
 *
 * Covers:
 * - Transaction scoping (commit, implicit rollback, nested begin)
 * - Compare-and-set updates on voters and access codes
 * - Ballot storage and aggregation
 * - Audit event round-trip and the popped flag
 *
 * @license AGPL-3.0-or-later
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { SqlitePersistence } from "../../src/storage/sqlite";
import { sha256 } from "../../src/utils/crypto";
import { thrownKind } from "../helpers";

const NOW = "2026-03-01T12:00:00.000Z";
const voter = sha256("voter-1");
const code = sha256("code-1");

describe("SqlitePersistence", () => {
  let db: SqlitePersistence;

  beforeEach(() => {
    db = new SqlitePersistence(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  // ============================================================
  // Transactions
  // ============================================================

  describe("withTransaction", () => {
    it("should persist writes after commit", () => {
      db.withTransaction((tx) => {
        tx.insertVoter(voter, NOW);
        tx.commit();
      });

      expect(db.getVoter(voter)).toEqual({ identityDigest: voter, hasVoted: false });
    });

    it("should roll back when the callback returns without committing", () => {
      db.withTransaction((tx) => {
        tx.insertVoter(voter, NOW);
      });

      expect(db.countVoters()).toBe(0);
    });

    it("should roll back when the callback throws", () => {
      expect(() =>
        db.withTransaction((tx) => {
          tx.insertVoter(voter, NOW);
          throw new Error("boom");
        })
      ).toThrow("boom");

      expect(db.countVoters()).toBe(0);
    });

    it("should refuse writes after the transaction finished", () => {
      const tx = db.beginTransaction();
      tx.commit();

      expect(tx.finished).toBe(true);
      expect(thrownKind(() => tx.insertVoter(voter, NOW))).toBe("INTERNAL_ERROR");
    });

    it("should refuse to open a second transaction on the same connection", () => {
      const tx = db.beginTransaction();
      expect(thrownKind(() => db.beginTransaction())).toBe("INTERNAL_ERROR");
      tx.rollback();
    });
  });

  // ============================================================
  // Voters & Codes
  // ============================================================

  describe("voters and access codes", () => {
    beforeEach(() => {
      db.withTransaction((tx) => {
        tx.insertVoter(voter, NOW);
        tx.insertAccessCode({ codeDigest: code, identityDigest: voter, used: false }, NOW);
        tx.commit();
      });
    });

    it("should report duplicates on insert", () => {
      db.withTransaction((tx) => {
        expect(tx.insertVoter(voter, NOW)).toBe(false);
        tx.commit();
      });
      expect(db.countVoters()).toBe(1);
    });

    it("should apply markVoted once", () => {
      db.withTransaction((tx) => {
        expect(tx.markVoted(voter)).toBe(true);
        expect(tx.markVoted(voter)).toBe(false);
        tx.commit();
      });

      expect(db.countVoted()).toBe(1);
    });

    it("should apply clearVoted only to a voter who voted", () => {
      db.withTransaction((tx) => {
        expect(tx.clearVoted(voter)).toBe(false);
        tx.markVoted(voter);
        expect(tx.clearVoted(voter)).toBe(true);
        tx.commit();
      });

      expect(db.countVoted()).toBe(0);
    });

    it("should consume and release a code", () => {
      db.withTransaction((tx) => {
        expect(tx.consumeAccessCode(code)).toBe(true);
        expect(tx.consumeAccessCode(code)).toBe(false);
        tx.commit();
      });
      expect(db.getAccessCode(code)?.used).toBe(true);

      db.withTransaction((tx) => {
        expect(tx.releaseAccessCode(code)).toBe(true);
        expect(tx.releaseAccessCode(code)).toBe(false);
        tx.commit();
      });
      expect(db.getAccessCode(code)?.used).toBe(false);
    });

    it("should revoke only unused codes", () => {
      const usedCode = sha256("code-2");

      db.withTransaction((tx) => {
        tx.insertAccessCode({ codeDigest: usedCode, identityDigest: voter, used: true }, NOW);
        expect(tx.revokeUnusedCodes(voter)).toBe(1);
        tx.commit();
      });

      expect(db.listAccessCodes().map((c) => c.codeDigest)).toEqual([usedCode]);
    });
  });

  // ============================================================
  // Ballots
  // ============================================================

  describe("ballots", () => {
    beforeEach(() => {
      db.withTransaction((tx) => {
        tx.insertBallot({ sequence: 1, ballotDigest: sha256("b1"), candidateId: "A", createdAt: NOW });
        tx.insertBallot({ sequence: 2, ballotDigest: sha256("b2"), candidateId: "B", createdAt: NOW });
        tx.insertBallot({ sequence: 3, ballotDigest: sha256("b3"), candidateId: "A", createdAt: NOW });
        tx.commit();
      });
    });

    it("should look ballots up by digest and sequence", () => {
      expect(db.findBallotByDigest(sha256("b2"))?.sequence).toBe(2);
      expect(db.getBallot(3)?.ballotDigest).toBe(sha256("b3"));
      expect(db.getBallot(9)).toBeUndefined();
    });

    it("should report the highest sequence and counts", () => {
      expect(db.maxSequence()).toBe(3);
      expect(db.countBallots()).toBe(3);
      expect(db.ballotCountsByCandidate()).toEqual(new Map([["A", 2], ["B", 1]]));
    });

    it("should reject a duplicate digest", () => {
      expect(() =>
        db.withTransaction((tx) => {
          tx.insertBallot({ sequence: 4, ballotDigest: sha256("b1"), candidateId: "B", createdAt: NOW });
        })
      ).toThrow();
      expect(db.countBallots()).toBe(3);
    });

    it("should delete by sequence", () => {
      db.withTransaction((tx) => {
        expect(tx.deleteBallot(3)).toBe(true);
        expect(tx.deleteBallot(3)).toBe(false);
        tx.commit();
      });
      expect(db.maxSequence()).toBe(2);
    });

    it("should report zero for an empty ledger", () => {
      const empty = new SqlitePersistence(":memory:");
      expect(empty.maxSequence()).toBe(0);
      expect(empty.listBallots()).toEqual([]);
      empty.close();
    });
  });

  // ============================================================
  // Audit events
  // ============================================================

  describe("audit events", () => {
    it("should assign increasing ids and decode payloads", () => {
      const [first, second] = db.withTransaction((tx) => {
        const a = tx.insertAuditEvent({
          kind: "ISSUE",
          timestamp: NOW,
          payload: { issuedCount: 1, requestedCount: 2 },
        });
        const b = tx.insertAuditEvent({
          kind: "UNDO",
          timestamp: NOW,
          payload: { reversedEventId: a.id, reversedKind: "ISSUE" },
        });
        tx.commit();
        return [a, b];
      });

      expect(second.id).toBeGreaterThan(first.id);
      expect(db.listActiveAuditEvents()).toEqual([first, second]);
    });

    it("should hide popped events", () => {
      const event = db.withTransaction((tx) => {
        const e = tx.insertAuditEvent({
          kind: "REGISTER",
          timestamp: NOW,
          payload: { registeredCount: 1, duplicateCount: 0, totalAttempted: 1 },
        });
        tx.commit();
        return e;
      });

      db.withTransaction((tx) => {
        expect(tx.markAuditEventPopped(event.id)).toBe(true);
        expect(tx.markAuditEventPopped(event.id)).toBe(false);
        tx.commit();
      });

      expect(db.listActiveAuditEvents()).toEqual([]);
    });
  });

  // ============================================================
  // Files
  // ============================================================

  describe("on disk", () => {
    it("should create the parent directory and keep data across reopen", () => {
      const dir = mkdtempSync(join(tmpdir(), "ballots-"));
      const file = join(dir, "nested", "ballots.db");

      try {
        const first = new SqlitePersistence(file);
        first.withTransaction((tx) => {
          tx.insertVoter(voter, NOW);
          tx.commit();
        });
        first.close();

        const second = new SqlitePersistence(file);
        expect(second.countVoters()).toBe(1);
        second.close();
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
