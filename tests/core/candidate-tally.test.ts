/**
 * Unit Tests for the CandidateTally
 *
 * Covers:
 * - Insertion limits (capacity, duplicates)
 * - Increment / decrement (floor at zero, unknown ids)
 * - Ranking stability and winner tie-breaking
 * - Recomputing counts from the ledger
 *
 * @license AGPL-3.0-or-later
 */

import { CandidateTally } from "../../src/core/candidate-tally";

describe("CandidateTally", () => {
  let tally: CandidateTally;

  beforeEach(() => {
    tally = new CandidateTally(3);
    tally.insert("A", "Alice");
    tally.insert("B", "Bob");
  });

  // ============================================================
  // Insertion
  // ============================================================

  describe("insert", () => {
    it("should add a candidate with zero votes", () => {
      expect(tally.get("A")).toEqual({ candidateId: "A", name: "Alice", voteCount: 0 });
      expect(tally.size).toBe(2);
    });

    it("should refuse a duplicate id", () => {
      expect(tally.insert("A", "Another Alice")).toBe(false);
      expect(tally.get("A")?.name).toBe("Alice");
      expect(tally.size).toBe(2);
    });

    it("should refuse inserts once full", () => {
      expect(tally.insert("C", "Carol")).toBe(true);
      expect(tally.isFull()).toBe(true);
      expect(tally.insert("D", "Dave")).toBe(false);
      expect(tally.has("D")).toBe(false);
    });

    it("should reject a non-positive capacity", () => {
      expect(() => new CandidateTally(0)).toThrow();
    });
  });

  // ============================================================
  // Counting
  // ============================================================

  describe("increment / decrement", () => {
    it("should count votes", () => {
      tally.increment("A");
      tally.increment("A");
      tally.increment("B");

      expect(tally.get("A")?.voteCount).toBe(2);
      expect(tally.get("B")?.voteCount).toBe(1);
      expect(tally.totalVotes()).toBe(3);
    });

    it("should return false for an unknown candidate", () => {
      expect(tally.increment("Z")).toBe(false);
      expect(tally.decrement("Z")).toBe(false);
      expect(tally.totalVotes()).toBe(0);
    });

    it("should never go below zero", () => {
      expect(tally.decrement("A")).toBe(true);
      expect(tally.get("A")?.voteCount).toBe(0);
    });

    it("should hand out copies", () => {
      const entry = tally.get("A");
      if (!entry) throw new Error("missing entry");
      entry.voteCount = 99;
      expect(tally.get("A")?.voteCount).toBe(0);
    });
  });

  // ============================================================
  // Ranking & Winner
  // ============================================================

  describe("ranked / winner", () => {
    it("should rank by votes, highest first", () => {
      tally.insert("C", "Carol");
      tally.increment("C");
      tally.increment("C");
      tally.increment("B");

      expect(tally.ranked().map((e) => e.candidateId)).toEqual(["C", "B", "A"]);
    });

    it("should keep insertion order among equal counts", () => {
      tally.insert("C", "Carol");
      tally.increment("C");
      tally.increment("A");

      expect(tally.ranked().map((e) => e.candidateId)).toEqual(["A", "C", "B"]);
    });

    it("should pick the first-inserted candidate on a tie", () => {
      tally.increment("B");
      tally.increment("A");

      expect(tally.winner()?.candidateId).toBe("A");
    });

    it("should report the first candidate when nobody has votes", () => {
      expect(tally.winner()).toEqual({ candidateId: "A", name: "Alice", voteCount: 0 });
    });

    it("should report no winner for an empty table", () => {
      expect(new CandidateTally(5).winner()).toBeNull();
    });
  });

  // ============================================================
  // Recompute
  // ============================================================

  describe("applyCounts", () => {
    it("should overwrite counts and zero missing candidates", () => {
      tally.increment("A");
      const unknown = tally.applyCounts(new Map([["B", 4]]));

      expect(unknown).toEqual([]);
      expect(tally.get("A")?.voteCount).toBe(0);
      expect(tally.get("B")?.voteCount).toBe(4);
    });

    it("should report ids it does not know", () => {
      expect(tally.applyCounts(new Map([["X", 1], ["A", 2]]))).toEqual(["X"]);
      expect(tally.totalVotes()).toBe(2);
    });
  });

  describe("getStats", () => {
    it("should report utilisation", () => {
      tally.increment("A");
      expect(tally.getStats()).toEqual({
        capacity: 3,
        size: 2,
        totalVotes: 1,
        utilizationPercent: 66.7,
      });
    });
  });
});
