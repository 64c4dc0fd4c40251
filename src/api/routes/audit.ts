/**
 * Ballot Service API -- Results & Audit Routes
 *
 * Read-only endpoints for tallies, receipt verification and the audit
 * trail.  Voter and code digests never leave the service.
 *
 * Endpoints:
 * - GET /v1/results          -- Ranked tally and current leader
 * - GET /v1/ballots/:digest  -- Verify a ballot receipt
 * - GET /v1/audit?limit=     -- Recent audit events and consistency
 * - GET /v1/stats            -- Counters and projection statistics
 *
 * @module api/routes/audit
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response } from "express";
import { z } from "zod";
import type { VoteCastingTransaction } from "../../core/vote-casting";
import { ApiError } from "../middleware/error-handler";

const DigestSchema = z.string().regex(/^[0-9a-f]{64}$/);

const AuditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createAuditRoutes(voting: VoteCastingTransaction): Router {
  const router = Router();

  // --------------------------------------------------------
  // GET /v1/results
  // --------------------------------------------------------
  router.get("/results", (_req: Request, res: Response) => {
    const { results, totalVotes, winner, computedAt } = voting.getResults();

    res.json({
      total_votes: totalVotes,
      winner: winner
        ? { candidate_id: winner.candidateId, name: winner.name, votes: winner.voteCount }
        : null,
      results: results.map((entry) => ({
        candidate_id: entry.candidateId,
        name: entry.name,
        votes: entry.voteCount,
      })),
      computed_at: computedAt,
    });
  });

  // --------------------------------------------------------
  // GET /v1/ballots/:digest -- Verify a receipt
  // --------------------------------------------------------
  router.get("/ballots/:digest", (req: Request, res: Response) => {
    const digest = req.params.digest.toLowerCase();

    if (!DigestSchema.safeParse(digest).success) {
      throw new ApiError(400, "VALIDATION_ERROR", "Ballot digest must be 64 hexadecimal characters.");
    }

    const ballot = voting.lookupBallot(digest);
    if (!ballot) {
      throw new ApiError(404, "BALLOT_NOT_FOUND", "No ballot with this digest exists in the ledger.");
    }

    res.json({
      verified: true,
      ballot_digest: ballot.ballotDigest,
      sequence: ballot.sequence,
      candidate_id: ballot.candidateId,
      timestamp: ballot.createdAt,
    });
  });

  // --------------------------------------------------------
  // GET /v1/audit -- Recent events and consistency check
  // --------------------------------------------------------
  router.get("/audit", (req: Request, res: Response) => {
    const query = AuditQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ApiError(400, "VALIDATION_ERROR", "limit must be an integer between 1 and 500.");
    }

    const report = voting.checkConsistency();

    res.json({
      events: voting.recentEvents(query.data.limit),
      consistency: {
        is_consistent: report.isConsistent,
        ledger_ballots: report.ledgerBallots,
        tally_total: report.tallyTotal,
        voters_marked: report.votersMarked,
        outstanding_casts: report.outstandingCasts,
        problems: report.problems,
      },
    });
  });

  // --------------------------------------------------------
  // GET /v1/stats
  // --------------------------------------------------------
  router.get("/stats", (_req: Request, res: Response) => {
    const stats = voting.getStats();

    res.json({
      total_voters: stats.totalVoters,
      voted_count: stats.votedCount,
      remaining_voters: stats.remainingVoters,
      total_ballots: stats.totalBallots,
      highest_sequence: stats.highestSequence,
      undo_enabled: stats.undoEnabled,
      tally: {
        capacity: stats.tally.capacity,
        size: stats.tally.size,
        total_votes: stats.tally.totalVotes,
        utilization_percent: stats.tally.utilizationPercent,
      },
      index: {
        buckets: stats.index.buckets,
        size: stats.index.size,
        capacity: stats.index.capacity,
        load_factor: stats.index.loadFactor,
        non_empty_buckets: stats.index.nonEmptyBuckets,
        longest_chain: stats.index.longestChain,
      },
      audit_log: stats.auditLog,
    });
  });

  return router;
}
