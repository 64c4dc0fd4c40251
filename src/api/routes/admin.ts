/**
 * Ballot Service API -- Admin Routes
 *
 * Endpoints:
 * - POST /v1/admin/voters -- Register voters
 * - POST /v1/admin/codes  -- Issue one-time access codes
 * - POST /v1/admin/undo   -- Reverse the most recent cast
 * - POST /v1/admin/resync -- Rebuild projections from the database
 *
 * @module api/routes/admin
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { VoteCastingTransaction } from "../../core/vote-casting";
import { ApiError, sendRejection } from "../middleware/error-handler";

const VoterListSchema = z.object({
  voter_ids: z.array(z.string().trim().min(1)).min(1).max(10000),
});

/**
 * @throws ApiError(400) unless the body carries a usable voter_ids list
 */
function parseVoterIds(req: Request): string[] {
  const parsed = VoterListSchema.safeParse(req.body);
  if (!parsed.success) {
    throw new ApiError(400, "VALIDATION_ERROR", "voter_ids must be a non-empty array of strings.");
  }
  return parsed.data.voter_ids;
}

export function createAdminRoutes(voting: VoteCastingTransaction): Router {
  const router = Router();

  // --------------------------------------------------------
  // POST /v1/admin/voters
  // --------------------------------------------------------
  router.post("/voters", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await voting.registerVoters(parseVoterIds(req));
      if (outcome.status === "rejected") {
        sendRejection(res, outcome);
        return;
      }

      res.status(201).json({
        registered: outcome.registeredCount,
        duplicates: outcome.duplicateCount,
        total_voters: outcome.totalVoters,
      });
    } catch (err) {
      next(err);
    }
  });

  // --------------------------------------------------------
  // POST /v1/admin/codes
  // --------------------------------------------------------
  router.post("/codes", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await voting.issueCodes(parseVoterIds(req));
      if (outcome.status === "rejected") {
        sendRejection(res, outcome);
        return;
      }

      res.status(201).json({
        issued: outcome.issuedCount,
        codes: outcome.codes.map((c) => ({ voter_id: c.voterId, code: c.code })),
        skipped: outcome.skipped,
      });
    } catch (err) {
      next(err);
    }
  });

  // --------------------------------------------------------
  // POST /v1/admin/undo
  // --------------------------------------------------------
  router.post("/undo", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await voting.undo();
      if (outcome.status === "rejected") {
        sendRejection(res, outcome);
        return;
      }

      res.json({
        undone: true,
        reversed_event_id: outcome.reversedEventId,
        undo_event_id: outcome.undoEventId,
        ballot_digest: outcome.ballotDigest,
        candidate_id: outcome.candidateId,
        sequence: outcome.sequence,
      });
    } catch (err) {
      next(err);
    }
  });

  // --------------------------------------------------------
  // POST /v1/admin/resync
  // --------------------------------------------------------
  router.post("/resync", async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await voting.resynchronize();
      res.json({
        is_consistent: report.isConsistent,
        ledger_ballots: report.ledgerBallots,
        tally_total: report.tallyTotal,
        voters_marked: report.votersMarked,
        outstanding_casts: report.outstandingCasts,
        problems: report.problems,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
