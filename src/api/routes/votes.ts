/**
 * Ballot Service API -- Vote Routes
 *
 * Endpoints:
 * - POST /v1/votes -- Redeem an access code and cast a vote
 *
 * @module api/routes/votes
 * @license AGPL-3.0-or-later
 */

import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { VoteCastingTransaction } from "../../core/vote-casting";
import { ApiError, sendRejection } from "../middleware/error-handler";

/**
 * Vote submission request body.
 */
const VoteRequestSchema = z.object({
  /** The voter's one-time access code */
  code: z.string().trim().min(1),
  /** The chosen candidate */
  candidate_id: z.string().trim().min(1),
});

export function createVoteRoutes(voting: VoteCastingTransaction): Router {
  const router = Router();

  // --------------------------------------------------------
  // POST /v1/votes -- Cast a vote
  // --------------------------------------------------------
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = VoteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      next(
        new ApiError(
          400,
          "VALIDATION_ERROR",
          "Both code and candidate_id are required.",
          parsed.error.flatten().fieldErrors
        )
      );
      return;
    }

    // a client that hangs up while queued gives up its turn
    const abort = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) abort.abort();
    });

    try {
      const outcome = await voting.cast({
        code: parsed.data.code,
        candidateId: parsed.data.candidate_id,
        signal: abort.signal,
      });

      if (outcome.status === "rejected") {
        sendRejection(res, outcome);
        return;
      }

      res.status(201).json({
        accepted: true,
        receipt: {
          ballot_digest: outcome.ballotDigest,
          sequence: outcome.sequence,
          timestamp: outcome.timestamp,
        },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
