/**
 * End-to-End Voting Flow Tests
 *
 * Tests the complete lifecycle of an election through the API:
 *   1. Register voters
 *   2. Issue one-time access codes
 *   3. Cast votes (multiple voters, some concurrently)
 *   4. Attempt code reuse (must be rejected)
 *   5. View results
 *   6. Verify receipts
 *   7. Undo the latest vote and recast
 *   8. Restart on the same database file
 *
 * @module tests/e2e/voting-flow
 * @license AGPL-3.0-or-later
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import request from "supertest";
import { createApp, createTestApp } from "../../src/api/server";
import { createVotingService } from "../../src/api/service";
import { DEFAULT_CONFIG } from "../../src/config";
import { StaticCandidateCatalog } from "../../src/core/candidate-catalog";

const TOKEN = "test-secret";
const auth = { Authorization: `Bearer ${TOKEN}` };

describe("E2E: Complete Voting Flow", () => {
  // ============================================================
  // Happy Path
  // ============================================================

  describe("Happy Path -- Register -> Issue -> Vote -> Results -> Undo", () => {
    it("should complete a full election cycle", async () => {
      const catalog = new StaticCandidateCatalog([
        { candidateId: "A", name: "Alice" },
        { candidateId: "B", name: "Bob" },
      ]);
      const { app, voting } = createTestApp({ adminToken: TOKEN, undoEnabled: true }, catalog);

      // ---- Step 1: Register ----
      const reg = await request(app)
        .post("/v1/admin/voters")
        .set(auth)
        .send({ voter_ids: ["V1", "V2", "V3"] });
      expect(reg.status).toBe(201);
      expect(reg.body.total_voters).toBe(3);

      // ---- Step 2: Issue codes ----
      const issued = await request(app)
        .post("/v1/admin/codes")
        .set(auth)
        .send({ voter_ids: ["V1", "V2", "V3"] });
      expect(issued.body.issued).toBe(3);
      const codes: Record<string, string> = {};
      for (const entry of issued.body.codes as { voter_id: string; code: string }[]) {
        codes[entry.voter_id] = entry.code;
      }

      // ---- Step 3: Vote (V2 and V3 concurrently) ----
      const v1 = await request(app).post("/v1/votes").send({ code: codes.V1, candidate_id: "A" });
      expect(v1.status).toBe(201);
      expect(v1.body.receipt.sequence).toBe(1);

      const [v2, v3] = await Promise.all([
        request(app).post("/v1/votes").send({ code: codes.V2, candidate_id: "B" }),
        request(app).post("/v1/votes").send({ code: codes.V3, candidate_id: "B" }),
      ]);
      expect([v2.body.receipt.sequence, v3.body.receipt.sequence].sort()).toEqual([2, 3]);

      // ---- Step 4: Code reuse ----
      const reuse = await request(app).post("/v1/votes").send({ code: codes.V1, candidate_id: "B" });
      expect(reuse.status).toBe(403);
      expect(reuse.body.error).toBe("INVALID_OR_USED_CODE");

      // ---- Step 5: Results ----
      const results = await request(app).get("/v1/results");
      expect(results.body.total_votes).toBe(3);
      expect(results.body.winner.candidate_id).toBe("B");

      // ---- Step 6: Verify a receipt ----
      const verify = await request(app).get(`/v1/ballots/${v1.body.receipt.ballot_digest}`);
      expect(verify.status).toBe(200);
      expect(verify.body.candidate_id).toBe("A");

      // ---- Step 7: Undo the latest vote and recast ----
      const latest = v2.body.receipt.sequence === 3 ? { res: v2, voter: "V2" } : { res: v3, voter: "V3" };
      const undo = await request(app).post("/v1/admin/undo").set(auth);
      expect(undo.status).toBe(200);
      expect(undo.body.ballot_digest).toBe(latest.res.body.receipt.ballot_digest);

      const gone = await request(app).get(`/v1/ballots/${latest.res.body.receipt.ballot_digest}`);
      expect(gone.status).toBe(404);

      const recast = await request(app)
        .post("/v1/votes")
        .send({ code: codes[latest.voter], candidate_id: "A" });
      expect(recast.status).toBe(201);
      expect(recast.body.receipt.sequence).toBe(3);

      const after = await request(app).get("/v1/results");
      expect(after.body.winner).toEqual({ candidate_id: "A", name: "Alice", votes: 2 });

      const audit = await request(app).get("/v1/audit");
      expect(audit.body.consistency.is_consistent).toBe(true);

      voting.close();
    });
  });

  // ============================================================
  // Restart
  // ============================================================

  describe("Restart on the same database", () => {
    it("should keep votes, codes and the audit trail", async () => {
      const dir = mkdtempSync(join(tmpdir(), "ballots-e2e-"));
      const config = { ...DEFAULT_CONFIG, dbPath: join(dir, "ballots.db"), adminToken: TOKEN };

      try {
        const first = createVotingService(config);
        const app1 = createApp({ voting: first, adminToken: TOKEN, disableRateLimiting: true });

        await request(app1).post("/v1/admin/voters").set(auth).send({ voter_ids: ["V1", "V2"] });
        const issued = await request(app1)
          .post("/v1/admin/codes")
          .set(auth)
          .send({ voter_ids: ["V1", "V2"] });
        const [c1, c2] = issued.body.codes as { voter_id: string; code: string }[];
        const vote = await request(app1).post("/v1/votes").send({ code: c1.code, candidate_id: "CAND003" });
        expect(vote.status).toBe(201);
        first.close();

        const second = createVotingService(config);
        const app2 = createApp({ voting: second, adminToken: TOKEN, disableRateLimiting: true });

        const results = await request(app2).get("/v1/results");
        expect(results.body.total_votes).toBe(1);
        expect(results.body.winner.candidate_id).toBe("CAND003");

        const reuse = await request(app2).post("/v1/votes").send({ code: c1.code, candidate_id: "CAND001" });
        expect(reuse.status).toBe(403);

        const fresh = await request(app2).post("/v1/votes").send({ code: c2.code, candidate_id: "CAND001" });
        expect(fresh.status).toBe(201);
        expect(fresh.body.receipt.sequence).toBe(2);

        const stats = await request(app2).get("/v1/stats");
        expect(stats.body.audit_log).toEqual({ size: 4, top: "CAST" });
        second.close();
      } finally {
        rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
