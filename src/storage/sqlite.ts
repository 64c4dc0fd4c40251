/**
 * SQLite persistence (better-sqlite3).
 *
 * Holds the authoritative voter records, access-code digests, the ballot
 * ledger and the audit events.  Writes happen only inside an IMMEDIATE
 * transaction, which takes the database write lock up front; contention
 * with another connection is bounded by the busy timeout and reported as
 * TRANSIENT_CONFLICT.
 *
 * @module storage/sqlite
 * @license AGPL-3.0-or-later
 */

import Database from "better-sqlite3";
import { mkdirSync, existsSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { VotingError } from "../core/errors";
import type {
  AccessCode,
  AuditEvent,
  Ballot,
  NewAuditEvent,
  VoterRecord,
} from "../types";
import type { Persistence, StoreReader, TransactionHandle } from "./persistence";

// ============================================================
// Schema
// ============================================================

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS voters (
    identity_digest TEXT PRIMARY KEY,
    has_voted INTEGER NOT NULL DEFAULT 0,
    registered_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS access_codes (
    code_digest TEXT PRIMARY KEY,
    identity_digest TEXT NOT NULL,
    used INTEGER NOT NULL DEFAULT 0,
    issued_at TEXT NOT NULL,
    FOREIGN KEY (identity_digest) REFERENCES voters(identity_digest)
  );

  CREATE INDEX IF NOT EXISTS idx_access_codes_voter ON access_codes(identity_digest);

  CREATE TABLE IF NOT EXISTS ballots (
    sequence INTEGER PRIMARY KEY,
    ballot_digest TEXT NOT NULL UNIQUE,
    candidate_id TEXT NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_ballots_candidate ON ballots(candidate_id);

  CREATE TABLE IF NOT EXISTS audit_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    kind TEXT NOT NULL,
    payload TEXT NOT NULL,
    created_at TEXT NOT NULL,
    popped INTEGER NOT NULL DEFAULT 0
  );

  CREATE INDEX IF NOT EXISTS idx_audit_events_popped ON audit_events(popped);
`;

// ============================================================
// Audit payload decoding
// ============================================================

const EventKindSchema = z.enum(["CAST", "UNDO", "REGISTER", "ISSUE"]);

const CastPayloadSchema = z.object({
  voterDigest: z.string(),
  codeDigest: z.string(),
  ballotDigest: z.string(),
  candidateId: z.string(),
  sequence: z.number().int().positive(),
});

const UndoPayloadSchema = z.object({
  reversedEventId: z.number().int(),
  reversedKind: EventKindSchema,
  ballotDigest: z.string().optional(),
  candidateId: z.string().optional(),
  sequence: z.number().int().positive().optional(),
});

const RegisterPayloadSchema = z.object({
  registeredCount: z.number().int().nonnegative(),
  duplicateCount: z.number().int().nonnegative(),
  totalAttempted: z.number().int().nonnegative(),
});

const IssuePayloadSchema = z.object({
  issuedCount: z.number().int().nonnegative(),
  requestedCount: z.number().int().nonnegative(),
});

function rowToAuditEvent(row: AuditEventRow): AuditEvent {
  const raw: unknown = JSON.parse(row.payload);
  const base = { id: row.id, timestamp: row.created_at };

  switch (row.kind) {
    case "CAST":
      return { ...base, kind: "CAST", payload: CastPayloadSchema.parse(raw) };
    case "UNDO":
      return { ...base, kind: "UNDO", payload: UndoPayloadSchema.parse(raw) };
    case "REGISTER":
      return { ...base, kind: "REGISTER", payload: RegisterPayloadSchema.parse(raw) };
    case "ISSUE":
      return { ...base, kind: "ISSUE", payload: IssuePayloadSchema.parse(raw) };
    default:
      throw new VotingError(
        "INTERNAL_ERROR",
        `Audit event ${row.id} has unknown kind "${row.kind}"`
      );
  }
}

function withId(event: NewAuditEvent, id: number): AuditEvent {
  switch (event.kind) {
    case "CAST":
      return { ...event, id };
    case "UNDO":
      return { ...event, id };
    case "REGISTER":
      return { ...event, id };
    case "ISSUE":
      return { ...event, id };
  }
}

function isBusyError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED")
  );
}

// ============================================================
// Reads
// ============================================================

class SqliteReader implements StoreReader {
  constructor(protected readonly db: Database.Database) {}

  getVoter(identityDigest: string): VoterRecord | undefined {
    const row = this.db
      .prepare<[string], VoterRow>("SELECT * FROM voters WHERE identity_digest = ?")
      .get(identityDigest);
    return row ? rowToVoter(row) : undefined;
  }

  listVoters(): VoterRecord[] {
    return this.db
      .prepare<[], VoterRow>("SELECT * FROM voters ORDER BY registered_at, identity_digest")
      .all()
      .map(rowToVoter);
  }

  countVoters(): number {
    return this.count("SELECT COUNT(*) AS n FROM voters");
  }

  countVoted(): number {
    return this.count("SELECT COUNT(*) AS n FROM voters WHERE has_voted = 1");
  }

  getAccessCode(codeDigest: string): AccessCode | undefined {
    const row = this.db
      .prepare<[string], AccessCodeRow>("SELECT * FROM access_codes WHERE code_digest = ?")
      .get(codeDigest);
    return row ? rowToAccessCode(row) : undefined;
  }

  listAccessCodes(): AccessCode[] {
    return this.db
      .prepare<[], AccessCodeRow>("SELECT * FROM access_codes ORDER BY issued_at, code_digest")
      .all()
      .map(rowToAccessCode);
  }

  findBallotByDigest(ballotDigest: string): Ballot | undefined {
    const row = this.db
      .prepare<[string], BallotRow>("SELECT * FROM ballots WHERE ballot_digest = ?")
      .get(ballotDigest);
    return row ? rowToBallot(row) : undefined;
  }

  getBallot(sequence: number): Ballot | undefined {
    const row = this.db
      .prepare<[number], BallotRow>("SELECT * FROM ballots WHERE sequence = ?")
      .get(sequence);
    return row ? rowToBallot(row) : undefined;
  }

  maxSequence(): number {
    const row = this.db
      .prepare<[], { seq: number | null }>("SELECT MAX(sequence) AS seq FROM ballots")
      .get();
    return row?.seq ?? 0;
  }

  countBallots(): number {
    return this.count("SELECT COUNT(*) AS n FROM ballots");
  }

  listBallots(): Ballot[] {
    return this.db
      .prepare<[], BallotRow>("SELECT * FROM ballots ORDER BY sequence")
      .all()
      .map(rowToBallot);
  }

  ballotCountsByCandidate(): Map<string, number> {
    const rows = this.db
      .prepare<[], { candidate_id: string; n: number }>(
        "SELECT candidate_id, COUNT(*) AS n FROM ballots GROUP BY candidate_id"
      )
      .all();
    return new Map(rows.map((r) => [r.candidate_id, r.n]));
  }

  listActiveAuditEvents(): AuditEvent[] {
    return this.db
      .prepare<[], AuditEventRow>("SELECT * FROM audit_events WHERE popped = 0 ORDER BY id")
      .all()
      .map(rowToAuditEvent);
  }

  private count(sql: string): number {
    const row = this.db.prepare<[], { n: number }>(sql).get();
    return row?.n ?? 0;
  }
}

// ============================================================
// Transactions
// ============================================================

export class SqliteTransaction extends SqliteReader implements TransactionHandle {
  private state: "open" | "committed" | "rolledBack" = "open";

  get finished(): boolean {
    return this.state !== "open";
  }

  commit(): void {
    this.assertOpen();
    this.db.exec("COMMIT");
    this.state = "committed";
  }

  rollback(): void {
    if (this.finished) return;
    this.state = "rolledBack";
    if (this.db.inTransaction) {
      this.db.exec("ROLLBACK");
    }
  }

  insertVoter(identityDigest: string, registeredAt: string): boolean {
    this.assertOpen();
    const info = this.db
      .prepare(
        "INSERT OR IGNORE INTO voters (identity_digest, has_voted, registered_at) VALUES (?, 0, ?)"
      )
      .run(identityDigest, registeredAt);
    return info.changes === 1;
  }

  markVoted(identityDigest: string): boolean {
    this.assertOpen();
    const info = this.db
      .prepare("UPDATE voters SET has_voted = 1 WHERE identity_digest = ? AND has_voted = 0")
      .run(identityDigest);
    return info.changes === 1;
  }

  clearVoted(identityDigest: string): boolean {
    this.assertOpen();
    const info = this.db
      .prepare("UPDATE voters SET has_voted = 0 WHERE identity_digest = ? AND has_voted = 1")
      .run(identityDigest);
    return info.changes === 1;
  }

  insertAccessCode(code: AccessCode, issuedAt: string): void {
    this.assertOpen();
    this.db
      .prepare(
        "INSERT INTO access_codes (code_digest, identity_digest, used, issued_at) VALUES (?, ?, ?, ?)"
      )
      .run(code.codeDigest, code.identityDigest, code.used ? 1 : 0, issuedAt);
  }

  revokeUnusedCodes(identityDigest: string): number {
    this.assertOpen();
    return this.db
      .prepare("DELETE FROM access_codes WHERE identity_digest = ? AND used = 0")
      .run(identityDigest).changes;
  }

  consumeAccessCode(codeDigest: string): boolean {
    this.assertOpen();
    const info = this.db
      .prepare("UPDATE access_codes SET used = 1 WHERE code_digest = ? AND used = 0")
      .run(codeDigest);
    return info.changes === 1;
  }

  releaseAccessCode(codeDigest: string): boolean {
    this.assertOpen();
    const info = this.db
      .prepare("UPDATE access_codes SET used = 0 WHERE code_digest = ? AND used = 1")
      .run(codeDigest);
    return info.changes === 1;
  }

  insertBallot(ballot: Ballot): void {
    this.assertOpen();
    this.db
      .prepare(
        "INSERT INTO ballots (sequence, ballot_digest, candidate_id, created_at) VALUES (?, ?, ?, ?)"
      )
      .run(ballot.sequence, ballot.ballotDigest, ballot.candidateId, ballot.createdAt);
  }

  deleteBallot(sequence: number): boolean {
    this.assertOpen();
    return this.db.prepare("DELETE FROM ballots WHERE sequence = ?").run(sequence).changes === 1;
  }

  insertAuditEvent(event: NewAuditEvent): AuditEvent {
    this.assertOpen();
    const info = this.db
      .prepare("INSERT INTO audit_events (kind, payload, created_at) VALUES (?, ?, ?)")
      .run(event.kind, JSON.stringify(event.payload), event.timestamp);
    return withId(event, Number(info.lastInsertRowid));
  }

  markAuditEventPopped(id: number): boolean {
    this.assertOpen();
    const info = this.db
      .prepare("UPDATE audit_events SET popped = 1 WHERE id = ? AND popped = 0")
      .run(id);
    return info.changes === 1;
  }

  private assertOpen(): void {
    if (this.finished) {
      throw new VotingError("INTERNAL_ERROR", "Transaction is already finished");
    }
  }
}

// ============================================================
// SqlitePersistence
// ============================================================

export interface SqliteOptions {
  /** How long to wait for another connection's write lock */
  busyTimeoutMs?: number;
}

/**
 * SQLite-backed Persistence.
 *
 * @example
 * ```ts
 * const persistence = new SqlitePersistence(":memory:");
 *
 * persistence.withTransaction((tx) => {
 *   tx.insertVoter(digest, new Date().toISOString());
 *   tx.commit();
 * });
 * ```
 */
export class SqlitePersistence extends SqliteReader implements Persistence {
  constructor(dbPath: string, options: SqliteOptions = {}) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    const db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 2000 });
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.exec(SCHEMA);

    super(db);
  }

  beginTransaction(): TransactionHandle {
    if (this.db.inTransaction) {
      throw new VotingError(
        "INTERNAL_ERROR",
        "A transaction is already open on this connection"
      );
    }

    try {
      this.db.exec("BEGIN IMMEDIATE");
    } catch (err) {
      if (isBusyError(err)) {
        throw new VotingError("TRANSIENT_CONFLICT", "Database is busy; try again");
      }
      throw err;
    }

    return new SqliteTransaction(this.db);
  }

  withTransaction<T>(fn: (tx: TransactionHandle) => T): T {
    const tx = this.beginTransaction();
    try {
      return fn(tx);
    } finally {
      if (!tx.finished) {
        tx.rollback();
      }
    }
  }

  close(): void {
    this.db.close();
  }
}

// ============================================================
// Row types
// ============================================================

interface VoterRow {
  identity_digest: string;
  has_voted: number;
  registered_at: string;
}

interface AccessCodeRow {
  code_digest: string;
  identity_digest: string;
  used: number;
  issued_at: string;
}

interface BallotRow {
  sequence: number;
  ballot_digest: string;
  candidate_id: string;
  created_at: string;
}

interface AuditEventRow {
  id: number;
  kind: string;
  payload: string;
  created_at: string;
  popped: number;
}

function rowToVoter(row: VoterRow): VoterRecord {
  return { identityDigest: row.identity_digest, hasVoted: row.has_voted === 1 };
}

function rowToAccessCode(row: AccessCodeRow): AccessCode {
  return {
    codeDigest: row.code_digest,
    identityDigest: row.identity_digest,
    used: row.used === 1,
  };
}

function rowToBallot(row: BallotRow): Ballot {
  return {
    sequence: row.sequence,
    ballotDigest: row.ballot_digest,
    candidateId: row.candidate_id,
    createdAt: row.created_at,
  };
}
