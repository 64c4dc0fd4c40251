/**
 * Single-Use Code Ballot Service -- Core Type Definitions
 *
 * Centralised TypeScript interfaces shared by the core, the storage layer
 * and the HTTP API.  Every digest is a lowercase hex-encoded SHA-256 value.
 *
 * @module types
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Voters & Access Codes
// ============================================================

/**
 * Voting status of a registered voter.
 *
 * The persistent store holds the authoritative copy; the VoterStatusIndex
 * keeps a cached copy for the cast fast-path.
 */
export interface VoterRecord {
  /** One-way hash of the voter's real identifier */
  identityDigest: string;
  /** Whether the voter has an outstanding (non-undone) cast */
  hasVoted: boolean;
}

/**
 * A one-time access code bound to a voter.  Only the digest of the code
 * is ever stored.
 */
export interface AccessCode {
  codeDigest: string;
  identityDigest: string;
  /** Set by a successful cast, cleared only by undo of that cast */
  used: boolean;
}

// ============================================================
// Ballots & Candidates
// ============================================================

/**
 * An entry of the append-only ballot ledger.
 */
export interface Ballot {
  /** Strictly increasing position in the ledger (1-based) */
  sequence: number;
  /** sha256(nonce:candidateId) -- proves the cast without naming the voter */
  ballotDigest: string;
  candidateId: string;
  /** ISO 8601 timestamp */
  createdAt: string;
}

export interface CandidateEntry {
  candidateId: string;
  name: string;
  voteCount: number;
}

/** A candidate as supplied by the catalog at startup. */
export interface CandidateDefinition {
  candidateId: string;
  name: string;
}

// ============================================================
// Audit Events
// ============================================================

export type AuditEventKind = "CAST" | "UNDO" | "REGISTER" | "ISSUE";

interface AuditEventBase {
  /** Persistent row id (monotonic) */
  id: number;
  /** ISO 8601 timestamp */
  timestamp: string;
}

export interface CastPayload {
  voterDigest: string;
  codeDigest: string;
  ballotDigest: string;
  candidateId: string;
  sequence: number;
}

export interface UndoPayload {
  reversedEventId: number;
  reversedKind: AuditEventKind;
  ballotDigest?: string;
  candidateId?: string;
  sequence?: number;
}

export interface RegisterPayload {
  registeredCount: number;
  duplicateCount: number;
  totalAttempted: number;
}

export interface IssuePayload {
  issuedCount: number;
  requestedCount: number;
}

export interface CastEvent extends AuditEventBase {
  kind: "CAST";
  payload: CastPayload;
}

export interface UndoEvent extends AuditEventBase {
  kind: "UNDO";
  payload: UndoPayload;
}

export interface RegisterEvent extends AuditEventBase {
  kind: "REGISTER";
  payload: RegisterPayload;
}

export interface IssueEvent extends AuditEventBase {
  kind: "ISSUE";
  payload: IssuePayload;
}

/**
 * Every state-mutating operation pushes one of these onto the audit log.
 * A CAST event carries everything needed to reverse it.
 */
export type AuditEvent = CastEvent | UndoEvent | RegisterEvent | IssueEvent;

/** An audit event whose payload has not been assigned a row id yet. */
export type NewAuditEvent =
  | Omit<CastEvent, "id">
  | Omit<UndoEvent, "id">
  | Omit<RegisterEvent, "id">
  | Omit<IssueEvent, "id">;

/** Placeholder that replaces identity-bearing digests in reports. */
export const REDACTED = "***REDACTED***";

/**
 * Audit event safe for external display: voter and code digests are
 * replaced by {@link REDACTED}.
 */
export interface SanitizedAuditEvent {
  id: number;
  kind: AuditEventKind;
  timestamp: string;
  details: Record<string, string | number>;
}

// ============================================================
// Errors
// ============================================================

/**
 * Closed set of failure kinds.  Gate rejections (the first three) never
 * change state.
 */
export type ErrorKind =
  | "INVALID_OR_USED_CODE"
  | "ALREADY_VOTED"
  | "UNKNOWN_CANDIDATE"
  | "SEQUENCE_CONFLICT"
  | "UNSUPPORTED_UNDO_TARGET"
  | "EMPTY"
  | "CAPACITY"
  | "INTERNAL_ERROR"
  | "TRANSIENT_CONFLICT"
  | "NOT_FOUND"
  | "UNDO_DISABLED"
  | "CANCELLED"
  | "VALIDATION_ERROR";

/** A rejected operation, returned instead of thrown by the orchestrator. */
export interface Rejection {
  status: "rejected";
  reason: ErrorKind;
  message: string;
}

// ============================================================
// Operation Outcomes
// ============================================================

/** Receipt returned to the voter after a committed cast. */
export interface CastReceipt {
  ballotDigest: string;
  sequence: number;
  timestamp: string;
}

export type CastOutcome = ({ status: "committed" } & CastReceipt) | Rejection;

export interface UndoResult {
  /** Id of the CAST event that was reversed */
  reversedEventId: number;
  /** Id of the UNDO event that was recorded */
  undoEventId: number;
  ballotDigest: string;
  candidateId: string;
  sequence: number;
}

export type UndoOutcome = ({ status: "committed" } & UndoResult) | Rejection;

export interface RegistrationResult {
  registeredCount: number;
  duplicateCount: number;
  totalVoters: number;
}

export interface IssuedCode {
  voterId: string;
  code: string;
}

export interface IssuanceResult {
  codes: IssuedCode[];
  issuedCount: number;
  /** Voter ids that received no code: unregistered, already voted, or repeated */
  skipped: string[];
}

export interface ElectionResults {
  results: CandidateEntry[];
  totalVotes: number;
  winner: CandidateEntry | null;
  computedAt: string;
}

/**
 * Outcome of comparing the projections against the ledger.
 */
export interface ConsistencyReport {
  isConsistent: boolean;
  ledgerBallots: number;
  tallyTotal: number;
  votersMarked: number;
  outstandingCasts: number;
  duplicateDigests: number;
  duplicateSequences: number;
  /** Human-readable description of each mismatch */
  problems: string[];
}

export interface SystemStats {
  totalVoters: number;
  votedCount: number;
  remainingVoters: number;
  totalBallots: number;
  highestSequence: number;
  undoEnabled: boolean;
  tally: TallyStats;
  index: IndexStats;
  auditLog: { size: number; top: AuditEventKind | null };
}

export interface TallyStats {
  capacity: number;
  size: number;
  totalVotes: number;
  utilizationPercent: number;
}

export interface IndexStats {
  buckets: number;
  size: number;
  capacity: number;
  loadFactor: number;
  nonEmptyBuckets: number;
  longestChain: number;
}
