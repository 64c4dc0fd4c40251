/**
 * Single-Use Code Ballot Service
 *
 * Casts votes against one-time access codes with an append-only ballot
 * ledger, per-candidate tallies and an undoable audit trail.
 *
 * @packageDocumentation
 * @license AGPL-3.0-or-later
 */

// ============================================================
// Vote casting (main orchestrator)
// ============================================================

export { VoteCastingTransaction, createVoteCasting } from "./core/vote-casting";

export type {
  VoteCastingOptions,
  CastVoteParams,
  RegistrationOutcome,
  IssuanceOutcome,
} from "./core/vote-casting";

// ============================================================
// Core components
// ============================================================

export { BallotLedger } from "./core/ballot-ledger";
export type { LedgerVerification } from "./core/ballot-ledger";

export { CandidateTally } from "./core/candidate-tally";
export { VoterStatusIndex } from "./core/voter-index";
export { AuditLog, sanitizeEvent } from "./core/audit-log";
export { SerialLock } from "./core/serial-lock";

export {
  StaticCandidateCatalog,
  loadCandidateCatalog,
} from "./core/candidate-catalog";
export type { CandidateCatalog } from "./core/candidate-catalog";

export { StoreCredentialVerifier } from "./core/credential-verifier";
export type { CredentialVerifier, RedeemResult } from "./core/credential-verifier";

export { VotingError, isVotingError } from "./core/errors";

// ============================================================
// Persistence
// ============================================================

export { SqlitePersistence } from "./storage/sqlite";
export type { Persistence, StoreReader, TransactionHandle } from "./storage/persistence";

// ============================================================
// Utilities & configuration
// ============================================================

export {
  createCredentialHasher,
  hashIdentity,
  hashAccessCode,
  generateAccessCode,
  createBallotDigest,
  computeBallotDigest,
  sha256,
} from "./utils/crypto";
export type { CredentialHasher } from "./utils/crypto";

export { createLogger, getLogger } from "./utils/logger";
export { loadConfig, DEFAULT_CONFIG } from "./config";
export type { ServiceConfig } from "./config";

// ============================================================
// Shared type definitions
// ============================================================

export { REDACTED } from "./types";

export type {
  VoterRecord,
  AccessCode,
  Ballot,
  CandidateEntry,
  CandidateDefinition,
  AuditEvent,
  AuditEventKind,
  CastEvent,
  UndoEvent,
  RegisterEvent,
  IssueEvent,
  SanitizedAuditEvent,
  ErrorKind,
  Rejection,
  CastReceipt,
  CastOutcome,
  UndoResult,
  UndoOutcome,
  RegistrationResult,
  IssuanceResult,
  IssuedCode,
  ElectionResults,
  ConsistencyReport,
  SystemStats,
} from "./types";
