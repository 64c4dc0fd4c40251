/**
 * Hashing and code-generation primitives.
 *
 * The core never sees a voter's real identifier or a plain access code
 * after it enters the system: both are reduced to SHA-256 digests here.
 * Ballot digests bind a random nonce to the chosen candidate so that a
 * receipt proves the cast without revealing who made it.
 *
 * @module utils/crypto
 * @license AGPL-3.0-or-later
 */

import { createHash, randomBytes, randomInt } from "crypto";

// ============================================================
// Constants
// ============================================================

/** Code alphabet without look-alike characters (0/O, 1/I/L) */
const CODE_ALPHABET = "ABCDEFGHJKMNPQRSTUVWXYZ23456789";

/** Length of a generated access code */
export const ACCESS_CODE_LENGTH = 12;

/** Bytes of randomness in a ballot nonce */
const BALLOT_NONCE_BYTES = 32;

// ============================================================
// Hash Utilities
// ============================================================

/**
 * Computes a SHA-256 hash of arbitrary string data.
 *
 * @param data - The string to hash
 * @returns Hex-encoded SHA-256 digest (64 characters)
 */
export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

/**
 * Hashes a voter identifier with the deployment salt.
 *
 * Identifiers are trimmed and upper-cased first so that "v001 " and
 * "V001" refer to the same voter.
 */
export function hashIdentity(voterId: string, salt: string): string {
  return sha256(`identity:${salt}:${voterId.trim().toUpperCase()}`);
}

/**
 * Hashes an access code for lookup.  Codes are case-insensitive and may be
 * typed with dashes or spaces.
 */
export function hashAccessCode(code: string): string {
  const normalized = code.replace(/[\s-]/g, "").toUpperCase();
  return sha256(`otac:${normalized}`);
}

/**
 * Generates a fresh access code.
 *
 * @returns The plain code (handed to the voter once) and its digest
 */
export function generateAccessCode(): { code: string; digest: string } {
  let code = "";
  for (let i = 0; i < ACCESS_CODE_LENGTH; i++) {
    code += CODE_ALPHABET[randomInt(CODE_ALPHABET.length)];
  }
  return { code, digest: hashAccessCode(code) };
}

/**
 * Computes the digest of a ballot from its nonce and candidate.
 */
export function computeBallotDigest(nonce: string, candidateId: string): string {
  return sha256(`${nonce}:${candidateId}`);
}

/**
 * Creates a fresh ballot digest for a candidate using a random nonce.
 */
export function createBallotDigest(candidateId: string): string {
  const nonce = randomBytes(BALLOT_NONCE_BYTES).toString("hex");
  return computeBallotDigest(nonce, candidateId);
}

// ============================================================
// CredentialHasher
// ============================================================

/**
 * The hashing capability consumed by the core.  Swappable so a deployment
 * can plug in a keyed hash or an HSM-backed implementation.
 */
export interface CredentialHasher {
  hashIdentity(voterId: string): string;
  hashCode(code: string): string;
  generateCode(): { code: string; digest: string };
}

/**
 * Creates the default SHA-256 CredentialHasher.
 *
 * @param salt - Deployment-wide identity salt
 */
export function createCredentialHasher(salt: string): CredentialHasher {
  return {
    hashIdentity: (voterId) => hashIdentity(voterId, salt),
    hashCode: hashAccessCode,
    generateCode: generateAccessCode,
  };
}
