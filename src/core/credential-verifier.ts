/**
 * Credential Verifier -- one-time access code redemption
 *
 * Redemption is a single conditional UPDATE (`used = 0 -> 1`) executed in
 * the caller's transaction, so of two simultaneous redemptions of the
 * same code exactly one changes a row.  If the surrounding transaction
 * rolls back, so does the redemption.
 *
 * @module credential-verifier
 * @license AGPL-3.0-or-later
 */

import type { TransactionHandle } from "../storage/persistence";
import type { CredentialHasher } from "../utils/crypto";

export type RedeemRejection = "NOT_FOUND" | "ALREADY_USED";

export type RedeemResult =
  | { ok: true; identityDigest: string; codeDigest: string }
  | { ok: false; reason: RedeemRejection };

/**
 * Validates and consumes access codes.
 */
export interface CredentialVerifier {
  redeem(tx: TransactionHandle, code: string): RedeemResult;
  /** Makes a consumed code redeemable again (undo only). */
  release(tx: TransactionHandle, codeDigest: string): boolean;
}

/**
 * CredentialVerifier backed by the `access_codes` table.
 */
export class StoreCredentialVerifier implements CredentialVerifier {
  constructor(private readonly hasher: CredentialHasher) {}

  redeem(tx: TransactionHandle, code: string): RedeemResult {
    if (code.trim() === "") {
      return { ok: false, reason: "NOT_FOUND" };
    }

    const codeDigest = this.hasher.hashCode(code);

    if (!tx.consumeAccessCode(codeDigest)) {
      const existing = tx.getAccessCode(codeDigest);
      return { ok: false, reason: existing ? "ALREADY_USED" : "NOT_FOUND" };
    }

    const record = tx.getAccessCode(codeDigest);
    if (!record) {
      // consumed a row that cannot be read back in the same transaction
      return { ok: false, reason: "NOT_FOUND" };
    }

    return { ok: true, identityDigest: record.identityDigest, codeDigest };
  }

  release(tx: TransactionHandle, codeDigest: string): boolean {
    return tx.releaseAccessCode(codeDigest);
  }
}
