/**
 * Typed error used by every core component.
 *
 * Components throw a VotingError carrying one of the closed ErrorKind
 * values; the orchestrator converts it into a typed Rejection.  Callers
 * branch on `kind`, never on the message text.
 *
 * @module errors
 * @license AGPL-3.0-or-later
 */

import type { ErrorKind, Rejection } from "../types";

/** Error thrown by the core components */
export class VotingError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string
  ) {
    super(message);
    this.name = "VotingError";
  }

  /** Converts this error into the orchestrator's rejection shape. */
  toRejection(): Rejection {
    return { status: "rejected", reason: this.kind, message: this.message };
  }
}

/**
 * Builds a rejection without throwing.
 */
export function reject(kind: ErrorKind, message: string): Rejection {
  return { status: "rejected", reason: kind, message };
}

export function isVotingError(err: unknown): err is VotingError {
  return err instanceof VotingError;
}
