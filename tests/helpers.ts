/**
 * Shared test helpers.
 *
 * @license AGPL-3.0-or-later
 */

import { isVotingError } from "../src/core/errors";
import type { ErrorKind } from "../src/types";

/**
 * Runs `fn` and returns the kind of the VotingError it throws.
 */
export function thrownKind(fn: () => unknown): ErrorKind | "none" | "other" {
  try {
    fn();
  } catch (err) {
    return isVotingError(err) ? err.kind : "other";
  }
  return "none";
}
