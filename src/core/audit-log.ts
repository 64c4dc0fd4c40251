/**
 * Audit Log -- LIFO record of state-mutating operations
 *
 * Every cast, undo, registration and issuance pushes one event.  Undo
 * pops the top event and, if it is a CAST, reverses it.  A popped event
 * is never pushed back.
 *
 * The in-memory stack mirrors the rows of the persistent `audit_events`
 * table that have not been popped; it is restored from those rows on
 * startup.
 *
 * @module audit-log
 * @license AGPL-3.0-or-later
 */

import {
  REDACTED,
  type AuditEvent,
  type SanitizedAuditEvent,
} from "../types";
import { VotingError } from "./errors";

export class AuditLog {
  /** Bottom of the stack at index 0 */
  private stack: AuditEvent[] = [];

  push(event: AuditEvent): void {
    this.stack.push(event);
  }

  /**
   * Removes and returns the most recent event.
   *
   * @throws VotingError(EMPTY)
   */
  pop(): AuditEvent {
    const event = this.stack.pop();
    if (!event) {
      throw new VotingError("EMPTY", "Audit log is empty");
    }
    return event;
  }

  /**
   * Returns the most recent event without removing it.
   *
   * @throws VotingError(EMPTY)
   */
  peek(): AuditEvent {
    const event = this.stack[this.stack.length - 1];
    if (!event) {
      throw new VotingError("EMPTY", "Audit log is empty");
    }
    return event;
  }

  isEmpty(): boolean {
    return this.stack.length === 0;
  }

  get size(): number {
    return this.stack.length;
  }

  /** Events from oldest to newest (shallow copy). */
  entries(): AuditEvent[] {
    return [...this.stack];
  }

  /**
   * Newest events first, with identity-bearing digests redacted.  Never
   * mutates the stack.
   */
  recentEvents(limit: number): SanitizedAuditEvent[] {
    if (!Number.isInteger(limit) || limit <= 0) return [];

    const events: SanitizedAuditEvent[] = [];
    for (let i = this.stack.length - 1; i >= 0 && events.length < limit; i--) {
      events.push(sanitizeEvent(this.stack[i]));
    }
    return events;
  }

  /** Replaces the stack contents (startup / resynchronisation). */
  restore(events: AuditEvent[]): void {
    this.stack = [...events];
  }
}

/**
 * Strips voter and code digests from an event for display.
 */
export function sanitizeEvent(event: AuditEvent): SanitizedAuditEvent {
  const base = { id: event.id, kind: event.kind, timestamp: event.timestamp };

  switch (event.kind) {
    case "CAST":
      return {
        ...base,
        details: {
          voterDigest: REDACTED,
          codeDigest: REDACTED,
          ballotDigest: event.payload.ballotDigest,
          candidateId: event.payload.candidateId,
          sequence: event.payload.sequence,
        },
      };
    case "UNDO": {
      const details: Record<string, string | number> = {
        reversedEventId: event.payload.reversedEventId,
        reversedKind: event.payload.reversedKind,
      };
      if (event.payload.ballotDigest !== undefined) {
        details.ballotDigest = event.payload.ballotDigest;
      }
      if (event.payload.candidateId !== undefined) {
        details.candidateId = event.payload.candidateId;
      }
      if (event.payload.sequence !== undefined) {
        details.sequence = event.payload.sequence;
      }
      return { ...base, details };
    }
    case "REGISTER":
      return { ...base, details: { ...event.payload } };
    case "ISSUE":
      return { ...base, details: { ...event.payload } };
  }
}
