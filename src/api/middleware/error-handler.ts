/**
 * Ballot Service API -- Error Handling Middleware
 *
 * Centralized error handling for the Express API.  Rejections from the
 * voting core are mapped to HTTP status codes in one table.
 *
 * @module api/middleware/error-handler
 * @license AGPL-3.0-or-later
 */

import { Request, Response, NextFunction } from "express";
import type { ErrorKind, Rejection } from "../../types";
import { isVotingError } from "../../core/errors";
import { getLogger } from "../../utils/logger";

/**
 * Custom API error class.
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ApiError";
  }
}

/** HTTP status for every rejection reason */
export const STATUS_BY_REASON: Record<ErrorKind, number> = {
  INVALID_OR_USED_CODE: 403,
  ALREADY_VOTED: 409,
  UNKNOWN_CANDIDATE: 400,
  SEQUENCE_CONFLICT: 409,
  UNSUPPORTED_UNDO_TARGET: 409,
  EMPTY: 409,
  CAPACITY: 507,
  INTERNAL_ERROR: 500,
  TRANSIENT_CONFLICT: 503,
  NOT_FOUND: 404,
  UNDO_DISABLED: 403,
  CANCELLED: 409,
  VALIDATION_ERROR: 400,
};

/**
 * Writes a core rejection as `{ error, message }`.
 */
export function sendRejection(res: Response, rejection: Rejection): void {
  if (res.headersSent) return;
  res.status(STATUS_BY_REASON[rejection.reason]).json({
    error: rejection.reason,
    message: rejection.message,
  });
}

/**
 * 404 handler -- catches unmatched routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: "NOT_FOUND",
    message: `Route ${req.method} ${req.originalUrl} not found.`,
  });
}

/**
 * Global error handler -- catches thrown errors.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: err.errorCode,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  if (isVotingError(err)) {
    sendRejection(res, err.toRejection());
    return;
  }

  // body-parser marks malformed JSON with a 400 status
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({
      error: "VALIDATION_ERROR",
      message: "Request body is not valid JSON.",
    });
    return;
  }

  getLogger().error({ err, method: req.method, url: req.originalUrl }, "unexpected API error");

  res.status(500).json({
    error: "INTERNAL_ERROR",
    message: "An unexpected error occurred.",
  });
}
