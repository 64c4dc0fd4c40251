/**
 * Ballot Service API -- Admin Authentication
 *
 * Guards /v1/admin with a static bearer token.  With no token configured
 * the guard lets every request through (local development).
 *
 * @module api/middleware/admin-auth
 * @license AGPL-3.0-or-later
 */

import { createHash, timingSafeEqual } from "crypto";
import { Request, Response, NextFunction, RequestHandler } from "express";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

export function requireAdminToken(token: string | undefined): RequestHandler {
  if (!token) {
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  const expected = digest(token);

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.get("authorization") ?? "";
    const match = /^Bearer\s+(.+)$/i.exec(header);

    if (!match || !timingSafeEqual(digest(match[1].trim()), expected)) {
      res.status(401).json({
        error: "UNAUTHORIZED",
        message: "A valid admin bearer token is required.",
      });
      return;
    }

    next();
  };
}
