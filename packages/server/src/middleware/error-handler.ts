/**
 * Global Express error handler.
 *
 * Maps thrown errors to HTTP responses:
 *
 *   - ZodError                    → 400 with issue details
 *   - body-parser JSON failure    → 400
 *   - EdgeFleetError              → status from the code prefix
 *   - anything else               → 500
 *
 * Stack traces are logged always and sent to clients only outside
 * production.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { EdgeFleetError } from "@edge-fleet/shared";
import { logger } from "../logger.js";

const isProduction = process.env.NODE_ENV === "production";

/** HTTP status for an EdgeFleetError code */
export function statusForErrorCode(code: string): number {
  if (code.startsWith("VALIDATION_")) return 400;
  if (code.startsWith("NOT_FOUND_")) return 404;
  if (code.startsWith("COMMAND_")) return 409;
  if (code === "NETWORK_TIMEOUT") return 504;
  if (code.startsWith("NETWORK_")) return 502;
  if (code.startsWith("STORAGE_")) return 503;
  return 500;
}

/** express.json() rejects bad bodies with a SyntaxError tagged `type` */
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

/**
 * Express error-handling middleware (four parameters, or Express will not
 * treat it as one).
 */
export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    logger.debug({ issues: err.issues }, "Request validation failed");
    res.status(400).json({ error: "Validation failed", details: err.issues });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  if (err instanceof EdgeFleetError) {
    const status = statusForErrorCode(err.code);
    const level = status >= 500 ? "error" : "warn";
    logger[level]({ err, code: err.code }, `Request error: ${err.message}`);
    res.status(status).json({
      error: err.message,
      code: err.code,
      ...(isProduction ? {} : { stack: err.stack }),
    });
    return;
  }

  logger.error({ err }, `Request error: ${err.message}`);
  res.status(500).json({
    error: "Internal server error",
    ...(isProduction ? {} : { stack: err.stack }),
  });
}
