// backend/services/shared/middleware/problemJson.ts

/**
 * Transport-level error formatting shared by every service.
 *
 * - 404s are only formatted as Problem+JSON under known API prefixes; anything
 *   else (favicon, crawlers) gets a bare 404.
 * - 5xx responses never carry the thrown message. The error is logged with the
 *   request context and the client gets a generic detail.
 * - 4xx errors raised by middleware (body parser: malformed JSON, oversize
 *   payloads) keep their status and surface as BAD_REQUEST-style problems.
 */

import type { ErrorRequestHandler, Request, Response } from "express";
import { extractLogContext, logger } from "../utils/logger";
import { internalError, notFound, problem, send } from "../http/errors";

export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return send(res, notFound("Route not found"));
    }
    /* c8 ignore next */
    return res.status(404).end();
  };
}

function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : 500;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 400 && n < 600 ? n : 500;
}

function clientDetail(err: unknown, status: number): string {
  if (status === 413) return "Request body too large";
  if (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  ) {
    return "Malformed JSON request body";
  }
  return "Invalid request";
}

export function errorProblemJson(): ErrorRequestHandler {
  return (err, req, res, next) => {
    if (res.headersSent) return next(err);

    const status = statusOf(err);
    const ctx = extractLogContext(req);
    const log = req.log ?? logger;

    if (status >= 500) {
      log.error({ err, status, ...ctx }, "request error");
      return send(res, internalError());
    }

    log.warn({ err, status, ...ctx }, "request rejected");
    return send(
      res,
      problem(
        status,
        status === 400 ? "BAD_REQUEST" : "REQUEST_ERROR",
        clientDetail(err, status)
      )
    );
  };
}
