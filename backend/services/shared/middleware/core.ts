// backend/services/shared/middleware/core.ts
import express from "express";
import cors from "cors";
import type { IncomingMessage } from "node:http";

/** Requests whose body was read and was not empty. */
const bodied = new WeakSet<IncomingMessage>();

/**
 * True when the JSON parser read a non-empty body for this request.
 * body-parser leaves `req.body` as `{}` both for "no body" and for an empty
 * one, so callers ask here instead of looking at `req.body`.
 */
export function hasJsonBody(req: IncomingMessage): boolean {
  return bodied.has(req);
}

/**
 * Every request body is parsed as JSON, whatever its Content-Type says;
 * a body that is not JSON fails in the parser (400 via errorProblemJson).
 */
export function coreMiddleware() {
  return [
    cors({ origin: true, credentials: true }),
    express.json({
      limit: "2mb",
      type: () => true,
      verify: (req, _res, buf) => {
        if (buf.length > 0) bodied.add(req);
      },
    }),
  ];
}
