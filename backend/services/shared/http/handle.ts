// backend/services/shared/http/handle.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { hasJsonBody } from "../middleware/core";
import { send, type HandlerResult } from "./errors";

/** Parsed JSON body, or `undefined` when the request carried none. */
export function jsonBody(req: Request): unknown {
  return hasJsonBody(req) ? req.body : undefined;
}

/**
 * Adapt a controller call to Express: the HandlerResult is written with
 * `send()`, a rejection goes to `next()` and on to errorProblemJson.
 */
export function handle(
  fn: (req: Request) => Promise<HandlerResult>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req).then((result) => send(res, result), next);
  };
}
