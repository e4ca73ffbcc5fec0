// backend/services/shared/http/errors.ts
import { STATUS_CODES } from "node:http";
import type { Response } from "express";
import type { ValidationErrorDetail } from "../contracts/resource";

export const PROBLEM_JSON = "application/problem+json";
export const JSON_API = "application/vnd.api+json";

/**
 * Transport-agnostic outcome of a controller operation.
 * `body === undefined` means "no body" (204).
 */
export type HandlerResult = {
  status: number;
  body?: unknown;
  contentType?: string;
};

export function problem(
  status: number,
  code: string,
  detail: string
): HandlerResult {
  return {
    status,
    contentType: PROBLEM_JSON,
    body: {
      type: "about:blank",
      title: STATUS_CODES[status] ?? "Error",
      status,
      code,
      detail,
    },
  };
}

export const notFound = (detail = "Resource not found") =>
  problem(404, "NOT_FOUND", detail);

export const badRequest = (detail: string) =>
  problem(400, "BAD_REQUEST", detail);

export const internalError = () =>
  problem(500, "INTERNAL_ERROR", "An unexpected error occurred.");

export const validationFailed = (
  errors: ValidationErrorDetail[]
): HandlerResult => ({
  status: 422,
  contentType: JSON_API,
  body: { errors },
});

/** Write a HandlerResult to the wire. */
export function send(res: Response, result: HandlerResult): void {
  res.status(result.status);
  if (result.body === undefined) {
    res.end();
    return;
  }
  if (result.contentType) res.type(result.contentType);
  res.json(result.body);
}
