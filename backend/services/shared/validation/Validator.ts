// backend/services/shared/validation/Validator.ts

/**
 * Payload validator. One instance is built at process start and handed to
 * every controller; it holds no per-request state.
 *
 * Outcomes:
 * - malformed: the payload is not a JSON object (absent, array, scalar)
 * - invalid:   one ValidationErrorDetail per failing field, all fields checked
 * - ok:        the parsed value (unknown keys stripped, defaults applied)
 */

import type { ZodIssue, ZodType, ZodTypeDef } from "zod";
import type { ValidationErrorDetail } from "../contracts/resource";
import { isRuleTag } from "./rules";

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; malformed: true; detail: string }
  | { ok: false; malformed: false; errors: ValidationErrorDetail[] };

export interface ValidatorOptions {
  /** JSON-pointer prefix for field errors. Default `/data/attributes`. */
  pointerPrefix?: string;
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export class Validator {
  private readonly pointerPrefix: string;

  constructor(opts: ValidatorOptions = {}) {
    this.pointerPrefix = (opts.pointerPrefix ?? "/data/attributes").replace(
      /\/+$/,
      ""
    );
  }

  public validate<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    payload: unknown
  ): ValidationOutcome<T> {
    if (payload === undefined) {
      return { ok: false, malformed: true, detail: "Request body is required" };
    }
    if (!isPlainObject(payload)) {
      return {
        ok: false,
        malformed: true,
        detail: "Request body must be a JSON object",
      };
    }

    const parsed = schema.safeParse(payload);
    if (parsed.success) return { ok: true, value: parsed.data };

    return {
      ok: false,
      malformed: false,
      errors: this.toErrors(parsed.error.issues),
    };
  }

  /** Build the error for one field/rule pair. */
  public fieldError(field: string, rule: string): ValidationErrorDetail {
    return {
      status: 422,
      source: { pointer: `${this.pointerPrefix}/${field}` },
      title: "Invalid Attribute",
      detail: `${rule} validation failed for field: ${field}`,
    };
  }

  /** First issue per field wins; zod reports issues in check order. */
  private toErrors(issues: ZodIssue[]): ValidationErrorDetail[] {
    const seen = new Set<string>();
    const out: ValidationErrorDetail[] = [];
    for (const issue of issues) {
      const field = issue.path.length ? issue.path.join("/") : "body";
      if (seen.has(field)) continue;
      seen.add(field);
      out.push(this.fieldError(field, ruleOf(issue)));
    }
    return out;
  }
}

function ruleOf(issue: ZodIssue): string {
  if (isRuleTag(issue.message)) return issue.message;
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return "required";
  }
  return issue.code;
}
