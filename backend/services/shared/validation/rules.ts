// backend/services/shared/validation/rules.ts
import { z } from "zod";

/**
 * Field rule builders. Each zod check carries its rule tag as the issue
 * message, so the Validator can report `<rule> validation failed for field`.
 * Checks run in declaration order; the first failing tag wins per field.
 */
export const RULE_TAGS = [
  "required",
  "string",
  "boolean",
  "min",
  "max",
  "email",
  "uuid",
  "exists",
] as const;
export type RuleTag = (typeof RULE_TAGS)[number];

const RULE_TAG_SET: ReadonlySet<string> = new Set(RULE_TAGS);

export function isRuleTag(v: string): v is RuleTag {
  return RULE_TAG_SET.has(v);
}

export interface TextRules {
  min?: number;
  max?: number;
  email?: boolean;
  uuid?: boolean;
}

const nullAsMissing = (v: unknown) => (v === null ? undefined : v);

/**
 * Required text: missing, null and "" all fail `required`; the remaining
 * checks run in the order min, max, email, uuid. UUID values come out
 * lower-cased, the form the store keys ids by.
 */
export function text(rules: TextRules = {}) {
  let s = z
    .string({ required_error: "required", invalid_type_error: "string" })
    .min(1, "required");
  if (rules.min !== undefined) s = s.min(rules.min, "min");
  if (rules.max !== undefined) s = s.max(rules.max, "max");
  if (rules.email) s = s.email("email");
  if (rules.uuid) s = s.uuid("uuid").toLowerCase();
  return z.preprocess(nullAsMissing, s);
}

/** Optional boolean, `false` when omitted. */
export function flag() {
  return z.boolean({ invalid_type_error: "boolean" }).default(false);
}
