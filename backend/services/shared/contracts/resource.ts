// backend/services/shared/contracts/resource.ts
import { z } from "zod";

/**
 * Wire shape of a single field validation failure (JSON:API error object).
 * `source.pointer` addresses the failing attribute, e.g. `/data/attributes/email`.
 */
export const zValidationErrorDetail = z.object({
  status: z.literal(422),
  source: z.object({ pointer: z.string() }),
  title: z.literal("Invalid Attribute"),
  detail: z.string(),
});
export type ValidationErrorDetail = z.infer<typeof zValidationErrorDetail>;

export const zValidationErrorDocument = z.object({
  errors: z.array(zValidationErrorDetail).min(1),
});
export type ValidationErrorDocument = z.infer<typeof zValidationErrorDocument>;

/** A stored resource: server-assigned id plus the kind's editable fields. */
export type Resource<TFields extends object> = { id: string } & TFields;
