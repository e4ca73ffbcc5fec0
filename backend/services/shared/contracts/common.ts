// backend/services/shared/contracts/common.ts
import { z } from "zod";

/** Server-generated resource identifier (any RFC 4122 UUID version). */
export const zResourceId = z.string().uuid();

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
});
export type Problem = z.infer<typeof zProblem>;
