// backend/services/content/src/validators/user.dto.ts
import { z } from "zod";
import { text } from "@shared/validation/rules";

export const userFields = z.object({
  name: text({ min: 5, max: 100 }),
  email: text({ email: true }),
});

export type UserFields = z.infer<typeof userFields>;
