// backend/services/content/src/validators/comment.dto.ts
import { z } from "zod";
import { text } from "@shared/validation/rules";

/** `articleId` must also name an existing article; CommentController checks that. */
export const commentFields = z.object({
  articleId: text({ uuid: true }),
  name: text({ max: 100 }),
  email: text({ email: true }),
  content: text({ max: 5000 }),
});

export type CommentFields = z.infer<typeof commentFields>;
