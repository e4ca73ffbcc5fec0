// backend/services/content/src/validators/article.dto.ts
import { z } from "zod";
import { flag, text } from "@shared/validation/rules";

export const articleFields = z.object({
  title: text({ max: 200 }),
  author: text({ max: 100 }),
  published: flag(),
});

export type ArticleFields = z.infer<typeof articleFields>;
