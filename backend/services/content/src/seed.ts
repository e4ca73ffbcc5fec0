// backend/services/content/src/seed.ts

/**
 * Seed loader.
 *
 * Document shape:
 *   { "users": [ {...} ], "articles": [ { ...article, "comments": [ {...} ] } ] }
 *
 * Every entry is checked with the same Validator and field schemas the HTTP
 * layer uses. Nothing is written unless the whole document is valid. Comments
 * take their articleId from the article they are nested under.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z, type ZodType, type ZodTypeDef } from "zod";
import type { Validator } from "@shared/validation/Validator";
import type { ContentStore } from "./kinds";
import { articleFields, type ArticleFields } from "./validators/article.dto";
import { commentFields, type CommentFields } from "./validators/comment.dto";
import { userFields, type UserFields } from "./validators/user.dto";

const zSeedDocument = z.object({
  users: z.array(z.unknown()).default([]),
  articles: z
    .array(
      z.object({ comments: z.array(z.unknown()).default([]) }).passthrough()
    )
    .default([]),
});

const nestedCommentFields = commentFields.omit({ articleId: true });
type NestedComment = Omit<CommentFields, "articleId">;

export interface SeedCounts {
  users: number;
  articles: number;
  comments: number;
}

export class SeedError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid seed document (${problems.length} problem(s))`);
    this.name = "SeedError";
  }
}

export async function loadSeedFile(file: string): Promise<unknown> {
  const raw = await fs.readFile(path.resolve(file), "utf8");
  return JSON.parse(raw);
}

export async function seedStore(
  deps: { store: ContentStore; validator: Validator },
  doc: unknown
): Promise<SeedCounts> {
  const { store, validator } = deps;

  const parsed = zSeedDocument.safeParse(doc);
  if (!parsed.success) {
    throw new SeedError(
      parsed.error.issues.map(
        (i) => `${i.path.join(".") || "document"}: ${i.message}`
      )
    );
  }

  const problems: string[] = [];
  function check<T>(
    schema: ZodType<T, ZodTypeDef, unknown>,
    entry: unknown,
    where: string
  ): T | undefined {
    const out = validator.validate(schema, entry);
    if (out.ok) return out.value;
    if (out.malformed) problems.push(`${where}: ${out.detail}`);
    else for (const e of out.errors) problems.push(`${where}: ${e.detail}`);
    return undefined;
  }

  const users: UserFields[] = [];
  parsed.data.users.forEach((entry, i) => {
    const u = check(userFields, entry, `users[${i}]`);
    if (u) users.push(u);
  });

  const articles: Array<{ fields: ArticleFields; comments: NestedComment[] }> =
    [];
  parsed.data.articles.forEach((entry, i) => {
    const fields = check(articleFields, entry, `articles[${i}]`);
    const comments: NestedComment[] = [];
    entry.comments.forEach((c, j) => {
      const comment = check(
        nestedCommentFields,
        c,
        `articles[${i}].comments[${j}]`
      );
      if (comment) comments.push(comment);
    });
    if (fields) articles.push({ fields, comments });
  });

  if (problems.length) throw new SeedError(problems);

  const counts: SeedCounts = { users: 0, articles: 0, comments: 0 };
  for (const u of users) {
    await store.create("user", u);
    counts.users++;
  }
  for (const a of articles) {
    const article = await store.create("article", a.fields);
    counts.articles++;
    for (const c of a.comments) {
      await store.create("comment", { ...c, articleId: article.id });
      counts.comments++;
    }
  }
  return counts;
}
