// backend/services/content/src/controllers/commentController.ts

/**
 * Comments hang off articles:
 * - every write checks that `articleId` names a live article (422 `exists`)
 * - `/comments/article/:id` lists or creates comments scoped to one article,
 *   404 when that article is unknown
 */

import {
  normalizeId,
  ResourceController,
} from "@shared/base/ResourceController";
import type { ValidationErrorDetail } from "@shared/contracts/resource";
import { notFound, type HandlerResult } from "@shared/http/errors";
import { isPlainObject } from "@shared/validation/Validator";
import type { ContentKinds, ControllerDeps } from "../kinds";
import { commentFields, type CommentFields } from "../validators/comment.dto";

export class CommentController extends ResourceController<
  ContentKinds,
  "comment"
> {
  constructor(deps: ControllerDeps) {
    super({
      kind: "comment",
      plural: "comments",
      schema: commentFields,
      ...deps,
    });
  }

  public async listForArticle(rawId: string): Promise<HandlerResult> {
    const articleId = await this.existingArticleId(rawId);
    if (!articleId) return notFound("Article not found");
    const all = await this.store.list("comment");
    return this.many(all.filter((c) => c.articleId === articleId));
  }

  /** The path's article id wins over any `articleId` in the body. */
  public async createForArticle(
    rawId: string,
    body: unknown
  ): Promise<HandlerResult> {
    const articleId = await this.existingArticleId(rawId);
    if (!articleId) return notFound("Article not found");
    return this.create(isPlainObject(body) ? { ...body, articleId } : body);
  }

  protected async checkReferences(
    value: CommentFields
  ): Promise<ValidationErrorDetail[]> {
    if (await this.existingArticleId(value.articleId)) return [];
    return [this.validator.fieldError("articleId", "exists")];
  }

  /** Normalized id of a live article, or `null`. */
  private async existingArticleId(rawId: string): Promise<string | null> {
    const id = normalizeId(rawId);
    if (!id) return null;
    return (await this.store.get("article", id)) ? id : null;
  }
}
