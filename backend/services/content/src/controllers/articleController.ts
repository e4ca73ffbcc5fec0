// backend/services/content/src/controllers/articleController.ts
import { ResourceController } from "@shared/base/ResourceController";
import type { ContentKinds, ControllerDeps } from "../kinds";
import { articleFields } from "../validators/article.dto";

export type ArticleController = ResourceController<ContentKinds, "article">;

export function createArticleController(
  deps: ControllerDeps
): ArticleController {
  return new ResourceController<ContentKinds, "article">({
    kind: "article",
    plural: "articles",
    schema: articleFields,
    ...deps,
  });
}
