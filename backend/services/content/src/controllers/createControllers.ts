// backend/services/content/src/controllers/createControllers.ts
import type { ControllerDeps } from "../kinds";
import {
  createArticleController,
  type ArticleController,
} from "./articleController";
import { CommentController } from "./commentController";
import { createUserController, type UserController } from "./userController";

export interface ContentControllers {
  users: UserController;
  articles: ArticleController;
  comments: CommentController;
}

/** One validator and one store shared by every kind. */
export function createControllers(deps: ControllerDeps): ContentControllers {
  return {
    users: createUserController(deps),
    articles: createArticleController(deps),
    comments: new CommentController(deps),
  };
}
