// backend/services/content/src/kinds.ts
import type { UpdateStatus } from "@shared/base/ResourceController";
import type { IResourceStore } from "@shared/store/IResourceStore";
import type { Validator } from "@shared/validation/Validator";
import type { ArticleFields } from "./validators/article.dto";
import type { CommentFields } from "./validators/comment.dto";
import type { UserFields } from "./validators/user.dto";

export type ContentKinds = {
  user: UserFields;
  article: ArticleFields;
  comment: CommentFields;
};

export type ContentStore = IResourceStore<ContentKinds>;

export interface ControllerDeps {
  store: ContentStore;
  validator: Validator;
  updateStatus?: UpdateStatus;
}
