// backend/services/content/src/routes/commentRoutes.ts
import type { Router } from "express";
import { handle, jsonBody } from "@shared/http/handle";
import { resourceRouter } from "@shared/http/resourceRouter";
import type { CommentController } from "../controllers/commentController";

/** Generic comment CRUD plus the per-article routes. */
export function commentRoutes(ctl: CommentController): Router {
  const router = resourceRouter(ctl);

  // one-liners only
  router.get(
    "/article/:id",
    handle((req) => ctl.listForArticle(req.params.id))
  );
  router.post(
    "/article/:id/new",
    handle((req) => ctl.createForArticle(req.params.id, jsonBody(req)))
  );

  return router;
}
