// backend/services/content/src/app.ts

/**
 * Content service app.
 *
 * Stack: cors + json parser → http logger → health (open) → banner →
 * /users · /articles · /comments → 404 → error formatter.
 */

import express, { type Express } from "express";
import { createHealthRouter } from "@shared/health";
import { resourceRouter } from "@shared/http/resourceRouter";
import { coreMiddleware } from "@shared/middleware/core";
import { makeHttpLogger } from "@shared/middleware/httpLogger";
import {
  errorProblemJson,
  notFoundProblemJson,
} from "@shared/middleware/problemJson";
import type { ContentControllers } from "./controllers/createControllers";
import type { ContentStore } from "./kinds";
import { commentRoutes } from "./routes/commentRoutes";

export const API_PREFIXES = ["/users", "/articles", "/comments"];

export interface CreateAppOptions {
  serviceName: string;
  controllers: ContentControllers;
  /** Used by readiness to report record counts. */
  store: ContentStore;
}

export function createApp(opts: CreateAppOptions): Express {
  const { serviceName, controllers, store } = opts;
  const app = express();
  app.disable("x-powered-by");

  app.use(coreMiddleware());
  app.use(makeHttpLogger(serviceName));

  app.use(
    createHealthRouter({
      service: serviceName,
      store,
      collections: { users: "user", articles: "article", comments: "comment" },
    })
  );

  app.get("/", (_req, res) => {
    res.json({ service: serviceName, resources: API_PREFIXES });
  });

  app.use("/users", resourceRouter(controllers.users));
  app.use("/articles", resourceRouter(controllers.articles));
  app.use("/comments", commentRoutes(controllers.comments));

  app.use(notFoundProblemJson(API_PREFIXES));
  app.use(errorProblemJson());

  return app;
}
