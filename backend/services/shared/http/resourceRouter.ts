// backend/services/shared/http/resourceRouter.ts
import { Router } from "express";
import type { ResourceHandlers } from "../base/ResourceController";
import { handle, jsonBody } from "./handle";

/**
 * Express adapter for a ResourceHandlers controller.
 *
 * Canonical:
 *   GET / · GET /:id · POST / · PUT /:id · DELETE /:id
 * Legacy aliases (older clients):
 *   PUT /new → create · POST /:id/edit → update · DELETE /:id/delete → delete
 */
export function resourceRouter(ctl: ResourceHandlers): Router {
  const r = Router();

  // one-liners only; "/new" must precede "/:id"
  const create = handle((req) => ctl.create(jsonBody(req)));
  const update = handle((req) => ctl.update(req.params.id, jsonBody(req)));
  const remove = handle((req) => ctl.remove(req.params.id));

  r.get("/", handle(() => ctl.list()));
  r.put("/new", create);
  r.get("/:id", handle((req) => ctl.get(req.params.id)));
  r.post("/", create);
  r.put("/:id", update);
  r.post("/:id/edit", update);
  r.delete("/:id", remove);
  r.delete("/:id/delete", remove);

  return r;
}
