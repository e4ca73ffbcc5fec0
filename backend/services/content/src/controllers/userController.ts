// backend/services/content/src/controllers/userController.ts
import { ResourceController } from "@shared/base/ResourceController";
import type { ContentKinds, ControllerDeps } from "../kinds";
import { userFields } from "../validators/user.dto";

export type UserController = ResourceController<ContentKinds, "user">;

export function createUserController(deps: ControllerDeps): UserController {
  return new ResourceController<ContentKinds, "user">({
    kind: "user",
    plural: "users",
    schema: userFields,
    ...deps,
  });
}
