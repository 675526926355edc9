// backend/services/tool/src/routes/toolRoutes.ts
import { Router } from "express";
import type { ToolController } from "../controllers/toolController";

/**
 * Routing table (mounted at /tools under the API prefix).
 * - one-liners only, no logic here
 * - literal segments (/all, /count) are registered before /:id
 * - delete binds :id from the path, never from the query string
 */
export function createToolRouter(controller: ToolController): Router {
  const router = Router();

  router.get("/all", controller.list);
  router.get("/count", controller.count);
  router.get("/:id", controller.getById);

  router.post("/add", controller.add);
  router.put("/update/:id", controller.update);
  router.delete("/delete/:id", controller.remove);
  router.delete("/all", controller.removeAll);

  return router;
}
