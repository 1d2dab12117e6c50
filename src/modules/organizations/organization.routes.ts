/**
 * Organization Routes
 *
 * Mounted at /org. Only DELETE requires a bearer token; the lifecycle
 * manager performs that check so the rule holds for every caller.
 */

import { Router, Request, Response } from "express";
import { OrganizationController } from "./organization.controller";
import { OrganizationLifecycleManager } from "./services/OrganizationLifecycleManager";

export function createOrganizationRouter(
  lifecycleManager: OrganizationLifecycleManager,
): Router {
  const router = Router();
  const controller = new OrganizationController(lifecycleManager);

  /**
   * POST /org/create
   */
  router.post("/create", (req: Request, res: Response) =>
    controller.create(req, res),
  );

  /**
   * GET /org/get?organization_name=
   */
  router.get("/get", (req: Request, res: Response) => controller.get(req, res));

  /**
   * PUT /org/update
   */
  router.put("/update", (req: Request, res: Response) =>
    controller.update(req, res),
  );

  /**
   * DELETE /org/delete?organization_name=
   * Requires: Authorization: Bearer <token>
   */
  router.delete("/delete", (req: Request, res: Response) =>
    controller.delete(req, res),
  );

  return router;
}
