/**
 * Health Check Routes
 *
 * - GET /health/live - Liveness probe
 * - GET /health/ready - Readiness probe
 * - GET /health - Health report
 */

import { Router, Request, Response } from "express";
import { HealthController } from "./health.controller";

export function createHealthRoutes(healthController: HealthController): Router {
  const router = Router();

  router.get("/live", (req: Request, res: Response) =>
    healthController.liveness(req, res),
  );

  router.get("/ready", (req: Request, res: Response) =>
    healthController.readiness(req, res),
  );

  router.get("/", (req: Request, res: Response) =>
    healthController.detailed(req, res),
  );

  return router;
}
