import { Router, Request, Response } from "express";
import { AuthController } from "./auth.controller";
import { AuthService } from "./services/AuthService";

/**
 * Create the admin router, mounted at /admin
 */
export function createAuthRouter(authService: AuthService): Router {
  const router = Router();
  const authController = new AuthController(authService);

  /**
   * POST /admin/login
   * Authenticate an organization admin
   */
  router.post("/login", (req: Request, res: Response) =>
    authController.login(req, res),
  );

  return router;
}
