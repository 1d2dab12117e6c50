/**
 * AuthController - HTTP Request Handlers
 *
 * - POST /admin/login - Exchange admin email/password for a bearer token
 */

import { Request, Response } from "express";
import { sendError, sendSuccess } from "../../shared/http/response";
import { loginSchema } from "./auth.schemas";
import { AuthService } from "./services/AuthService";

export class AuthController {
  constructor(private authService: AuthService) {}

  /**
   * POST /admin/login
   *
   * Request body:
   * - email: string (valid email)
   * - password: string
   */
  async login(req: Request, res: Response): Promise<void> {
    try {
      const { email, password } = loginSchema.parse(req.body);
      const result = await this.authService.login(email, password);
      sendSuccess(res, 200, result);
    } catch (error) {
      sendError(res, error);
    }
  }
}

export default AuthController;
