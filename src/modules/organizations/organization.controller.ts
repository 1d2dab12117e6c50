/**
 * OrganizationController - HTTP Request Handlers
 *
 * - POST /org/create - Register an organization and provision its partition
 * - GET /org/get - Organization metadata with a partition summary
 * - PUT /org/update - Rename and/or change admin credentials
 * - DELETE /org/delete - Remove an organization (admin bearer token)
 */

import { Request, Response } from "express";
import { extractBearerToken } from "../../shared/middleware/auth";
import { sendError, sendSuccess } from "../../shared/http/response";
import {
  createOrganizationSchema,
  organizationQuerySchema,
  updateOrganizationSchema,
} from "./organization.schemas";
import { OrganizationLifecycleManager } from "./services/OrganizationLifecycleManager";

export class OrganizationController {
  constructor(private lifecycleManager: OrganizationLifecycleManager) {}

  async create(req: Request, res: Response): Promise<void> {
    try {
      const body = createOrganizationSchema.parse(req.body);

      const organization = await this.lifecycleManager.create({
        organizationName: body.organization_name,
        email: body.email,
        password: body.password,
      });

      sendSuccess(res, 201, organization.toMetadata());
    } catch (error) {
      sendError(res, error);
    }
  }

  async get(req: Request, res: Response): Promise<void> {
    try {
      const query = organizationQuerySchema.parse(req.query);
      const details = await this.lifecycleManager.get(query.organization_name);
      sendSuccess(res, 200, {
        ...details.organization.toMetadata(),
        data_count: details.dataCount,
        data: details.sample,
      });
    } catch (error) {
      sendError(res, error);
    }
  }

  async update(req: Request, res: Response): Promise<void> {
    try {
      const body = updateOrganizationSchema.parse(req.body);

      const organization = await this.lifecycleManager.update(
        body.organization_name,
        {
          newOrganizationName: body.new_organization_name,
          email: body.email,
          password: body.password,
        },
      );

      sendSuccess(res, 200, organization.toMetadata());
    } catch (error) {
      sendError(res, error);
    }
  }

  /**
   * The bearer token is checked before the query so an anonymous caller
   * learns nothing about which organizations exist.
   */
  async delete(req: Request, res: Response): Promise<void> {
    try {
      const token = extractBearerToken(req);
      const name =
        typeof req.query.organization_name === "string"
          ? req.query.organization_name
          : "";

      const organization = await this.lifecycleManager.delete(name, token);

      sendSuccess(res, 200, {
        message: `Organization '${organization.name.value}' deleted`,
      });
    } catch (error) {
      sendError(res, error);
    }
  }
}
