/**
 * Organization Schemas - Zod Validation Schemas
 *
 * Shape checks only. Name normalization and the name/email format rules live
 * in the domain value objects so every entry point applies them the same way.
 */

import { z } from "zod";

const organizationName = z
  .string({ required_error: "organization_name is required" })
  .min(1, "organization_name is required")
  .max(100, "organization_name is too long");

const email = z
  .string({ required_error: "email is required" })
  .min(1, "email is required")
  .max(254, "email is too long");

const password = z
  .string({ required_error: "password is required" })
  .min(6, "password must be at least 6 characters")
  .max(128, "password is too long");

/**
 * POST /org/create
 */
export const createOrganizationSchema = z.object({
  organization_name: organizationName,
  email,
  password,
});

/**
 * PUT /org/update
 *
 * Every change is optional; a body carrying none of them is a no-op that
 * still returns the current metadata.
 */
export const updateOrganizationSchema = z.object({
  organization_name: organizationName,
  new_organization_name: organizationName.optional(),
  email: email.optional(),
  password: password.optional(),
});

/**
 * GET /org/get and DELETE /org/delete
 */
export const organizationQuerySchema = z.object({
  organization_name: organizationName,
});
