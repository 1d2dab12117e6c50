/**
 * Auth Schemas - Zod Validation Schemas
 */

import { z } from "zod";

/**
 * Admin login schema
 *
 * Both fields are only checked for presence. The email format is left to
 * the registry lookup so any address accepted at registration can log in,
 * and a stricter password rule would tell a caller something about the
 * stored credential.
 */
export const loginSchema = z.object({
  email: z
    .string({ required_error: "email is required" })
    .min(1, "email is required")
    .max(254, "email is too long"),
  password: z
    .string({ required_error: "password is required" })
    .min(1, "Password is required"),
});
