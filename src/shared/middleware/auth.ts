import { Request } from "express";

const BEARER_PREFIX = "Bearer ";

/**
 * Token from an `Authorization: Bearer <token>` header, or null when the
 * header is absent or uses another scheme.
 */
export function extractBearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = authHeader.substring(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}
