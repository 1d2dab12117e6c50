/**
 * Auth Module - Exports
 *
 * Credential handling (argon2 password hashes, HS256 bearer tokens) and the
 * admin login endpoint.
 */

export { AuthController } from "./auth.controller";
export { createAuthRouter } from "./auth.routes";
export { loginSchema } from "./auth.schemas";

// Services
export { AuthService } from "./services/AuthService";
export { CredentialService } from "./services/CredentialService";
export { PasswordService } from "./services/PasswordService";
export { TokenService } from "./services/TokenService";

export type { LoginResult } from "./services/AuthService";
export type { IssuedToken, TokenClaims } from "./services/TokenService";
