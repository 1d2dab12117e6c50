import { PasswordHash } from "../../../domain/value-objects/PasswordHash";
import { Config } from "../../../shared/config";
import { PasswordService } from "./PasswordService";
import { IssuedToken, TokenClaims, TokenService } from "./TokenService";

/**
 * Single entry point for everything credential related: password hashing
 * for admin accounts and bearer token issuance/verification.
 */
export class CredentialService {
  constructor(
    private passwordService: PasswordService,
    private tokenService: TokenService,
  ) {}

  static fromConfig(config: Readonly<Config>): CredentialService {
    return new CredentialService(
      PasswordService.fromConfig(config),
      TokenService.fromConfig(config),
    );
  }

  hash(password: string): Promise<PasswordHash> {
    return this.passwordService.hash(password);
  }

  verify(password: string, hash: PasswordHash | string): Promise<boolean> {
    const encoded = typeof hash === "string" ? hash : hash.hash;
    return this.passwordService.verify(password, encoded);
  }

  issueToken(adminId: string, organizationId: string): IssuedToken {
    return this.tokenService.issue(adminId, organizationId);
  }

  verifyToken(token: string): TokenClaims {
    return this.tokenService.verify(token);
  }
}
