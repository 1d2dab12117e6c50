/**
 * AuthService - Admin Login
 *
 * Exchanges an admin's email and password for a bearer token. An unknown
 * email and a wrong password fail with the same code and message, and both
 * paths run one argon2 verification.
 */

import * as crypto from "crypto";
import { Email } from "../../../domain/value-objects/Email";
import { PasswordHash } from "../../../domain/value-objects/PasswordHash";
import { IOrganizationRepository } from "../../../infrastructure/repositories/IOrganizationRepository";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";
import { CredentialService } from "./CredentialService";

export interface LoginResult {
  access_token: string;
  token_type: "bearer";
  expires_in: number;
  organization_name: string;
  organization_id: string;
}

export class AuthService {
  private dummyHash: Promise<PasswordHash> | null = null;

  constructor(
    private organizationRepository: IOrganizationRepository,
    private credentialService: CredentialService,
  ) {}

  async login(email: string, password: string): Promise<LoginResult> {
    const normalizedEmail = Email.normalize(email);
    const organization =
      await this.organizationRepository.findByEmail(normalizedEmail);

    if (!organization) {
      await this.credentialService.verify(password, await this.getDummyHash());
      logger.warn("Admin login failed", {
        reason: "unknown_email",
        emailFingerprint: fingerprint(normalizedEmail),
      });
      throw this.invalidCredentials();
    }

    const valid = await this.credentialService.verify(
      password,
      organization.admin.passwordHash,
    );
    if (!valid) {
      logger.warn("Admin login failed", {
        reason: "invalid_password",
        organization: organization.name.value,
      });
      throw this.invalidCredentials();
    }

    const { token, expiresIn } = this.credentialService.issueToken(
      organization.admin.id,
      organization.name.value,
    );

    logger.logAudit("admin_login", organization.name.value, {
      adminId: organization.admin.id,
    });

    return {
      access_token: token,
      token_type: "bearer",
      expires_in: expiresIn,
      organization_name: organization.name.value,
      organization_id: organization.id,
    };
  }

  private invalidCredentials(): AppError {
    return AppError.fromErrorCode(
      ErrorCode.INVALID_CREDENTIALS,
      "Invalid email or password",
    );
  }

  // Hash of a random throwaway password, computed on first use.
  private getDummyHash(): Promise<PasswordHash> {
    if (!this.dummyHash) {
      this.dummyHash = this.credentialService.hash(
        crypto.randomBytes(24).toString("hex"),
      );
    }
    return this.dummyHash;
  }
}

/**
 * Hash sensitive data for logging (one-way)
 */
function fingerprint(data: string): string {
  return crypto.createHash("sha256").update(data).digest("hex").substring(0, 8);
}
