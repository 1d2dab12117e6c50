/**
 * TokenService - Admin Session Tokens
 *
 * Stateless HS256 JWTs carrying the admin id (`sub`) and the organization the
 * admin belongs to. Tokens cannot be revoked server-side; expiry is the only
 * way a token stops working.
 */

import * as jwt from "jsonwebtoken";
import { Config } from "../../../shared/config";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";

/**
 * Verified token contents
 */
export interface TokenClaims {
  adminId: string;
  organizationId: string;
  issuedAt: Date;
  expiresAt: Date;
}

export interface IssuedToken {
  token: string;
  /** Seconds until expiration */
  expiresIn: number;
}

export interface TokenServiceConfig {
  secret: string;
  /** Lifetime such as "30m", "1h" or "45s" */
  expiresIn?: string;
}

const DEFAULT_EXPIRES_IN = "30m";
const ALGORITHM: jwt.Algorithm = "HS256";

export class TokenService {
  private secret: string;
  private expiresInSeconds: number;

  constructor(config: TokenServiceConfig) {
    if (!config.secret) {
      throw new Error("Token signing secret is required");
    }
    this.secret = config.secret;
    this.expiresInSeconds = TokenService.parseExpiresIn(
      config.expiresIn ?? DEFAULT_EXPIRES_IN,
    );
  }

  static fromConfig(config: Pick<Config, "jwtSecret" | "jwtExpiresIn">): TokenService {
    return new TokenService({
      secret: config.jwtSecret,
      expiresIn: config.jwtExpiresIn,
    });
  }

  /**
   * Sign a token for an admin of the given organization.
   */
  issue(adminId: string, organizationId: string): IssuedToken {
    const token = jwt.sign({ organizationId }, this.secret, {
      algorithm: ALGORITHM,
      subject: adminId,
      expiresIn: this.expiresInSeconds,
    });

    logger.debug("Issued access token", {
      adminId,
      organizationId,
      expiresIn: this.expiresInSeconds,
    });

    return { token, expiresIn: this.expiresInSeconds };
  }

  /**
   * Verify signature and expiry, then return the embedded identity.
   *
   * @throws AppError TOKEN_EXPIRED once past expiry
   * @throws AppError TOKEN_INVALID for anything else that does not verify
   */
  verify(token: string): TokenClaims {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: [ALGORITHM] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw AppError.fromErrorCode(
          ErrorCode.TOKEN_EXPIRED,
          "Access token has expired",
        );
      }
      if (error instanceof jwt.JsonWebTokenError) {
        logger.debug("Invalid access token", { error: error.message });
        throw AppError.fromErrorCode(
          ErrorCode.TOKEN_INVALID,
          "Invalid access token",
        );
      }
      throw error;
    }

    if (typeof decoded === "string") {
      throw AppError.fromErrorCode(ErrorCode.TOKEN_INVALID, "Invalid access token");
    }

    const { sub, organizationId, iat, exp } = decoded;
    if (
      typeof sub !== "string" ||
      typeof organizationId !== "string" ||
      typeof iat !== "number" ||
      typeof exp !== "number"
    ) {
      throw AppError.fromErrorCode(
        ErrorCode.TOKEN_INVALID,
        "Access token is missing required claims",
      );
    }

    return {
      adminId: sub,
      organizationId,
      issuedAt: new Date(iat * 1000),
      expiresAt: new Date(exp * 1000),
    };
  }

  getExpiresIn(): number {
    return this.expiresInSeconds;
  }

  /**
   * Parse expiration string to seconds
   *
   * @param expiresIn - Expiration string (e.g., "15m", "7d", "1h")
   */
  static parseExpiresIn(expiresIn: string): number {
    const match = expiresIn.match(/^(\d+)([smhd])$/);
    if (!match) {
      throw new Error(`Invalid token lifetime "${expiresIn}"`);
    }

    const value = parseInt(match[1], 10);
    switch (match[2]) {
      case "s":
        return value;
      case "m":
        return value * 60;
      case "h":
        return value * 3600;
      default:
        return value * 86400;
    }
  }
}
