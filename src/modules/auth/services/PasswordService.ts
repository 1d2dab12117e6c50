/**
 * PasswordService - Admin Password Hashing
 *
 * Argon2id with salts generated per hash. The encoded hash carries its own
 * parameters, so changing the work factors does not invalidate stored hashes.
 */

import { argon2id, hash, verify } from "argon2";
import { PasswordHash } from "../../../domain/value-objects/PasswordHash";
import { Config } from "../../../shared/config";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";

/**
 * Password hashing configuration
 */
export interface HashingConfig {
  /** Memory cost in KiB (default: 65536 = 64MB) */
  memoryCost?: number;
  /** Time cost / iterations (default: 3) */
  timeCost?: number;
  /** Parallelism factor (default: 1) */
  parallelism?: number;
  /** Hash length in bytes (default: 32) */
  hashLength?: number;
}

const DEFAULT_HASHING_CONFIG: Required<HashingConfig> = {
  memoryCost: 2 ** 16,
  timeCost: 3,
  parallelism: 1,
  hashLength: 32,
};

const MAX_PASSWORD_LENGTH = 1000;

export class PasswordService {
  private config: Required<HashingConfig>;

  constructor(config?: HashingConfig) {
    this.config = { ...DEFAULT_HASHING_CONFIG, ...config };
  }

  static fromConfig(
    config: Pick<
      Config,
      "argon2MemoryCost" | "argon2TimeCost" | "argon2Parallelism"
    >,
  ): PasswordService {
    return new PasswordService({
      memoryCost: config.argon2MemoryCost,
      timeCost: config.argon2TimeCost,
      parallelism: config.argon2Parallelism,
    });
  }

  /**
   * Hash a password using Argon2id
   *
   * @throws AppError INVALID_PASSWORD for an empty or oversized password
   */
  async hash(plainPassword: string): Promise<PasswordHash> {
    this.validatePasswordInput(plainPassword);

    try {
      const encoded = await hash(plainPassword, {
        type: argon2id,
        memoryCost: this.config.memoryCost,
        timeCost: this.config.timeCost,
        parallelism: this.config.parallelism,
        hashLength: this.config.hashLength,
      });
      return new PasswordHash(encoded);
    } catch (error) {
      logger.error("Password hashing failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw AppError.fromErrorCode(
        ErrorCode.INTERNAL_SERVER_ERROR,
        "Failed to process password",
      );
    }
  }

  /**
   * Verify a password against a stored hash.
   *
   * Returns false instead of throwing for empty input or a hash argon2 cannot
   * parse.
   */
  async verify(plainPassword: string, hashedPassword: string): Promise<boolean> {
    if (!plainPassword || !hashedPassword) {
      return false;
    }

    try {
      return await verify(hashedPassword, plainPassword);
    } catch (error) {
      logger.debug("Password verification failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  getConfig(): Readonly<Required<HashingConfig>> {
    return { ...this.config };
  }

  private validatePasswordInput(password: string): void {
    if (!password) {
      throw AppError.fromErrorCode(
        ErrorCode.INVALID_PASSWORD,
        "Password is required",
      );
    }

    // Reject passwords that are too long (DoS protection)
    if (password.length > MAX_PASSWORD_LENGTH) {
      throw AppError.fromErrorCode(
        ErrorCode.INVALID_PASSWORD,
        "Password is too long",
      );
    }
  }
}
