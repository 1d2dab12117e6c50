/**
 * PartitionManager - Per-Organization Data Partitions
 *
 * Owns the partition naming contract (`org_<normalized organization name>`)
 * and the create/rename/drop transitions over an injected backend:
 * - Identifiers are validated here, before any backend call
 * - Precondition failures surface as precise error codes
 * - Backend I/O failures surface as PARTITION_OPERATION_FAILED; the
 *   underlying message is logged, never returned to callers
 */

import { OrganizationName } from "../../../domain/value-objects/OrganizationName";
import {
  IPartitionBackend,
  PartitionDocument,
} from "../../../infrastructure/partitions/IPartitionBackend";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";

export const PARTITION_PREFIX = "org_";

const PARTITION_ID_PATTERN = /^org_[a-z0-9][a-z0-9_-]{2,49}$/;

export class PartitionManager {
  constructor(private backend: IPartitionBackend) {}

  /**
   * Deterministic partition identifier for an organization. External tooling
   * relies on this exact format.
   */
  static partitionIdFor(name: OrganizationName): string {
    return `${PARTITION_PREFIX}${name.value}`;
  }

  static isValidPartitionId(partitionId: string): boolean {
    return PARTITION_ID_PATTERN.test(partitionId);
  }

  /**
   * Create an empty partition.
   *
   * @throws AppError PARTITION_EXISTS if the identifier is already in use
   */
  async create(partitionId: string): Promise<void> {
    this.assertValid(partitionId);

    if (await this.run("exists", partitionId, () => this.backend.exists(partitionId))) {
      throw AppError.fromErrorCode(
        ErrorCode.PARTITION_EXISTS,
        `Partition '${partitionId}' already exists`,
      );
    }

    await this.run("create", partitionId, () => this.backend.create(partitionId));
    logger.info("Partition created", { partitionId });
  }

  /**
   * Move every document from `oldId` to `newId`; `oldId` no longer exists
   * afterwards.
   *
   * @throws AppError PARTITION_SOURCE_MISSING if `oldId` does not exist
   * @throws AppError PARTITION_TARGET_EXISTS if `newId` is already in use
   */
  async rename(oldId: string, newId: string): Promise<void> {
    this.assertValid(oldId);
    this.assertValid(newId);

    if (!(await this.run("exists", oldId, () => this.backend.exists(oldId)))) {
      throw AppError.fromErrorCode(
        ErrorCode.PARTITION_SOURCE_MISSING,
        `Partition '${oldId}' does not exist`,
      );
    }
    if (await this.run("exists", newId, () => this.backend.exists(newId))) {
      throw AppError.fromErrorCode(
        ErrorCode.PARTITION_TARGET_EXISTS,
        `Partition '${newId}' already exists`,
      );
    }

    await this.run("rename", oldId, () => this.backend.rename(oldId, newId));
    logger.info("Partition renamed", { from: oldId, to: newId });
  }

  /**
   * Delete a partition and everything in it. Dropping a partition that does
   * not exist is treated as already cleaned up.
   */
  async drop(partitionId: string): Promise<void> {
    this.assertValid(partitionId);

    if (!(await this.run("exists", partitionId, () => this.backend.exists(partitionId)))) {
      logger.debug("Partition already absent, nothing to drop", { partitionId });
      return;
    }

    await this.run("drop", partitionId, () => this.backend.drop(partitionId));
    logger.info("Partition dropped", { partitionId });
  }

  async exists(partitionId: string): Promise<boolean> {
    this.assertValid(partitionId);
    return this.run("exists", partitionId, () => this.backend.exists(partitionId));
  }

  /**
   * Number of documents stored in the partition; 0 when it does not exist.
   */
  async count(partitionId: string): Promise<number> {
    this.assertValid(partitionId);
    if (!(await this.run("exists", partitionId, () => this.backend.exists(partitionId)))) {
      return 0;
    }
    return this.run("count", partitionId, () => this.backend.count(partitionId));
  }

  /**
   * The first `limit` documents of the partition; empty when it does not
   * exist.
   */
  async sample(partitionId: string, limit: number): Promise<PartitionDocument[]> {
    this.assertValid(partitionId);
    if (!(await this.run("exists", partitionId, () => this.backend.exists(partitionId)))) {
      return [];
    }
    return this.run("find", partitionId, () => this.backend.find(partitionId, limit));
  }

  private assertValid(partitionId: string): void {
    if (!PartitionManager.isValidPartitionId(partitionId)) {
      throw AppError.fromErrorCode(
        ErrorCode.INVALID_PARTITION_ID,
        `Invalid partition identifier '${partitionId}'`,
      );
    }
  }

  private async run<T>(
    operation: string,
    partitionId: string,
    task: () => Promise<T>,
  ): Promise<T> {
    try {
      return await task();
    } catch (error) {
      logger.error("Partition operation failed", {
        operation,
        partitionId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw AppError.fromErrorCode(
        ErrorCode.PARTITION_OPERATION_FAILED,
        `Partition ${operation} failed for '${partitionId}'`,
      );
    }
  }
}
