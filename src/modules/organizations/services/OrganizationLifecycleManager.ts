/**
 * OrganizationLifecycleManager - Registry/Partition Orchestration
 *
 * Keeps a registry row and its partition in step across create, update and
 * delete. The backend has no multi-document transactions, so each operation
 * orders its steps and compensates:
 *
 * - create: registry insert, then partition create; a failed partition
 *   create removes the inserted row
 * - rename: registry update, then partition rename; a failed partition
 *   rename restores the old name on the row
 * - delete: partition drop, then registry delete; a crash in between leaves
 *   a row without a partition, which is detectable, instead of a partition
 *   the registry no longer knows about
 *
 * Compensations run before returning and the original error is re-thrown
 * unchanged. Concurrent conflicting requests on the same organization are
 * not serialized.
 */

import * as crypto from "crypto";
import {
  AdminCredential,
  Organization,
} from "../../../domain/entities/Organization";
import { Email } from "../../../domain/value-objects/Email";
import { OrganizationName } from "../../../domain/value-objects/OrganizationName";
import { PartitionDocument } from "../../../infrastructure/partitions/IPartitionBackend";
import { IOrganizationRepository } from "../../../infrastructure/repositories/IOrganizationRepository";
import { AppError, ErrorCode } from "../../../shared/errors/AppError";
import { logger } from "../../../shared/logger";
import { CredentialService } from "../../auth/services/CredentialService";
import { TokenClaims } from "../../auth/services/TokenService";
import { PartitionManager } from "./PartitionManager";

export interface CreateOrganizationDto {
  organizationName: string;
  email: string;
  password: string;
}

export interface UpdateOrganizationDto {
  newOrganizationName?: string;
  email?: string;
  password?: string;
}

/** Documents returned alongside the metadata by `get`. */
export const PARTITION_SAMPLE_SIZE = 10;

export interface OrganizationDetails {
  organization: Organization;
  dataCount: number;
  sample: PartitionDocument[];
}

export class OrganizationLifecycleManager {
  constructor(
    private organizationRepository: IOrganizationRepository,
    private partitionManager: PartitionManager,
    private credentialService: CredentialService,
  ) {}

  /**
   * Register an organization with its admin and provision its partition.
   *
   * @throws AppError DUPLICATE_NAME / DUPLICATE_EMAIL before any partition
   * is created
   */
  async create(dto: CreateOrganizationDto): Promise<Organization> {
    const name = new OrganizationName(dto.organizationName);
    const email = new Email(dto.email);
    const passwordHash = await this.credentialService.hash(dto.password);
    const partitionId = PartitionManager.partitionIdFor(name);

    const now = new Date();
    const organization = new Organization(
      crypto.randomUUID(),
      name,
      partitionId,
      new AdminCredential(crypto.randomUUID(), email, passwordHash),
      now,
      now,
    );

    const created = await this.organizationRepository.insert(organization);

    try {
      await this.partitionManager.create(partitionId);
    } catch (error) {
      await this.compensate("rollback_insert", name.value, () =>
        this.organizationRepository.delete(name.value),
      );
      throw error;
    }

    logger.logAudit("organization_created", name.value, {
      organizationId: created.id,
      partitionId,
    });
    return created;
  }

  /**
   * Registry metadata plus the partition's document count and its first
   * documents.
   */
  async get(organizationName: string): Promise<OrganizationDetails> {
    const name = new OrganizationName(organizationName);
    const organization = await this.load(name);
    const [dataCount, sample] = await Promise.all([
      this.partitionManager.count(organization.partitionId),
      this.partitionManager.sample(
        organization.partitionId,
        PARTITION_SAMPLE_SIZE,
      ),
    ]);
    return { organization, dataCount, sample };
  }

  /**
   * Rename the organization and/or change its admin email or password.
   *
   * Every input is validated, and the new password hashed, before anything is
   * written.
   */
  async update(
    organizationName: string,
    dto: UpdateOrganizationDto,
  ): Promise<Organization> {
    const name = new OrganizationName(organizationName);
    const newName =
      dto.newOrganizationName !== undefined
        ? new OrganizationName(dto.newOrganizationName)
        : undefined;
    const email = dto.email !== undefined ? new Email(dto.email) : undefined;
    const passwordHash =
      dto.password !== undefined
        ? await this.credentialService.hash(dto.password)
        : undefined;

    let organization = await this.load(name);

    if (email) {
      const owner = await this.organizationRepository.findByEmail(email.value);
      if (owner && owner.id !== organization.id) {
        throw AppError.fromErrorCode(
          ErrorCode.DUPLICATE_EMAIL,
          `Email '${email.value}' is already registered`,
        );
      }
    }

    if (newName && !newName.equals(organization.name)) {
      organization = await this.rename(organization, newName);
    }

    if (email || passwordHash) {
      organization = await this.organizationRepository.update(
        organization.name.value,
        { email, passwordHash },
      );
      const changedFields = [
        ...(email ? ["email"] : []),
        ...(passwordHash ? ["password"] : []),
      ];
      logger.logAudit("organization_admin_updated", organization.name.value, {
        changedFields,
      });
    }

    return organization;
  }

  /**
   * Drop the organization's partition and remove it from the registry.
   *
   * The token is checked before the name is even parsed, so an anonymous
   * caller learns nothing about which organizations exist.
   *
   * @throws AppError UNAUTHORIZED unless `callerToken` is a valid, unexpired
   * token issued to this organization's admin
   */
  async delete(
    organizationName: string,
    callerToken: string | null | undefined,
  ): Promise<Organization> {
    const claims = this.authenticate(callerToken);
    const name = new OrganizationName(organizationName);

    if (claims.organizationId !== name.value) {
      logger.warn("Token does not belong to the target organization", {
        organization: name.value,
        adminId: claims.adminId,
      });
      throw AppError.fromErrorCode(
        ErrorCode.UNAUTHORIZED,
        "You can only delete your own organization",
      );
    }

    const organization = await this.load(name);

    await this.partitionManager.drop(organization.partitionId);
    await this.organizationRepository.delete(name.value);

    logger.logAudit("organization_deleted", name.value, {
      organizationId: organization.id,
      partitionId: organization.partitionId,
      adminId: claims.adminId,
    });
    return organization;
  }

  private async rename(
    current: Organization,
    newName: OrganizationName,
  ): Promise<Organization> {
    const newPartitionId = PartitionManager.partitionIdFor(newName);

    const renamed = await this.organizationRepository.update(
      current.name.value,
      { name: newName, partitionId: newPartitionId },
    );

    try {
      await this.partitionManager.rename(current.partitionId, newPartitionId);
    } catch (error) {
      await this.compensate("revert_rename", newName.value, () =>
        this.organizationRepository.update(newName.value, {
          name: current.name,
          partitionId: current.partitionId,
        }),
      );
      throw error;
    }

    logger.logAudit("organization_renamed", newName.value, {
      previousName: current.name.value,
      partitionId: newPartitionId,
    });
    return renamed;
  }

  private authenticate(callerToken: string | null | undefined): TokenClaims {
    if (!callerToken) {
      throw AppError.fromErrorCode(
        ErrorCode.UNAUTHORIZED,
        "Authentication token is required",
      );
    }

    try {
      return this.credentialService.verifyToken(callerToken);
    } catch (error) {
      if (AppError.is(error, ErrorCode.TOKEN_EXPIRED, ErrorCode.TOKEN_INVALID)) {
        throw AppError.fromErrorCode(
          ErrorCode.UNAUTHORIZED,
          error.code === ErrorCode.TOKEN_EXPIRED
            ? "Token has expired"
            : "Invalid token",
          { reason: error.code },
        );
      }
      throw error;
    }
  }

  private async load(name: OrganizationName): Promise<Organization> {
    const organization = await this.organizationRepository.findByName(
      name.value,
    );
    if (!organization) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name.value}' not found`,
      );
    }
    return organization;
  }

  /**
   * Run a compensating step. A failure here is logged and left for
   * reconciliation; the caller re-throws the error that triggered it.
   */
  private async compensate(
    action: string,
    organization: string,
    step: () => Promise<unknown>,
  ): Promise<void> {
    try {
      await step();
      logger.warn("Compensating action applied", { action, organization });
    } catch (error) {
      logger.error("Compensating action failed, registry needs reconciliation", {
        action,
        organization,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
