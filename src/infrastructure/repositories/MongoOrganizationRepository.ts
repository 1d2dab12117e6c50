import { Connection, Model, Schema, mongo } from "mongoose";
import {
  AdminCredential,
  Organization,
  OrganizationPatch,
} from "../../domain/entities/Organization";
import { Email } from "../../domain/value-objects/Email";
import { OrganizationName } from "../../domain/value-objects/OrganizationName";
import { PasswordHash } from "../../domain/value-objects/PasswordHash";
import { AppError, ErrorCode } from "../../shared/errors/AppError";
import { logger } from "../../shared/logger";
import { IOrganizationRepository } from "./IOrganizationRepository";

export const ORGANIZATIONS_COLLECTION = "organizations";

const DUPLICATE_KEY = 11000;

interface OrganizationRecord {
  organizationId: string;
  name: string;
  partitionId: string;
  adminId: string;
  adminEmail: string;
  adminPasswordHash: string;
  createdAt: Date;
  updatedAt: Date;
}

const organizationSchema = new Schema<OrganizationRecord>(
  {
    organizationId: { type: String, required: true, unique: true },
    name: { type: String, required: true, unique: true },
    partitionId: { type: String, required: true },
    adminId: { type: String, required: true },
    adminEmail: { type: String, required: true, unique: true },
    adminPasswordHash: { type: String, required: true },
    createdAt: { type: Date, required: true },
    updatedAt: { type: Date, required: true },
  },
  { versionKey: false },
);

/**
 * Unique indexes still catch writes that race past the existence checks.
 */
export function translateWriteError(error: unknown): never {
  if (error instanceof mongo.MongoServerError && error.code === DUPLICATE_KEY) {
    const keys = Object.keys(error.keyPattern ?? {});
    if (keys.includes("name")) {
      throw AppError.fromErrorCode(ErrorCode.DUPLICATE_NAME);
    }
    if (keys.includes("adminEmail")) {
      throw AppError.fromErrorCode(ErrorCode.DUPLICATE_EMAIL);
    }
  }

  logger.error("Registry write failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  throw AppError.fromErrorCode(ErrorCode.DATABASE_ERROR);
}

export class MongoOrganizationRepository implements IOrganizationRepository {
  private model: Model<OrganizationRecord>;

  constructor(private connection: Connection) {
    this.model = connection.model<OrganizationRecord>(
      "Organization",
      organizationSchema,
      ORGANIZATIONS_COLLECTION,
    );
  }

  async findByName(name: string): Promise<Organization | null> {
    const record = await this.model
      .findOne({ name })
      .lean<OrganizationRecord | null>()
      .exec();
    return record ? this.mapToDomain(record) : null;
  }

  async findByEmail(email: string): Promise<Organization | null> {
    const record = await this.model
      .findOne({ adminEmail: email })
      .lean<OrganizationRecord | null>()
      .exec();
    return record ? this.mapToDomain(record) : null;
  }

  async insert(organization: Organization): Promise<Organization> {
    if (await this.model.exists({ name: organization.name.value })) {
      throw AppError.fromErrorCode(
        ErrorCode.DUPLICATE_NAME,
        `Organization '${organization.name.value}' already exists`,
      );
    }
    if (
      await this.model.exists({ adminEmail: organization.admin.email.value })
    ) {
      throw AppError.fromErrorCode(
        ErrorCode.DUPLICATE_EMAIL,
        `Email '${organization.admin.email.value}' is already registered`,
      );
    }

    try {
      await this.model.create(this.mapToRecord(organization));
    } catch (error) {
      translateWriteError(error);
    }
    return organization;
  }

  async update(name: string, patch: OrganizationPatch): Promise<Organization> {
    const record = await this.model
      .findOne({ name })
      .lean<OrganizationRecord | null>()
      .exec();
    if (!record) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name}' not found`,
      );
    }

    const newName = patch.name?.value;
    if (newName !== undefined && newName !== name) {
      if (await this.model.exists({ name: newName })) {
        throw AppError.fromErrorCode(
          ErrorCode.DUPLICATE_NAME,
          `Organization '${newName}' already exists`,
        );
      }
    }
    if (patch.email) {
      const taken = await this.model.exists({
        adminEmail: patch.email.value,
        organizationId: { $ne: record.organizationId },
      });
      if (taken) {
        throw AppError.fromErrorCode(
          ErrorCode.DUPLICATE_EMAIL,
          `Email '${patch.email.value}' is already registered`,
        );
      }
    }

    const updated = this.mapToDomain(record).withChanges(patch);
    const { organizationId, ...changes } = this.mapToRecord(updated);

    let matched = 0;
    try {
      const result = await this.model
        .updateOne({ organizationId }, { $set: changes })
        .exec();
      matched = result.matchedCount;
    } catch (error) {
      translateWriteError(error);
    }

    // Removed between the read and the write.
    if (matched === 0) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name}' not found`,
      );
    }
    return updated;
  }

  async delete(name: string): Promise<void> {
    const result = await this.model.deleteOne({ name }).exec();
    if (result.deletedCount === 0) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name}' not found`,
      );
    }
  }

  async ping(): Promise<void> {
    const db = this.connection.db;
    if (!db) {
      throw AppError.fromErrorCode(
        ErrorCode.DATABASE_ERROR,
        "MongoDB connection is not open",
      );
    }
    await db.admin().ping();
  }

  private mapToRecord(organization: Organization): OrganizationRecord {
    return {
      organizationId: organization.id,
      name: organization.name.value,
      partitionId: organization.partitionId,
      adminId: organization.admin.id,
      adminEmail: organization.admin.email.value,
      adminPasswordHash: organization.admin.passwordHash.hash,
      createdAt: organization.createdAt,
      updatedAt: organization.updatedAt,
    };
  }

  private mapToDomain(record: OrganizationRecord): Organization {
    return new Organization(
      record.organizationId,
      new OrganizationName(record.name),
      record.partitionId,
      new AdminCredential(
        record.adminId,
        new Email(record.adminEmail),
        new PasswordHash(record.adminPasswordHash),
      ),
      record.createdAt,
      record.updatedAt,
    );
  }
}
