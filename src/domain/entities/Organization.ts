import { Email } from "../value-objects/Email";
import { OrganizationName } from "../value-objects/OrganizationName";
import { PasswordHash } from "../value-objects/PasswordHash";

class AdminCredential {
  private _id: string;
  private _email: Email;
  private _passwordHash: PasswordHash;

  constructor(id: string, email: Email, passwordHash: PasswordHash) {
    if (!id) throw new Error("Admin ID is required");

    this._id = id;
    this._email = email;
    this._passwordHash = passwordHash;
  }

  get id(): string {
    return this._id;
  }
  get email(): Email {
    return this._email;
  }
  get passwordHash(): PasswordHash {
    return this._passwordHash;
  }
}

/**
 * Fields a registry update may change. Name and partition id always travel
 * together; the lifecycle manager derives one from the other.
 */
interface OrganizationPatch {
  name?: OrganizationName;
  partitionId?: string;
  email?: Email;
  passwordHash?: PasswordHash;
}

/**
 * Public view of an organization. Never carries the password hash.
 */
interface OrganizationMetadata {
  organization_id: string;
  organization_name: string;
  email: string;
  partition_id: string;
  created_at: string;
  updated_at: string;
}

class Organization {
  private _id: string;
  private _name: OrganizationName;
  private _partitionId: string;
  private _admin: AdminCredential;
  private _createdAt: Date;
  private _updatedAt: Date;

  constructor(
    id: string,
    name: OrganizationName,
    partitionId: string,
    admin: AdminCredential,
    createdAt: Date,
    updatedAt: Date,
  ) {
    // Invariants
    if (!id) throw new Error("Organization ID is required");
    if (!partitionId) throw new Error("Partition ID is required");
    if (createdAt > updatedAt)
      throw new Error("CreatedAt cannot be after UpdatedAt");

    this._id = id;
    this._name = name;
    this._partitionId = partitionId;
    this._admin = admin;
    this._createdAt = createdAt;
    this._updatedAt = updatedAt;
  }

  get id(): string {
    return this._id;
  }
  get name(): OrganizationName {
    return this._name;
  }
  get partitionId(): string {
    return this._partitionId;
  }
  get admin(): AdminCredential {
    return this._admin;
  }
  get createdAt(): Date {
    return this._createdAt;
  }
  get updatedAt(): Date {
    return this._updatedAt;
  }

  /**
   * Copy of this organization with the patch applied and updatedAt moved to
   * `at` (never earlier than createdAt).
   */
  withChanges(patch: OrganizationPatch, at: Date = new Date()): Organization {
    const admin = new AdminCredential(
      this._admin.id,
      patch.email ?? this._admin.email,
      patch.passwordHash ?? this._admin.passwordHash,
    );
    const updatedAt = at < this._createdAt ? this._createdAt : at;

    return new Organization(
      this._id,
      patch.name ?? this._name,
      patch.partitionId ?? this._partitionId,
      admin,
      this._createdAt,
      updatedAt,
    );
  }

  toMetadata(): OrganizationMetadata {
    return {
      organization_id: this._id,
      organization_name: this._name.value,
      email: this._admin.email.value,
      partition_id: this._partitionId,
      created_at: this._createdAt.toISOString(),
      updated_at: this._updatedAt.toISOString(),
    };
  }
}

export { Organization, AdminCredential };
export type { OrganizationPatch, OrganizationMetadata };
