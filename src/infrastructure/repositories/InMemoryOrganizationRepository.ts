import {
  Organization,
  OrganizationPatch,
} from "../../domain/entities/Organization";
import { AppError, ErrorCode } from "../../shared/errors/AppError";
import { IOrganizationRepository } from "./IOrganizationRepository";

/**
 * Process-local registry used by the "memory" storage driver and the tests.
 */
export class InMemoryOrganizationRepository implements IOrganizationRepository {
  private organizations = new Map<string, Organization>();

  async findByName(name: string): Promise<Organization | null> {
    return this.organizations.get(name) ?? null;
  }

  async findByEmail(email: string): Promise<Organization | null> {
    for (const organization of this.organizations.values()) {
      if (organization.admin.email.value === email) {
        return organization;
      }
    }
    return null;
  }

  async insert(organization: Organization): Promise<Organization> {
    if (this.organizations.has(organization.name.value)) {
      throw AppError.fromErrorCode(
        ErrorCode.DUPLICATE_NAME,
        `Organization '${organization.name.value}' already exists`,
      );
    }
    this.assertEmailAvailable(organization.admin.email.value, null);

    this.organizations.set(organization.name.value, organization);
    return organization;
  }

  async update(name: string, patch: OrganizationPatch): Promise<Organization> {
    const current = this.organizations.get(name);
    if (!current) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name}' not found`,
      );
    }

    const newName = patch.name?.value;
    if (newName !== undefined && newName !== name) {
      if (this.organizations.has(newName)) {
        throw AppError.fromErrorCode(
          ErrorCode.DUPLICATE_NAME,
          `Organization '${newName}' already exists`,
        );
      }
    }
    if (patch.email) {
      this.assertEmailAvailable(patch.email.value, current.id);
    }

    const updated = current.withChanges(patch);
    this.organizations.delete(name);
    this.organizations.set(updated.name.value, updated);
    return updated;
  }

  async delete(name: string): Promise<void> {
    if (!this.organizations.delete(name)) {
      throw AppError.fromErrorCode(
        ErrorCode.ORGANIZATION_NOT_FOUND,
        `Organization '${name}' not found`,
      );
    }
  }

  async ping(): Promise<void> {
    // always reachable
  }

  size(): number {
    return this.organizations.size;
  }

  private assertEmailAvailable(email: string, ownerId: string | null): void {
    for (const organization of this.organizations.values()) {
      if (
        organization.admin.email.value === email &&
        organization.id !== ownerId
      ) {
        throw AppError.fromErrorCode(
          ErrorCode.DUPLICATE_EMAIL,
          `Email '${email}' is already registered`,
        );
      }
    }
  }
}
