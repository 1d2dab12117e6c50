import {
  Organization,
  OrganizationPatch,
} from "../../domain/entities/Organization";

/**
 * Master registry of organizations.
 *
 * Lookups resolve to null when nothing matches. Mutations fail with
 * DUPLICATE_NAME / DUPLICATE_EMAIL (emails are unique across every
 * organization) or ORGANIZATION_NOT_FOUND. None of these methods touch the
 * organization's partition.
 */
export interface IOrganizationRepository {
  findByName(name: string): Promise<Organization | null>;
  findByEmail(email: string): Promise<Organization | null>;
  insert(organization: Organization): Promise<Organization>;
  update(name: string, patch: OrganizationPatch): Promise<Organization>;
  delete(name: string): Promise<void>;
  ping(): Promise<void>;
}
