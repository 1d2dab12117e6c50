export { createOrganizationRouter } from "./organization.routes";
export { OrganizationController } from "./organization.controller";
export { OrganizationLifecycleManager } from "./services/OrganizationLifecycleManager";
export type {
  CreateOrganizationDto,
  OrganizationDetails,
  UpdateOrganizationDto,
} from "./services/OrganizationLifecycleManager";
export { PartitionManager, PARTITION_PREFIX } from "./services/PartitionManager";
