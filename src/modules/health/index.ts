/**
 * Health Module Index
 */

export { HealthController } from "./health.controller";
export type { HealthInfo } from "./health.controller";
export { createHealthRoutes } from "./routes";
