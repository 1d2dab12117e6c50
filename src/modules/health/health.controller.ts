/**
 * Health Check Controller
 *
 * - Liveness probe: is the process up?
 * - Readiness probe: can the registry backend be reached?
 * - Health report: readiness plus version and storage driver
 */

import { Request, Response } from "express";
import { IOrganizationRepository } from "../../infrastructure/repositories/IOrganizationRepository";
import { logger } from "../../shared/logger";

interface CheckResult {
  name: string;
  status: "healthy" | "unhealthy";
  message?: string;
  latencyMs?: number;
}

interface HealthResponse {
  status: "OK" | "ERROR";
  timestamp: string;
  uptime: number;
  checks: CheckResult[];
}

interface DetailedHealthResponse extends HealthResponse {
  version: string;
  environment: string;
  storageDriver: string;
}

export interface HealthInfo {
  version: string;
  environment: string;
  storageDriver: string;
}

export class HealthController {
  constructor(
    private organizationRepository: IOrganizationRepository,
    private info: HealthInfo,
  ) {}

  async liveness(req: Request, res: Response): Promise<void> {
    res.status(200).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
    });
  }

  async readiness(req: Request, res: Response): Promise<void> {
    const checks = [await this.checkRegistry()];
    const ready = checks.every((check) => check.status === "healthy");

    const response: HealthResponse = {
      status: ready ? "OK" : "ERROR",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      checks,
    };

    res.status(ready ? 200 : 503).json(response);
  }

  async detailed(req: Request, res: Response): Promise<void> {
    const checks = [await this.checkRegistry()];
    const ready = checks.every((check) => check.status === "healthy");

    const response: DetailedHealthResponse = {
      status: ready ? "OK" : "ERROR",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      checks,
      version: this.info.version,
      environment: this.info.environment,
      storageDriver: this.info.storageDriver,
    };

    res.status(ready ? 200 : 503).json(response);
  }

  private async checkRegistry(): Promise<CheckResult> {
    const start = Date.now();
    try {
      await this.organizationRepository.ping();
      return {
        name: "registry",
        status: "healthy",
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      logger.error("Registry health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return {
        name: "registry",
        status: "unhealthy",
        message: "Registry backend unreachable",
        latencyMs: Date.now() - start,
      };
    }
  }
}
