import express, { Express } from "express";
import cors from "cors";
import { version } from "../package.json";
import { IPartitionBackend } from "./infrastructure/partitions/IPartitionBackend";
import { IOrganizationRepository } from "./infrastructure/repositories/IOrganizationRepository";
import { AuthService, CredentialService, createAuthRouter } from "./modules/auth";
import { HealthController, createHealthRoutes } from "./modules/health";
import {
  OrganizationLifecycleManager,
  PartitionManager,
  createOrganizationRouter,
} from "./modules/organizations";
import { Config } from "./shared/config";
import { logger } from "./shared/logger";
import { errorHandler, notFoundHandler } from "./shared/middleware/errorHandler";
import { correlationId, requestLogger } from "./shared/middleware/requestContext";

export interface AppDependencies {
  config: Readonly<Config>;
  organizationRepository: IOrganizationRepository;
  partitionBackend: IPartitionBackend;
  /** Defaults to one built from `config` */
  credentialService?: CredentialService;
}

function corsOptions(config: Readonly<Config>): cors.CorsOptions {
  return {
    origin: (
      origin: string | undefined,
      callback: (error: Error | null, allow?: boolean) => void,
    ) => {
      // Requests without an Origin header (curl, server-to-server)
      if (!origin) {
        callback(null, true);
        return;
      }

      const allowed =
        config.corsAllowedOrigins.includes(origin) ||
        (config.nodeEnv !== "production" && origin.includes("localhost"));

      if (!allowed) {
        logger.warn("CORS origin rejected", { origin });
      }
      callback(null, allowed);
    },
    methods: ["GET", "POST", "PUT", "DELETE"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Correlation-ID"],
    exposedHeaders: ["X-Correlation-ID"],
  };
}

/**
 * Wire services onto an Express app. Storage backends are injected so the
 * same app runs against MongoDB or the in-memory stores.
 */
export function createApp(deps: AppDependencies): Express {
  const { config, organizationRepository, partitionBackend } = deps;

  const credentialService =
    deps.credentialService ?? CredentialService.fromConfig(config);
  const partitionManager = new PartitionManager(partitionBackend);
  const lifecycleManager = new OrganizationLifecycleManager(
    organizationRepository,
    partitionManager,
    credentialService,
  );
  const authService = new AuthService(organizationRepository, credentialService);
  const healthController = new HealthController(organizationRepository, {
    version,
    environment: config.nodeEnv,
    storageDriver: config.storageDriver,
  });

  const app = express();
  app.disable("x-powered-by");

  app.use(correlationId);
  app.use(requestLogger);
  if (config.corsEnabled) {
    app.use(cors(corsOptions(config)));
  }
  app.use(express.json({ limit: "100kb" }));

  app.use("/health", createHealthRoutes(healthController));
  app.use("/org", createOrganizationRouter(lifecycleManager));
  app.use("/admin", createAuthRouter(authService));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
