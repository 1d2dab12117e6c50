import dotenv from "dotenv";
import { Server } from "http";
import { Connection } from "mongoose";
import { createApp } from "./app";
import { connectMongo, disconnectMongo } from "./infrastructure/database/mongo";
import { IPartitionBackend } from "./infrastructure/partitions/IPartitionBackend";
import { InMemoryPartitionBackend } from "./infrastructure/partitions/InMemoryPartitionBackend";
import { MongoPartitionBackend } from "./infrastructure/partitions/MongoPartitionBackend";
import { IOrganizationRepository } from "./infrastructure/repositories/IOrganizationRepository";
import { InMemoryOrganizationRepository } from "./infrastructure/repositories/InMemoryOrganizationRepository";
import { MongoOrganizationRepository } from "./infrastructure/repositories/MongoOrganizationRepository";
import { Config, loadConfig } from "./shared/config";
import { logger } from "./shared/logger";

interface Storage {
  organizationRepository: IOrganizationRepository;
  partitionBackend: IPartitionBackend;
  connection: Connection | null;
}

async function createStorage(config: Readonly<Config>): Promise<Storage> {
  if (config.storageDriver === "memory") {
    logger.warn("Using in-memory storage; data is lost on restart");
    return {
      organizationRepository: new InMemoryOrganizationRepository(),
      partitionBackend: new InMemoryPartitionBackend(),
      connection: null,
    };
  }

  const connection = await connectMongo(config);
  return {
    organizationRepository: new MongoOrganizationRepository(connection),
    partitionBackend: new MongoPartitionBackend(connection),
    connection,
  };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function start(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  logger.configure({ level: config.logLevel, jsonFormat: config.jsonLogFormat });

  const storage = await createStorage(config);
  const app = createApp({
    config,
    organizationRepository: storage.organizationRepository,
    partitionBackend: storage.partitionBackend,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`, {
      environment: config.nodeEnv,
      storageDriver: config.storageDriver,
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);

    try {
      await closeServer(server);
      if (storage.connection) {
        await disconnectMongo(storage.connection);
      }
      logger.info("All connections closed");
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

start().catch((error: unknown) => {
  logger.error("Failed to start server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
