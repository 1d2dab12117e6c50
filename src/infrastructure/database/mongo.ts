import mongoose, { Connection } from "mongoose";
import { Config } from "../../shared/config";
import { logger } from "../../shared/logger";

/**
 * Open a dedicated connection to the master database. Partitions are
 * collections in the same database, so one connection serves both the
 * registry and the partition backend.
 */
export async function connectMongo(
  config: Pick<Config, "mongodbUrl" | "mongodbDbName">,
): Promise<Connection> {
  const connection = mongoose.createConnection(config.mongodbUrl, {
    dbName: config.mongodbDbName,
  });

  connection.on("error", (error: Error) => {
    logger.error("MongoDB connection error", { error: error.message });
  });

  await connection.asPromise();
  logger.info("Connected to MongoDB", { database: config.mongodbDbName });
  return connection;
}

export async function disconnectMongo(connection: Connection): Promise<void> {
  await connection.close();
  logger.info("MongoDB connection closed");
}
