import { Connection, mongo } from "mongoose";
import { IPartitionBackend, PartitionDocument } from "./IPartitionBackend";

const NAMESPACE_NOT_FOUND = 26;

/**
 * Partitions are collections in the master database.
 */
export class MongoPartitionBackend implements IPartitionBackend {
  constructor(private connection: Connection) {}

  async exists(partitionId: string): Promise<boolean> {
    const found = await this.database()
      .listCollections({ name: partitionId }, { nameOnly: true })
      .toArray();
    return found.length > 0;
  }

  async create(partitionId: string): Promise<void> {
    await this.database().createCollection(partitionId);
  }

  async rename(fromId: string, toId: string): Promise<void> {
    // renameCollection is atomic on a single server and within a replica set
    await this.database().renameCollection(fromId, toId);
  }

  async drop(partitionId: string): Promise<void> {
    try {
      await this.database().dropCollection(partitionId);
    } catch (error) {
      // Servers before 7.0 report dropping a missing collection as an error.
      if (
        error instanceof mongo.MongoServerError &&
        error.code === NAMESPACE_NOT_FOUND
      ) {
        return;
      }
      throw error;
    }
  }

  async count(partitionId: string): Promise<number> {
    return this.database().collection(partitionId).countDocuments();
  }

  async find(partitionId: string, limit: number): Promise<PartitionDocument[]> {
    return this.database().collection(partitionId).find({}).limit(limit).toArray();
  }

  private database(): mongo.Db {
    const db = this.connection.db;
    if (!db) {
      throw new Error("MongoDB connection is not open");
    }
    return db;
  }
}
