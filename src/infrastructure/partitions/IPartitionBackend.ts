/**
 * Physical storage for per-organization partitions. Identifiers reaching a
 * backend have already been validated by PartitionManager.
 */
export interface IPartitionBackend {
  exists(partitionId: string): Promise<boolean>;
  create(partitionId: string): Promise<void>;
  /** Move every document from `fromId` to `toId` and remove `fromId`. */
  rename(fromId: string, toId: string): Promise<void>;
  drop(partitionId: string): Promise<void>;
  count(partitionId: string): Promise<number>;
  /** Up to `limit` documents, in storage order. */
  find(partitionId: string, limit: number): Promise<PartitionDocument[]>;
}

export type PartitionDocument = Record<string, unknown>;
