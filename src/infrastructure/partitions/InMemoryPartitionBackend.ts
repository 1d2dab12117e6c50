import { IPartitionBackend, PartitionDocument } from "./IPartitionBackend";

export class InMemoryPartitionBackend implements IPartitionBackend {
  private partitions = new Map<string, PartitionDocument[]>();

  async exists(partitionId: string): Promise<boolean> {
    return this.partitions.has(partitionId);
  }

  async create(partitionId: string): Promise<void> {
    if (this.partitions.has(partitionId)) {
      throw new Error(`Partition ${partitionId} already exists`);
    }
    this.partitions.set(partitionId, []);
  }

  async rename(fromId: string, toId: string): Promise<void> {
    const documents = this.partitions.get(fromId);
    if (!documents) {
      throw new Error(`Partition ${fromId} does not exist`);
    }
    if (this.partitions.has(toId)) {
      throw new Error(`Partition ${toId} already exists`);
    }
    this.partitions.set(toId, documents);
    this.partitions.delete(fromId);
  }

  async drop(partitionId: string): Promise<void> {
    this.partitions.delete(partitionId);
  }

  async count(partitionId: string): Promise<number> {
    return this.partitions.get(partitionId)?.length ?? 0;
  }

  async find(partitionId: string, limit: number): Promise<PartitionDocument[]> {
    return this.documents(partitionId).slice(0, limit);
  }

  insert(partitionId: string, ...documents: PartitionDocument[]): void {
    const existing = this.partitions.get(partitionId);
    if (!existing) {
      throw new Error(`Partition ${partitionId} does not exist`);
    }
    existing.push(...documents.map((document) => ({ ...document })));
  }

  documents(partitionId: string): PartitionDocument[] {
    return (this.partitions.get(partitionId) ?? []).map((document) => ({
      ...document,
    }));
  }

  partitionIds(): string[] {
    return Array.from(this.partitions.keys()).sort();
  }
}
