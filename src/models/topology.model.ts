import { Mutex } from "async-mutex";
import { ClusterOperationException, EmptyShardSetException } from "@/exceptions/PlannerException";
import { ControlPlane } from "@/interfaces/cluster.interface";
import { Shard, ShardId } from "@/interfaces/shard.interface";
import { logger } from "@/utils/logger";

/**
 * Shard membership for planning runs. Only `refresh` changes it; readers get a
 * frozen snapshot ordered by shard id so every run sees the same order.
 */
export class TopologyModel {
  private shards: readonly Shard[] = [];
  private refreshedAt?: Date;
  private mutex = new Mutex();

  public async refresh(source: Pick<ControlPlane, "listShards">): Promise<readonly Shard[]> {
    return this.mutex.runExclusive(async () => {
      const listed = await source.listShards();
      const seen = new Set<ShardId>();
      for (const shard of listed) {
        if (seen.has(shard.id)) {
          throw new ClusterOperationException("listShards", `duplicate shard id ${shard.id}`, false);
        }
        seen.add(shard.id);
      }
      const sorted = [...listed].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)).map(shard => Object.freeze({ ...shard }));
      this.shards = Object.freeze(sorted);
      this.refreshedAt = new Date();
      logger.info(`topology refreshed: ${sorted.map(shard => shard.id).join(", ") || "<none>"}`);
      return this.shards;
    });
  }

  public snapshot(): readonly Shard[] {
    return this.shards;
  }

  public get(id: ShardId): Shard | undefined {
    return this.shards.find(shard => shard.id === id);
  }

  public lastRefreshed(): Date | undefined {
    return this.refreshedAt;
  }

  // the first `count` shards by id
  public select(count: number): readonly Shard[] {
    if (this.shards.length === 0) {
      throw new EmptyShardSetException();
    }
    if (this.shards.length < count) {
      throw new EmptyShardSetException(`expected ${count} shards, cluster has ${this.shards.length}`);
    }
    return this.shards.slice(0, count);
  }
}

const topology = new TopologyModel();
export default topology;
