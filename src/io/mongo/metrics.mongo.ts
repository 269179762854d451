import { MongoClient } from "mongodb";
import { MetricsSource } from "@/interfaces/cluster.interface";
import { ShardCounts } from "@/interfaces/shard.interface";
import { toClusterError } from "@/io/mongo/errors.mongo";
import { parseNamespace } from "@/utils/util";

// document counts per shard from $collStats, one result document per shard
class MongoMetricsSource implements MetricsSource {
  constructor(private client: MongoClient) {}

  public async perShardCount(collection: string): Promise<ShardCounts> {
    const { db, collection: name } = parseNamespace(collection);
    try {
      const stats = await this.client
        .db(db)
        .collection(name)
        .aggregate<{ shard?: string; count?: number }>([
          { $collStats: { storageStats: {} } },
          { $project: { _id: 0, shard: 1, count: "$storageStats.count" } },
        ])
        .toArray();
      const counts: ShardCounts = {};
      for (const { shard, count } of stats) {
        const key = shard ?? "unsharded";
        counts[key] = (counts[key] ?? 0) + (count ?? 0);
      }
      return counts;
    } catch (error) {
      throw toClusterError("perShardCount", error);
    }
  }
}

export default MongoMetricsSource;
