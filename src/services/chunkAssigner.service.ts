import { randomUUID } from "crypto";
import { HttpException } from "@/exceptions/HttpException";
import { EmptyShardSetException } from "@/exceptions/PlannerException";
import { KeyBound, KeyRange, ShardKey } from "@/interfaces/keyRange.interface";
import { AssignmentPolicy, PlacementEntry, PlacementPlan } from "@/interfaces/placement.interface";
import { Shard, ShardCounts, ShardId } from "@/interfaces/shard.interface";
import { compareBounds, rangeContains } from "@/models/keyBound.model";

// range i -> shards[i mod S]
export class RoundRobinPolicy implements AssignmentPolicy {
  public readonly name = "round-robin";

  public assign(ranges: readonly KeyRange[], shards: readonly Shard[]): ShardId[] {
    return ranges.map((_, i) => shards[i % shards.length].id);
  }
}

/**
 * Smooth weighted round-robin. Each step every shard gains its weight, the
 * largest running total wins (ties go to the earlier shard) and pays back the
 * sum of weights. Shards missing from `weights` count as 1; equal weights give
 * exactly the round-robin order.
 */
export class WeightedPolicy implements AssignmentPolicy {
  public readonly name = "weighted";
  private weights: Readonly<Record<ShardId, number>>;

  constructor(weights: Record<ShardId, number>) {
    for (const [shard, weight] of Object.entries(weights)) {
      if (!Number.isFinite(weight) || weight <= 0) {
        throw new HttpException(400, `weight of ${shard} must be a positive number, got ${weight}`);
      }
    }
    this.weights = { ...weights };
  }

  public assign(ranges: readonly KeyRange[], shards: readonly Shard[]): ShardId[] {
    const weights = shards.map(shard => this.weights[shard.id] ?? 1);
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    const current = shards.map(() => 0);
    return ranges.map(() => {
      let best = 0;
      for (let s = 0; s < shards.length; s++) {
        current[s] += weights[s];
        if (current[s] > current[best]) {
          best = s;
        }
      }
      current[best] -= total;
      return shards[best].id;
    });
  }
}

export const roundRobin = new RoundRobinPolicy();

class ChunkAssignerService {
  public assign(
    ranges: readonly KeyRange[],
    shards: readonly Shard[],
    target: { collection: string; shardKey: ShardKey },
    policy: AssignmentPolicy = roundRobin,
  ): PlacementPlan {
    if (shards.length === 0) {
      throw new EmptyShardSetException();
    }
    const targets = policy.assign(ranges, shards);
    if (targets.length !== ranges.length) {
      throw new HttpException(500, `policy ${policy.name} assigned ${targets.length} of ${ranges.length} ranges`);
    }
    const known = new Set(shards.map(shard => shard.id));
    const entries: PlacementEntry[] = ranges.map((range, index) => {
      const targetShard = targets[index];
      if (!known.has(targetShard)) {
        throw new HttpException(500, `policy ${policy.name} chose unknown shard ${targetShard}`);
      }
      return Object.freeze({ index, range: Object.freeze({ ...range }), targetShard });
    });

    return Object.freeze({
      id: randomUUID(),
      collection: target.collection,
      shardKey: Object.freeze({ ...target.shardKey }),
      policy: policy.name,
      createdAt: new Date().toISOString(),
      entries: Object.freeze(entries),
    });
  }

  // entry whose range holds `key`; entries are ordered by lower bound
  public routeKey(plan: PlacementPlan, key: KeyBound): PlacementEntry | undefined {
    let low = 0;
    let high = plan.entries.length - 1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      const entry = plan.entries[mid];
      if (rangeContains(entry.range, key)) {
        return entry;
      }
      if (compareBounds(key, entry.range.lowerBound) < 0) {
        high = mid - 1;
      } else {
        low = mid + 1;
      }
    }
    return undefined;
  }

  // ranges per shard; shards given up front are listed even when they get nothing
  public shardLoad(plan: PlacementPlan, shards: readonly Shard[] = []): ShardCounts {
    const load: ShardCounts = {};
    for (const shard of shards) {
      load[shard.id] = 0;
    }
    for (const entry of plan.entries) {
      load[entry.targetShard] = (load[entry.targetShard] ?? 0) + 1;
    }
    return load;
  }
}

const chunkAssignerService = new ChunkAssignerService();
export { ChunkAssignerService };
export default chunkAssignerService;
