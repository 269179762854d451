import { KeyBound, KeyRange } from "@/interfaces/keyRange.interface";
import { Shard, ShardCounts, ShardId } from "@/interfaces/shard.interface";

export interface ChunkInfo {
  min: KeyBound;
  max: KeyBound;
  shard: ShardId;
}

export type ClusterOperation = "listShards" | "splitAt" | "moveRange" | "setBalancerState" | "getBalancerState" | "findChunk" | "perShardCount";

// all mutating operations are idempotent: splitting at an existing boundary and
// moving a chunk onto the shard that owns it are no-ops
export interface ControlPlane {
  listShards(): Promise<Shard[]>;
  splitAt(collection: string, boundary: KeyBound): Promise<void>;
  moveRange(collection: string, range: KeyRange, targetShard: ShardId): Promise<void>;
  setBalancerState(enabled: boolean): Promise<void>;
  getBalancerState(): Promise<boolean>;
  // chunk whose [min, max) contains key
  findChunk(collection: string, key: KeyBound): Promise<ChunkInfo | undefined>;
}

export interface MetricsSource {
  perShardCount(collection: string): Promise<ShardCounts>;
}
