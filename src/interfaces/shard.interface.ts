export type ShardId = string;

export interface Shard {
  id: ShardId;
  // host list as reported by the cluster, e.g. "mongo1:27017,mongo2:27017"
  endpoint: string;
  replicaSetName: string;
}

export interface ShardCounts {
  [shard_id: ShardId]: number;
}
