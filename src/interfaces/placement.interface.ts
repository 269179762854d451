import { KeyRange, ShardKey } from "@/interfaces/keyRange.interface";
import { Shard, ShardId } from "@/interfaces/shard.interface";

export interface PlacementEntry {
  readonly index: number;
  readonly range: KeyRange;
  readonly targetShard: ShardId;
}

export interface PlacementPlan {
  readonly id: string;
  // namespace, "<db>.<collection>"
  readonly collection: string;
  readonly shardKey: ShardKey;
  readonly policy: string;
  readonly createdAt: string;
  readonly entries: readonly PlacementEntry[];
}

export interface AssignmentPolicy {
  readonly name: string;
  // one target shard per range, in range order
  assign(ranges: readonly KeyRange[], shards: readonly Shard[]): ShardId[];
}

export type ExecutionStatus = "pending" | "split-done" | "moved" | "failed";

export interface ExecutionRecord {
  index: number;
  status: ExecutionStatus;
  splitIssued: boolean;
  moveIssued: boolean;
  retries: number;
  failedOperation?: string;
  error?: string;
}

export interface PlacementFailure {
  index: number;
  targetShard: ShardId;
  operation: string;
  message: string;
}

export interface RunSummary {
  total: number;
  split: number;
  moved: number;
  failed: number;
  skipped: number;
  pending: number;
  failures: PlacementFailure[];
}

export interface ExecutionResult {
  planId: string;
  records: ExecutionRecord[];
  summary: RunSummary;
  cancelled: boolean;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  // records of an earlier, partial execution of the same plan
  records?: readonly ExecutionRecord[];
  concurrency?: number;
}
