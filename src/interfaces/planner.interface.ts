import { VerificationOutcome } from "@/interfaces/distribution.interface";
import { KeyDomain, ShardKey } from "@/interfaces/keyRange.interface";
import { ExecutionRecord, PlacementPlan, RunSummary } from "@/interfaces/placement.interface";
import { ShardId } from "@/interfaces/shard.interface";

export type PolicyConfig = { kind: "round-robin" } | { kind: "weighted"; weights: { [shard_id: ShardId]: number } };

export interface PlannerConfig {
  collection: string;
  shardKey: ShardKey;
  domain: KeyDomain;
  shardCount: number;
  splitCount: number;
  // max share - min share, in [0, 1]
  tolerance: number;
  concurrency: number;
  policy: PolicyConfig;
}

export type RunStage = "planning" | "executing" | "ingesting" | "verifying";

export interface RunOptions {
  signal?: AbortSignal;
  // bulk ingestion; runs after placement, before the balancer resumes
  ingest?: (plan: PlacementPlan) => Promise<void>;
  onStage?: (stage: RunStage) => void;
  refresh?: boolean;
}

export interface RunReport {
  plan: PlacementPlan;
  records: ExecutionRecord[];
  summary: RunSummary;
  cancelled: boolean;
  ingested: boolean;
  verification: VerificationOutcome;
}

export type RunStatus = "planning" | "executing" | "ingesting" | "verifying" | "completed" | "failed" | "cancelled";

export interface RunState {
  id: string;
  status: RunStatus;
  config: PlannerConfig;
  startedAt: string;
  finishedAt?: string;
  report?: RunReport;
  error?: { message: string; code?: string };
}
