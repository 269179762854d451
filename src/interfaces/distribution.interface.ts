import { ShardId } from "@/interfaces/shard.interface";

export interface ShardShare {
  shard: ShardId;
  count: number;
  share: number;
}

export interface DistributionReport {
  collection: string;
  total: number;
  shares: ShardShare[];
  skew: number;
  generatedAt: string;
}

export type VerificationOutcome =
  | { available: true; balanced: boolean; tolerance: number; report: DistributionReport }
  | { available: false; reason: string };
