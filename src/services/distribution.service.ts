import { VerificationUnavailableException } from "@/exceptions/PlannerException";
import { MetricsSource } from "@/interfaces/cluster.interface";
import { DistributionReport, ShardShare } from "@/interfaces/distribution.interface";
import { ShardCounts, ShardId } from "@/interfaces/shard.interface";
import cluster from "@/io/index.io";
import { logger } from "@/utils/logger";

// float slack on skew comparisons: 0.34 - 0.33 is 0.010000000000000009
const EPSILON = 1e-9;

export const computeReport = (collection: string, counts: ShardCounts, shards: readonly ShardId[] = []): DistributionReport => {
  const order = [...shards, ...Object.keys(counts).filter(shard => !shards.includes(shard)).sort()];
  const total = order.reduce((sum, shard) => sum + (counts[shard] ?? 0), 0);
  const shares: ShardShare[] = order.map(shard => {
    const count = counts[shard] ?? 0;
    return { shard, count, share: total === 0 ? 0 : count / total };
  });
  const values = shares.map(share => share.share);
  const skew = values.length === 0 ? 0 : Math.max(...values) - Math.min(...values);
  return { collection, total, shares, skew, generatedAt: new Date().toISOString() };
};

class DistributionService {
  constructor(private metrics: MetricsSource) {}

  /**
   * Reads per-shard document counts and reports each shard's share. Shards
   * listed in `shards` but missing from the counts are reported with 0. Does
   * not wait for the balancer; poll from the caller when migrations are pending.
   */
  public async verify(collection: string, shards: readonly ShardId[] = []): Promise<DistributionReport> {
    let counts: ShardCounts;
    try {
      counts = await this.metrics.perShardCount(collection);
    } catch (error) {
      throw new VerificationUnavailableException(collection, error);
    }
    for (const [shard, count] of Object.entries(counts)) {
      if (!Number.isFinite(count) || count < 0) {
        throw new VerificationUnavailableException(collection, new Error(`invalid count ${count} for ${shard}`));
      }
    }
    const report = computeReport(collection, counts, shards);
    logger.info(`distribution of ${collection}: ${report.shares.map(s => `${s.shard}=${s.count}`).join(" ")} skew=${report.skew.toFixed(4)}`);
    return report;
  }

  public isBalanced(report: DistributionReport, tolerance: number): boolean {
    return report.skew <= tolerance + EPSILON;
  }
}

const distributionService = new DistributionService(cluster);
export { DistributionService };
export default distributionService;
