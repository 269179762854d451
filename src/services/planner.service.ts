import { COLLECTION, CONCURRENCY, KEY_DOMAIN_MAX, KEY_DOMAIN_MIN, PRIMARY_FIELD, SHARD_COUNT, SPLIT_COUNT, TIEBREAKER_FIELD, TOLERANCE } from "@/config";
import { VerificationUnavailableException } from "@/exceptions/PlannerException";
import { ControlPlane } from "@/interfaces/cluster.interface";
import { DistributionReport, VerificationOutcome } from "@/interfaces/distribution.interface";
import { AssignmentPolicy, PlacementPlan } from "@/interfaces/placement.interface";
import { PlannerConfig, PolicyConfig, RunOptions, RunReport } from "@/interfaces/planner.interface";
import { Shard } from "@/interfaces/shard.interface";
import cluster from "@/io/index.io";
import topology, { TopologyModel } from "@/models/topology.model";
import balancerService, { BalancerService } from "@/services/balancer.service";
import chunkAssignerService, { ChunkAssignerService, roundRobin, WeightedPolicy } from "@/services/chunkAssigner.service";
import distributionService, { DistributionService } from "@/services/distribution.service";
import placementService, { PlacementService } from "@/services/placement.service";
import rangeSplitterService, { RangeSplitterService } from "@/services/rangeSplitter.service";
import { logger } from "@/utils/logger";
import { sleep } from "@/utils/retry";
import { describeError } from "@/utils/util";

export const defaultPlannerConfig = (): PlannerConfig => ({
  collection: COLLECTION,
  shardKey: { primaryField: PRIMARY_FIELD, tiebreakerField: TIEBREAKER_FIELD },
  domain: { kind: "integer", min: KEY_DOMAIN_MIN, max: KEY_DOMAIN_MAX },
  shardCount: SHARD_COUNT,
  splitCount: SPLIT_COUNT,
  tolerance: TOLERANCE,
  concurrency: CONCURRENCY,
  policy: { kind: "round-robin" },
});

export const toPolicy = (config: PolicyConfig): AssignmentPolicy =>
  config.kind === "weighted" ? new WeightedPolicy(config.weights) : roundRobin;

export interface PlannerDependencies {
  topology: TopologyModel;
  controlPlane: Pick<ControlPlane, "listShards">;
  splitter: RangeSplitterService;
  assigner: ChunkAssignerService;
  balancer: BalancerService;
  placement: PlacementService;
  distribution: DistributionService;
}

/**
 * One planning run: split -> assign -> suspend -> execute -> (ingest) -> resume -> verify.
 * Domain, shard-set and balancer failures abort the run; per-entry failures end
 * up in the summary; an unreachable metrics source only marks verification
 * unavailable.
 */
class PlannerService {
  constructor(private deps: PlannerDependencies) {}

  public refreshTopology(): Promise<readonly Shard[]> {
    return this.deps.topology.refresh(this.deps.controlPlane);
  }

  public topology(): readonly Shard[] {
    return this.deps.topology.snapshot();
  }

  public async plan(config: PlannerConfig, refresh = true): Promise<PlacementPlan> {
    if (refresh || this.deps.topology.lastRefreshed() === undefined) {
      await this.refreshTopology();
    }
    const ranges = this.deps.splitter.split(config.domain, config.splitCount);
    const shards = this.deps.topology.select(config.shardCount);
    const plan = this.deps.assigner.assign(ranges, shards, { collection: config.collection, shardKey: config.shardKey }, toPolicy(config.policy));
    logger.info(`plan ${plan.id}: ${ranges.length} ranges over ${shards.map(shard => shard.id).join(", ")} (${plan.policy})`);
    return plan;
  }

  public async run(config: PlannerConfig, options: RunOptions = {}): Promise<RunReport> {
    const { signal, ingest, onStage } = options;
    onStage?.("planning");
    const plan = await this.plan(config, options.refresh ?? true);
    const shardIds = this.deps.topology.select(config.shardCount).map(shard => shard.id);

    onStage?.("executing");
    const { execution, ingested } = await this.deps.balancer.runSuspended(async () => {
      const result = await this.deps.placement.execute(plan, { signal, concurrency: config.concurrency });
      if (ingest === undefined) {
        return { execution: result, ingested: false };
      }
      if (result.cancelled || result.summary.failed > 0) {
        logger.warn(`skipping ingestion for plan ${plan.id}: ${result.summary.failed} failed, ${result.summary.pending} pending entries`);
        return { execution: result, ingested: false };
      }
      onStage?.("ingesting");
      await ingest(plan);
      return { execution: result, ingested: true };
    });

    onStage?.("verifying");
    const verification = await this.verification(plan.collection, shardIds, config.tolerance);
    return {
      plan,
      records: execution.records,
      summary: execution.summary,
      cancelled: execution.cancelled,
      ingested,
      verification,
    };
  }

  /**
   * Polls the distribution until it is within tolerance, e.g. while the
   * resumed balancer finishes its migrations. Resolves with the last report.
   */
  public async awaitBalanced(
    collection: string,
    tolerance: number,
    { intervalMs = 5000, timeoutMs = 300000, signal }: { intervalMs?: number; timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<{ balanced: boolean; report: DistributionReport }> {
    const deadline = Date.now() + timeoutMs;
    const shards = this.topology().map(shard => shard.id);
    for (;;) {
      const report = await this.deps.distribution.verify(collection, shards);
      const balanced = this.deps.distribution.isBalanced(report, tolerance);
      if (balanced || signal?.aborted || Date.now() + intervalMs > deadline) {
        return { balanced, report };
      }
      await sleep(intervalMs);
    }
  }

  private async verification(collection: string, shards: readonly string[], tolerance: number): Promise<VerificationOutcome> {
    try {
      const report = await this.deps.distribution.verify(collection, shards);
      return { available: true, balanced: this.deps.distribution.isBalanced(report, tolerance), tolerance, report };
    } catch (error) {
      if (error instanceof VerificationUnavailableException) {
        logger.warn(`verification skipped: ${describeError(error)}`);
        return { available: false, reason: error.message };
      }
      throw error;
    }
  }
}

const plannerService = new PlannerService({
  topology,
  controlPlane: cluster,
  splitter: rangeSplitterService,
  assigner: chunkAssignerService,
  balancer: balancerService,
  placement: placementService,
  distribution: distributionService,
});
export { PlannerService };
export default plannerService;
