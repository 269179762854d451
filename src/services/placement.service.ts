import { Semaphore } from "async-mutex";
import { CONCURRENCY, OPERATION_TIMEOUT_MS, RETRY_ATTEMPTS, RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS } from "@/config";
import { isTransient, PlacementFailedException } from "@/exceptions/PlannerException";
import { ChunkInfo, ClusterOperation, ControlPlane } from "@/interfaces/cluster.interface";
import { KeyBound } from "@/interfaces/keyRange.interface";
import { ExecuteOptions, ExecutionRecord, ExecutionResult, PlacementEntry, PlacementPlan, RunSummary } from "@/interfaces/placement.interface";
import cluster from "@/io/index.io";
import { boundsEqual, formatBound, formatRange, GLOBAL_MAX, GLOBAL_MIN } from "@/models/keyBound.model";
import { logger } from "@/utils/logger";
import { RetrySettings, withRetry, withTimeout } from "@/utils/retry";
import { describeError } from "@/utils/util";

type PlacementControl = Pick<ControlPlane, "splitAt" | "moveRange" | "findChunk">;

export interface PlacementSettings extends RetrySettings {
  concurrency: number;
}

class EntryFailure extends Error {
  constructor(public readonly operation: string, public readonly reason: unknown) {
    super(describeError(reason));
  }
}

export const summarize = (records: readonly ExecutionRecord[], plan: PlacementPlan): RunSummary => {
  const summary: RunSummary = { total: records.length, split: 0, moved: 0, failed: 0, skipped: 0, pending: 0, failures: [] };
  for (const record of records) {
    if (record.splitIssued) summary.split++;
    if (record.moveIssued) summary.moved++;
    if (record.status === "pending") {
      summary.pending++;
    } else if (record.status === "failed") {
      summary.failed++;
      const entry = plan.entries[record.index];
      summary.failures.push({
        index: record.index,
        targetShard: entry.targetShard,
        operation: record.failedOperation ?? "apply",
        message: record.error ?? "",
      });
    } else if (record.status === "moved" && !record.splitIssued && !record.moveIssued) {
      summary.skipped++;
    }
  }
  return summary;
};

/**
 * Applies a placement plan entry by entry: make the range's bounds chunk
 * boundaries, then move the chunk to its target shard. Both steps read the
 * cluster's chunk map first and skip work that is already in place, so a plan
 * can be re-run from any prefix. A failed entry is recorded and the remaining
 * entries still run.
 */
class PlacementService {
  constructor(private control: PlacementControl, private settings: PlacementSettings) {}

  public async execute(plan: PlacementPlan, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const { signal } = options;
    const concurrency = Math.max(1, options.concurrency ?? this.settings.concurrency);
    const previous = new Map((options.records ?? []).map(record => [record.index, record]));

    const records: ExecutionRecord[] = plan.entries.map(entry => {
      const done = previous.get(entry.index)?.status === "moved";
      return { index: entry.index, status: done ? "moved" : "pending", splitIssued: false, moveIssued: false, retries: 0 };
    });

    logger.info(`executing plan ${plan.id}: ${plan.entries.length} entries on ${plan.collection}, concurrency ${concurrency}`);
    const semaphore = new Semaphore(concurrency);
    await Promise.all(
      plan.entries.map(entry =>
        semaphore.runExclusive(async () => {
          const record = records[entry.index];
          // entries not yet started stay pending once cancelled; started ones finish
          if (record.status !== "pending" || signal?.aborted) {
            return;
          }
          await this.applyEntry(plan, entry, record);
        }),
      ),
    );

    const summary = summarize(records, plan);
    const cancelled = signal?.aborted === true && summary.pending > 0;
    logger.info(
      `plan ${plan.id} ${cancelled ? "cancelled" : "finished"}: split=${summary.split} moved=${summary.moved} failed=${summary.failed} skipped=${summary.skipped} pending=${summary.pending}`,
    );
    return { planId: plan.id, records, summary, cancelled };
  }

  private async applyEntry(plan: PlacementPlan, entry: PlacementEntry, record: ExecutionRecord): Promise<void> {
    const { collection } = plan;
    try {
      const splitLower = await this.ensureBoundary(collection, entry.range.lowerBound, record);
      const splitUpper = await this.ensureBoundary(collection, entry.range.upperBound, record);
      record.splitIssued = splitLower || splitUpper;
      record.status = "split-done";

      record.moveIssued = await this.ensureResident(plan, entry, record);
      record.status = "moved";
    } catch (error) {
      const operation = error instanceof EntryFailure ? error.operation : "apply";
      const failure = new PlacementFailedException(entry.index, operation, error instanceof EntryFailure ? error.reason : error);
      record.status = "failed";
      record.failedOperation = operation;
      record.error = failure.message;
      logger.error(`${failure.message} (range ${formatRange(entry.range)} -> ${entry.targetShard})`);
    }
  }

  // true when a split was issued
  private async ensureBoundary(collection: string, bound: KeyBound, record: ExecutionRecord): Promise<boolean> {
    if (boundsEqual(bound, GLOBAL_MIN) || boundsEqual(bound, GLOBAL_MAX)) {
      return false;
    }
    if (await this.isBoundary(collection, bound, record)) {
      return false;
    }
    try {
      await this.call("splitAt", () => this.control.splitAt(collection, bound), record);
    } catch (error) {
      // a concurrent entry may have split at the same bound first
      if (await this.isBoundary(collection, bound, record)) {
        logger.debug(`split at ${formatBound(bound)} failed but the boundary exists: ${describeError(error)}`);
        return true;
      }
      throw new EntryFailure("splitAt", error);
    }
    logger.debug(`split ${collection} at ${formatBound(bound)}`);
    return true;
  }

  private async isBoundary(collection: string, bound: KeyBound, record: ExecutionRecord): Promise<boolean> {
    const chunk = await this.lookup(collection, bound, record);
    return chunk !== undefined && boundsEqual(chunk.min, bound);
  }

  // true when a move was issued
  private async ensureResident(plan: PlacementPlan, entry: PlacementEntry, record: ExecutionRecord): Promise<boolean> {
    const { collection } = plan;
    const chunk = await this.lookup(collection, entry.range.lowerBound, record);
    if (chunk === undefined) {
      throw new EntryFailure("findChunk", new Error(`no chunk contains ${formatBound(entry.range.lowerBound)}`));
    }
    if (chunk.shard === entry.targetShard) {
      return false;
    }
    try {
      await this.call("moveRange", () => this.control.moveRange(collection, entry.range, entry.targetShard), record);
    } catch (error) {
      throw new EntryFailure("moveRange", error);
    }

    const moved = await this.lookup(collection, entry.range.lowerBound, record);
    if (moved?.shard !== entry.targetShard) {
      throw new EntryFailure("moveRange", new Error(`chunk still on ${moved?.shard ?? "no shard"} after move to ${entry.targetShard}`));
    }
    logger.debug(`moved ${formatRange(entry.range)} from ${chunk.shard} to ${entry.targetShard}`);
    return true;
  }

  private async lookup(collection: string, key: KeyBound, record: ExecutionRecord): Promise<ChunkInfo | undefined> {
    try {
      return await this.call("findChunk", () => this.control.findChunk(collection, key), record);
    } catch (error) {
      throw new EntryFailure("findChunk", error);
    }
  }

  private call<T>(operation: ClusterOperation, fn: () => Promise<T>, record: ExecutionRecord): Promise<T> {
    return withRetry(() => withTimeout(operation, fn(), this.settings.timeoutMs), {
      attempts: this.settings.attempts,
      baseDelayMs: this.settings.baseDelayMs,
      maxDelayMs: this.settings.maxDelayMs,
      isRetryable: isTransient,
      onRetry: (error, attempt, delayMs) => {
        record.retries++;
        logger.warn(`entry ${record.index} ${operation} attempt ${attempt} failed, retrying in ${delayMs}ms: ${describeError(error)}`);
      },
    });
  }
}

const placementService = new PlacementService(cluster, {
  concurrency: CONCURRENCY,
  attempts: RETRY_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  timeoutMs: OPERATION_TIMEOUT_MS,
});
export { PlacementService };
export default placementService;
