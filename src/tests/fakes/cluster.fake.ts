import { ClusterOperationException } from "@/exceptions/PlannerException";
import { ChunkInfo, ClusterOperation, ControlPlane, MetricsSource } from "@/interfaces/cluster.interface";
import { KeyBound, KeyRange } from "@/interfaces/keyRange.interface";
import { Shard, ShardCounts, ShardId } from "@/interfaces/shard.interface";
import { boundsEqual, compareBounds, GLOBAL_MAX, GLOBAL_MIN, rangeContains } from "@/models/keyBound.model";

interface FailureRule {
  operation: ClusterOperation;
  remaining: number;
  transient: boolean;
  match?: (arg: unknown) => boolean;
}

export const makeShards = (count: number): Shard[] =>
  Array.from({ length: count }, (_, i) => ({
    id: `shard${i + 1}`,
    endpoint: `mongo${i + 1}:27017`,
    replicaSetName: `rs${i + 1}`,
  }));

/**
 * In-memory cluster: a chunk map per collection, a balancer flag and per-shard
 * counts. Every call is counted; failures can be queued per operation.
 */
export class FakeCluster implements ControlPlane, MetricsSource {
  public balancerEnabled = true;
  public balancerHistory: boolean[] = [];
  public counts: { [collection: string]: ShardCounts } = {};
  public calls: Record<ClusterOperation, number> = {
    listShards: 0,
    splitAt: 0,
    moveRange: 0,
    setBalancerState: 0,
    getBalancerState: 0,
    findChunk: 0,
    perShardCount: 0,
  };
  public delays: Partial<Record<ClusterOperation, number>> = {};
  private chunks = new Map<string, ChunkInfo[]>();
  private failures: FailureRule[] = [];

  constructor(public shards: Shard[] = makeShards(3)) {}

  public fail(operation: ClusterOperation, options: { times?: number; transient?: boolean; match?: (arg: unknown) => boolean } = {}) {
    this.failures.push({ operation, remaining: options.times ?? 1, transient: options.transient ?? true, match: options.match });
  }

  public chunksOf(collection: string): ChunkInfo[] {
    let chunks = this.chunks.get(collection);
    if (chunks === undefined) {
      chunks = [{ min: GLOBAL_MIN, max: GLOBAL_MAX, shard: this.shards[0].id }];
      this.chunks.set(collection, chunks);
    }
    return chunks;
  }

  public async listShards(): Promise<Shard[]> {
    await this.enter("listShards");
    return this.shards.map(shard => ({ ...shard }));
  }

  public async splitAt(collection: string, boundary: KeyBound): Promise<void> {
    await this.enter("splitAt", boundary);
    const chunks = this.chunksOf(collection);
    const index = chunks.findIndex(chunk => rangeContains({ lowerBound: chunk.min, upperBound: chunk.max }, boundary));
    const chunk = chunks[index];
    if (chunk === undefined || boundsEqual(chunk.min, boundary)) {
      return;
    }
    chunks.splice(index, 1, { min: chunk.min, max: boundary, shard: chunk.shard }, { min: boundary, max: chunk.max, shard: chunk.shard });
  }

  public async moveRange(collection: string, range: KeyRange, targetShard: ShardId): Promise<void> {
    await this.enter("moveRange", range);
    if (!this.shards.some(shard => shard.id === targetShard)) {
      throw new ClusterOperationException("moveRange", `unknown shard ${targetShard}`, false);
    }
    const chunk = this.chunksOf(collection).find(c => boundsEqual(c.min, range.lowerBound) && boundsEqual(c.max, range.upperBound));
    if (chunk === undefined) {
      throw new ClusterOperationException("moveRange", "range is not a single chunk", false);
    }
    chunk.shard = targetShard;
  }

  public async setBalancerState(enabled: boolean): Promise<void> {
    await this.enter("setBalancerState", enabled);
    this.balancerEnabled = enabled;
    this.balancerHistory.push(enabled);
  }

  public async getBalancerState(): Promise<boolean> {
    await this.enter("getBalancerState");
    return this.balancerEnabled;
  }

  public async findChunk(collection: string, key: KeyBound): Promise<ChunkInfo | undefined> {
    await this.enter("findChunk", key);
    const chunk = this.chunksOf(collection).find(c => compareBounds(c.min, key) <= 0 && compareBounds(key, c.max) < 0);
    return chunk === undefined ? undefined : { ...chunk };
  }

  // configured counts, or chunks per shard when none were set
  public async perShardCount(collection: string): Promise<ShardCounts> {
    await this.enter("perShardCount", collection);
    const configured = this.counts[collection];
    if (configured !== undefined) {
      return { ...configured };
    }
    const counts: ShardCounts = {};
    for (const chunk of this.chunksOf(collection)) {
      counts[chunk.shard] = (counts[chunk.shard] ?? 0) + 1;
    }
    return counts;
  }

  private async enter(operation: ClusterOperation, arg?: unknown): Promise<void> {
    this.calls[operation]++;
    const delay = this.delays[operation];
    if (delay !== undefined) {
      await new Promise<void>(resolve => setTimeout(resolve, delay));
    }
    const rule = this.failures.find(r => r.operation === operation && r.remaining > 0 && (r.match === undefined || r.match(arg)));
    if (rule !== undefined) {
      rule.remaining--;
      throw new ClusterOperationException(operation, "injected failure", rule.transient);
    }
  }
}
