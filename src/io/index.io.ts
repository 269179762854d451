import { ChunkInfo, ControlPlane, MetricsSource } from "@/interfaces/cluster.interface";
import { KeyBound, KeyRange } from "@/interfaces/keyRange.interface";
import { Shard, ShardCounts, ShardId } from "@/interfaces/shard.interface";
import { HttpException } from "@/exceptions/HttpException";
import { logger } from "@/utils/logger";

// Routes every cluster call to whichever control plane and metrics source are
// bound, so services can be built before the cluster connection exists
class ClusterBinding implements ControlPlane, MetricsSource {
  private controlPlane?: ControlPlane;
  private metrics?: MetricsSource;

  public bind(controlPlane: ControlPlane, metrics: MetricsSource) {
    this.controlPlane = controlPlane;
    this.metrics = metrics;
    logger.info(`cluster bound: ${controlPlane.constructor.name} / ${metrics.constructor.name}`);
  }

  public unbind() {
    this.controlPlane = undefined;
    this.metrics = undefined;
  }

  public isBound(): boolean {
    return this.controlPlane !== undefined && this.metrics !== undefined;
  }

  public listShards(): Promise<Shard[]> {
    return this.plane().listShards();
  }

  public splitAt(collection: string, boundary: KeyBound): Promise<void> {
    return this.plane().splitAt(collection, boundary);
  }

  public moveRange(collection: string, range: KeyRange, targetShard: ShardId): Promise<void> {
    return this.plane().moveRange(collection, range, targetShard);
  }

  public setBalancerState(enabled: boolean): Promise<void> {
    return this.plane().setBalancerState(enabled);
  }

  public getBalancerState(): Promise<boolean> {
    return this.plane().getBalancerState();
  }

  public findChunk(collection: string, key: KeyBound): Promise<ChunkInfo | undefined> {
    return this.plane().findChunk(collection, key);
  }

  public perShardCount(collection: string): Promise<ShardCounts> {
    if (this.metrics === undefined) {
      return Promise.reject(new HttpException(503, "metrics source not connected"));
    }
    return this.metrics.perShardCount(collection);
  }

  private plane(): ControlPlane {
    if (this.controlPlane === undefined) {
      throw new HttpException(503, "cluster not connected");
    }
    return this.controlPlane;
  }
}

const cluster = new ClusterBinding();
export { ClusterBinding };
export default cluster;
