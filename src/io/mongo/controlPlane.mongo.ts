import { Document, MongoClient } from "mongodb";
import { ClusterOperationException } from "@/exceptions/PlannerException";
import { ChunkInfo, ClusterOperation, ControlPlane } from "@/interfaces/cluster.interface";
import { KeyBound, KeyRange } from "@/interfaces/keyRange.interface";
import { Shard, ShardId } from "@/interfaces/shard.interface";
import { fromDocument, KeyFields, toDocument } from "@/io/mongo/bson.mongo";
import { toClusterError } from "@/io/mongo/errors.mongo";
import { logger } from "@/utils/logger";

interface ShardedCollectionDoc {
  _id: string;
  key?: Document;
  uuid?: unknown;
}

interface CollectionMeta {
  uuid: unknown;
  fields: KeyFields;
}

// "rs0/mongo1:27017,mongo2:27017" -> rs0 + hosts; standalone shards have no prefix
export const parseShardHost = (host: string): { replicaSetName: string; endpoint: string } => {
  const slash = host.indexOf("/");
  if (slash === -1) {
    return { replicaSetName: "", endpoint: host };
  }
  return { replicaSetName: host.slice(0, slash), endpoint: host.slice(slash + 1) };
};

/**
 * Control plane over a mongos router. Chunk metadata is read from the config
 * database; splits, moves and balancer changes go through admin commands.
 */
class MongoControlPlane implements ControlPlane {
  private meta = new Map<string, CollectionMeta>();

  constructor(private client: MongoClient) {}

  public async listShards(): Promise<Shard[]> {
    const res = await this.command("listShards", { listShards: 1 });
    const shards: unknown = res.shards;
    if (!Array.isArray(shards)) {
      throw new ClusterOperationException("listShards", "response has no shard list", false);
    }
    return shards.map((shard: Document) => {
      const id: unknown = shard._id;
      const host: unknown = shard.host;
      if (typeof id !== "string" || typeof host !== "string") {
        throw new ClusterOperationException("listShards", `malformed shard entry ${JSON.stringify(shard)}`, false);
      }
      return { id, ...parseShardHost(host) };
    });
  }

  public async splitAt(collection: string, boundary: KeyBound): Promise<void> {
    const { fields } = await this.collectionMeta(collection, "splitAt");
    await this.command("splitAt", { split: collection, middle: toDocument(fields, boundary) });
  }

  public async moveRange(collection: string, range: KeyRange, targetShard: ShardId): Promise<void> {
    const { fields } = await this.collectionMeta(collection, "moveRange");
    await this.command("moveRange", {
      moveRange: collection,
      min: toDocument(fields, range.lowerBound),
      max: toDocument(fields, range.upperBound),
      toShard: targetShard,
    });
  }

  public async setBalancerState(enabled: boolean): Promise<void> {
    await this.command("setBalancerState", enabled ? { balancerStart: 1 } : { balancerStop: 1 });
  }

  public async getBalancerState(): Promise<boolean> {
    const res = await this.command("getBalancerState", { balancerStatus: 1 });
    return res.mode !== "off";
  }

  public async findChunk(collection: string, key: KeyBound): Promise<ChunkInfo | undefined> {
    const { uuid, fields } = await this.collectionMeta(collection, "findChunk");
    try {
      const [chunk] = await this.client
        .db("config")
        .collection("chunks")
        .find({ uuid, min: { $lte: toDocument(fields, key) } })
        .sort({ min: -1 })
        .limit(1)
        .toArray();
      if (chunk === undefined) {
        return undefined;
      }
      const shard: unknown = chunk.shard;
      if (typeof shard !== "string") {
        throw new ClusterOperationException("findChunk", `chunk without owning shard in ${collection}`, false);
      }
      return { min: fromDocument(fields, chunk.min), max: fromDocument(fields, chunk.max), shard };
    } catch (error) {
      throw toClusterError("findChunk", error);
    }
  }

  private async collectionMeta(collection: string, operation: ClusterOperation): Promise<CollectionMeta> {
    const cached = this.meta.get(collection);
    if (cached !== undefined) {
      return cached;
    }
    let doc: ShardedCollectionDoc | null;
    try {
      doc = await this.client.db("config").collection<ShardedCollectionDoc>("collections").findOne({ _id: collection });
    } catch (error) {
      throw toClusterError(operation, error);
    }
    if (doc === null) {
      throw new ClusterOperationException(operation, `${collection} is not sharded`, false);
    }
    const fields = doc.key === undefined ? [] : Object.keys(doc.key);
    if (fields.length !== 2) {
      throw new ClusterOperationException(operation, `${collection} shard key must have two fields, found ${fields.length}`, false);
    }
    const meta: CollectionMeta = { uuid: doc.uuid, fields: [fields[0], fields[1]] };
    this.meta.set(collection, meta);
    logger.info(`${collection} shard key: { ${meta.fields.join(", ")} }`);
    return meta;
  }

  private async command(operation: ClusterOperation, cmd: Document): Promise<Document> {
    try {
      return await this.client.db("admin").command(cmd);
    } catch (error) {
      throw toClusterError(operation, error);
    }
  }
}

export default MongoControlPlane;
