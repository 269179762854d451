import { HttpException } from "@/exceptions/HttpException";
import { EmptyShardSetException } from "@/exceptions/PlannerException";
import { GLOBAL_MIN, MIN_KEY } from "@/models/keyBound.model";
import chunkAssignerService, { roundRobin, WeightedPolicy } from "@/services/chunkAssigner.service";
import rangeSplitterService from "@/services/rangeSplitter.service";
import { makeShards } from "@/tests/fakes/cluster.fake";

const target = { collection: "shop.products", shardKey: { primaryField: "category_id", tiebreakerField: "product_id" } };
const rangesOf = (splitCount: number) => rangeSplitterService.split({ kind: "integer", min: 0, max: 99 }, splitCount);

describe("Testing Chunk Assigner", () => {
  describe("round-robin", () => {
    it("assigns range i to shard i mod S", () => {
      const plan = chunkAssignerService.assign(rangesOf(99), makeShards(3), target);
      expect(plan.entries).toHaveLength(99);
      plan.entries.forEach((entry, i) => {
        expect(entry.index).toBe(i);
        expect(entry.targetShard).toBe(`shard${(i % 3) + 1}`);
      });
      expect(chunkAssignerService.shardLoad(plan)).toStrictEqual({ shard1: 33, shard2: 33, shard3: 33 });
    });

    it("keeps per-shard counts within one of each other", () => {
      for (const [splitCount, shardCount] of [
        [10, 3],
        [7, 4],
        [100, 6],
        [2, 5],
      ]) {
        const plan = chunkAssignerService.assign(rangesOf(splitCount), makeShards(shardCount), target);
        const load = Object.values(chunkAssignerService.shardLoad(plan, makeShards(shardCount)));
        expect(Math.max(...load) - Math.min(...load)).toBeLessThanOrEqual(1);
      }
    });

    it("lists shards that receive no range", () => {
      const plan = chunkAssignerService.assign(rangesOf(2), makeShards(3), target);
      expect(chunkAssignerService.shardLoad(plan, makeShards(3))).toStrictEqual({ shard1: 1, shard2: 1, shard3: 0 });
    });

    it("builds an immutable plan carrying the target collection", () => {
      const plan = chunkAssignerService.assign(rangesOf(3), makeShards(3), target, roundRobin);
      expect(plan.collection).toBe("shop.products");
      expect(plan.shardKey).toStrictEqual(target.shardKey);
      expect(plan.policy).toBe("round-robin");
      expect(Object.isFrozen(plan)).toBe(true);
      expect(Object.isFrozen(plan.entries)).toBe(true);
      expect(Object.isFrozen(plan.entries[0])).toBe(true);
    });

    it("rejects an empty shard set", () => {
      expect(() => chunkAssignerService.assign(rangesOf(3), [], target)).toThrow(EmptyShardSetException);
    });
  });

  describe("weighted", () => {
    it("gives heavier shards proportionally more ranges", () => {
      const policy = new WeightedPolicy({ shard1: 2 });
      const plan = chunkAssignerService.assign(rangesOf(8), makeShards(3), target, policy);
      expect(plan.entries.map(entry => entry.targetShard)).toStrictEqual([
        "shard1",
        "shard2",
        "shard3",
        "shard1",
        "shard1",
        "shard2",
        "shard3",
        "shard1",
      ]);
      expect(plan.policy).toBe("weighted");
    });

    it("matches round-robin when weights are equal", () => {
      const ranges = rangesOf(20);
      const shards = makeShards(4);
      const weighted = new WeightedPolicy({ shard1: 5, shard2: 5, shard3: 5, shard4: 5 }).assign(ranges, shards);
      expect(weighted).toStrictEqual(roundRobin.assign(ranges, shards));
    });

    it("rejects non-positive weights", () => {
      expect(() => new WeightedPolicy({ shard1: 0 })).toThrow("weight of shard1 must be a positive number, got 0");
      expect(() => new WeightedPolicy({ shard1: -2 })).toThrow(HttpException);
    });
  });

  describe("routeKey", () => {
    const plan = chunkAssignerService.assign(rangesOf(99), makeShards(3), target);

    it("finds the entry holding a key", () => {
      expect(chunkAssignerService.routeKey(plan, { primary: 42, tiebreaker: 12345 })?.index).toBe(42);
      expect(chunkAssignerService.routeKey(plan, { primary: 42, tiebreaker: MIN_KEY })?.targetShard).toBe("shard1");
      expect(chunkAssignerService.routeKey(plan, GLOBAL_MIN)?.index).toBe(0);
    });

    it("puts the two highest categories in the last range", () => {
      expect(chunkAssignerService.routeKey(plan, { primary: 98, tiebreaker: 1 })?.index).toBe(98);
      expect(chunkAssignerService.routeKey(plan, { primary: 99, tiebreaker: 1 })?.index).toBe(98);
      expect(chunkAssignerService.routeKey(plan, { primary: 99, tiebreaker: 1 })?.targetShard).toBe("shard3");
    });
  });
});
