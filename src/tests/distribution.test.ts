import { VerificationUnavailableException } from "@/exceptions/PlannerException";
import { computeReport, DistributionService } from "@/services/distribution.service";
import { FakeCluster } from "@/tests/fakes/cluster.fake";

const SHARDS = ["shard1", "shard2", "shard3"];

describe("Testing Distribution Verifier", () => {
  describe("computeReport", () => {
    it("reports each shard's share and the skew", () => {
      const report = computeReport("shop.products", { shard1: 340, shard2: 330, shard3: 330 }, SHARDS);
      expect(report.total).toBe(1000);
      expect(report.shares).toStrictEqual([
        { shard: "shard1", count: 340, share: 0.34 },
        { shard: "shard2", count: 330, share: 0.33 },
        { shard: "shard3", count: 330, share: 0.33 },
      ]);
      expect(report.skew).toBeCloseTo(0.01);
    });

    it("counts a listed shard with no documents as 0", () => {
      const report = computeReport("shop.products", { shard1: 10, shard2: 10 }, SHARDS);
      expect(report.shares.map(share => share.share)).toStrictEqual([0.5, 0.5, 0]);
      expect(report.skew).toBe(0.5);
    });

    it("lists unexpected shards after the expected ones, sorted", () => {
      const report = computeReport("shop.products", { zeta: 1, shard1: 1, alpha: 2 }, ["shard1"]);
      expect(report.shares.map(share => share.shard)).toStrictEqual(["shard1", "alpha", "zeta"]);
      expect(report.total).toBe(4);
    });

    it("reports zero shares and zero skew for an empty collection", () => {
      const report = computeReport("shop.products", {}, SHARDS);
      expect(report.total).toBe(0);
      expect(report.shares.every(share => share.share === 0)).toBe(true);
      expect(report.skew).toBe(0);
    });
  });

  describe("DistributionService", () => {
    let fake: FakeCluster;
    let verifier: DistributionService;

    beforeEach(() => {
      fake = new FakeCluster();
      verifier = new DistributionService(fake);
    });

    it("checks the skew against the tolerance", async () => {
      fake.counts["shop.products"] = { shard1: 340, shard2: 330, shard3: 330 };
      const report = await verifier.verify("shop.products", SHARDS);
      expect(verifier.isBalanced(report, 0.05)).toBe(true);
      expect(verifier.isBalanced(report, 0.01)).toBe(true);
      expect(verifier.isBalanced(report, 0.005)).toBe(false);
    });

    it("raises VerificationUnavailable when metrics cannot be read", async () => {
      fake.fail("perShardCount");
      const error = await verifier.verify("shop.products", SHARDS).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(VerificationUnavailableException);
      expect(error).toHaveProperty("message", "distribution of shop.products unavailable: perShardCount: injected failure");
    });

    it("rejects negative counts", async () => {
      fake.counts["shop.products"] = { shard1: -1 };
      await expect(verifier.verify("shop.products")).rejects.toThrow("invalid count -1 for shard1");
    });
  });
});
