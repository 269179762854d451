import { HttpException } from "@/exceptions/HttpException";
import { BalancerStateException } from "@/exceptions/PlannerException";
import { BalancerService } from "@/services/balancer.service";
import { FakeCluster } from "@/tests/fakes/cluster.fake";
import { sleep } from "@/utils/retry";

const settings = { attempts: 3, baseDelayMs: 1, maxDelayMs: 2, timeoutMs: 1000 };

describe("Testing Balancer Coordinator", () => {
  let fake: FakeCluster;
  let balancer: BalancerService;

  beforeEach(() => {
    fake = new FakeCluster();
    balancer = new BalancerService(fake, settings);
  });

  describe("suspend / resume", () => {
    it("resume without a prior suspend leaves the balancer running", async () => {
      await balancer.resume();
      expect(fake.balancerEnabled).toBe(true);
      expect(fake.calls.setBalancerState).toBe(0);
    });

    it("suspend is idempotent", async () => {
      await balancer.suspend();
      await balancer.suspend();
      expect(fake.balancerEnabled).toBe(false);
      expect(fake.balancerHistory).toStrictEqual([false]);
      await expect(balancer.state()).resolves.toBe(false);
    });

    it("retries a transient failure", async () => {
      fake.fail("setBalancerState");
      await balancer.suspend();
      expect(fake.calls.setBalancerState).toBe(2);
      expect(fake.calls.getBalancerState).toBe(2);
      expect(fake.balancerHistory).toStrictEqual([false]);
    });

    it("raises BalancerStateError once retries run out", async () => {
      fake.fail("getBalancerState", { times: Infinity });
      const error = await balancer.suspend().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BalancerStateException);
      expect(error).toHaveProperty("operation", "suspend");
      expect(fake.calls.getBalancerState).toBe(3);
      expect(fake.balancerEnabled).toBe(true);
    });

    it("does not retry a permanent failure", async () => {
      fake.fail("setBalancerState", { transient: false });
      await expect(balancer.suspend()).rejects.toThrow("balancer suspend failed: setBalancerState: injected failure");
      expect(fake.calls.setBalancerState).toBe(1);
    });
  });

  describe("runSuspended", () => {
    it("runs the work with the balancer stopped and resumes it afterwards", async () => {
      const result = await balancer.runSuspended(async () => {
        expect(fake.balancerEnabled).toBe(false);
        expect(balancer.isHeld()).toBe(true);
        return 42;
      });
      expect(result).toBe(42);
      expect(fake.balancerHistory).toStrictEqual([false, true]);
      expect(balancer.isHeld()).toBe(false);
    });

    it("resumes when the work fails and rethrows the work error", async () => {
      const work = async (): Promise<void> => {
        throw new Error("placement exploded");
      };
      await expect(balancer.runSuspended(work)).rejects.toThrow("placement exploded");
      expect(fake.balancerEnabled).toBe(true);
      expect(fake.balancerHistory).toStrictEqual([false, true]);
    });

    it("never runs the work when the suspend fails", async () => {
      fake.fail("setBalancerState", { transient: false });
      let ran = false;
      await expect(
        balancer.runSuspended(async () => {
          ran = true;
        }),
      ).rejects.toThrow(BalancerStateException);
      expect(ran).toBe(false);
      expect(balancer.isHeld()).toBe(false);
    });

    it("attaches the work error when the resume also fails", async () => {
      const work = async (): Promise<void> => {
        fake.fail("getBalancerState", { times: Infinity });
        throw new Error("work failed");
      };
      const error = await balancer.runSuspended(work).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(BalancerStateException);
      expect(error).toHaveProperty("operation", "resume");
      expect(error).toHaveProperty("message", "balancer resume failed: getBalancerState: injected failure (after suspended work failed: work failed)");
      expect(error).toHaveProperty("workError.message", "work failed");
      expect(balancer.isHeld()).toBe(false);
    });

    it("keeps one suspension across overlapping holders", async () => {
      const first = balancer.runSuspended(async () => {
        await sleep(20);
        return "first";
      });
      const second = balancer.runSuspended(async () => {
        await sleep(5);
        return "second";
      });
      await expect(Promise.all([first, second])).resolves.toStrictEqual(["first", "second"]);
      expect(fake.balancerHistory).toStrictEqual([false, true]);
      expect(fake.calls.getBalancerState).toBe(2);
    });

    it("refuses a manual resume while a run holds the balancer", async () => {
      const seen: boolean[] = [];
      const run = balancer.runSuspended(async () => {
        await sleep(20);
        seen.push(fake.balancerEnabled);
      });
      await sleep(5);
      const error = await balancer.resume().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(HttpException);
      expect(error).toHaveProperty("status", 409);
      expect(error).toHaveProperty("message", "balancer held by a running plan");

      await run;
      expect(seen).toStrictEqual([false]);
      expect(fake.balancerHistory).toStrictEqual([false, true]);
    });

    it("leaves a manually suspended balancer stopped when a run ends", async () => {
      await balancer.suspend();
      await balancer.runSuspended(async () => undefined);
      expect(fake.balancerEnabled).toBe(false);
      expect(fake.balancerHistory).toStrictEqual([false]);
      expect(balancer.isPinned()).toBe(true);

      await balancer.resume();
      expect(fake.balancerEnabled).toBe(true);
      expect(balancer.isPinned()).toBe(false);
    });
  });
});
