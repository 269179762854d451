import { Mutex } from "async-mutex";
import { HttpException } from "@/exceptions/HttpException";
import { BalancerStateException, isTransient } from "@/exceptions/PlannerException";
import { ControlPlane } from "@/interfaces/cluster.interface";
import cluster from "@/io/index.io";
import { RETRY_ATTEMPTS, RETRY_BASE_DELAY_MS, RETRY_MAX_DELAY_MS, OPERATION_TIMEOUT_MS } from "@/config";
import { logger } from "@/utils/logger";
import { RetrySettings, withRetry, withTimeout } from "@/utils/retry";
import { describeError } from "@/utils/util";

type BalancerControl = Pick<ControlPlane, "getBalancerState" | "setBalancerState">;

/**
 * Pauses the cluster's automatic balancer around manual placement.
 *
 * `runSuspended` holds a suspension for the duration of its work; overlapping
 * holders share one suspension and the balancer resumes when the last one
 * leaves, whether its work succeeded or not. A manual `suspend` pins the
 * balancer off: runs ending afterwards leave it stopped until a manual `resume`.
 */
class BalancerService {
  private mutex = new Mutex();
  private holders = 0;
  private pinned = false;

  constructor(private control: BalancerControl, private retry: RetrySettings) {}

  public async state(): Promise<boolean> {
    try {
      return await this.retrying("state", () => withTimeout("getBalancerState", this.control.getBalancerState(), this.retry.timeoutMs));
    } catch (error) {
      throw new BalancerStateException("state", error);
    }
  }

  // no-op when already disabled
  public async suspend(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.transition(false);
      this.pinned = true;
    });
  }

  // no-op when already enabled, including after a restart that lost track of an earlier suspend
  public async resume(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.holders > 0) {
        throw new HttpException(409, "balancer held by a running plan");
      }
      await this.transition(true);
      this.pinned = false;
    });
  }

  public isPinned(): boolean {
    return this.pinned;
  }

  public isHeld(): boolean {
    return this.holders > 0;
  }

  public async runSuspended<T>(work: () => Promise<T>): Promise<T> {
    await this.mutex.runExclusive(async () => {
      if (this.holders === 0) {
        await this.transition(false);
      }
      this.holders++;
    });

    let result: T;
    try {
      result = await work();
    } catch (workError) {
      await this.release(workError);
      throw workError;
    }
    await this.release();
    return result;
  }

  private async release(workError?: unknown): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.holders--;
      if (this.holders > 0) {
        return;
      }
      if (this.pinned) {
        logger.info("balancer left stopped: suspended manually");
        return;
      }
      await this.transition(true, workError);
    });
  }

  private async transition(enabled: boolean, workError?: unknown): Promise<void> {
    const operation = enabled ? "resume" : "suspend";
    try {
      const changed = await this.retrying(operation, async () => {
        const current = await withTimeout("getBalancerState", this.control.getBalancerState(), this.retry.timeoutMs);
        if (current === enabled) {
          return false;
        }
        await withTimeout("setBalancerState", this.control.setBalancerState(enabled), this.retry.timeoutMs);
        return true;
      });
      logger.info(changed ? `balancer ${enabled ? "resumed" : "suspended"}` : `balancer ${operation}: already ${enabled ? "running" : "stopped"}`);
    } catch (error) {
      logger.error(`balancer ${operation} failed: ${describeError(error)}`);
      throw new BalancerStateException(operation, error, workError);
    }
  }

  private retrying<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      attempts: this.retry.attempts,
      baseDelayMs: this.retry.baseDelayMs,
      maxDelayMs: this.retry.maxDelayMs,
      isRetryable: isTransient,
      onRetry: (error, attempt, delayMs) => logger.warn(`balancer ${label} attempt ${attempt} failed, retrying in ${delayMs}ms: ${describeError(error)}`),
    });
  }
}

const balancerService = new BalancerService(cluster, {
  attempts: RETRY_ATTEMPTS,
  baseDelayMs: RETRY_BASE_DELAY_MS,
  maxDelayMs: RETRY_MAX_DELAY_MS,
  timeoutMs: OPERATION_TIMEOUT_MS,
});
export { BalancerService };
export default balancerService;
