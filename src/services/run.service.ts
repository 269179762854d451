import { randomUUID } from "crypto";
import { RUN_HISTORY_LIMIT } from "@/config";
import { HttpException } from "@/exceptions/HttpException";
import { PlannerConfig, RunOptions, RunState } from "@/interfaces/planner.interface";
import runsModel, { RunEntry } from "@/models/runs.model";
import plannerService, { PlannerService } from "@/services/planner.service";
import { logger } from "@/utils/logger";
import { describeError } from "@/utils/util";

const FINISHED = new Set(["completed", "failed", "cancelled"]);

/**
 * Background planning runs, tracked in memory so they can be polled and
 * cancelled over HTTP. Nothing survives a restart; re-running a plan is safe.
 * At most `historyLimit` runs are kept; the oldest finished ones go first.
 */
class RunService {
  constructor(private planner: PlannerService, private historyLimit: number, public runs: Map<string, RunEntry> = runsModel) {}

  public start(config: PlannerConfig, options: Pick<RunOptions, "ingest" | "refresh"> = {}): RunState {
    const id = randomUUID();
    const controller = new AbortController();
    const state: RunState = { id, status: "planning", config, startedAt: new Date().toISOString() };

    const done = this.planner
      .run(config, { ...options, signal: controller.signal, onStage: stage => (state.status = stage) })
      .then(report => {
        state.report = report;
        state.status = report.cancelled ? "cancelled" : "completed";
        logger.info(`run ${id} ${state.status}`);
      })
      .catch((error: unknown) => {
        state.status = "failed";
        state.error = {
          message: describeError(error),
          code: error instanceof HttpException ? error.code : undefined,
        };
        logger.error(`run ${id} failed: ${state.error.message}`);
      })
      .finally(() => {
        state.finishedAt = new Date().toISOString();
      });

    this.prune();
    const entry: RunEntry = { state, controller, done };
    this.runs.set(id, entry);
    logger.info(`run ${id} started on ${config.collection}`);
    return state;
  }

  public get(id: string): RunState {
    return this.entry(id).state;
  }

  public list(): RunState[] {
    return [...this.runs.values()].map(entry => entry.state);
  }

  // takes effect between entries; operations already sent to the cluster complete
  public cancel(id: string): RunState {
    const entry = this.entry(id);
    if (FINISHED.has(entry.state.status)) {
      throw new HttpException(409, `run ${id} already ${entry.state.status}`);
    }
    entry.controller.abort();
    logger.info(`run ${id} cancellation requested`);
    return entry.state;
  }

  // resolves when the run finishes, or after `timeoutMs` with the state so far
  public async wait(id: string, timeoutMs?: number): Promise<RunState> {
    const entry = this.entry(id);
    if (timeoutMs === undefined) {
      await entry.done;
      return entry.state;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>(resolve => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([entry.done, timeout]);
    } finally {
      clearTimeout(timer);
    }
    return entry.state;
  }

  // Map iteration is insertion order, so the first finished entries are the oldest
  private prune(): void {
    for (const [id, entry] of this.runs) {
      if (this.runs.size < this.historyLimit) {
        return;
      }
      if (FINISHED.has(entry.state.status)) {
        this.runs.delete(id);
      }
    }
  }

  private entry(id: string): RunEntry {
    const entry = this.runs.get(id);
    if (entry === undefined) {
      throw new HttpException(404, `run ${id} not found`);
    }
    return entry;
  }
}

const runService = new RunService(plannerService, RUN_HISTORY_LIMIT);
export { RunService };
export default runService;
