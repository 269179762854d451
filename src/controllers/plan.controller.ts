import { NextFunction, Request, Response } from "express";
import { CreatePlanDto } from "@/dtos/plan.dto";
import { HttpException } from "@/exceptions/HttpException";
import { KeyDomain, KeyValue } from "@/interfaces/keyRange.interface";
import { PlannerConfig, PolicyConfig } from "@/interfaces/planner.interface";
import { MIN_KEY } from "@/models/keyBound.model";
import chunkAssignerService from "@/services/chunkAssigner.service";
import plannerService, { defaultPlannerConfig } from "@/services/planner.service";
import runService from "@/services/run.service";

const toDomain = (dto: CreatePlanDto["domain"], fallback: KeyDomain): KeyDomain => {
  if (dto === undefined) {
    return fallback;
  }
  if (dto.kind === "integer") {
    if (dto.min === undefined || dto.max === undefined) {
      throw new HttpException(400, "integer domain needs min and max");
    }
    return { kind: "integer", min: dto.min, max: dto.max };
  }
  const values = dto.values ?? [];
  const ordered: (string | number)[] = [];
  for (const value of values) {
    if (typeof value !== "string" && typeof value !== "number") {
      throw new HttpException(400, "ordered domain values must be strings or numbers");
    }
    ordered.push(value);
  }
  return { kind: "ordered", values: ordered };
};

const toPolicyConfig = (dto: CreatePlanDto["policy"], fallback: PolicyConfig): PolicyConfig => {
  if (dto === undefined) {
    return fallback;
  }
  return dto.kind === "weighted" ? { kind: "weighted", weights: dto.weights ?? {} } : { kind: "round-robin" };
};

// a query string value as a primary key value of the run's domain
const toPrimary = (raw: string, domain: KeyDomain): KeyValue => {
  if (domain.kind === "integer") {
    const value = Number(raw);
    if (!Number.isInteger(value)) {
      throw new HttpException(400, `primary must be an integer, got ${raw}`);
    }
    return value;
  }
  return domain.values.find(value => String(value) === raw) ?? raw;
};

// request overrides on top of the configured defaults
export const toPlannerConfig = (dto: CreatePlanDto): PlannerConfig => {
  const defaults = defaultPlannerConfig();
  return {
    collection: dto.collection ?? defaults.collection,
    shardKey: dto.shardKey ?? defaults.shardKey,
    domain: toDomain(dto.domain, defaults.domain),
    shardCount: dto.shardCount ?? defaults.shardCount,
    splitCount: dto.splitCount ?? defaults.splitCount,
    tolerance: dto.tolerance ?? defaults.tolerance,
    concurrency: dto.concurrency ?? defaults.concurrency,
    policy: toPolicyConfig(dto.policy, defaults.policy),
  };
};

class PlanController {
  public plannerService = plannerService;
  public runService = runService;

  // plan only: reads the topology, changes nothing on the cluster
  public createPlan = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const planDto: CreatePlanDto = req.body;
      const config = toPlannerConfig(planDto);
      const plan = await this.plannerService.plan(config, planDto.refresh ?? true);
      const load = chunkAssignerService.shardLoad(plan, this.plannerService.topology().slice(0, config.shardCount));
      res.status(201).json({ plan, load });
    } catch (error) {
      next(error);
    }
  };

  public startRun = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const planDto: CreatePlanDto = req.body;
      const run = this.runService.start(toPlannerConfig(planDto), { refresh: planDto.refresh ?? true });
      res.status(202).json({ id: run.id, status: run.status });
    } catch (error) {
      next(error);
    }
  };

  public getRuns = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const runs = this.runService.list().map(({ id, status, startedAt, finishedAt }) => ({ id, status, startedAt, finishedAt }));
      res.status(200).json({ runs });
    } catch (error) {
      next(error);
    }
  };

  // ?waitMs= holds the response until the run finishes or the wait runs out
  public getRun = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { waitMs } = req.query;
      const run = typeof waitMs === "string" ? await this.runService.wait(req.params.id, parseInt(waitMs, 10)) : this.runService.get(req.params.id);
      res.status(200).json(run);
    } catch (error) {
      next(error);
    }
  };

  // which entry of the run's plan, and so which shard, owns a primary key value
  public routeKey = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const run = this.runService.get(req.params.id);
      const plan = run.report?.plan;
      if (plan === undefined) {
        throw new HttpException(409, `run ${run.id} has no plan yet`);
      }
      const primary = toPrimary(String(req.query.primary), run.config.domain);
      const entry = chunkAssignerService.routeKey(plan, { primary, tiebreaker: MIN_KEY });
      if (entry === undefined) {
        throw new HttpException(404, `no range of run ${run.id} holds ${String(req.query.primary)}`);
      }
      res.status(200).json({ index: entry.index, range: entry.range, targetShard: entry.targetShard });
    } catch (error) {
      next(error);
    }
  };

  public cancelRun = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const run = this.runService.cancel(req.params.id);
      res.status(202).json({ id: run.id, status: run.status });
    } catch (error) {
      next(error);
    }
  };
}

export default PlanController;
