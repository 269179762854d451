import { NextFunction, Request, Response } from "express";
import { COLLECTION, TOLERANCE } from "@/config";
import distributionService from "@/services/distribution.service";
import plannerService from "@/services/planner.service";

const POLL_INTERVAL_MS = 1000;

class DistributionController {
  public distributionService = distributionService;

  public getDistribution = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { collection, tolerance, waitMs } = req.query;
      const namespace = typeof collection === "string" ? collection : COLLECTION;
      if (typeof waitMs === "string") {
        const limit = typeof tolerance === "string" ? parseFloat(tolerance) : TOLERANCE;
        const timeoutMs = parseInt(waitMs, 10);
        const { balanced, report } = await plannerService.awaitBalanced(namespace, limit, {
          intervalMs: Math.max(1, Math.min(POLL_INTERVAL_MS, timeoutMs)),
          timeoutMs,
        });
        res.status(200).json({ ...report, tolerance: limit, balanced });
        return;
      }
      const shards = plannerService.topology().map(shard => shard.id);
      const report = await this.distributionService.verify(namespace, shards);
      if (typeof tolerance === "string") {
        const limit = parseFloat(tolerance);
        res.status(200).json({ ...report, tolerance: limit, balanced: this.distributionService.isBalanced(report, limit) });
      } else {
        res.status(200).json(report);
      }
    } catch (error) {
      next(error);
    }
  };
}

export default DistributionController;
