import { NextFunction, Request, Response } from "express";
import plannerService from "@/services/planner.service";
import topology from "@/models/topology.model";

class TopologyController {
  public plannerService = plannerService;

  public getTopology = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const shards = this.plannerService.topology();
      res.status(200).json({ shards, refreshedAt: topology.lastRefreshed()?.toISOString() ?? null });
    } catch (error) {
      next(error);
    }
  };

  public refreshTopology = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const shards = await this.plannerService.refreshTopology();
      res.status(200).json({ shards, refreshedAt: topology.lastRefreshed()?.toISOString() ?? null });
    } catch (error) {
      next(error);
    }
  };
}

export default TopologyController;
