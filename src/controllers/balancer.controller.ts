import { NextFunction, Request, Response } from "express";
import { BalancerStateDto } from "@/dtos/plan.dto";
import balancerService from "@/services/balancer.service";

class BalancerController {
  public balancerService = balancerService;

  public getState = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const enabled = await this.balancerService.state();
      res.status(200).json({ enabled, held: this.balancerService.isHeld(), pinned: this.balancerService.isPinned() });
    } catch (error) {
      next(error);
    }
  };

  public setState = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const stateDto: BalancerStateDto = req.body;
      if (stateDto.enabled) {
        await this.balancerService.resume();
      } else {
        await this.balancerService.suspend();
      }
      const enabled = await this.balancerService.state();
      res.status(200).json({ enabled, held: this.balancerService.isHeld(), pinned: this.balancerService.isPinned() });
    } catch (error) {
      next(error);
    }
  };
}

export default BalancerController;
