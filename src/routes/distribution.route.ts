import { Router } from "express";
import DistributionController from "@controllers/distribution.controller";
import { DistributionQueryDto } from "@/dtos/plan.dto";
import { Routes } from "@interfaces/routes.interface";
import validationMiddleware from "@middlewares/validation.middleware";

class DistributionRoute implements Routes {
  public path = "/distribution";
  public router = Router();
  public distributionController = new DistributionController();

  constructor() {
    this.initializeRoutes();
  }

  private initializeRoutes() {
    this.router.get(`${this.path}`, validationMiddleware(DistributionQueryDto, "query"), this.distributionController.getDistribution);
  }
}

export default DistributionRoute;
