import { Router } from "express";
import PlanController from "@controllers/plan.controller";
import { CreatePlanDto } from "@/dtos/plan.dto";
import { Routes } from "@interfaces/routes.interface";
import validationMiddleware from "@middlewares/validation.middleware";

class PlanRoute implements Routes {
  public path = "/plans";
  public router = Router();
  public planController = new PlanController();

  constructor() {
    this.initializeRoutes();
  }

  private initializeRoutes() {
    this.router.post(`${this.path}`, validationMiddleware(CreatePlanDto, "body"), this.planController.createPlan);
  }
}

export default PlanRoute;
