import { Router } from "express";
import PlanController from "@controllers/plan.controller";
import { CreatePlanDto, RouteQueryDto, RunQueryDto } from "@/dtos/plan.dto";
import { Routes } from "@interfaces/routes.interface";
import validationMiddleware from "@middlewares/validation.middleware";

class RunRoute implements Routes {
  public path = "/runs";
  public router = Router();
  public planController = new PlanController();

  constructor() {
    this.initializeRoutes();
  }

  private initializeRoutes() {
    this.router.get(`${this.path}`, this.planController.getRuns);
    this.router.post(`${this.path}`, validationMiddleware(CreatePlanDto, "body"), this.planController.startRun);
    this.router.get(`${this.path}/:id`, validationMiddleware(RunQueryDto, "query"), this.planController.getRun);
    this.router.get(`${this.path}/:id/route`, validationMiddleware(RouteQueryDto, "query"), this.planController.routeKey);
    this.router.delete(`${this.path}/:id`, this.planController.cancelRun);
  }
}

export default RunRoute;
