import { Router } from "express";
import BalancerController from "@controllers/balancer.controller";
import { BalancerStateDto } from "@/dtos/plan.dto";
import { Routes } from "@interfaces/routes.interface";
import validationMiddleware from "@middlewares/validation.middleware";

class BalancerRoute implements Routes {
  public path = "/balancer";
  public router = Router();
  public balancerController = new BalancerController();

  constructor() {
    this.initializeRoutes();
  }

  private initializeRoutes() {
    this.router.get(`${this.path}`, this.balancerController.getState);
    this.router.put(`${this.path}`, validationMiddleware(BalancerStateDto, "body"), this.balancerController.setState);
  }
}

export default BalancerRoute;
