import { Router } from "express";
import TopologyController from "@controllers/topology.controller";
import { Routes } from "@interfaces/routes.interface";

class TopologyRoute implements Routes {
  public path = "/topology";
  public router = Router();
  public topologyController = new TopologyController();

  constructor() {
    this.initializeRoutes();
  }

  private initializeRoutes() {
    this.router.get(`${this.path}`, this.topologyController.getTopology);
    this.router.put(`${this.path}`, this.topologyController.refreshTopology);
  }
}

export default TopologyRoute;
