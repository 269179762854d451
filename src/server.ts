import "reflect-metadata";
import { MongoClient } from "mongodb";
import App from "@/app";
import { MONGO_URI } from "@config";
import cluster from "@/io/index.io";
import MongoControlPlane from "@/io/mongo/controlPlane.mongo";
import MongoMetricsSource from "@/io/mongo/metrics.mongo";
import BalancerRoute from "@routes/balancer.route";
import DistributionRoute from "@routes/distribution.route";
import IndexRoute from "@routes/index.route";
import PlanRoute from "@routes/plan.route";
import RunRoute from "@routes/run.route";
import TopologyRoute from "@routes/topology.route";
import plannerService from "@/services/planner.service";
import { logger } from "@utils/logger";
import { describeError } from "@utils/util";
import validateEnv from "@utils/validateEnv";

validateEnv();

const bootstrap = async () => {
  const client = new MongoClient(MONGO_URI);
  await client.connect();
  cluster.bind(new MongoControlPlane(client), new MongoMetricsSource(client));
  await plannerService.refreshTopology();

  const app = new App([new IndexRoute(), new TopologyRoute(), new PlanRoute(), new RunRoute(), new BalancerRoute(), new DistributionRoute()]);
  await app.listen();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    Promise.all([app.close(), client.close()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error(`shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
};

bootstrap().catch((error: unknown) => {
  logger.error(`startup failed: ${describeError(error)}`);
  process.exit(1);
});
