import { Router } from "express";
import { MetricsController } from "../app/Controllers/Metrics";
import { MetricsAggregator } from "../services/metrics/metricsAggregator";

export default function MetricsRoutes(metrics: MetricsAggregator): Router {
  const controller = new MetricsController(metrics);
  const router = Router();
  router.get("/", controller.snapshot);
  return router;
}
