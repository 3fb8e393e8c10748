import { Router } from "express";
import { ReportController } from "../app/Controllers/Reports";
import { ReportStateMachine } from "../services/reports/reportStateMachine";

export default function ReportRoutes(reports: ReportStateMachine): Router {
  const controller = new ReportController(reports);
  const router = Router();

  router.post("/", controller.create);
  router.get("/", controller.list);
  router.get("/assigned", controller.assigned);
  router.get("/:id", controller.get);
  router.get("/:id/history", controller.history);
  router.post("/:id/transitions", controller.transition);
  router.post("/:id/comments", controller.comment);

  return router;
}
