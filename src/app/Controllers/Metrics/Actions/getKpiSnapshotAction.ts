import { Request, Response } from "express";
import { Forbidden } from "../../../../services/errors";
import { MetricsAggregator } from "../../../../services/metrics/metricsAggregator";
import { authorize } from "../../../../services/reports/permissions";
import { principalOf, sendError } from "../../../Middlewares";
import { MetricsQuerySchema } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const getKpiSnapshotAction =
  (metrics: MetricsAggregator) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const decision = authorize(principalOf(req), "metrics", null);
      if (!decision.allowed) throw new Forbidden(decision.reason);

      const query = validateInput(MetricsQuerySchema, req.query, res);
      if (!query) return res;

      const snapshot = await metrics.snapshot({
        range: query.range,
        filters: { status: query.status_type, ...(query.category ? { category: query.category } : {}) },
        analyzeAi: query.analyze_ai,
      });
      return res.json({ data: snapshot });
    } catch (err) {
      return sendError(res, err);
    }
  };
