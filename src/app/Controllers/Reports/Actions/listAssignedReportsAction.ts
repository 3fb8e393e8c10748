import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { ReportListQuerySchema } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const listAssignedReportsAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const query = validateInput(ReportListQuerySchema, req.query, res);
      if (!query) return res;
      const data = await reports.listAssigned(principalOf(req), query);
      return res.json({ data, meta: { count: data.length, limit: query.limit } });
    } catch (err) {
      return sendError(res, err);
    }
  };
