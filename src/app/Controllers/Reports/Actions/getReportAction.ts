import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { idParam } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const getReportAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const params = validateInput(idParam, req.params, res);
      if (!params) return res;
      const report = await reports.get(principalOf(req), params.id);
      return res.json({ data: report });
    } catch (err) {
      return sendError(res, err);
    }
  };
