import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { idParam } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const getReportHistoryAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const params = validateInput(idParam, req.params, res);
      if (!params) return res;
      const history = await reports.history(principalOf(req), params.id);
      return res.json({ data: history, meta: { total: history.length } });
    } catch (err) {
      return sendError(res, err);
    }
  };
