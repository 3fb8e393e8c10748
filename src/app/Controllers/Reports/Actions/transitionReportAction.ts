import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { TransitionSchema, idParam } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const transitionReportAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const params = validateInput(idParam, req.params, res);
      if (!params) return res;
      const command = validateInput(TransitionSchema, req.body, res);
      if (!command) return res;
      const report = await reports.transition(principalOf(req), params.id, command);
      return res.json({ data: report });
    } catch (err) {
      return sendError(res, err);
    }
  };
