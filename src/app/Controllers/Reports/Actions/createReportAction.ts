import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { CreateReportSchema } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const createReportAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const input = validateInput(CreateReportSchema, req.body, res);
      if (!input) return res;
      const report = await reports.create(principalOf(req), input);
      return res.status(201).json({ data: report });
    } catch (err) {
      return sendError(res, err);
    }
  };
