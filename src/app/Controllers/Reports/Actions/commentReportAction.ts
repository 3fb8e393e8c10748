import { Request, Response } from "express";
import { ReportStateMachine } from "../../../../services/reports/reportStateMachine";
import { principalOf, sendError } from "../../../Middlewares";
import { CommentSchema, idParam } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const commentReportAction =
  (reports: ReportStateMachine) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const params = validateInput(idParam, req.params, res);
      if (!params) return res;
      const body = validateInput(CommentSchema, req.body, res);
      if (!body) return res;
      const report = await reports.comment(principalOf(req), params.id, body.note);
      return res.status(201).json({ data: report });
    } catch (err) {
      return sendError(res, err);
    }
  };
