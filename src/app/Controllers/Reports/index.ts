import { ReportStateMachine } from "../../../services/reports/reportStateMachine";
import { commentReportAction } from "./Actions/commentReportAction";
import { createReportAction } from "./Actions/createReportAction";
import { getReportAction } from "./Actions/getReportAction";
import { getReportHistoryAction } from "./Actions/getReportHistoryAction";
import { listAssignedReportsAction } from "./Actions/listAssignedReportsAction";
import { listReportsAction } from "./Actions/listReportsAction";
import { transitionReportAction } from "./Actions/transitionReportAction";

export class ReportController {
  readonly create;
  readonly list;
  readonly assigned;
  readonly get;
  readonly history;
  readonly transition;
  readonly comment;

  constructor(reports: ReportStateMachine) {
    this.create = createReportAction(reports);
    this.list = listReportsAction(reports);
    this.assigned = listAssignedReportsAction(reports);
    this.get = getReportAction(reports);
    this.history = getReportHistoryAction(reports);
    this.transition = transitionReportAction(reports);
    this.comment = commentReportAction(reports);
  }
}
