import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";

export type StepAction = "assign" | "start" | "resolve" | "close";

export interface Step {
  from: ReportStatusEnum;
  to: ReportStatusEnum;
  event: NotificationKindEnum;
}

/** The only forward moves; anything else needs an administrative override. */
export const STEPS: Record<StepAction, Step> = {
  assign: { from: ReportStatusEnum.PENDING, to: ReportStatusEnum.ASSIGNED, event: NotificationKindEnum.REPORT_ASSIGNED },
  start: { from: ReportStatusEnum.ASSIGNED, to: ReportStatusEnum.IN_PROGRESS, event: NotificationKindEnum.STATUS_CHANGED },
  resolve: { from: ReportStatusEnum.IN_PROGRESS, to: ReportStatusEnum.RESOLVED, event: NotificationKindEnum.STATUS_CHANGED },
  close: { from: ReportStatusEnum.RESOLVED, to: ReportStatusEnum.CLOSED, event: NotificationKindEnum.CASE_CLOSED },
};

export function overrideEvent(to: ReportStatusEnum): NotificationKindEnum {
  return to === ReportStatusEnum.CLOSED ? NotificationKindEnum.CASE_CLOSED : NotificationKindEnum.STATUS_CHANGED;
}
