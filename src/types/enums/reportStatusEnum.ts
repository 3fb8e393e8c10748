export enum ReportStatusEnum {
  PENDING = "pending",
  ASSIGNED = "assigned",
  IN_PROGRESS = "in_progress",
  RESOLVED = "resolved",
  CLOSED = "closed",
}

export const REPORT_STATUSES: readonly ReportStatusEnum[] = Object.values(ReportStatusEnum);

// Work still outstanding on these.
export const OPEN_STATUSES: readonly ReportStatusEnum[] = [
  ReportStatusEnum.PENDING,
  ReportStatusEnum.ASSIGNED,
  ReportStatusEnum.IN_PROGRESS,
];

export const FINISHED_STATUSES: readonly ReportStatusEnum[] = [
  ReportStatusEnum.RESOLVED,
  ReportStatusEnum.CLOSED,
];

// Statuses in which a report may carry an assignee.
export const ASSIGNEE_STATUSES: readonly ReportStatusEnum[] = [
  ReportStatusEnum.ASSIGNED,
  ReportStatusEnum.IN_PROGRESS,
  ReportStatusEnum.RESOLVED,
];
