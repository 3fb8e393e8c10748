export enum NotificationKindEnum {
  REPORT_CREATED = "report_created",
  REPORT_ASSIGNED = "report_assigned",
  CASE_UPDATED = "case_updated",
  STATUS_CHANGED = "status_changed",
  CASE_CLOSED = "case_closed",
}
