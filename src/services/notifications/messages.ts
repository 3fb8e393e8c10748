import { v4 as uuid } from "uuid";
import { NotificationAudience, NotificationEvent, NotificationPayload } from "../../types/NotificationInterface";
import { ReportRecord } from "../../types/ReportInterface";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";
import { ReportStatusEnum } from "../../types/enums/reportStatusEnum";

const STATUS_LABELS: Record<ReportStatusEnum, string> = {
  [ReportStatusEnum.PENDING]: "pending",
  [ReportStatusEnum.ASSIGNED]: "assigned",
  [ReportStatusEnum.IN_PROGRESS]: "in progress",
  [ReportStatusEnum.RESOLVED]: "resolved",
  [ReportStatusEnum.CLOSED]: "closed",
};

const MAX_BODY_CHARS = 100;

function snippet(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_BODY_CHARS ? `${trimmed.slice(0, MAX_BODY_CHARS)}...` : trimmed;
}

export function buildPayload(kind: NotificationKindEnum, report: ReportRecord, note: string | null): NotificationPayload {
  const label = STATUS_LABELS[report.status];
  const detail = note ? snippet(note) : snippet(report.description);
  let title: string;
  switch (kind) {
    case NotificationKindEnum.REPORT_CREATED:
      title = "New report received";
      break;
    case NotificationKindEnum.REPORT_ASSIGNED:
      title = "Report assigned";
      break;
    case NotificationKindEnum.CASE_UPDATED:
      title = "New update on a report";
      break;
    case NotificationKindEnum.STATUS_CHANGED:
      title = `Report is now ${label}`;
      break;
    case NotificationKindEnum.CASE_CLOSED:
      title = "Report closed";
      break;
  }
  return {
    title,
    body: detail || `Report ${report.id} is ${label}`,
    data: { reportId: report.id, kind, status: report.status },
  };
}

export function buildEvent(
  kind: NotificationKindEnum,
  report: ReportRecord,
  audience: NotificationAudience,
  note: string | null,
  createdAt: Date
): NotificationEvent {
  return {
    id: uuid(),
    kind,
    reportId: report.id,
    audience,
    payload: buildPayload(kind, report, note),
    createdAt,
  };
}
