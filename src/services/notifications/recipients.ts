import { NotificationAudience } from "../../types/NotificationInterface";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";

const ASSIGNEE_KINDS: ReadonlySet<NotificationKindEnum> = new Set([
  NotificationKindEnum.REPORT_ASSIGNED,
  NotificationKindEnum.CASE_UPDATED,
  NotificationKindEnum.STATUS_CHANGED,
  NotificationKindEnum.CASE_CLOSED,
]);

const ADMIN_KINDS: ReadonlySet<NotificationKindEnum> = new Set([
  NotificationKindEnum.REPORT_CREATED,
  NotificationKindEnum.CASE_CLOSED,
]);

export function needsAdministrators(kind: NotificationKindEnum): boolean {
  return ADMIN_KINDS.has(kind);
}

/** Creator first, then assignee, then administrators; each id at most once. */
export function resolveRecipients(
  kind: NotificationKindEnum,
  audience: NotificationAudience,
  administratorIds: readonly string[]
): string[] {
  const recipients: string[] = [];
  if (audience.creatorId) recipients.push(audience.creatorId);
  if (audience.assigneeId && ASSIGNEE_KINDS.has(kind)) recipients.push(audience.assigneeId);
  if (ADMIN_KINDS.has(kind)) recipients.push(...administratorIds);
  return [...new Set(recipients)];
}
