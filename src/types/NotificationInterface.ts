import { NotificationKindEnum } from "./enums/notificationKindEnum";

export interface NotificationPayload {
  title: string;
  body: string;
  data: Record<string, string>;
}

/** Who an event concerns; recipients are derived from it at dispatch time. */
export interface NotificationAudience {
  creatorId: string | null;
  assigneeId: string | null;
}

export interface NotificationEvent {
  id: string;
  kind: NotificationKindEnum;
  reportId: string;
  audience: NotificationAudience;
  payload: NotificationPayload;
  createdAt: Date;
}

export type FailedDeliveryStatus = "pending" | "requeued" | "abandoned";

export interface FailedDelivery {
  id: string;
  eventId: string;
  reportId: string;
  kind: NotificationKindEnum;
  channel: string;
  recipientId: string;
  payload: NotificationPayload;
  attempts: number;
  rounds: number;
  lastError: string;
  status: FailedDeliveryStatus;
  createdAt: Date;
}

export interface InboxNotification {
  id: string;
  eventId: string;
  userId: string;
  reportId: string;
  kind: NotificationKindEnum;
  title: string;
  body: string;
  readAt: Date | null;
  createdAt: Date;
}
