import { NotificationPayload } from "../../../types/NotificationInterface";
import { NotificationKindEnum } from "../../../types/enums/notificationKindEnum";

export type DeliveryOutcome =
  | { ok: true; skipped?: boolean }
  | { ok: false; error: string; retryable: boolean };

export interface DeliveryContext {
  eventId: string;
  reportId: string;
  kind: NotificationKindEnum;
}

export interface NotificationChannel {
  readonly name: string;
  send(recipientId: string, payload: NotificationPayload, context: DeliveryContext): Promise<DeliveryOutcome>;
}

export const delivered = (): DeliveryOutcome => ({ ok: true });
export const skipped = (): DeliveryOutcome => ({ ok: true, skipped: true });
export const failed = (error: unknown, retryable = true): DeliveryOutcome => ({
  ok: false,
  error: error instanceof Error ? error.message : String(error),
  retryable,
});
