import { NotificationPayload } from "../../../types/NotificationInterface";
import { InboxStore } from "../../stores";
import { DeliveryContext, DeliveryOutcome, NotificationChannel, delivered } from "./types";

/** Writes to the user's inbox; a repeated (event, user) delivery is a no-op. */
export class InAppChannel implements NotificationChannel {
  readonly name = "in_app";

  constructor(private readonly inbox: InboxStore) {}

  async send(recipientId: string, payload: NotificationPayload, context: DeliveryContext): Promise<DeliveryOutcome> {
    await this.inbox.insertOnce({
      eventId: context.eventId,
      userId: recipientId,
      reportId: context.reportId,
      kind: context.kind,
      title: payload.title,
      body: payload.body,
    });
    return delivered();
  }
}
