import type { Messaging } from "firebase-admin/messaging";
import { NotificationPayload } from "../../../types/NotificationInterface";
import { UserDirectory } from "../../stores";
import { DeliveryOutcome, NotificationChannel, delivered, failed, skipped } from "./types";

// Codes that will not improve on retry.
const PERMANENT_CODES = new Set([
  "messaging/invalid-argument",
  "messaging/invalid-registration-token",
  "messaging/registration-token-not-registered",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export class PushChannel implements NotificationChannel {
  readonly name = "push";

  constructor(
    private readonly directory: Pick<UserDirectory, "findById">,
    private readonly messaging: () => Pick<Messaging, "send">
  ) {}

  async send(recipientId: string, payload: NotificationPayload): Promise<DeliveryOutcome> {
    const user = await this.directory.findById(recipientId);
    if (!user || user.pushTokens.length === 0) return skipped();

    let lastError: unknown;
    let permanentOnly = true;
    let sent = 0;
    for (const token of user.pushTokens) {
      try {
        await this.messaging().send({
          token,
          notification: { title: payload.title, body: payload.body },
          data: { ...payload.data, title: payload.title, body: payload.body },
        });
        sent++;
      } catch (error) {
        lastError = error;
        const code = errorCode(error);
        if (!code || !PERMANENT_CODES.has(code)) permanentOnly = false;
      }
    }
    return sent > 0 ? delivered() : failed(lastError, !permanentOnly);
  }
}
