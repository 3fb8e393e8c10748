import { NotificationPayload } from "../../../types/NotificationInterface";
import { UserDirectory } from "../../stores";
import { DeliveryOutcome, NotificationChannel, delivered, skipped } from "./types";

export interface SmsClient {
  messages: {
    create(options: { body: string; to: string; from: string }): Promise<unknown>;
  };
}

export class SmsChannel implements NotificationChannel {
  readonly name = "sms";

  constructor(
    private readonly directory: Pick<UserDirectory, "findById">,
    private readonly client: SmsClient,
    private readonly fromNumber: string
  ) {}

  async send(recipientId: string, payload: NotificationPayload): Promise<DeliveryOutcome> {
    const user = await this.directory.findById(recipientId);
    if (!user?.phone) return skipped();
    const to = user.phone.startsWith("+") ? user.phone : `+${user.phone}`;
    await this.client.messages.create({ body: `${payload.title}: ${payload.body}`, to, from: this.fromNumber });
    return delivered();
  }
}
