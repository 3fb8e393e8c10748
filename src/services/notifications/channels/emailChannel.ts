import type { SendMailOptions } from "nodemailer";
import { NotificationPayload } from "../../../types/NotificationInterface";
import { UserDirectory } from "../../stores";
import { DeliveryOutcome, NotificationChannel, delivered, skipped } from "./types";

/** The part of a nodemailer transporter this channel uses. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<unknown>;
}

export class EmailChannel implements NotificationChannel {
  readonly name = "email";

  constructor(
    private readonly directory: Pick<UserDirectory, "findById">,
    private readonly transporter: MailTransport,
    private readonly from: string
  ) {}

  async send(recipientId: string, payload: NotificationPayload): Promise<DeliveryOutcome> {
    const user = await this.directory.findById(recipientId);
    if (!user?.email) return skipped();
    await this.transporter.sendMail({
      from: this.from,
      to: user.email,
      subject: payload.title,
      text: `${payload.body}\n\nReport: ${payload.data.reportId ?? ""}`,
    });
    return delivered();
  }
}
