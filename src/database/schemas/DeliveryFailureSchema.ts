import { Schema } from "mongoose";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";
import { FailedDeliveryStatus, NotificationPayload } from "../../types/NotificationInterface";

export interface DeliveryFailureDocument {
  _id: string;
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

const DeliveryFailureSchema = new Schema<DeliveryFailureDocument>(
  {
    _id: { type: String, required: true },
    eventId: { type: String, required: true },
    reportId: { type: String, required: true },
    kind: { type: String, enum: Object.values(NotificationKindEnum), required: true },
    channel: { type: String, required: true },
    recipientId: { type: String, required: true },
    payload: {
      title: { type: String, required: true },
      body: { type: String, required: true },
      data: { type: Schema.Types.Mixed, default: {} },
    },
    attempts: { type: Number, required: true },
    rounds: { type: Number, default: 0 },
    lastError: { type: String, required: true },
    status: {
      type: String,
      enum: ["pending", "requeued", "abandoned"],
      default: "pending",
    },
    createdAt: { type: Date, required: true },
  },
  { versionKey: false }
);

DeliveryFailureSchema.index({ status: 1, createdAt: 1 });

export { DeliveryFailureSchema };
