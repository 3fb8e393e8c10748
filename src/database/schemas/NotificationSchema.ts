import { Schema } from "mongoose";
import { NotificationKindEnum } from "../../types/enums/notificationKindEnum";

export interface NotificationDocument {
  _id: string;
  eventId: string;
  userId: string;
  reportId: string;
  kind: NotificationKindEnum;
  title: string;
  body: string;
  readAt: Date | null;
  createdAt: Date;
}

const NotificationSchema = new Schema<NotificationDocument>(
  {
    _id: { type: String, required: true },
    eventId: { type: String, required: true },
    userId: { type: String, required: true },
    reportId: { type: String, required: true },
    kind: { type: String, enum: Object.values(NotificationKindEnum), required: true },
    title: { type: String, required: true },
    body: { type: String, required: true },
    readAt: { type: Date, default: null },
    createdAt: { type: Date, required: true },
  },
  { versionKey: false }
);

NotificationSchema.index({ eventId: 1, userId: 1 }, { unique: true });
NotificationSchema.index({ userId: 1, createdAt: -1 });

export { NotificationSchema };
