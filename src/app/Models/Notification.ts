import { model, Model } from "mongoose";
import { NotificationDocument, NotificationSchema } from "../../database/schemas/NotificationSchema";

const Notification: Model<NotificationDocument> = model<NotificationDocument>("Notification", NotificationSchema);

export { Notification };
