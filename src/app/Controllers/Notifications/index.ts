import { InboxStore } from "../../../services/stores";
import { getNotificationsAction } from "./Actions/getNotificationsAction";
import { getUnreadCountAction } from "./Actions/getUnreadCountAction";
import { markAllNotificationsReadAction } from "./Actions/markAllNotificationsReadAction";
import { markNotificationReadAction } from "./Actions/markNotificationReadAction";

export class NotificationController {
  readonly list;
  readonly markRead;
  readonly markAllRead;
  readonly unreadCount;

  constructor(inbox: InboxStore) {
    this.list = getNotificationsAction(inbox);
    this.markRead = markNotificationReadAction(inbox);
    this.markAllRead = markAllNotificationsReadAction(inbox);
    this.unreadCount = getUnreadCountAction(inbox);
  }
}
