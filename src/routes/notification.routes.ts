import { Router } from "express";
import { NotificationController } from "../app/Controllers/Notifications";
import { InboxStore } from "../services/stores";

export default function NotificationRoutes(inbox: InboxStore): Router {
  const controller = new NotificationController(inbox);
  const router = Router();
  router.get("/", controller.list);
  router.get("/unread-count", controller.unreadCount);
  router.post("/read-all", controller.markAllRead);
  router.patch("/:id/read", controller.markRead);
  return router;
}
