import { Request, Response } from "express";
import { InboxStore } from "../../../../services/stores";
import { principalOf, sendError } from "../../../Middlewares";
import { NotificationListQuerySchema } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const getNotificationsAction =
  (inbox: InboxStore) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const query = validateInput(NotificationListQuerySchema, req.query, res);
      if (!query) return res;
      const notifications = await inbox.listForUser(principalOf(req).id, query.limit);
      return res.json({
        data: notifications,
        meta: { unread: notifications.filter((n) => n.readAt === null).length, limit: query.limit },
      });
    } catch (err) {
      return sendError(res, err);
    }
  };
