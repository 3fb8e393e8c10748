import { Request, Response } from "express";
import { InboxStore } from "../../../../services/stores";
import { principalOf, sendError } from "../../../Middlewares";

export const markAllNotificationsReadAction =
  (inbox: InboxStore) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const updated = await inbox.markAllRead(principalOf(req).id);
      return res.json({ data: { updated } });
    } catch (err) {
      return sendError(res, err);
    }
  };
