import { Request, Response } from "express";
import { InboxStore } from "../../../../services/stores";
import { principalOf, sendError } from "../../../Middlewares";

export const getUnreadCountAction =
  (inbox: InboxStore) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      return res.json({ data: { unread: await inbox.countUnread(principalOf(req).id) } });
    } catch (err) {
      return sendError(res, err);
    }
  };
