import { Request, Response } from "express";
import { NotificationNotFound } from "../../../../services/errors";
import { InboxStore } from "../../../../services/stores";
import { principalOf, sendError } from "../../../Middlewares";
import { idParam } from "../../../Validation/requestSchemas";
import { validateInput } from "../../../Validation/validateInput";

export const markNotificationReadAction =
  (inbox: InboxStore) =>
  async (req: Request, res: Response): Promise<Response> => {
    try {
      const params = validateInput(idParam, req.params, res);
      if (!params) return res;
      // Another user's notification is indistinguishable from a missing one.
      const notification = await inbox.markRead(params.id, principalOf(req).id);
      if (!notification) throw new NotificationNotFound(params.id);
      return res.json({ data: notification });
    } catch (err) {
      return sendError(res, err);
    }
  };
