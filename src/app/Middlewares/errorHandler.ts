import { ErrorRequestHandler, Request, Response } from "express";
import { moduleLogger } from "../../observability/logging";
import { captureError } from "../../observability/sentry";
import { DomainError } from "../../services/errors";

const log = moduleLogger("http");

export function sendError(res: Response, err: unknown): Response {
  if (err instanceof DomainError) {
    if (err.statusCode >= 500) {
      log.error({ err }, "request failed");
      captureError(err, { code: err.code });
    }
    return res.status(err.statusCode).json({ error: { message: err.message, code: err.code } });
  }
  log.error({ err }, "unhandled error");
  captureError(err);
  return res.status(500).json({ error: { message: "Something went wrong", code: "INTERNAL_ERROR" } });
}

export function notFound(req: Request, res: Response) {
  return res.status(404).json({ error: { message: `Cannot ${req.method} ${req.path}`, code: "NOT_FOUND" } });
}

// Express only treats four-argument functions as error handlers.
export const errorMiddleware: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed") {
    return res.status(400).json({ error: { message: "Malformed JSON body", code: "INVALID_JSON" } });
  }
  return sendError(res, err);
};
