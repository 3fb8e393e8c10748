import { v4 as uuid } from "uuid";
import pino, { Logger } from "pino";
import pinoHttp from "pino-http";

const level = process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info");

export const logger: Logger = pino({ level, base: { service: "incident-desk" } });

export type { Logger };

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}

export const httpLogger = pinoHttp({
  logger,
  genReqId: (req) => {
    const header = req.headers["x-request-id"];
    return typeof header === "string" && header ? header : uuid();
  },
  autoLogging: { ignore: (req) => Boolean(req.url?.includes("/health")) },
});
