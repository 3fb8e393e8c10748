import { connect, connection, disconnect } from "mongoose";
import { moduleLogger } from "../observability/logging";

const log = moduleLogger("db");

export const connectDatabase = async (uri: string | undefined): Promise<void> => {
  if (connection.readyState !== 0) {
    return;
  }
  const target = (uri || "").trim();
  if (!target) {
    throw new Error("DB_URL is not set. Add it to .env");
  }
  log.info("connecting to MongoDB");
  await connect(target);
  log.info({ db: connection.name }, "database connected");
};

export const disconnectDatabase = async (): Promise<void> => {
  if (connection.readyState === 0) return;
  await disconnect();
  log.info("database disconnected");
};
