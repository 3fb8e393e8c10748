import "dotenv/config";
import { loadConfig } from "./config";
import { logger } from "./observability/logging";
import { Server } from "./server";
import { createServices } from "./services";
import { connectDatabase, disconnectDatabase } from "./utils/dbConnection";

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;

  await connectDatabase(config.dbUrl);
  const server = new Server(config, createServices(config));
  server.start();

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    try {
      await server.stop();
      await disconnectDatabase();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    }
  };
  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

main().catch((err) => {
  logger.fatal({ err }, "failed to boot");
  process.exit(1);
});
