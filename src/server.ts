// Must stay first: later modules read process.env while they load.
import "dotenv/config";
import { createApp } from "./app.js";
import { DEFAULT_SECRET_KEY, loadConfig } from "./config.js";
import { openDatabase } from "./db/client.js";
import { configureLogger, logger } from "./lib/logger.js";

const config = loadConfig();
configureLogger(config);

if (config.token.secretKey === DEFAULT_SECRET_KEY) {
  logger.warn("WARNING: JWT_SECRET_KEY is not set, using the development default. Set it before deploying.");
}

const { db, close } = openDatabase(config.databaseFile);
const app = createApp(db, config);

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
});

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  server.close((err) => {
    close();
    if (err) {
      logger.error("Error while closing HTTP server:", err);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
