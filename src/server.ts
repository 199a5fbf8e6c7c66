import http from "http";
import { createApp } from "./app";
import { env } from "./config/env";
import { logger } from "./config/logger";
import { openSqlite } from "./database/sqlite/client";
import { runMigrations } from "./database/sqlite/migrate";

const database = openSqlite(env.DATABASE_URL);
runMigrations(database.db);

const server = http.createServer(createApp({ db: database.db }));

server.listen(env.PORT, () => {
  logger.info(`Bakery catalog listening on port ${env.PORT}`);
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "Shutting down");
  server.close((err) => {
    if (err) logger.error({ err }, "HTTP server close failed");
    database.close();
    process.exit(err ? 1 : 0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
