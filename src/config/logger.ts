import pino from "pino";
import { env } from "./env";

function defaultLevel() {
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

const pretty = env.LOG_PRETTY ?? env.NODE_ENV === "development";

export const logger = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { service: "bakery-catalog-api", environment: env.NODE_ENV },
  ...(pretty && {
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss Z", ignore: "pid,hostname" }
    }
  })
});
