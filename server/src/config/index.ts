import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const parsedPort = Number.parseInt(process.env.SERVER_PORT ?? "4000", 10);

if (Number.isNaN(parsedPort)) {
  throw new Error("Invalid SERVER_PORT value. It must be a number.");
}

const logLevel = process.env.LOG_LEVEL ?? "info";

if (!isLogLevel(logLevel)) {
  throw new Error(`Invalid LOG_LEVEL value. Expected one of: ${LOG_LEVELS.join(", ")}.`);
}

const dataPath =
  process.env.SERVER_DATA_PATH !== undefined && process.env.SERVER_DATA_PATH.trim() !== ""
    ? path.resolve(process.env.SERVER_DATA_PATH)
    : undefined;

export const config = {
  port: parsedPort,
  host: process.env.SERVER_HOST ?? "0.0.0.0",
  logLevel,
  corsOrigin: process.env.CORS_ORIGIN ?? "",
  dataPath
};

export type AppConfig = typeof config;
