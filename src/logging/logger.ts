import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

// The bridge username is the bridge's API key
const REDACT_PATHS = ["username", "*.username", "bridge.username"];

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";
  const base: pino.LoggerOptions = { level, name: "lumen", redact: REDACT_PATHS };

  // pino takes either a transport or a destination stream, not both
  if (config?.file) {
    return pino(base, pino.destination({ dest: config.file, mkdir: true, sync: true }));
  }

  if (isJson) return pino(base);

  return pino({
    ...base,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, translateTime: "HH:MM:ss", ignore: "pid,hostname,name" },
    },
  });
}
