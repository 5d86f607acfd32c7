import type { LoggerOptions } from "pino";
import pino from "pino";

const env = process.env["NODE_ENV"];

const options: LoggerOptions = {
  level: process.env["LOG_LEVEL"] ?? "info",
  redact: ["secret", "*.secret", "token", "*.token"],
};

if (env !== "production" && env !== "test") {
  options.transport = { target: "pino-pretty", options: { colorize: true } };
}

export const logger = pino(options);

export function createChildLogger(module: string) {
  return logger.child({ module });
}
