import { mkdirSync } from "node:fs";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import type { AppConfig } from "./config";

export type Logger = pino.Logger;

export function createLogger(config: Pick<AppConfig, "logDir" | "logLevel">): Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: {
      service: "registrable",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.logDir === null) {
    return pino(options, pino.destination(2));
  }

  mkdirSync(config.logDir, { recursive: true });

  const stream = createStream("registrable.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: config.logDir,
    compress: "gzip",
  });

  return pino(options, stream);
}
