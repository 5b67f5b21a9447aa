import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import type { AppConfig } from "./config";

export interface Loggers {
  app: pino.Logger;
  audit: pino.Logger;
}

export function createLoggers(config: AppConfig): Loggers {
  const resolvedLogDir = resolve(config.logDir);
  mkdirSync(resolvedLogDir, { recursive: true });

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const auditStream = createStream("audit.log", {
    interval: "1d",
    size: "10M",
    rotate: 90,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "paylens",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  );

  const audit = pino(
    {
      level: config.logLevel,
      base: {
        service: "paylens-audit",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    auditStream,
  );

  return { app, audit };
}

export function createSilentLoggers(): Loggers {
  return {
    app: pino({ level: "silent" }),
    audit: pino({ level: "silent" }),
  };
}
