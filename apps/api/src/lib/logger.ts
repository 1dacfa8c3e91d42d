import { pino, type Logger, type LoggerOptions } from "pino";

function buildOptions(): LoggerOptions {
  const nodeEnv = process.env["NODE_ENV"];
  const level = process.env["LOG_LEVEL"] ?? "info";

  if (nodeEnv === "test") {
    return { name: "wa-gateway", level: "silent" };
  }

  if (nodeEnv === "development") {
    return {
      name: "wa-gateway",
      level,
      transport: { target: "pino-pretty" },
    };
  }

  return { name: "wa-gateway", level };
}

/**
 * Process-wide pino instance. Fastify receives it as `loggerInstance`, so
 * request logs and module logs share one stream.
 */
export const logger: Logger = pino(buildOptions());

export function moduleLogger(module: string): Logger {
  return logger.child({ module });
}
