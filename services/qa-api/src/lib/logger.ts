import pino, { type BaseLogger } from "pino";

// The subset shared by pino loggers and Fastify's request/app loggers.
export type Logger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export function buildLoggerOptions(level: string) {
  return {
    transport:
      process.env.NODE_ENV === "development"
        ? { target: "pino-pretty" }
        : undefined,
    level,
  };
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
