import type { FastifyBaseLogger } from "fastify";

/** The slice of Fastify's pino logger the custody core writes to. */
export type CoreLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export const silentLogger: CoreLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
