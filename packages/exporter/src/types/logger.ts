import type { BaseLogger } from "pino";

/** The logger methods the core engine calls; pino and Fastify's logger both satisfy it */
export type CoreLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;
