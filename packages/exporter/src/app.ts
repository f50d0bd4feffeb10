import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import { randomUUID } from "node:crypto";
import type { IGaugeFetcher } from "@streamflow-exporter/shared";

import type { ExporterConfig } from "./config/config.js";
import { GaugeRegistry } from "./gauges/gauge-registry.js";
import { CredentialPool } from "./gauges/credential-pool.js";
import { GaugeFetcher } from "./fetcher/gauge-fetcher.js";
import { MetricAggregator } from "./metrics/metric-aggregator.js";
import { PrometheusRenderer } from "./metrics/prometheus-renderer.js";
import { PollCoordinator } from "./poll/poll-coordinator.js";
import { metricsRoutes } from "./routes/metrics.js";
import { healthRoutes } from "./routes/health.js";
import { gaugeRoutes } from "./routes/gauges.js";

const isDev = process.env.NODE_ENV !== "production";

/** Config fields the app itself uses (listen address lives in index.ts) */
export type AppConfig = Omit<ExporterConfig, "host" | "port">;

export interface BuildAppOptions extends FastifyServerOptions {
  config: AppConfig;
  /** Override the gauge fetcher (for testing) */
  fetcher?: IGaugeFetcher;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const { config, fetcher: customFetcher, ...fastifyOpts } = opts;

  const app = Fastify(
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: isDev
            ? {
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : {
                // Production: structured JSON logging with redaction
                redact: ["req.headers.authorization"],
              },
          // Generate unique request IDs for tracing
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header ? header : randomUUID();
          },
        },
  );

  // Core engine (decorated so routes can access it). One set per app
  // instance; nothing here is process-global.
  const gauges = new GaugeRegistry(config.gauges);
  const fetcher =
    customFetcher ??
    new GaugeFetcher({
      credentials: CredentialPool.fromKeys(config.apiKeys),
      apiUrl: config.apiUrl,
      timeoutMs: config.requestTimeoutMs,
      logger: app.log.child({ module: "fetcher" }),
    });
  const aggregator = new MetricAggregator({ configuredGaugeCount: gauges.size });
  const pollCoordinator = new PollCoordinator(gauges, fetcher, aggregator, {
    maxWorkers: config.maxWorkers,
    logger: app.log.child({ module: "poll" }),
  });
  const metricsRenderer = new PrometheusRenderer(gauges, aggregator, {
    defaultMetrics: config.defaultMetrics,
  });

  app.decorate("gauges", gauges);
  app.decorate("aggregator", aggregator);
  app.decorate("pollCoordinator", pollCoordinator);
  app.decorate("metricsRenderer", metricsRenderer);

  // ---------------------------------------------------------------------------
  // Global error handler: normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || "params",
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.message,
      });
      return;
    }

    // Unexpected errors: log full details, return generic message
    request.log.error({ err: error }, "Unhandled error");
    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------
  await app.register(metricsRoutes, { prefix: "/metrics" });
  await app.register(healthRoutes, { prefix: "/health" });
  await app.register(gaugeRoutes, { prefix: "/api/gauges" });

  app.log.info(
    { gauges: gauges.size, maxWorkers: config.maxWorkers },
    "Exporter configured",
  );

  return app;
}
