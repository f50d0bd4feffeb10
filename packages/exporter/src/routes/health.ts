import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const snapshot = app.aggregator.snapshot();

    const payload = {
      status: "ok",
      gauges: snapshot.configuredGaugeCount,
      lastScrapeAt: snapshot.lastScrapeAt,
      scraping: app.pollCoordinator.inFlight,
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(payload);
  });
};
