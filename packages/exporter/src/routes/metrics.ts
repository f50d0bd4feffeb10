/**
 * Prometheus scrape endpoint.
 *
 * Every request runs a fresh poll cycle before rendering. Individual gauge
 * failures only show up in the counters, so this route always answers 200.
 */

import type { FastifyPluginAsync } from "fastify";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /metrics
  // -------------------------------------------------------------------------
  app.get("/", async (request, reply) => {
    try {
      await app.pollCoordinator.runCycle();
    } catch (err) {
      // Serve the last committed snapshot rather than failing the scrape
      request.log.error({ err }, "Poll cycle failed");
    }

    const body = await app.metricsRenderer.render();
    return reply.type(app.metricsRenderer.contentType).send(body);
  });
};
