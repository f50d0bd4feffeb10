/**
 * Gauge API routes: JSON view of the last committed snapshot.
 *
 * These never trigger a poll cycle; only /metrics does.
 */

import type { FastifyPluginAsync } from "fastify";
import type { GaugeDescriptor, MetricSnapshot } from "@streamflow-exporter/shared";
import {
  GaugeIdParams,
  GaugeListResponse,
  GaugeStatus,
} from "./gauges.schemas.js";

function toStatus(gauge: GaugeDescriptor, snapshot: MetricSnapshot): GaugeStatus {
  return {
    id: gauge.id,
    friendlyName: gauge.friendlyName,
    locationName: gauge.locationName,
    monitoringLocationId: gauge.query.monitoringLocationId,
    streamflowCfs: snapshot.streamflow[gauge.id] ?? null,
    observedAt: snapshot.observedAt[gauge.id] ?? null,
    up: snapshot.gaugeUp[gauge.id] ?? null,
  };
}

export const gaugeRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/gauges
  // -------------------------------------------------------------------------
  app.get(
    "/",
    { schema: { response: { 200: GaugeListResponse } } },
    async (_request, reply) => {
      const snapshot = app.aggregator.snapshot();
      const gauges = app.gauges.all().map((g) => toStatus(g, snapshot));
      return reply.send({ lastScrapeAt: snapshot.lastScrapeAt, gauges });
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/gauges/:id
  // -------------------------------------------------------------------------
  app.get<{ Params: GaugeIdParams }>(
    "/:id",
    { schema: { params: GaugeIdParams, response: { 200: GaugeStatus } } },
    async (request, reply) => {
      const gauge = app.gauges.get(request.params.id);
      if (!gauge) {
        return reply.status(404).send({ error: "Gauge not found" });
      }
      return reply.send(toStatus(gauge, app.aggregator.snapshot()));
    },
  );
};
