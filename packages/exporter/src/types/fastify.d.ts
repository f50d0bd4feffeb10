import "fastify";
import type { GaugeRegistry } from "../gauges/gauge-registry.js";
import type { MetricAggregator } from "../metrics/metric-aggregator.js";
import type { PrometheusRenderer } from "../metrics/prometheus-renderer.js";
import type { PollCoordinator } from "../poll/poll-coordinator.js";

declare module "fastify" {
  interface FastifyInstance {
    gauges: GaugeRegistry;
    aggregator: MetricAggregator;
    pollCoordinator: PollCoordinator;
    metricsRenderer: PrometheusRenderer;
  }
}
