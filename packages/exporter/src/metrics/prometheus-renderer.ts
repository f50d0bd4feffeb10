/**
 * Prometheus Renderer: exposes the aggregator's snapshot in text format.
 *
 * Each renderer owns its registry; there is no process-wide singleton.
 * Metric values are pulled from the aggregator in `collect` callbacks.
 * prom-client invokes all of them in the same tick when rendering, so one
 * render reads one snapshot.
 */

import {
  Counter,
  Gauge,
  Registry,
  collectDefaultMetrics,
} from "prom-client";
import { FAILURE_KINDS, type MetricSnapshot } from "@streamflow-exporter/shared";
import type { GaugeRegistry } from "../gauges/gauge-registry.js";
import type { MetricAggregator } from "./metric-aggregator.js";

export interface PrometheusRendererOptions {
  /** Also register Node.js process metrics (default: true) */
  defaultMetrics?: boolean;
}

export class PrometheusRenderer {
  readonly registry = new Registry();

  private aggregator: MetricAggregator;
  private gauges: GaugeRegistry;

  constructor(
    gauges: GaugeRegistry,
    aggregator: MetricAggregator,
    options?: PrometheusRendererOptions,
  ) {
    this.gauges = gauges;
    this.aggregator = aggregator;

    if (options?.defaultMetrics ?? true) {
      collectDefaultMetrics({ register: this.registry });
    }
    this.registerMetrics();
  }

  /** Content-Type header for the rendered text */
  get contentType(): string {
    return this.registry.contentType;
  }

  /** Render every registered metric in Prometheus text format */
  render(): Promise<string> {
    return this.registry.metrics();
  }

  // -----------------------------------------------------------------------
  // Metric definitions
  // -----------------------------------------------------------------------

  private registerMetrics(): void {
    const read = (): MetricSnapshot => this.aggregator.snapshot();
    const gauges = this.gauges;
    const registers = [this.registry];

    // -- Per-gauge readings -------------------------------------------------

    new Gauge({
      name: "usgs_streamflow_cfs",
      help: "USGS streamflow in cubic feet per second",
      labelNames: ["gauge_id", "friendly_name", "location_name"] as const,
      registers,
      collect() {
        const snap = read();
        this.reset();
        for (const g of gauges.all()) {
          const value = snap.streamflow[g.id];
          if (value === undefined) continue;
          this.set(
            { gauge_id: g.id, friendly_name: g.friendlyName, location_name: g.locationName },
            value,
          );
        }
      },
    });

    new Gauge({
      name: "usgs_streamflow_observed_timestamp_seconds",
      help: "Unix time of the reading behind usgs_streamflow_cfs",
      labelNames: ["gauge_id"] as const,
      registers,
      collect() {
        const snap = read();
        this.reset();
        for (const g of gauges.all()) {
          const observedAt = snap.observedAt[g.id];
          if (observedAt === undefined) continue;
          const ms = Date.parse(observedAt);
          if (Number.isNaN(ms)) continue;
          this.set({ gauge_id: g.id }, ms / 1000);
        }
      },
    });

    new Gauge({
      name: "usgs_gauge_up",
      help: "Whether the last fetch for the gauge succeeded (1) or failed (0)",
      labelNames: ["gauge_id"] as const,
      registers,
      collect() {
        const snap = read();
        this.reset();
        for (const g of gauges.all()) {
          const up = snap.gaugeUp[g.id];
          if (up === undefined) continue;
          this.set({ gauge_id: g.id }, up ? 1 : 0);
        }
      },
    });

    // -- Exporter health ----------------------------------------------------

    new Counter({
      name: "usgs_exporter_scrape_success_total",
      help: "Number of successful gauge fetches",
      registers,
      collect() {
        this.reset();
        this.inc(read().successCount);
      },
    });

    new Counter({
      name: "usgs_exporter_scrape_failure_total",
      help: "Total number of failed gauge fetches",
      registers,
      collect() {
        this.reset();
        this.inc(read().failureCount);
      },
    });

    new Counter({
      name: "usgs_exporter_scrape_failures_by_kind_total",
      help: "Failed gauge fetches by failure kind",
      labelNames: ["kind"] as const,
      registers,
      collect() {
        const snap = read();
        this.reset();
        for (const kind of FAILURE_KINDS) {
          this.inc({ kind }, snap.failuresByKind[kind]);
        }
      },
    });

    new Gauge({
      name: "usgs_exporter_gauges_total",
      help: "Total number of gauges configured for polling",
      registers,
      collect() {
        this.set(read().configuredGaugeCount);
      },
    });

    new Gauge({
      name: "usgs_exporter_scrape_duration_seconds",
      help: "Time spent scraping all gauges",
      registers,
      collect() {
        this.set(read().lastScrapeDurationSeconds);
      },
    });

    // -- Upstream quota (per credential) ------------------------------------

    new Gauge({
      name: "usgs_api_ratelimit_remaining",
      help: "Remaining allowed requests per hour for each USGS API key",
      labelNames: ["api_key_label"] as const,
      registers,
      collect() {
        this.reset();
        for (const [label, q] of Object.entries(read().quota)) {
          this.set({ api_key_label: label }, q.remaining);
        }
      },
    });

    new Gauge({
      name: "usgs_api_ratelimit_limit",
      help: "Limit of allowed requests per hour",
      labelNames: ["api_key_label"] as const,
      registers,
      collect() {
        this.reset();
        for (const [label, q] of Object.entries(read().quota)) {
          this.set({ api_key_label: label }, q.limit);
        }
      },
    });

    new Gauge({
      name: "usgs_api_requests_per_hour",
      help: "Number of USGS API requests used in the current hour",
      labelNames: ["api_key_label"] as const,
      registers,
      collect() {
        this.reset();
        for (const [label, q] of Object.entries(read().quota)) {
          this.set({ api_key_label: label }, Math.max(0, q.limit - q.remaining));
        }
      },
    });
  }
}
