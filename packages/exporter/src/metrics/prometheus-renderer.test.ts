import { describe, it, expect } from "vitest";
import type { FetchOutcome, GaugeDescriptor } from "@streamflow-exporter/shared";
import { PrometheusRenderer } from "./prometheus-renderer.js";
import { MetricAggregator } from "./metric-aggregator.js";
import { GaugeRegistry } from "../gauges/gauge-registry.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const GAUGES: GaugeDescriptor[] = [
  {
    id: "01646500",
    friendlyName: "Little Falls",
    locationName: "POTOMAC RIVER NEAR WASH",
    query: { monitoringLocationId: "USGS-01646500", parameterCode: "00060", statisticId: "00011" },
  },
  {
    id: "02037500",
    friendlyName: "Richmond",
    locationName: "JAMES RIVER NEAR RICHMOND",
    query: { monitoringLocationId: "USGS-02037500", parameterCode: "00060", statisticId: "00011" },
  },
];

function success(value: number, observedAt: string | null = null): FetchOutcome {
  return { status: "success", value, unit: "CFS", observedAt, quota: [] };
}

function setup(defaultMetrics = false) {
  const gauges = new GaugeRegistry(GAUGES);
  const aggregator = new MetricAggregator({ configuredGaugeCount: gauges.size });
  const renderer = new PrometheusRenderer(gauges, aggregator, { defaultMetrics });
  return { gauges, aggregator, renderer };
}

async function valuesOf(renderer: PrometheusRenderer, name: string) {
  const metric = renderer.registry.getSingleMetric(name);
  if (!metric) throw new Error(`metric ${name} not registered`);
  return (await metric.get()).values;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("PrometheusRenderer", () => {
  it("renders counters and exporter gauges from the snapshot", async () => {
    const { aggregator, renderer } = setup();
    aggregator.commitCycle({
      outcomes: [
        { gaugeId: "01646500", outcome: success(12.4) },
        {
          gaugeId: "02037500",
          outcome: { status: "failure", kind: "no_data", detail: "none", quota: [] },
        },
      ],
      durationSeconds: 0.25,
    });

    const text = await renderer.render();
    const lines = text.split("\n");

    expect(lines).toContain("usgs_exporter_gauges_total 2");
    expect(lines).toContain("usgs_exporter_scrape_success_total 1");
    expect(lines).toContain("usgs_exporter_scrape_failure_total 1");
    expect(lines).toContain("usgs_exporter_scrape_duration_seconds 0.25");
    expect(lines).toContain("# TYPE usgs_exporter_scrape_success_total counter");
    expect(text).toMatch(/^usgs_streamflow_cfs\{[^}]*gauge_id="01646500"[^}]*\} 12\.4$/m);
  });

  it("labels streamflow with the gauge names and skips gauges without data", async () => {
    const { aggregator, renderer } = setup();
    aggregator.applyOutcome("01646500", success(12.4));

    expect(await valuesOf(renderer, "usgs_streamflow_cfs")).toEqual([
      {
        value: 12.4,
        labels: {
          gauge_id: "01646500",
          friendly_name: "Little Falls",
          location_name: "POTOMAC RIVER NEAR WASH",
        },
      },
    ]);
  });

  it("reports gauge up/down and observation time", async () => {
    const { aggregator, renderer } = setup();
    aggregator.applyOutcome("01646500", success(1, "2025-06-01T12:00:00Z"));
    aggregator.applyOutcome("02037500", {
      status: "failure",
      kind: "transport",
      detail: "HTTP 503",
      quota: [],
    });

    expect(await valuesOf(renderer, "usgs_gauge_up")).toEqual([
      { value: 1, labels: { gauge_id: "01646500" } },
      { value: 0, labels: { gauge_id: "02037500" } },
    ]);
    expect(await valuesOf(renderer, "usgs_streamflow_observed_timestamp_seconds")).toEqual([
      { value: Date.parse("2025-06-01T12:00:00Z") / 1000, labels: { gauge_id: "01646500" } },
    ]);
  });

  it("breaks failures down by kind", async () => {
    const { aggregator, renderer } = setup();
    aggregator.applyOutcome("01646500", {
      status: "failure",
      kind: "parse_error",
      detail: "bad",
      quota: [],
    });

    const values = await valuesOf(renderer, "usgs_exporter_scrape_failures_by_kind_total");
    expect(values).toContainEqual({ value: 1, labels: { kind: "parse_error" } });
    expect(values).toContainEqual({ value: 0, labels: { kind: "transport" } });
    expect(values).toHaveLength(4);
  });

  it("exposes quota per credential", async () => {
    const { aggregator, renderer } = setup();
    aggregator.applyOutcome("01646500", {
      ...success(1),
      quota: [{ credentialLabel: "primary", remaining: 940, limit: 1000 }],
    });

    expect(await valuesOf(renderer, "usgs_api_ratelimit_remaining")).toEqual([
      { value: 940, labels: { api_key_label: "primary" } },
    ]);
    expect(await valuesOf(renderer, "usgs_api_ratelimit_limit")).toEqual([
      { value: 1000, labels: { api_key_label: "primary" } },
    ]);
    expect(await valuesOf(renderer, "usgs_api_requests_per_hour")).toEqual([
      { value: 60, labels: { api_key_label: "primary" } },
    ]);
  });

  it("keeps registries separate between instances", async () => {
    const a = setup();
    const b = setup();
    a.aggregator.applyOutcome("01646500", success(5));

    expect(await valuesOf(a.renderer, "usgs_streamflow_cfs")).toHaveLength(1);
    expect(await valuesOf(b.renderer, "usgs_streamflow_cfs")).toHaveLength(0);
  });

  it("includes process metrics when enabled", async () => {
    const { renderer } = setup(true);

    expect(await renderer.render()).toContain("# TYPE process_cpu_user_seconds_total counter");
  });

  it("uses the Prometheus text content type", () => {
    const { renderer } = setup();

    expect(renderer.contentType).toContain("text/plain");
  });
});
