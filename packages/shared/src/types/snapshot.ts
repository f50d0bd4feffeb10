/**
 * Metric state published by the aggregator and read by renderers.
 * A snapshot is frozen; updates publish a new one.
 */

import type { FailureKind } from "./fetch.js";

/** Last rate-limit headers seen for one credential */
export interface QuotaState {
  remaining: number;
  limit: number;
}

export interface MetricSnapshot {
  /** Last known streamflow (cfs) per gauge; absent until the first success */
  streamflow: Readonly<Record<string, number>>;
  /** ISO 8601 time of the reading behind `streamflow`, when known */
  observedAt: Readonly<Record<string, string>>;
  /** Whether the gauge's most recent fetch succeeded */
  gaugeUp: Readonly<Record<string, boolean>>;
  successCount: number;
  failureCount: number;
  failuresByKind: Readonly<Record<FailureKind, number>>;
  configuredGaugeCount: number;
  lastScrapeDurationSeconds: number;
  /** ISO 8601 completion time of the last cycle (null before the first) */
  lastScrapeAt: string | null;
  cycleCount: number;
  /** Keyed by credential label */
  quota: Readonly<Record<string, QuotaState>>;
}
