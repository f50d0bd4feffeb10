/**
 * Metric Aggregator: the exporter's only mutable shared state.
 *
 * The current snapshot is frozen and replaced wholesale on every update
 * (build next, swap reference), so a reader holding a snapshot never sees
 * a partial update. Writes come from the PollCoordinator only.
 */

import type {
  FailureKind,
  FetchOutcome,
  MetricSnapshot,
  QuotaState,
} from "@streamflow-exporter/shared";

/** One gauge's outcome within a cycle */
export interface GaugeOutcome {
  gaugeId: string;
  outcome: FetchOutcome;
}

/** Everything a completed poll cycle contributes */
export interface CycleResult {
  outcomes: readonly GaugeOutcome[];
  durationSeconds: number;
  /** Completion time (default: now) */
  completedAt?: Date;
}

export interface MetricAggregatorOptions {
  /** Size of the gauge registry; constant for the aggregator's lifetime */
  configuredGaugeCount: number;
}

// ---------------------------------------------------------------------------
// Mutable draft used while building the next snapshot
// ---------------------------------------------------------------------------

interface Draft {
  streamflow: Record<string, number>;
  observedAt: Record<string, string>;
  gaugeUp: Record<string, boolean>;
  successCount: number;
  failureCount: number;
  failuresByKind: Record<FailureKind, number>;
  configuredGaugeCount: number;
  lastScrapeDurationSeconds: number;
  lastScrapeAt: string | null;
  cycleCount: number;
  quota: Record<string, QuotaState>;
}

// ---------------------------------------------------------------------------
// MetricAggregator
// ---------------------------------------------------------------------------

export class MetricAggregator {
  private current: MetricSnapshot;

  constructor(options: MetricAggregatorOptions) {
    this.current = freeze({
      streamflow: {},
      observedAt: {},
      gaugeUp: {},
      successCount: 0,
      failureCount: 0,
      failuresByKind: { transport: 0, auth_exhausted: 0, no_data: 0, parse_error: 0 },
      configuredGaugeCount: options.configuredGaugeCount,
      lastScrapeDurationSeconds: 0,
      lastScrapeAt: null,
      cycleCount: 0,
      quota: {},
    });
  }

  /** The last fully committed snapshot (frozen; safe to hold on to) */
  snapshot(): MetricSnapshot {
    return this.current;
  }

  /** Apply a single gauge outcome and publish it */
  applyOutcome(gaugeId: string, outcome: FetchOutcome): void {
    const draft = thaw(this.current);
    applyToDraft(draft, gaugeId, outcome);
    this.current = freeze(draft);
  }

  /** Overwrite the last scrape duration and completion time */
  recordCycleDuration(seconds: number, completedAt: Date = new Date()): void {
    const draft = thaw(this.current);
    draft.lastScrapeDurationSeconds = seconds;
    draft.lastScrapeAt = completedAt.toISOString();
    this.current = freeze(draft);
  }

  /**
   * Apply a whole cycle in one swap: all outcomes, the duration, and the
   * cycle count become visible together.
   */
  commitCycle(result: CycleResult): MetricSnapshot {
    const draft = thaw(this.current);
    for (const { gaugeId, outcome } of result.outcomes) {
      applyToDraft(draft, gaugeId, outcome);
    }
    draft.lastScrapeDurationSeconds = result.durationSeconds;
    draft.lastScrapeAt = (result.completedAt ?? new Date()).toISOString();
    draft.cycleCount += 1;
    this.current = freeze(draft);
    return this.current;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function applyToDraft(draft: Draft, gaugeId: string, outcome: FetchOutcome): void {
  for (const q of outcome.quota) {
    draft.quota[q.credentialLabel] = Object.freeze({ remaining: q.remaining, limit: q.limit });
  }

  if (outcome.status === "success") {
    draft.successCount += 1;
    draft.streamflow[gaugeId] = outcome.value;
    if (outcome.observedAt) {
      draft.observedAt[gaugeId] = outcome.observedAt;
    } else {
      delete draft.observedAt[gaugeId];
    }
    draft.gaugeUp[gaugeId] = true;
    return;
  }

  // Failures keep the previous (stale) streamflow value
  draft.failureCount += 1;
  draft.failuresByKind[outcome.kind] += 1;
  draft.gaugeUp[gaugeId] = false;
}

/** Shallow-copy a snapshot into a mutable draft */
function thaw(s: MetricSnapshot): Draft {
  return {
    ...s,
    streamflow: { ...s.streamflow },
    observedAt: { ...s.observedAt },
    gaugeUp: { ...s.gaugeUp },
    failuresByKind: { ...s.failuresByKind },
    quota: { ...s.quota },
  };
}

function freeze(d: Draft): MetricSnapshot {
  return Object.freeze({
    ...d,
    streamflow: Object.freeze(d.streamflow),
    observedAt: Object.freeze(d.observedAt),
    gaugeUp: Object.freeze(d.gaugeUp),
    failuresByKind: Object.freeze(d.failuresByKind),
    quota: Object.freeze(d.quota),
  });
}
