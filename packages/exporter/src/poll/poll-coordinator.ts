/**
 * Poll Coordinator: runs one scrape cycle across every configured gauge.
 *
 * Fetches go through a bounded worker pool (p-limit) shared by all cycles,
 * so outbound connections never exceed `maxWorkers`. A cycle finishes only
 * once every gauge has produced exactly one outcome, then commits them to
 * the aggregator in a single swap.
 *
 * Cycles are serialized and coalesced: a scrape arriving while one is in
 * flight waits for it and then runs a fresh cycle. At most one cycle is
 * pending behind the running one; every scrape arriving before it starts
 * shares its result.
 *
 * IMPORTANT: Like the fetcher, this is independent of the web framework.
 * It receives its dependencies via constructor injection.
 */

import { performance } from "node:perf_hooks";
import pLimit, { type LimitFunction } from "p-limit";
import { pino } from "pino";
import type {
  FetchOutcome,
  GaugeDescriptor,
  IGaugeFetcher,
  MetricSnapshot,
} from "@streamflow-exporter/shared";
import type { GaugeRegistry } from "../gauges/gauge-registry.js";
import type { CoreLogger } from "../types/logger.js";
import type { GaugeOutcome, MetricAggregator } from "../metrics/metric-aggregator.js";

export const DEFAULT_MAX_WORKERS = 10;

export interface PollCoordinatorOptions {
  /** Maximum concurrent fetches (default: 10) */
  maxWorkers?: number;
  logger?: CoreLogger;
}

export class PollCoordinator {
  private registry: GaugeRegistry;
  private fetcher: IGaugeFetcher;
  private aggregator: MetricAggregator;
  private limit: LimitFunction;
  private log: CoreLogger;

  /** Cycle currently fetching, if any */
  private current: Promise<MetricSnapshot> | null = null;
  /** Cycle queued behind `current`, shared by every caller that joins it */
  private pending: Promise<MetricSnapshot> | null = null;

  constructor(
    registry: GaugeRegistry,
    fetcher: IGaugeFetcher,
    aggregator: MetricAggregator,
    options?: PollCoordinatorOptions,
  ) {
    const maxWorkers = options?.maxWorkers ?? DEFAULT_MAX_WORKERS;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer (got ${maxWorkers})`);
    }
    this.registry = registry;
    this.fetcher = fetcher;
    this.aggregator = aggregator;
    this.limit = pLimit(maxWorkers);
    this.log = options?.logger ?? pino({ level: "silent" });
  }

  /** Whether a cycle is currently running or queued */
  get inFlight(): boolean {
    return this.current !== null || this.pending !== null;
  }

  /** Fetches currently executing in the worker pool */
  get activeFetches(): number {
    return this.limit.activeCount;
  }

  /**
   * Run a full poll cycle and return the snapshot it committed.
   *
   * The cycle always starts after this call. If one is already in flight,
   * the caller joins the single cycle queued behind it.
   */
  runCycle(): Promise<MetricSnapshot> {
    if (this.pending) return this.pending;
    if (!this.current) return this.startCycle();

    const settled = this.current.then(
      () => undefined,
      () => undefined,
    );
    this.pending = settled.then(() => {
      this.pending = null;
      return this.startCycle();
    });
    return this.pending;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private startCycle(): Promise<MetricSnapshot> {
    const cycle: Promise<MetricSnapshot> = this.executeCycle().finally(() => {
      if (this.current === cycle) this.current = null;
    });
    this.current = cycle;
    return cycle;
  }

  private async executeCycle(): Promise<MetricSnapshot> {
    const start = performance.now();
    const gauges = this.registry.all();

    const outcomes: GaugeOutcome[] = await Promise.all(
      gauges.map((gauge) =>
        this.limit(async () => ({
          gaugeId: gauge.id,
          outcome: await this.fetchContained(gauge),
        })),
      ),
    );

    const durationSeconds = (performance.now() - start) / 1000;
    const snapshot = this.aggregator.commitCycle({ outcomes, durationSeconds });

    const succeeded = outcomes.filter((o) => o.outcome.status === "success").length;
    this.log.info(
      {
        gauges: gauges.length,
        succeeded,
        failed: outcomes.length - succeeded,
        durationSeconds: round3(durationSeconds),
      },
      "Poll cycle complete",
    );
    return snapshot;
  }

  /** Run one fetch; a thrown error is confined to its own gauge */
  private async fetchContained(gauge: GaugeDescriptor): Promise<FetchOutcome> {
    try {
      return await this.fetcher.fetch(gauge);
    } catch (err) {
      this.log.error({ gaugeId: gauge.id, err }, "Gauge fetch threw unexpectedly");
      return {
        status: "failure",
        kind: "transport",
        detail: err instanceof Error ? err.message : String(err),
        quota: [],
      };
    }
  }
}

/** Round to 3 decimal places */
function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}
