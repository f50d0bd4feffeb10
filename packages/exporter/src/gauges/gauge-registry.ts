/**
 * Gauge Registry: the fixed, ordered set of gauges polled on every scrape.
 *
 * Built once from configuration and shared read-only by every worker.
 */

import type { GaugeDescriptor } from "@streamflow-exporter/shared";

export class GaugeRegistry {
  private readonly gauges: readonly GaugeDescriptor[];
  private readonly byId: ReadonlyMap<string, GaugeDescriptor>;

  constructor(gauges: readonly GaugeDescriptor[]) {
    const byId = new Map<string, GaugeDescriptor>();
    for (const gauge of gauges) {
      if (byId.has(gauge.id)) {
        throw new Error(`Duplicate gauge id "${gauge.id}"`);
      }
      byId.set(gauge.id, Object.freeze({ ...gauge, query: Object.freeze({ ...gauge.query }) }));
    }
    this.byId = byId;
    this.gauges = Object.freeze(Array.from(byId.values()));
  }

  /** Number of configured gauges */
  get size(): number {
    return this.gauges.length;
  }

  /** All gauges in configuration order */
  all(): readonly GaugeDescriptor[] {
    return this.gauges;
  }

  get(id: string): GaugeDescriptor | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }
}
