/**
 * Typebox schemas for gauge API routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Params
// ---------------------------------------------------------------------------

export const GaugeIdParams = Type.Object({
  id: Type.String({ pattern: "^[0-9]+$" }),
});

export type GaugeIdParams = Static<typeof GaugeIdParams>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const GaugeStatus = Type.Object({
  id: Type.String(),
  friendlyName: Type.String(),
  locationName: Type.String(),
  monitoringLocationId: Type.String(),
  /** Last known streamflow in cfs (null until the first successful fetch) */
  streamflowCfs: Type.Union([Type.Number(), Type.Null()]),
  observedAt: Type.Union([Type.String(), Type.Null()]),
  /** Result of the most recent fetch (null before the first cycle) */
  up: Type.Union([Type.Boolean(), Type.Null()]),
});

export type GaugeStatus = Static<typeof GaugeStatus>;

export const GaugeListResponse = Type.Object({
  lastScrapeAt: Type.Union([Type.String(), Type.Null()]),
  gauges: Type.Array(GaugeStatus),
});

export type GaugeListResponse = Static<typeof GaugeListResponse>;
