/**
 * Outcome of a single gauge fetch.
 *
 * Every failure is recoverable for the gauge it belongs to: it bumps the
 * failure counter and leaves the previous streamflow value in place.
 */

import type { GaugeDescriptor, CredentialLabel } from "./gauge.js";

/** Classified reasons a gauge fetch can fail */
export type FailureKind =
  /** Network error, timeout, or a non-auth upstream error status */
  | "transport"
  /** Every credential was rejected (401/403/429) */
  | "auth_exhausted"
  /** Well-formed response without a current reading */
  | "no_data"
  /** Body was not JSON, did not match the schema, or the value was not numeric */
  | "parse_error";

export const FAILURE_KINDS: readonly FailureKind[] = [
  "transport",
  "auth_exhausted",
  "no_data",
  "parse_error",
];

/** Rate-limit headers seen on one upstream response */
export interface QuotaObservation {
  credentialLabel: CredentialLabel;
  /** X-RateLimit-Remaining */
  remaining: number;
  /** X-RateLimit-Limit */
  limit: number;
}

export interface FetchSuccess {
  status: "success";
  /** Streamflow in cubic feet per second */
  value: number;
  unit: "CFS";
  /** ISO 8601 time of the reading, if the upstream reported one */
  observedAt: string | null;
  quota: QuotaObservation[];
}

export interface FetchFailure {
  status: "failure";
  kind: FailureKind;
  detail: string;
  quota: QuotaObservation[];
}

export type FetchOutcome = FetchSuccess | FetchFailure;

/**
 * Contract for anything that can fetch the latest reading for one gauge.
 * Implementations resolve with a failure outcome instead of rejecting.
 */
export interface IGaugeFetcher {
  fetch(gauge: GaugeDescriptor): Promise<FetchOutcome>;
}
