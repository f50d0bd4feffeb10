/** Query parameters sent to the latest-continuous collection for one gauge */
export interface GaugeQuery {
  /** Agency-prefixed site code, e.g. "USGS-01646500" */
  monitoringLocationId: string;
  /** Observed property code (default "00060" = discharge, cfs) */
  parameterCode: string;
  /** Statistic code (default "00011" = instantaneous) */
  statisticId: string;
}

/** A configured monitoring station, immutable after load */
export interface GaugeDescriptor {
  /** USGS site code, e.g. "01646500" */
  id: string;
  /** Label used on dashboards (falls back to `locationName`) */
  friendlyName: string;
  /** Station name as published by USGS (falls back to `id`) */
  locationName: string;
  query: GaugeQuery;
}

/** Which configured key a credential came from */
export type CredentialLabel = "primary" | "backup" | "anonymous";

/** An API key plus its failover rank (0 = tried first) */
export interface Credential {
  label: CredentialLabel;
  rank: number;
  /** `null` sends the request without an `X-Api-Key` header */
  apiKey: string | null;
}
