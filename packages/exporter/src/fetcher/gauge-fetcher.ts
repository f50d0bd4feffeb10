/**
 * Gauge Fetcher: one bounded-timeout request for one gauge's latest reading.
 *
 * Retries are credential failover only: an authorization-class response
 * (401/403/429) moves to the next credential, while transport errors and
 * other upstream errors end the fetch immediately.
 *
 * IMPORTANT: This module is independent of the web framework and never
 * touches metric state. Everything it learns is returned in the outcome.
 */

import { Value } from "@sinclair/typebox/value";
import { pino } from "pino";
import type {
  Credential,
  FetchOutcome,
  FailureKind,
  GaugeDescriptor,
  IGaugeFetcher,
  QuotaObservation,
} from "@streamflow-exporter/shared";
import type { CredentialPool } from "../gauges/credential-pool.js";
import type { CoreLogger } from "../types/logger.js";
import {
  LatestContinuousResponse,
  type LatestValueProperties,
} from "./usgs-api.schemas.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_API_URL =
  "https://api.waterdata.usgs.gov/ogcapi/v0/collections/latest-continuous/items";
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Statuses that mean "this key was rejected", not "the upstream is down" */
const AUTH_STATUSES = new Set([401, 403, 429]);

export interface GaugeFetcherOptions {
  credentials: CredentialPool;
  /** Items endpoint of the latest-continuous collection */
  apiUrl?: string;
  /** Per-request timeout in ms, including reading the body (default: 10000) */
  timeoutMs?: number;
  logger?: CoreLogger;
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

type ParsedReading =
  | { status: "success"; value: number; observedAt: string | null }
  | { status: "failure"; kind: FailureKind; detail: string };

/**
 * Extract the latest reading from a decoded response body.
 * The value may be a number, a numeric string, or wrapped as `{ value }`.
 */
export function parseLatestReading(body: unknown): ParsedReading {
  if (!Value.Check(LatestContinuousResponse, body)) {
    const first = Value.Errors(LatestContinuousResponse, body).First();
    return {
      status: "failure",
      kind: "parse_error",
      detail: first ? `${first.path || "/"}: ${first.message}` : "Unexpected response shape",
    };
  }

  const feature = body.features?.[0];
  if (!feature) {
    return { status: "failure", kind: "no_data", detail: "No current reading" };
  }

  const raw = unwrapValue(feature.properties);
  if (raw === null || raw === undefined || (typeof raw === "string" && raw.trim() === "")) {
    return { status: "failure", kind: "no_data", detail: "Latest reading has no value" };
  }

  const value = typeof raw === "number" ? raw : parseDecimal(raw);
  if (!Number.isFinite(value)) {
    return {
      status: "failure",
      kind: "parse_error",
      detail: `Non-numeric value ${JSON.stringify(raw)}`,
    };
  }

  return { status: "success", value, observedAt: feature.properties.time ?? null };
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Decimal notation only; hex, binary and octal literals are NaN */
function parseDecimal(raw: string): number {
  const text = raw.trim();
  return DECIMAL.test(text) ? Number(text) : Number.NaN;
}

function unwrapValue(props: LatestValueProperties): string | number | null | undefined {
  const { value } = props;
  if (value !== null && typeof value === "object") return value.value;
  return value;
}

/** Read the rate-limit headers; both must be present integers */
export function readQuota(
  headers: Headers,
  credential: Credential,
): QuotaObservation | null {
  const remaining = parseIntHeader(headers.get("x-ratelimit-remaining"));
  const limit = parseIntHeader(headers.get("x-ratelimit-limit"));
  if (remaining === null || limit === null) return null;
  return { credentialLabel: credential.label, remaining, limit };
}

function parseIntHeader(raw: string | null): number | null {
  if (raw === null || !/^\s*\d+\s*$/.test(raw)) return null;
  return parseInt(raw, 10);
}

// ---------------------------------------------------------------------------
// GaugeFetcher
// ---------------------------------------------------------------------------

export class GaugeFetcher implements IGaugeFetcher {
  private credentials: CredentialPool;
  private apiUrl: string;
  private timeoutMs: number;
  private log: CoreLogger;

  constructor(options: GaugeFetcherOptions) {
    this.credentials = options.credentials;
    this.apiUrl = options.apiUrl ?? DEFAULT_API_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.logger ?? pino({ level: "silent" });
  }

  /** Fetch the latest reading for a gauge. Never rejects. */
  async fetch(gauge: GaugeDescriptor): Promise<FetchOutcome> {
    const quota: QuotaObservation[] = [];
    const url = this.buildUrl(gauge);

    let state = this.credentials.start();
    while (state.phase === "try") {
      const { credential } = state;
      let res: Response;
      let body: string;
      try {
        res = await fetch(url, {
          headers: buildHeaders(credential),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        body = await res.text();
      } catch (err) {
        return this.fail(gauge, credential, "transport", describeTransportError(err, this.timeoutMs), quota);
      }

      const observed = readQuota(res.headers, credential);
      if (observed) quota.push(observed);

      if (AUTH_STATUSES.has(res.status)) {
        this.log.debug(
          { gaugeId: gauge.id, credential: credential.label, status: res.status },
          "Credential rejected, failing over",
        );
        state = this.credentials.advance(state);
        continue;
      }

      if (!res.ok) {
        return this.fail(gauge, credential, "transport", `HTTP ${res.status}`, quota);
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(body);
      } catch {
        return this.fail(gauge, credential, "parse_error", "Response body is not JSON", quota);
      }

      const reading = parseLatestReading(decoded);
      if (reading.status === "failure") {
        return this.fail(gauge, credential, reading.kind, reading.detail, quota);
      }
      return {
        status: "success",
        value: reading.value,
        unit: "CFS",
        observedAt: reading.observedAt,
        quota,
      };
    }

    const outcome: FetchOutcome = {
      status: "failure",
      kind: "auth_exhausted",
      detail: `All ${state.attempted} credential(s) rejected`,
      quota,
    };
    this.log.warn({ gaugeId: gauge.id, kind: outcome.kind }, outcome.detail);
    return outcome;
  }

  /** Build the request URL for a gauge */
  buildUrl(gauge: GaugeDescriptor): string {
    const url = new URL(this.apiUrl);
    url.searchParams.set("monitoring_location_id", gauge.query.monitoringLocationId);
    url.searchParams.set("parameter_code", gauge.query.parameterCode);
    url.searchParams.set("statistic_id", gauge.query.statisticId);
    url.searchParams.set("properties", "value,time");
    return url.toString();
  }

  private fail(
    gauge: GaugeDescriptor,
    credential: Credential,
    kind: FailureKind,
    detail: string,
    quota: QuotaObservation[],
  ): FetchOutcome {
    this.log.warn({ gaugeId: gauge.id, kind, credential: credential.label }, detail);
    return { status: "failure", kind, detail, quota };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buildHeaders(credential: Credential): Record<string, string> {
  const headers: Record<string, string> = { accept: "application/geo+json, application/json" };
  if (credential.apiKey) headers["x-api-key"] = credential.apiKey;
  return headers;
}

/** AbortSignal.timeout rejects with a DOMException named TimeoutError */
function describeTransportError(err: unknown, timeoutMs: number): string {
  if (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    (err.name === "TimeoutError" || err.name === "AbortError")
  ) {
    return `Timed out after ${timeoutMs}ms`;
  }
  if (!(err instanceof Error)) return String(err);
  // undici reports "fetch failed" with the socket error as the cause
  return err.cause instanceof Error ? `${err.message}: ${err.cause.message}` : err.message;
}
