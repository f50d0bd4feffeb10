/**
 * Exporter configuration: environment variables plus the YAML gauges file.
 *
 * Anything missing or malformed here is fatal at startup (ConfigError).
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import type { GaugeDescriptor } from "@streamflow-exporter/shared";
import { DEFAULT_API_URL, DEFAULT_TIMEOUT_MS } from "../fetcher/gauge-fetcher.js";
import { DEFAULT_MAX_WORKERS } from "../poll/poll-coordinator.js";
import { GaugesFile, type GaugeEntry } from "./config.schemas.js";

export const DEFAULT_GAUGES_FILE = "/config/usgs_gauges.yaml";
const DEFAULT_PARAMETER_CODE = "00060"; // discharge, cfs
const DEFAULT_STATISTIC_ID = "00011"; // instantaneous

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export interface ExporterConfig {
  gauges: GaugeDescriptor[];
  maxWorkers: number;
  apiKeys: { primary?: string; backup?: string };
  apiUrl: string;
  requestTimeoutMs: number;
  /** Register Node.js process metrics */
  defaultMetrics: boolean;
  host: string;
  port: number;
}

type Env = Record<string, string | undefined>;

// ---------------------------------------------------------------------------
// Gauges file
// ---------------------------------------------------------------------------

/**
 * Parse and validate the YAML text of a gauges file.
 *
 * Uses the failsafe schema so every scalar stays a string: site codes such
 * as `01646500` keep their leading zeros.
 */
export function parseGaugesFile(text: string, source = "gauges file"): GaugeDescriptor[] {
  let doc: unknown;
  try {
    doc = parseYaml(text, { schema: "failsafe" });
  } catch (err) {
    throw new ConfigError(`${source} is not valid YAML`, { cause: err });
  }

  if (!Value.Check(GaugesFile, doc)) {
    const first = Value.Errors(GaugesFile, doc).First();
    const where = first?.path ? ` at ${first.path}` : "";
    throw new ConfigError(
      `${source} must be a list of gauges with an "id"${where}: ${first?.message ?? "invalid"}`,
    );
  }

  const seen = new Set<string>();
  return doc.map((entry) => {
    const gauge = toDescriptor(entry);
    if (seen.has(gauge.id)) {
      throw new ConfigError(`${source} lists gauge "${gauge.id}" more than once`);
    }
    seen.add(gauge.id);
    return gauge;
  });
}

/** Map a validated YAML entry to a descriptor, applying naming defaults */
export function toDescriptor(entry: GaugeEntry): GaugeDescriptor {
  const id = entry.id;
  const locationName = entry.name ?? id;
  return {
    id,
    friendlyName: entry.friendly_name ?? locationName,
    locationName,
    query: {
      monitoringLocationId: `USGS-${id}`,
      parameterCode: entry.parameter_code ?? DEFAULT_PARAMETER_CODE,
      statisticId: entry.statistic_id ?? DEFAULT_STATISTIC_ID,
    },
  };
}

/** Read and parse the gauges file from disk */
export async function loadGauges(path: string): Promise<GaugeDescriptor[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`Cannot read gauges file ${path}`, { cause: err });
  }
  return parseGaugesFile(text, path);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

/** Load the full configuration from the environment and the gauges file */
export async function loadConfig(env: Env = process.env): Promise<ExporterConfig> {
  const gaugesFile = env.USGS_GAUGES_FILE || DEFAULT_GAUGES_FILE;
  const apiUrl = env.USGS_API_URL || DEFAULT_API_URL;
  try {
    new URL(apiUrl);
  } catch (err) {
    throw new ConfigError(`USGS_API_URL is not a valid URL: ${apiUrl}`, { cause: err });
  }

  return {
    gauges: await loadGauges(gaugesFile),
    maxWorkers: positiveInt(env, "USGS_MAX_WORKERS", DEFAULT_MAX_WORKERS),
    apiKeys: {
      primary: env.USGS_API_KEY || undefined,
      backup: env.USGS_API_KEY2 || undefined,
    },
    apiUrl,
    requestTimeoutMs: positiveInt(env, "USGS_REQUEST_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    defaultMetrics: bool(env, "EXPORTER_DEFAULT_METRICS", true),
    host: env.HOST || "0.0.0.0",
    port: positiveInt(env, "PORT", 8000),
  };
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  const value = parseInt(raw, 10);
  if (value < 1) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function bool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${name} must be true or false (got "${env[name]}")`);
}
