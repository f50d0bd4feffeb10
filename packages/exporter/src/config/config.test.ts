import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, writeFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, loadConfig, parseGaugesFile } from "./config.js";
import { DEFAULT_API_URL } from "../fetcher/gauge-fetcher.js";

// ---------------------------------------------------------------------------
// parseGaugesFile
// ---------------------------------------------------------------------------

describe("parseGaugesFile", () => {
  it("maps entries to descriptors with naming defaults", () => {
    const gauges = parseGaugesFile(
      [
        "- id: 01646500",
        "  name: POTOMAC RIVER NEAR WASH",
        "  friendly_name: Little Falls",
        "- id: '02037500'",
        "  name: JAMES RIVER NEAR RICHMOND",
        "- id: 03430100",
        "  parameter_code: 00065",
      ].join("\n"),
    );

    expect(gauges).toEqual([
      {
        id: "01646500",
        friendlyName: "Little Falls",
        locationName: "POTOMAC RIVER NEAR WASH",
        query: { monitoringLocationId: "USGS-01646500", parameterCode: "00060", statisticId: "00011" },
      },
      {
        id: "02037500",
        friendlyName: "JAMES RIVER NEAR RICHMOND",
        locationName: "JAMES RIVER NEAR RICHMOND",
        query: { monitoringLocationId: "USGS-02037500", parameterCode: "00060", statisticId: "00011" },
      },
      {
        id: "03430100",
        friendlyName: "03430100",
        locationName: "03430100",
        query: { monitoringLocationId: "USGS-03430100", parameterCode: "00065", statisticId: "00011" },
      },
    ]);
  });

  it("accepts an empty list", () => {
    expect(parseGaugesFile("[]")).toEqual([]);
  });

  it("rejects a document that is not a list", () => {
    expect(() => parseGaugesFile("gauges:\n  - id: '1'")).toThrow(ConfigError);
  });

  it("rejects entries without an id", () => {
    expect(() => parseGaugesFile("- name: Somewhere")).toThrow(/must be a list of gauges/);
  });

  it("rejects duplicate ids", () => {
    expect(() => parseGaugesFile("- id: '1'\n- id: '1'")).toThrow('lists gauge "1" more than once');
  });

  it("rejects malformed YAML", () => {
    expect(() => parseGaugesFile("- id: [unclosed")).toThrow("gauges file is not valid YAML");
  });
});

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

describe("loadConfig", () => {
  let dir: string;
  let gaugesFile: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "usgs-exporter-"));
    gaugesFile = join(dir, "usgs_gauges.yaml");
    await writeFile(gaugesFile, "- id: 01646500\n  name: POTOMAC RIVER NEAR WASH\n");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies defaults", async () => {
    const config = await loadConfig({ USGS_GAUGES_FILE: gaugesFile });

    expect(config).toEqual({
      gauges: [expect.objectContaining({ id: "01646500" })],
      maxWorkers: 10,
      apiKeys: { primary: undefined, backup: undefined },
      apiUrl: DEFAULT_API_URL,
      requestTimeoutMs: 10_000,
      defaultMetrics: true,
      host: "0.0.0.0",
      port: 8000,
    });
  });

  it("reads overrides from the environment", async () => {
    const config = await loadConfig({
      USGS_GAUGES_FILE: gaugesFile,
      USGS_MAX_WORKERS: "4",
      USGS_API_KEY: "test-primary",
      USGS_API_KEY2: "test-backup",
      USGS_API_URL: "http://localhost:9999/items",
      USGS_REQUEST_TIMEOUT_MS: "2500",
      EXPORTER_DEFAULT_METRICS: "false",
      HOST: "127.0.0.1",
      PORT: "9101",
    });

    expect(config.maxWorkers).toBe(4);
    expect(config.apiKeys).toEqual({ primary: "test-primary", backup: "test-backup" });
    expect(config.apiUrl).toBe("http://localhost:9999/items");
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.defaultMetrics).toBe(false);
    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(9101);
  });

  it("rejects a worker count that is not a positive integer", async () => {
    await expect(
      loadConfig({ USGS_GAUGES_FILE: gaugesFile, USGS_MAX_WORKERS: "0" }),
    ).rejects.toThrow('USGS_MAX_WORKERS must be a positive integer (got "0")');
    await expect(
      loadConfig({ USGS_GAUGES_FILE: gaugesFile, USGS_MAX_WORKERS: "ten" }),
    ).rejects.toThrow(ConfigError);
  });

  it("rejects an invalid API URL", async () => {
    await expect(
      loadConfig({ USGS_GAUGES_FILE: gaugesFile, USGS_API_URL: "not a url" }),
    ).rejects.toThrow("USGS_API_URL is not a valid URL");
  });

  it("fails when the gauges file is missing", async () => {
    const missing = join(dir, "missing.yaml");

    await expect(loadConfig({ USGS_GAUGES_FILE: missing })).rejects.toThrow(
      `Cannot read gauges file ${missing}`,
    );
  });
});
