import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.databaseUrl).toBeNull();
    expect(config.workflow).toEqual({ siteConcurrency: 4, stepLeaseMs: 300_000, maxStepAttempts: 1 });
    expect(config.assurance.requiredMetrics).toEqual([
      "time-to-connect",
      "throughput",
      "coverage",
      "capacity",
      "successful-connects",
    ]);
  });

  it("coerces numbers and trims the metric list and host", () => {
    const config = loadConfig({
      VENDOR_API_HOST: "https://vendor.example.test//",
      SITE_CONCURRENCY: "8",
      SLE_THRESHOLD: "85.5",
      SLE_REQUIRED_METRICS: " throughput, coverage ,,",
    });

    expect(config.vendor.host).toBe("https://vendor.example.test");
    expect(config.workflow.siteConcurrency).toBe(8);
    expect(config.assurance.threshold).toBe(85.5);
    expect(config.assurance.requiredMetrics).toEqual(["throughput", "coverage"]);
  });

  it("rejects values outside their range", () => {
    expect(() => loadConfig({ SITE_CONCURRENCY: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ SLE_THRESHOLD: "120" })).toThrow(/SLE_THRESHOLD/);
    expect(() => loadConfig({ VENDOR_API_HOST: "not a url" })).toThrow(ConfigError);
  });
});
