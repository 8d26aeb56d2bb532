import { describe, it, expect, beforeEach } from "vitest";
import { ConnectivityError, SLEThresholdBreach, VendorRequestError } from "../../errors";
import type { VendorDevice } from "../../vendor";
import { evaluateSle } from "../assuranceGate";
import { createHarness, provisionDay0, siteRequest } from "../../__tests__/helpers/fixtures";

const POLICY = { threshold: 90, requiredMetrics: ["time-to-connect", "throughput"] };

const DEVICES: VendorDevice[] = [
  { deviceId: "d3", mac: "aabbccddee03", type: "ap", name: null },
  { deviceId: "d1", mac: "aabbccddee01", type: "ap", name: null },
  { deviceId: "d2", mac: "aabbccddee02", type: "ap", name: null },
];

const FIRMWARE_2 = { kind: "firmware", version: "2.0.0" } as const;

const healthy = [
  { name: "time-to-connect", value: 95 },
  { name: "throughput", value: 95 },
];

describe("evaluateSle", () => {
  it("passes metrics at or above the threshold", () => {
    const verdict = evaluateSle(
      [
        { name: "time-to-connect", value: 90 },
        { name: "throughput", value: 99 },
      ],
      POLICY,
    );
    expect(verdict.passed).toBe(true);
    expect(verdict.breaches).toEqual([]);
  });

  it("treats a missing or null reading as a breach", () => {
    const verdict = evaluateSle([{ name: "time-to-connect", value: null }], POLICY);
    expect(verdict.passed).toBe(false);
    expect(verdict.breaches.map((b) => [b.metric, b.value])).toEqual([
      ["time-to-connect", null],
      ["throughput", null],
    ]);
    expect(verdict.breaches[0]).toBeInstanceOf(SLEThresholdBreach);
  });
});

describe("AssuranceGate", () => {
  let h: ReturnType<typeof createHarness>;

  beforeEach(async () => {
    h = createHarness();
    await provisionDay0(h, siteRequest({ siteId: "austin" }));
  });

  describe("validateDeployment", () => {
    beforeEach(async () => {
      await h.service.applyDay1("austin");
    });

    it("reports Verified when every metric meets the threshold", async () => {
      const report = await h.service.queryAssurance("austin");

      expect(report.status).toBe("Verified");
      expect(report.breaches).toEqual([]);
      expect(h.vendor.getSiteSle).toHaveBeenCalledWith("vs-austin", ["time-to-connect", "throughput"]);
    });

    it("reports Failed with the breached metrics and stores the report", async () => {
      h.vendor.getSiteSle.mockResolvedValueOnce([
        { name: "time-to-connect", value: 92 },
        { name: "throughput", value: 88 },
      ]);

      const report = await h.service.queryAssurance("austin");

      expect(report.status).toBe("Failed");
      expect(report.breaches).toEqual(["throughput"]);
      expect(report.metrics).toEqual([
        { name: "time-to-connect", value: 92, threshold: 90, passed: true },
        { name: "throughput", value: 88, threshold: 90, passed: false },
      ]);
      expect(await h.service.getAssuranceReport("austin")).toEqual(report);
      expect(h.audit.ofType("ASSURANCE_EVALUATED")[0].metadata).toEqual({
        status: "Failed",
        breaches: ["throughput"],
      });
    });

    it("never changes configuration", async () => {
      h.vendor.pushIntent.mockClear();
      h.vendor.getSiteSle.mockResolvedValueOnce([]);

      await h.service.queryAssurance("austin");

      expect(h.vendor.pushIntent).not.toHaveBeenCalled();
      expect(h.vendor.applyLifecycleChange).not.toHaveBeenCalled();
    });
  });

  it("refuses validation while steps are incomplete", async () => {
    await expect(h.service.queryAssurance("austin")).rejects.toMatchObject({ code: "DEPLOYMENT_INCOMPLETE" });
    expect(h.vendor.getSiteSle).not.toHaveBeenCalled();
  });

  describe("canary rollout", () => {
    beforeEach(() => {
      h.vendor.listSiteDevices.mockResolvedValue(DEVICES);
    });

    it("promotes the change to the remaining devices after a clean window", async () => {
      const rollout = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });

      expect(rollout.status).toBe("Promoted");
      expect(rollout.canaryDeviceId).toBe("d1");
      expect(rollout.samples).toHaveLength(3);
      expect(h.sleep).toHaveBeenCalledTimes(3);
      expect(h.vendor.applyLifecycleChange.mock.calls).toEqual([
        ["vs-austin", ["d1"], FIRMWARE_2],
        ["vs-austin", ["d2", "d3"], FIRMWARE_2],
      ]);
    });

    it("rolls the canary back to its prior state on the first breached sample", async () => {
      h.vendor.getDeviceSle.mockResolvedValueOnce(healthy).mockResolvedValueOnce([
        { name: "time-to-connect", value: 95 },
        { name: "throughput", value: 85 },
      ]);

      const rollout = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });

      expect(rollout.status).toBe("RolledBack");
      expect(rollout.breach).toEqual({ metric: "throughput", value: 85, threshold: 90 });
      expect(rollout.priorState).toEqual({ kind: "firmware", version: "1.0.0" });
      expect(h.sleep.mock.calls).toEqual([[1000], [1000]]);
      expect(h.vendor.applyLifecycleChange.mock.calls).toEqual([
        ["vs-austin", ["d1"], FIRMWARE_2],
        ["vs-austin", ["d1"], { kind: "firmware", version: "1.0.0" }],
      ]);
      expect(h.audit.ofType("CANARY_TRANSITIONED").map((e) => e.metadata?.to)).toEqual([
        "Pending",
        "CanaryDeployed",
        "Measuring",
        "RolledBack",
      ]);
    });

    it("scopes the rollout to one device type", async () => {
      h.vendor.listSiteDevices.mockResolvedValue([
        { deviceId: "d1", mac: "aabbccddee01", type: "switch", name: null },
        { deviceId: "d2", mac: "aabbccddee02", type: "ap", name: null },
        { deviceId: "d3", mac: "aabbccddee03", type: "ap", name: null },
      ]);

      const rollout = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2, deviceType: "ap" });

      expect(rollout.canaryDeviceId).toBe("d2");
      expect(rollout.rolloutDeviceIds).toEqual(["d3"]);
    });

    it("rejects a canary device outside the rollout scope", async () => {
      await expect(
        h.service.triggerLifecycle("austin", { change: FIRMWARE_2, canaryDeviceId: "d9" }),
      ).rejects.toMatchObject({ code: "DEVICE_NOT_FOUND" });
    });

    it("holds the site lock while a rollout is stalled and resumes it", async () => {
      h.vendor.applyLifecycleChange.mockRejectedValueOnce(new ConnectivityError("connection reset"));

      const stalled = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });
      expect(stalled.status).toBe("Pending");
      expect(stalled.lastError?.code).toBe("VENDOR_UNREACHABLE");

      await expect(h.service.triggerLifecycle("austin", { change: FIRMWARE_2 })).rejects.toMatchObject({
        code: "CANARY_IN_PROGRESS",
      });

      const resumed = await h.service.resumeCanary("austin");
      expect(resumed.status).toBe("Promoted");
      expect(resumed.rolloutId).toBe(stalled.rolloutId);
      expect(resumed.lastError).toBeNull();
      expect(h.vendor.getDeviceState).toHaveBeenCalledTimes(1);
    });

    it("leaves the canary untouched when its prior state cannot be read", async () => {
      h.vendor.getDeviceState.mockRejectedValueOnce(
        new VendorRequestError(200, "device returned an unexpected body"),
      );

      const stalled = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });

      expect(stalled).toMatchObject({ status: "Pending", priorState: null });
      expect(stalled.lastError?.code).toBe("VENDOR_REQUEST_FAILED");
      expect(h.vendor.applyLifecycleChange).not.toHaveBeenCalled();
    });

    it("retries only the promotion after it fails", async () => {
      h.vendor.applyLifecycleChange
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new ConnectivityError("connection reset"));

      const stalled = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });
      expect(stalled).toMatchObject({ status: "Measuring", measurementPassed: true });

      const resumed = await h.service.resumeCanary("austin");
      expect(resumed.status).toBe("Promoted");
      expect(resumed.samples).toHaveLength(3);
      expect(h.vendor.getDeviceSle).toHaveBeenCalledTimes(3);
      expect(h.vendor.applyLifecycleChange).toHaveBeenCalledTimes(3);
    });

    it("allows a new rollout once the previous one is terminal", async () => {
      const first = await h.service.triggerLifecycle("austin", { change: FIRMWARE_2 });
      const second = await h.service.triggerLifecycle("austin", {
        change: { kind: "firmware", version: "2.0.1" },
      });

      expect(second.rolloutId).not.toBe(first.rolloutId);
      expect((await h.service.getCanary("austin")).rolloutId).toBe(second.rolloutId);
    });
  });
});
