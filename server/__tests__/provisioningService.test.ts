import { describe, it, expect, beforeEach } from "vitest";
import { AuthorizationError, ConnectivityError, PlanConflictError } from "../errors";
import { ORG_ID, PLAN, createHarness, siteRequest } from "./helpers/fixtures";

describe("ProvisioningService", () => {
  let h: ReturnType<typeof createHarness>;

  beforeEach(() => {
    h = createHarness();
  });

  describe("checkReachability", () => {
    it("reports latency and organization access", async () => {
      expect(await h.service.checkReachability(ORG_ID)).toEqual({
        reachable: true,
        latencyMs: 12,
        orgAccessible: true,
        error: null,
      });
      expect((await h.service.checkReachability("org-unknown")).orgAccessible).toBe(false);
    });

    it("reports an unreachable platform without throwing", async () => {
      h.vendor.probe.mockRejectedValueOnce(new ConnectivityError("connect ECONNREFUSED"));

      expect(await h.service.checkReachability(ORG_ID)).toEqual({
        reachable: false,
        latencyMs: null,
        orgAccessible: null,
        error: { code: "VENDOR_UNREACHABLE", message: "connect ECONNREFUSED", retryable: true },
      });
    });

    it("raises authorization failures", async () => {
      h.vendor.probe.mockRejectedValueOnce(new AuthorizationError("forbidden"));
      await expect(h.service.checkReachability(ORG_ID)).rejects.toBeInstanceOf(AuthorizationError);
    });
  });

  describe("registerPlan", () => {
    it("accepts the same plan twice", async () => {
      const first = await h.service.registerPlan(ORG_ID, PLAN);
      const second = await h.service.registerPlan(ORG_ID, PLAN);
      expect(second).toEqual(first);
    });

    it("rejects a different plan for the same organization", async () => {
      await h.service.registerPlan(ORG_ID, PLAN);
      await expect(h.service.registerPlan(ORG_ID, { ...PLAN, zoneCount: 16 })).rejects.toBeInstanceOf(
        PlanConflictError,
      );
    });

    it("rejects a root block that cannot be split into the zones", async () => {
      await expect(
        h.service.registerPlan(ORG_ID, { ...PLAN, zoneCount: 6 }),
      ).rejects.toMatchObject({ code: "INVALID_ADDRESS_BLOCK" });
    });
  });

  describe("createSite", () => {
    it("requires an address plan", async () => {
      await expect(h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }))).rejects.toMatchObject({
        code: "PLAN_NOT_FOUND",
      });
    });

    it("is idempotent for the same definition", async () => {
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);
      const again = await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);

      expect(again.steps.find((s) => s.stepId === "create-site")?.status).toBe("Succeeded");
      expect(h.vendor.createSite).toHaveBeenCalledTimes(1);
    });

    it("rejects a different definition under an existing site id", async () => {
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);
      await expect(
        h.service.createSite(ORG_ID, siteRequest({ siteId: "austin", name: "Austin HQ" }), PLAN),
      ).rejects.toMatchObject({ code: "SITE_EXISTS" });
    });

    it("rejects a re-submitted site whose variable bindings differ", async () => {
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);
      await expect(
        h.service.createSite(
          ORG_ID,
          siteRequest({ siteId: "austin", variables: { wlan_psk: "other-passphrase", extra_var: "x" } }),
          PLAN,
        ),
      ).rejects.toMatchObject({ code: "SITE_EXISTS" });

      const stored = await h.store.get("site:austin");
      expect(stored?.value).toMatchObject({ variables: { wlan_psk: "test-passphrase" } });
    });

    it("accepts a re-submission with the same bindings in a different order", async () => {
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin", variables: { a: 1, b: "two" } }), PLAN);
      const status = await h.service.createSite(
        ORG_ID,
        siteRequest({ siteId: "austin", variables: { b: "two", a: 1 } }),
        PLAN,
      );
      expect(status.steps.find((s) => s.stepId === "create-site")?.status).toBe("Succeeded");
    });

    it("persists the allocation once", async () => {
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);
      await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);

      expect(h.audit.ofType("ALLOCATION_PERSISTED")).toHaveLength(1);
      expect((await h.store.get("alloc:austin"))?.version).toBe(1);
    });
  });

  it("requires a deployment profile before assigning devices", async () => {
    await h.service.createSite(ORG_ID, siteRequest({ siteId: "austin" }), PLAN);
    const status = await h.service.applyDay1("austin");

    const assign = status.steps.find((s) => s.stepId === "assign-devices");
    expect(assign?.lastError?.code).toBe("PROFILE_NOT_FOUND");
  });
});
