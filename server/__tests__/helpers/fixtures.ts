import { vi, type Mock } from "vitest";
import {
  createSiteRequestSchema,
  type CreateSiteRequest,
  type RegisterPlanRequest,
} from "@shared/schema";
import { InMemoryAuditSink } from "../../../platform/audit";
import { InMemoryStateStore } from "../../../platform/state";
import { ProvisioningService } from "../../services/provisioningService";
import type { VendorApi } from "../../vendor";

export type VendorMock = { [K in keyof VendorApi]: Mock<VendorApi[K]> };

export function createVendorMock(): VendorMock {
  return {
    probe: vi.fn<VendorApi["probe"]>().mockResolvedValue({ latencyMs: 12, orgIds: ["org-1"] }),
    createSite: vi
      .fn<VendorApi["createSite"]>()
      .mockImplementation(async (_orgId, identity) => ({ id: `vs-${identity.name}`, name: identity.name })),
    setSiteVariables: vi.fn<VendorApi["setSiteVariables"]>().mockResolvedValue(undefined),
    claimDevices: vi.fn<VendorApi["claimDevices"]>().mockResolvedValue(undefined),
    assignDevices: vi.fn<VendorApi["assignDevices"]>().mockResolvedValue(undefined),
    listSiteDevices: vi.fn<VendorApi["listSiteDevices"]>().mockResolvedValue([]),
    pushIntent: vi
      .fn<VendorApi["pushIntent"]>()
      .mockImplementation(async (push) => ({ objectId: `obj-${push.kind}`, kind: push.kind, assignedToSite: false })),
    getSiteSle: vi
      .fn<VendorApi["getSiteSle"]>()
      .mockImplementation(async (_site, metrics) => metrics.map((name) => ({ name, value: 95 }))),
    getDeviceSle: vi
      .fn<VendorApi["getDeviceSle"]>()
      .mockImplementation(async (_site, _device, metrics) => metrics.map((name) => ({ name, value: 95 }))),
    getDeviceState: vi
      .fn<VendorApi["getDeviceState"]>()
      .mockImplementation(async (_site, deviceId) => ({ deviceId, firmwareVersion: "1.0.0", config: {} })),
    applyLifecycleChange: vi.fn<VendorApi["applyLifecycleChange"]>().mockResolvedValue(undefined),
  };
}

export const ORG_ID = "org-1";

export const PLAN: RegisterPlanRequest = {
  rootBlock: "10.0.0.0/8",
  zoneCount: 8,
  roles: [
    { role: "mgmt", prefixLength: 24, vlanId: 10 },
    { role: "corp", prefixLength: 24, vlanId: 20 },
    { role: "guest", prefixLength: 24, vlanId: 30 },
  ],
};

export const TEST_CONFIG = {
  workflow: { siteConcurrency: 2, stepLeaseMs: 60_000, maxStepAttempts: 1 },
  assurance: {
    threshold: 90,
    requiredMetrics: ["time-to-connect", "throughput"],
    canaryWindowMs: 3_000,
    canaryIntervalMs: 1_000,
  },
};

export function siteRequest(overrides: Partial<CreateSiteRequest> & { siteId: string }): CreateSiteRequest {
  return createSiteRequestSchema.parse({
    name: overrides.siteId,
    zoneIndex: 0,
    ordinal: 0,
    variables: { wlan_psk: "test-passphrase" },
    ...overrides,
  });
}

export function createHarness(opts: { maxStepAttempts?: number } = {}) {
  const store = new InMemoryStateStore();
  const audit = new InMemoryAuditSink();
  const vendor = createVendorMock();
  const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
  const service = new ProvisioningService({
    store,
    vendor,
    audit,
    config: {
      ...TEST_CONFIG,
      workflow: { ...TEST_CONFIG.workflow, maxStepAttempts: opts.maxStepAttempts ?? 1 },
    },
    ownerId: "test-worker",
    sleep,
  });
  return { store, audit, vendor, sleep, service };
}

/** Register the plan and default templates, then run Day-0 for one site. */
export async function provisionDay0(
  harness: ReturnType<typeof createHarness>,
  site: CreateSiteRequest,
): Promise<void> {
  await harness.service.seedDefaultTemplates(ORG_ID);
  await harness.service.createSite(ORG_ID, site, PLAN);
  await harness.service.claimDevices(site.siteId, {
    devices: [{ mac: "aabbccddee01", type: "ap", name: null, claimCode: "CLAIM-AP-1" }],
  });
}
