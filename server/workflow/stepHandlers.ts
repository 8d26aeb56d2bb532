import { createHash } from "node:crypto";
import {
  deploymentProfileSchema,
  organizationPlanSchema,
  siteAllocationSchema,
  siteSchema,
  type IntentStepId,
  type JsonObject,
  type Site,
  type SiteAllocation,
  type StepId,
  type VariableValue,
} from "@shared/schema";
import { recordAudit, type AuditSink } from "../../platform/audit";
import {
  ABSENT_VERSION,
  listRecords,
  mutateRecord,
  parseEntry,
  readRecord,
  stateKeys,
  type StateStore,
} from "../../platform/state";
import {
  DeploymentProfileMissingError,
  OrganizationPlanNotFoundError,
  ProvisioningError,
  SiteNotFoundError,
} from "../errors";
import { assertNoConflict, deriveSiteVariables, planOrganizationSite, toSiteAllocation } from "../planning/addressPlanner";
import { bindVariables, getSiteVariables } from "../services/siteVariables";
import { fingerprint as templateFingerprint, resolveTemplate } from "../services/templateBinder";
import { getAssignedTemplate } from "../services/templateRegistry";
import type { VendorApi } from "../vendor";
import { STEP_DEFINITIONS } from "./workflowPlan";

export type StepContext = Readonly<{
  orgId: string;
  siteId: string;
  stepId: StepId;
}>;

/**
 * A step ready to run: its fingerprint is known and every precondition that
 * can be checked without the vendor platform has passed.
 */
export type PreparedStep = Readonly<{
  fingerprint: string;
  apply: () => Promise<JsonObject>;
}>;

export type StepHandler = (ctx: StepContext) => Promise<PreparedStep>;

export type StepHandlerDeps = {
  store: StateStore;
  vendor: VendorApi;
  audit: AuditSink;
};

function hash(payload: unknown): string {
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex");
}

export async function loadSite(store: StateStore, siteId: string): Promise<Site> {
  const found = await readRecord(store, stateKeys.site(siteId), siteSchema);
  if (!found) throw new SiteNotFoundError(siteId);
  return found.record;
}

function requireVendorSiteId(site: Site): string {
  if (!site.vendorSiteId) {
    throw new ProvisioningError("SITE_NOT_CREATED", `Site "${site.siteId}" has not been created on the platform`, {
      statusCode: 409,
    });
  }
  return site.vendorSiteId;
}

/**
 * Return the persisted allocation for the site, planning and persisting one
 * first when none exists. A persisted allocation is never recomputed.
 */
async function ensureAllocation(deps: StepHandlerDeps, site: Site): Promise<SiteAllocation> {
  const { store, audit } = deps;
  const key = stateKeys.allocation(site.siteId);

  const existing = await readRecord(store, key, siteAllocationSchema);
  if (existing) return existing.record;

  const plan = await readRecord(store, stateKeys.plan(site.orgId), organizationPlanSchema);
  if (!plan) throw new OrganizationPlanNotFoundError(site.orgId);

  const sitePlan = planOrganizationSite(plan.record, site.zoneIndex, site.ordinal);
  const candidate = toSiteAllocation(site.siteId, site.orgId, sitePlan, new Date().toISOString());

  const persisted = await listRecords(store, stateKeys.allocationPrefix(), siteAllocationSchema);
  assertNoConflict(
    candidate,
    persisted.map((p) => p.record).filter((a) => a.orgId === site.orgId),
  );

  const cas = await store.compareAndSwap(key, ABSENT_VERSION, candidate);
  if (!cas.ok) {
    if (!cas.current) {
      throw new ProvisioningError("STATE_CONTENTION", `Allocation for site "${site.siteId}" vanished during write`);
    }
    return parseEntry(cas.current, siteAllocationSchema).record;
  }

  await recordAudit(audit, {
    orgId: site.orgId,
    siteId: site.siteId,
    eventType: "ALLOCATION_PERSISTED",
    entityId: key,
    metadata: { siteBlock: candidate.siteBlock, subnets: candidate.subnets.map((s) => s.cidr) },
  });
  return candidate;
}

function createSiteHandler(deps: StepHandlerDeps): StepHandler {
  return async ({ siteId }) => {
    const site = await loadSite(deps.store, siteId);
    const plan = await readRecord(deps.store, stateKeys.plan(site.orgId), organizationPlanSchema);
    if (!plan) throw new OrganizationPlanNotFoundError(site.orgId);

    const fingerprint = hash({
      name: site.name,
      address: site.address,
      timezone: site.timezone,
      countryCode: site.countryCode,
      latlng: site.latlng,
      notes: site.notes,
      zoneIndex: site.zoneIndex,
      ordinal: site.ordinal,
      rootBlock: plan.record.rootBlock,
      zoneCount: plan.record.zoneCount,
      roles: plan.record.roles,
      variables: site.variables,
    });

    return {
      fingerprint,
      apply: async () => {
        const allocation = await ensureAllocation(deps, site);

        const vendorSite = await deps.vendor.createSite(site.orgId, {
          name: site.name,
          address: site.address,
          timezone: site.timezone,
          countryCode: site.countryCode,
          latlng: site.latlng,
          notes: site.notes,
        });

        await mutateRecord(deps.store, stateKeys.site(siteId), siteSchema, (current) => {
          if (!current) throw new SiteNotFoundError(siteId);
          if (current.vendorSiteId === vendorSite.id) return null;
          return { ...current, vendorSiteId: vendorSite.id };
        });

        const bound = await bindVariables(deps.store, deps.audit, {
          orgId: site.orgId,
          siteId,
          values: {
            ...deriveSiteVariables(allocation),
            site_name: site.name,
            timezone: site.timezone,
            country_code: site.countryCode,
            vendor_site_id: vendorSite.id,
            ...site.variables,
          },
        });

        const plain: Record<string, VariableValue> = {};
        for (const [name, v] of Object.entries(bound)) plain[name] = v.value;
        await deps.vendor.setSiteVariables(vendorSite.id, plain);

        return {
          vendorSiteId: vendorSite.id,
          siteBlock: allocation.siteBlock,
          subnets: allocation.subnets.map((s) => s.cidr),
          variableCount: Object.keys(plain).length,
        };
      },
    };
  };
}

function assignDevicesHandler(deps: StepHandlerDeps): StepHandler {
  return async ({ siteId, orgId }) => {
    const site = await loadSite(deps.store, siteId);
    const vendorSiteId = requireVendorSiteId(site);

    const profile = await readRecord(deps.store, stateKeys.profile(siteId), deploymentProfileSchema);
    if (!profile) throw new DeploymentProfileMissingError(siteId);

    const devices = [...profile.record.devices].sort((a, b) => (a.mac < b.mac ? -1 : a.mac > b.mac ? 1 : 0));
    const claimCodes = devices.flatMap((d) => (d.claimCode ? [d.claimCode] : []));
    const macs = devices.map((d) => d.mac);

    return {
      fingerprint: hash({ vendorSiteId, devices: devices.map((d) => [d.mac, d.type, d.claimCode]) }),
      apply: async () => {
        await deps.vendor.claimDevices(orgId, claimCodes);
        await deps.vendor.assignDevices(orgId, vendorSiteId, macs);
        return { claimed: claimCodes.length, assigned: macs.length };
      },
    };
  };
}

function intentHandler(deps: StepHandlerDeps, stepId: IntentStepId): StepHandler {
  const { intentKind } = STEP_DEFINITIONS[stepId];

  return async ({ siteId, orgId }) => {
    if (!intentKind) {
      throw new ProvisioningError("STEP_MISCONFIGURED", `Step "${stepId}" has no intent kind`, { statusCode: 500 });
    }
    const site = await loadSite(deps.store, siteId);
    const vendorSiteId = requireVendorSiteId(site);
    const template = await getAssignedTemplate(deps.store, orgId, stepId);
    const variables = await getSiteVariables(deps.store, siteId);

    // Resolution fails here, before any vendor mutation, when a reference is unbound.
    const payload = resolveTemplate(template, siteId, variables);
    const name = typeof payload.name === "string" ? payload.name : `${template.name}-${siteId}`;

    return {
      fingerprint: templateFingerprint(template, variables),
      apply: async () => {
        const pushed = await deps.vendor.pushIntent({ orgId, vendorSiteId, kind: intentKind, name, payload });
        return {
          templateId: template.templateId,
          templateVersion: template.version,
          objectId: pushed.objectId,
          objectName: name,
        };
      },
    };
  };
}

export function createStepHandlers(deps: StepHandlerDeps): Record<StepId, StepHandler> {
  return {
    "create-site": createSiteHandler(deps),
    "assign-devices": assignDevicesHandler(deps),
    "create-applications": intentHandler(deps, "create-applications"),
    "hub-profiles": intentHandler(deps, "hub-profiles"),
    "gateway-templates": intentHandler(deps, "gateway-templates"),
    "lan-networks": intentHandler(deps, "lan-networks"),
    "switch-templates": intentHandler(deps, "switch-templates"),
    "wlan-templates": intentHandler(deps, "wlan-templates"),
    "rf-templates": intentHandler(deps, "rf-templates"),
    "create-wlans": intentHandler(deps, "create-wlans"),
    "create-labels": intentHandler(deps, "create-labels"),
    "wlan-policies": intentHandler(deps, "wlan-policies"),
    "org-psks": intentHandler(deps, "org-psks"),
  };
}
