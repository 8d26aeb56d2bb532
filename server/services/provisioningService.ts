import {
  STEP_IDS,
  organizationPlanSchema,
  siteSchema,
  type AssuranceReport,
  type CanaryRollout,
  type CreateSiteRequest,
  type Day1Domain,
  type DeploymentProfile,
  type DeploymentProfileRequest,
  type IntentStepId,
  type LifecycleRequest,
  type OrganizationPlan,
  type RecordedError,
  type RegisterPlanRequest,
  type RegisterTemplateRequest,
  type Site,
  type StepId,
  type Template,
  type VariableValue,
} from "@shared/schema";
import type { AuditSink } from "../../platform/audit";
import { ABSENT_VERSION, parseEntry, readRecord, stateKeys, type StateStore } from "../../platform/state";
import type { AppConfig } from "../config";
import {
  AuthorizationError,
  OrganizationPlanNotFoundError,
  PlanConflictError,
  ProvisioningError,
  toRecordedError,
} from "../errors";
import { log } from "../log";
import { planOrganizationSite } from "../planning/addressPlanner";
import type { VendorApi } from "../vendor";
import {
  WorkflowOrchestrator,
  type RunStatus,
  type SiteRunResult,
  type StepOutcome,
} from "../workflow/workflowOrchestrator";
import { STEP_DEFINITIONS } from "../workflow/workflowPlan";
import { AssuranceGate } from "./assuranceGate";
import * as templates from "./templateRegistry";

export type ReachabilityReport = {
  reachable: boolean;
  latencyMs: number | null;
  /** Whether the configured token can see the organization; null when unreachable. */
  orgAccessible: boolean | null;
  error: RecordedError | null;
};

export type ProvisioningServiceDeps = {
  store: StateStore;
  vendor: VendorApi;
  audit: AuditSink;
  config: Pick<AppConfig, "workflow" | "assurance">;
  ownerId: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

function sameVariables(a: Site["variables"], b: CreateSiteRequest["variables"]): boolean {
  const names = Object.keys(a).sort();
  const other = Object.keys(b).sort();
  return names.length === other.length && names.every((name, i) => name === other[i] && a[name] === b[name]);
}

function sameIdentity(a: Site, b: CreateSiteRequest): boolean {
  return (
    a.name === b.name &&
    a.address === b.address &&
    a.timezone === b.timezone &&
    a.countryCode === b.countryCode &&
    a.notes === b.notes &&
    a.zoneIndex === b.zoneIndex &&
    a.ordinal === b.ordinal &&
    JSON.stringify(a.latlng) === JSON.stringify(b.latlng) &&
    [...a.domains].sort().join(",") === [...b.domains].sort().join(",") &&
    sameVariables(a.variables, b.variables)
  );
}

/**
 * The externally triggered operations: reachability, site + address plan,
 * device claim, Day-1 application, assurance and lifecycle, plus the
 * maintenance operations around them.
 */
export class ProvisioningService {
  readonly orchestrator: WorkflowOrchestrator;
  readonly assurance: AssuranceGate;
  private readonly store: StateStore;
  private readonly vendor: VendorApi;

  constructor(deps: ProvisioningServiceDeps) {
    this.store = deps.store;
    this.vendor = deps.vendor;
    this.orchestrator = new WorkflowOrchestrator({
      store: deps.store,
      vendor: deps.vendor,
      audit: deps.audit,
      options: {
        ownerId: deps.ownerId,
        leaseMs: deps.config.workflow.stepLeaseMs,
        maxStepAttempts: deps.config.workflow.maxStepAttempts,
        siteConcurrency: deps.config.workflow.siteConcurrency,
      },
      now: deps.now,
    });
    this.assurance = new AssuranceGate({
      store: deps.store,
      vendor: deps.vendor,
      audit: deps.audit,
      options: {
        threshold: deps.config.assurance.threshold,
        requiredMetrics: deps.config.assurance.requiredMetrics,
        canaryWindowMs: deps.config.assurance.canaryWindowMs,
        canaryIntervalMs: deps.config.assurance.canaryIntervalMs,
      },
      sleep: deps.sleep,
      now: deps.now,
    });
  }

  // --- Reachability ---

  /** Connectivity failures are reported; an authorization failure is raised. */
  async checkReachability(orgId: string): Promise<ReachabilityReport> {
    try {
      const probe = await this.vendor.probe();
      return { reachable: true, latencyMs: probe.latencyMs, orgAccessible: probe.orgIds.includes(orgId), error: null };
    } catch (err) {
      if (err instanceof AuthorizationError || !(err instanceof ProvisioningError)) throw err;
      return { reachable: false, latencyMs: null, orgAccessible: null, error: toRecordedError(err) };
    }
  }

  // --- Address plan & sites ---

  /**
   * Persist the organization's address plan. The plan is written once;
   * re-registering identical inputs is a no-op and different inputs fail.
   */
  async registerPlan(orgId: string, input: RegisterPlanRequest): Promise<OrganizationPlan> {
    const plan: OrganizationPlan = { orgId, ...input, createdAt: new Date().toISOString() };
    // Validates the block, the zone split and that one site fits a zone.
    planOrganizationSite(plan, 0, 0);

    const key = stateKeys.plan(orgId);
    const cas = await this.store.compareAndSwap(key, ABSENT_VERSION, plan);
    if (cas.ok) {
      log(`Registered address plan ${plan.rootBlock} / ${plan.zoneCount} zones for org ${orgId}`, "planning");
      return plan;
    }

    if (!cas.current) throw new PlanConflictError(orgId);
    const existing = parseEntry(cas.current, organizationPlanSchema).record;
    const same =
      existing.rootBlock === input.rootBlock &&
      existing.zoneCount === input.zoneCount &&
      JSON.stringify(existing.roles) === JSON.stringify(input.roles);
    if (!same) throw new PlanConflictError(orgId);
    return existing;
  }

  async getPlan(orgId: string): Promise<OrganizationPlan> {
    const found = await readRecord(this.store, stateKeys.plan(orgId), organizationPlanSchema);
    if (!found) throw new OrganizationPlanNotFoundError(orgId);
    return found.record;
  }

  /**
   * Record the site and run Day-0 `create-site`: allocate its subnets,
   * create it on the platform and bind its variables.
   */
  async createSite(orgId: string, input: CreateSiteRequest, plan?: RegisterPlanRequest): Promise<RunStatus> {
    if (plan) {
      await this.registerPlan(orgId, plan);
    } else {
      await this.getPlan(orgId);
    }

    const key = stateKeys.site(input.siteId);
    const site: Site = { ...input, orgId, vendorSiteId: null, createdAt: new Date().toISOString() };
    const cas = await this.store.compareAndSwap(key, ABSENT_VERSION, site);
    if (!cas.ok && cas.current) {
      const existing = parseEntry(cas.current, siteSchema).record;
      if (existing.orgId !== orgId || !sameIdentity(existing, input)) {
        throw new ProvisioningError("SITE_EXISTS", `Site "${input.siteId}" already exists with a different definition`, {
          statusCode: 409,
        });
      }
    }

    return this.orchestrator.runSite(input.siteId, { steps: ["create-site"] });
  }

  // --- Devices ---

  async claimDevices(siteId: string, input: DeploymentProfileRequest): Promise<RunStatus> {
    const profile: DeploymentProfile = { siteId, devices: input.devices, updatedAt: new Date().toISOString() };
    await this.store.set(stateKeys.profile(siteId), profile);
    return this.orchestrator.runSite(siteId, { steps: ["create-site", "assign-devices"] });
  }

  // --- Day-1 ---

  /** Apply Day-1 intent for the given domains (all of the site's domains by default). */
  async applyDay1(siteId: string, domains?: readonly Day1Domain[]): Promise<RunStatus> {
    const steps = STEP_IDS.filter((stepId) => {
      const { domain } = STEP_DEFINITIONS[stepId];
      return domain === "day0" || !domains || domains.includes(domain);
    });
    return this.orchestrator.runSite(siteId, { steps });
  }

  /**
   * Run every listed site of the organization. A site registered under a
   * different organization is reported as failed and never run.
   */
  async provisionSites(orgId: string, siteIds: readonly string[]): Promise<SiteRunResult[]> {
    const foreign = new Map<string, RecordedError>();
    for (const siteId of siteIds) {
      const site = await readRecord(this.store, stateKeys.site(siteId), siteSchema);
      if (site && site.record.orgId !== orgId) {
        foreign.set(
          siteId,
          toRecordedError(
            new ProvisioningError("SITE_ORG_MISMATCH", `Site "${siteId}" does not belong to organization "${orgId}"`, {
              statusCode: 409,
            }),
          ),
        );
      }
    }

    const runnable = siteIds.filter((siteId) => !foreign.has(siteId));
    const results = new Map((await this.orchestrator.runSites(runnable)).map((r) => [r.siteId, r]));
    return siteIds.flatMap((siteId): SiteRunResult[] => {
      const error = foreign.get(siteId);
      if (error) return [{ siteId, ok: false, error }];
      const result = results.get(siteId);
      return result ? [result] : [];
    });
  }

  getRunStatus(siteId: string): Promise<RunStatus> {
    return this.orchestrator.getRunStatus(siteId);
  }

  retryStep(siteId: string, stepId: StepId): Promise<{ outcome: StepOutcome; status: RunStatus }> {
    return this.orchestrator.retryStep(siteId, stepId);
  }

  cancelRun(siteId: string) {
    return this.orchestrator.cancelRun(siteId);
  }

  rotateVariable(siteId: string, name: string, value: VariableValue) {
    return this.orchestrator.rotateVariable(siteId, name, value);
  }

  // --- Templates ---

  registerTemplate(input: RegisterTemplateRequest): Promise<Template> {
    return templates.registerTemplate(this.store, input);
  }

  getTemplate(templateId: string): Promise<Template> {
    return templates.getTemplate(this.store, templateId);
  }

  assignTemplate(orgId: string, stepId: IntentStepId, templateId: string) {
    return templates.assignTemplate(this.store, { orgId, stepId, templateId });
  }

  seedDefaultTemplates(orgId: string): Promise<Template[]> {
    return templates.seedDefaultTemplates(this.store, orgId);
  }

  // --- Assurance & lifecycle ---

  queryAssurance(siteId: string): Promise<AssuranceReport> {
    return this.assurance.validateDeployment(siteId);
  }

  getAssuranceReport(siteId: string): Promise<AssuranceReport | null> {
    return this.assurance.getAssuranceReport(siteId);
  }

  triggerLifecycle(siteId: string, input: LifecycleRequest): Promise<CanaryRollout> {
    return this.assurance.startCanary(siteId, input);
  }

  resumeCanary(siteId: string): Promise<CanaryRollout> {
    return this.assurance.resumeCanary(siteId);
  }

  getCanary(siteId: string): Promise<CanaryRollout> {
    return this.assurance.getCanary(siteId);
  }
}
