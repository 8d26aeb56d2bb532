import { randomUUID } from "node:crypto";
import {
  assuranceReportSchema,
  canaryRolloutSchema,
  siteSchema,
  stepRecordSchema,
  type AssuranceReport,
  type CanaryRollout,
  type CanarySample,
  type CanaryStatus,
  type DeviceType,
  type LifecycleChange,
  type SleEvaluation,
} from "@shared/schema";
import { recordAudit, type AuditSink } from "../../platform/audit";
import { ABSENT_VERSION, listRecords, parseEntry, readRecord, stateKeys, type StateStore } from "../../platform/state";
import {
  CanaryInProgressError,
  CanaryNotFoundError,
  CanarySupersededError,
  DeploymentIncompleteError,
  DeviceNotFoundError,
  InvalidTransitionError,
  ProvisioningError,
  SLEThresholdBreach,
  SiteNotFoundError,
  toRecordedError,
} from "../errors";
import { sleep } from "../lib/retry";
import { log, logError } from "../log";
import type { SleReading, VendorApi } from "../vendor";

export type SlePolicy = {
  threshold: number;
  requiredMetrics: readonly string[];
};

export type SleVerdict = {
  metrics: SleEvaluation[];
  breaches: SLEThresholdBreach[];
  passed: boolean;
};

/**
 * Score readings against the policy. Every required metric must be present
 * and at or above the threshold; a missing or null reading is a breach.
 */
export function evaluateSle(readings: readonly SleReading[], policy: SlePolicy): SleVerdict {
  const byName = new Map(readings.map((r) => [r.name, r.value]));
  const metrics = policy.requiredMetrics.map((name): SleEvaluation => {
    const value = byName.get(name) ?? null;
    return { name, value, threshold: policy.threshold, passed: value !== null && value >= policy.threshold };
  });
  const breaches = metrics
    .filter((m) => !m.passed)
    .map((m) => new SLEThresholdBreach(m.name, m.value, m.threshold));
  return { metrics, breaches, passed: breaches.length === 0 };
}

export type AssuranceOptions = SlePolicy & {
  canaryWindowMs: number;
  canaryIntervalMs: number;
};

export type AssuranceGateDeps = {
  store: StateStore;
  vendor: VendorApi;
  audit: AuditSink;
  options: AssuranceOptions;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type CanaryRequest = {
  change: LifecycleChange;
  canaryDeviceId?: string;
  deviceType?: DeviceType;
};

const ACTIVE_CANARY_STATES: readonly CanaryStatus[] = ["Pending", "CanaryDeployed", "Measuring"];

const VALID_TRANSITIONS: Record<CanaryStatus, CanaryStatus[]> = {
  Pending: ["CanaryDeployed"],
  CanaryDeployed: ["Measuring", "RolledBack"],
  Measuring: ["Promoted", "RolledBack"],
  Promoted: [],
  RolledBack: [],
};

function assertTransition(from: CanaryStatus, to: CanaryStatus): void {
  if (from !== to && !VALID_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError("canary rollout", from, to);
  }
}

type Tracked = { rollout: CanaryRollout; version: number };

export class AssuranceGate {
  private readonly store: StateStore;
  private readonly vendor: VendorApi;
  private readonly audit: AuditSink;
  private readonly options: AssuranceOptions;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(deps: AssuranceGateDeps) {
    this.store = deps.store;
    this.vendor = deps.vendor;
    this.audit = deps.audit;
    this.options = deps.options;
    this.sleep = deps.sleep ?? sleep;
    this.now = deps.now ?? (() => new Date());
  }

  private async vendorSite(siteId: string): Promise<{ orgId: string; vendorSiteId: string }> {
    const site = await readRecord(this.store, stateKeys.site(siteId), siteSchema);
    if (!site) throw new SiteNotFoundError(siteId);
    if (!site.record.vendorSiteId) {
      throw new ProvisioningError("SITE_NOT_CREATED", `Site "${siteId}" has not been created on the platform`, {
        statusCode: 409,
      });
    }
    return { orgId: site.record.orgId, vendorSiteId: site.record.vendorSiteId };
  }

  // --- Post-deployment validation ---

  /**
   * Query the required site SLEs once every non-skipped step has Succeeded.
   * The verdict is recorded and reported; configuration is never changed.
   */
  async validateDeployment(siteId: string): Promise<AssuranceReport> {
    const { orgId, vendorSiteId } = await this.vendorSite(siteId);

    const steps = await listRecords(this.store, stateKeys.stepPrefix(siteId), stepRecordSchema);
    const unfinished = steps
      .map((s) => s.record)
      .filter((s) => s.status !== "Succeeded" && s.status !== "Skipped")
      .map((s) => s.stepId);
    if (steps.length === 0 || unfinished.length > 0) {
      throw new DeploymentIncompleteError(siteId, steps.length === 0 ? ["create-site"] : unfinished);
    }

    const readings = await this.vendor.getSiteSle(vendorSiteId, [...this.options.requiredMetrics]);
    const verdict = evaluateSle(readings, this.options);

    const report: AssuranceReport = {
      siteId,
      status: verdict.passed ? "Verified" : "Failed",
      metrics: verdict.metrics,
      breaches: verdict.breaches.map((b) => b.metric),
      checkedAt: this.now().toISOString(),
    };
    await this.store.set(stateKeys.assurance(siteId), report);

    for (const breach of verdict.breaches) {
      logError("assurance", `Site ${siteId} unverified`, breach);
    }
    await recordAudit(this.audit, {
      orgId,
      siteId,
      eventType: "ASSURANCE_EVALUATED",
      entityId: stateKeys.assurance(siteId),
      metadata: { status: report.status, breaches: report.breaches },
    });
    return report;
  }

  async getAssuranceReport(siteId: string): Promise<AssuranceReport | null> {
    const found = await readRecord(this.store, stateKeys.assurance(siteId), assuranceReportSchema);
    return found ? found.record : null;
  }

  // --- Canary rollout ---

  async getCanary(siteId: string): Promise<CanaryRollout> {
    const found = await readRecord(this.store, stateKeys.canary(siteId), canaryRolloutSchema);
    if (!found) throw new CanaryNotFoundError(siteId);
    return found.record;
  }

  /**
   * Start a Day-N change on one canary device and drive it to Promoted or
   * RolledBack. The `canary:{site}` entry is the per-site lock: a new
   * rollout can only replace a terminal one.
   */
  async startCanary(siteId: string, request: CanaryRequest): Promise<CanaryRollout> {
    const { orgId, vendorSiteId } = await this.vendorSite(siteId);
    const key = stateKeys.canary(siteId);

    const existing = await readRecord(this.store, key, canaryRolloutSchema);
    if (existing && ACTIVE_CANARY_STATES.includes(existing.record.status)) {
      throw new CanaryInProgressError(siteId, existing.record.rolloutId);
    }

    const devices = (await this.vendor.listSiteDevices(vendorSiteId))
      .filter((d) => !request.deviceType || d.type === request.deviceType)
      .sort((a, b) => (a.deviceId < b.deviceId ? -1 : a.deviceId > b.deviceId ? 1 : 0));
    if (devices.length === 0) {
      throw new DeviceNotFoundError(siteId, "no devices match the rollout scope");
    }

    const canaryDeviceId = request.canaryDeviceId ?? devices[0].deviceId;
    if (!devices.some((d) => d.deviceId === canaryDeviceId)) {
      throw new DeviceNotFoundError(siteId, `device ${canaryDeviceId} is not in the rollout scope`);
    }

    const now = this.now().toISOString();
    const rollout: CanaryRollout = {
      rolloutId: randomUUID(),
      orgId,
      siteId,
      vendorSiteId,
      status: "Pending",
      change: request.change,
      canaryDeviceId,
      rolloutDeviceIds: devices.map((d) => d.deviceId).filter((id) => id !== canaryDeviceId),
      priorState: null,
      samples: [],
      expectedSamples: Math.max(1, Math.floor(this.options.canaryWindowMs / this.options.canaryIntervalMs)),
      measurementPassed: false,
      breach: null,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };

    const cas = await this.store.compareAndSwap(key, existing ? existing.version : ABSENT_VERSION, rollout);
    if (!cas.ok) {
      const winner = cas.current ? parseEntry(cas.current, canaryRolloutSchema).record : null;
      throw new CanaryInProgressError(siteId, winner ? winner.rolloutId : "unknown");
    }

    log(`Canary ${rollout.rolloutId} started on ${canaryDeviceId} for site ${siteId}`, "canary");
    await this.emitTransition(rollout, null);
    return this.drive({ rollout, version: cas.entry.version });
  }

  /** Continue an interrupted rollout from its persisted state. */
  async resumeCanary(siteId: string): Promise<CanaryRollout> {
    const found = await readRecord(this.store, stateKeys.canary(siteId), canaryRolloutSchema);
    if (!found) throw new CanaryNotFoundError(siteId);
    if (!ACTIVE_CANARY_STATES.includes(found.record.status)) return found.record;
    return this.drive({ rollout: found.record, version: found.version });
  }

  private async save(current: Tracked, patch: Partial<CanaryRollout>): Promise<Tracked> {
    const next: CanaryRollout = { ...current.rollout, ...patch, updatedAt: this.now().toISOString() };
    assertTransition(current.rollout.status, next.status);

    const cas = await this.store.compareAndSwap(stateKeys.canary(next.siteId), current.version, next);
    if (!cas.ok) throw new CanarySupersededError(next.siteId, next.rolloutId);

    if (next.status !== current.rollout.status) {
      await this.emitTransition(next, current.rollout.status);
    }
    return { rollout: next, version: cas.entry.version };
  }

  private async emitTransition(rollout: CanaryRollout, from: CanaryStatus | null): Promise<void> {
    await recordAudit(this.audit, {
      orgId: rollout.orgId,
      siteId: rollout.siteId,
      eventType: "CANARY_TRANSITIONED",
      entityId: rollout.rolloutId,
      metadata: { from, to: rollout.status },
    });
  }

  private async captureChangeTarget(rollout: CanaryRollout): Promise<LifecycleChange> {
    const state = await this.vendor.getDeviceState(rollout.vendorSiteId, rollout.canaryDeviceId);
    return rollout.change.kind === "firmware"
      ? { kind: "firmware", version: state.firmwareVersion }
      : { kind: "device-config", config: state.config };
  }

  /**
   * Advance the rollout until it is terminal or a vendor call fails. A
   * failure is stored on the rollout as lastError and the rollout keeps its
   * state, so resumeCanary picks up where it stopped.
   */
  private async drive(start: Tracked): Promise<CanaryRollout> {
    let current = start;
    try {
      while (ACTIVE_CANARY_STATES.includes(current.rollout.status)) {
        current = await this.step(current);
      }
    } catch (err) {
      if (err instanceof CanarySupersededError || err instanceof InvalidTransitionError) throw err;
      logError("canary", `Rollout ${current.rollout.rolloutId} stalled in ${current.rollout.status}`, err);
      current = await this.save(current, { lastError: toRecordedError(err) });
    }
    return current.rollout;
  }

  /** Each branch makes its vendor calls first and then persists exactly once. */
  private async step(current: Tracked): Promise<Tracked> {
    const { rollout } = current;

    switch (rollout.status) {
      case "Pending": {
        // Prior state is persisted before the canary is touched.
        if (!rollout.priorState) {
          return this.save(current, { priorState: await this.captureChangeTarget(rollout) });
        }
        await this.vendor.applyLifecycleChange(rollout.vendorSiteId, [rollout.canaryDeviceId], rollout.change);
        return this.save(current, { status: "CanaryDeployed", lastError: null });
      }

      case "CanaryDeployed":
        return this.save(current, { status: "Measuring" });

      case "Measuring": {
        if (rollout.breach) return this.rollBack(current);
        if (rollout.measurementPassed) return this.promote(current);
        if (rollout.samples.length >= rollout.expectedSamples) {
          return this.save(current, { measurementPassed: true, lastError: null });
        }
        return this.sample(current);
      }

      default:
        return current;
    }
  }

  /** One sample; a single failing sample ends measurement. */
  private async sample(current: Tracked): Promise<Tracked> {
    const { rollout } = current;
    await this.sleep(this.options.canaryIntervalMs);

    const readings = await this.vendor.getDeviceSle(rollout.vendorSiteId, rollout.canaryDeviceId, [
      ...this.options.requiredMetrics,
    ]);
    const verdict = evaluateSle(readings, this.options);
    const sample: CanarySample = {
      sampledAt: this.now().toISOString(),
      metrics: verdict.metrics,
      passed: verdict.passed,
    };

    const [first] = verdict.breaches;
    if (!first) {
      return this.save(current, { samples: [...rollout.samples, sample], lastError: null });
    }

    logError("canary", `Rollout ${rollout.rolloutId} breached on ${rollout.canaryDeviceId}`, first);
    return this.save(current, {
      samples: [...rollout.samples, sample],
      breach: { metric: first.metric, value: first.value, threshold: first.threshold },
      lastError: null,
    });
  }

  private async rollBack(current: Tracked): Promise<Tracked> {
    const { rollout } = current;
    if (rollout.priorState) {
      await this.vendor.applyLifecycleChange(rollout.vendorSiteId, [rollout.canaryDeviceId], rollout.priorState);
    }
    log(`Rollout ${rollout.rolloutId} rolled back ${rollout.canaryDeviceId}`, "canary");
    return this.save(current, { status: "RolledBack", lastError: null });
  }

  private async promote(current: Tracked): Promise<Tracked> {
    const { rollout } = current;
    if (rollout.rolloutDeviceIds.length > 0) {
      await this.vendor.applyLifecycleChange(rollout.vendorSiteId, rollout.rolloutDeviceIds, rollout.change);
    }
    log(`Rollout ${rollout.rolloutId} promoted to ${rollout.rolloutDeviceIds.length} device(s)`, "canary");
    return this.save(current, { status: "Promoted", lastError: null });
  }
}
