import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import {
  STEP_IDS,
  siteSchema,
  stepRecordSchema,
  workflowRunSchema,
  type JsonObject,
  type RecordedError,
  type StepId,
  type IntentStepId,
  type StepRecord,
  type VariableValue,
  type WorkflowRun,
  type WorkflowRunStatus,
} from "@shared/schema";
import { recordAudit, type AuditSink } from "../../platform/audit";
import {
  ABSENT_VERSION,
  listRecords,
  mutateRecord,
  readRecord,
  stateKeys,
  type StateStore,
  type VersionedRecord,
} from "../../platform/state";
import {
  DependencyNotSatisfiedError,
  InvalidTransitionError,
  SiteNotFoundError,
  WorkflowNotFoundError,
  toRecordedError,
} from "../errors";
import { log, logError } from "../log";
import { rotateVariable as rotateSiteVariable } from "../services/siteVariables";
import { referencesVariable } from "../services/templateBinder";
import { getAssignedTemplate } from "../services/templateRegistry";
import type { VendorApi } from "../vendor";
import { createStepHandlers, type PreparedStep, type StepHandler } from "./stepHandlers";
import {
  STEP_DEFINITIONS,
  assertPredecessorsSucceeded,
  statusMap,
  stepsInDomains,
  topologicalOrder,
} from "./workflowPlan";

export type OrchestratorOptions = {
  /** Identifies this process in step leases. */
  ownerId: string;
  leaseMs: number;
  maxStepAttempts: number;
  siteConcurrency: number;
};

export type OrchestratorDeps = {
  store: StateStore;
  vendor: VendorApi;
  audit: AuditSink;
  options: OrchestratorOptions;
  now?: () => Date;
};

export type StepOutcome =
  | { kind: "succeeded"; stepId: StepId; record: StepRecord }
  | { kind: "cached"; stepId: StepId; record: StepRecord }
  | { kind: "failed"; stepId: StepId; record: StepRecord; error: RecordedError }
  | { kind: "blocked"; stepId: StepId; unmet: readonly StepId[] }
  | { kind: "busy"; stepId: StepId; record: StepRecord }
  | { kind: "skipped"; stepId: StepId }
  | { kind: "awaiting-retry"; stepId: StepId; record: StepRecord }
  | { kind: "superseded"; stepId: StepId };

export type RunStatus = {
  run: WorkflowRun;
  steps: StepRecord[];
};

export type RunSiteOptions = {
  /** Restrict this pass to a subset of steps; the rest are left as they are. */
  steps?: readonly StepId[];
};

export type SiteRunResult =
  | { siteId: string; ok: true; status: RunStatus }
  | { siteId: string; ok: false; error: RecordedError };

// Run-level state machine. A Cancelled run is terminal; a new trigger starts a new run.
const RUN_TRANSITIONS: Record<WorkflowRunStatus, WorkflowRunStatus[]> = {
  Running: ["Succeeded", "Failed", "Cancelled"],
  Succeeded: ["Running", "Cancelled"],
  Failed: ["Running", "Cancelled"],
  Cancelled: [],
};

function assertRunTransition(from: WorkflowRunStatus, to: WorkflowRunStatus): void {
  if (!RUN_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError("workflow run", from, to);
  }
}

function deriveRunStatus(steps: readonly StepRecord[]): WorkflowRunStatus {
  const relevant = steps.filter((s) => s.status !== "Skipped");
  if (relevant.some((s) => s.status === "Running")) return "Running";
  if (relevant.every((s) => s.status === "Succeeded")) return "Succeeded";
  if (relevant.some((s) => s.status === "Failed")) return "Failed";
  return "Running";
}

/**
 * Drives the per-site step DAG. All authoritative state lives in the
 * StateStore: every transition is a compare-and-swap on the step record
 * against the version read at the start of the execution, so any number of
 * orchestrator processes may work the same site.
 */
export class WorkflowOrchestrator {
  private readonly store: StateStore;
  private readonly audit: AuditSink;
  private readonly options: OrchestratorOptions;
  private readonly now: () => Date;
  private readonly handlers: Record<StepId, StepHandler>;

  constructor(deps: OrchestratorDeps) {
    this.store = deps.store;
    this.audit = deps.audit;
    this.options = deps.options;
    this.now = deps.now ?? (() => new Date());
    this.handlers = createStepHandlers({ store: deps.store, vendor: deps.vendor, audit: deps.audit });
  }

  // --- Runs ---

  /**
   * Create (or resume) the run for a site. Step records that already exist
   * are kept; missing ones are created Pending, or Skipped when their
   * Day-1 domain is not in scope for the site.
   */
  async startRun(siteId: string): Promise<WorkflowRun> {
    const site = await readRecord(this.store, stateKeys.site(siteId), siteSchema);
    if (!site) throw new SiteNotFoundError(siteId);
    const { orgId, domains } = site.record;

    const { skipped } = stepsInDomains(domains);
    for (const stepId of STEP_IDS) {
      const initial: StepRecord = {
        siteId,
        stepId,
        status: skipped.includes(stepId) ? "Skipped" : "Pending",
        attempt: 0,
        fingerprint: null,
        lastError: null,
        result: null,
        lease: null,
        updatedAt: this.timestamp(),
      };
      // Lost race means the record exists already, which is what we want.
      await this.store.compareAndSwap(stateKeys.step(siteId, stepId), ABSENT_VERSION, initial);
    }

    const outcome = { created: false };
    const result = await mutateRecord(this.store, stateKeys.run(siteId), workflowRunSchema, (current): WorkflowRun | null => {
      outcome.created = false;
      if (current && current.status === "Running") return null;
      if (current && current.status !== "Cancelled") {
        assertRunTransition(current.status, "Running");
        return { ...current, status: "Running", updatedAt: this.timestamp() };
      }
      outcome.created = true;
      const run: WorkflowRun = {
        runId: randomUUID(),
        orgId,
        siteId,
        steps: [...STEP_IDS],
        status: "Running",
        createdAt: this.timestamp(),
        updatedAt: this.timestamp(),
        cancelledAt: null,
      };
      return run;
    });
    if (!result) throw new WorkflowNotFoundError(siteId);

    if (outcome.created) {
      log(`Started run ${result.record.runId} for site ${siteId}`, "workflow");
      await recordAudit(this.audit, {
        orgId,
        siteId,
        eventType: "WORKFLOW_STARTED",
        entityId: result.record.runId,
        metadata: { skipped },
      });
    }
    return result.record;
  }

  async getRunStatus(siteId: string): Promise<RunStatus> {
    const run = await readRecord(this.store, stateKeys.run(siteId), workflowRunSchema);
    if (!run) throw new WorkflowNotFoundError(siteId);
    return { run: run.record, steps: await this.loadSteps(siteId) };
  }

  /**
   * Mark the run Cancelled. Steps already executing finish and persist
   * their result; no further step is started for this run.
   */
  async cancelRun(siteId: string): Promise<WorkflowRun> {
    const result = await mutateRecord(this.store, stateKeys.run(siteId), workflowRunSchema, (current): WorkflowRun | null => {
      if (!current) throw new WorkflowNotFoundError(siteId);
      if (current.status === "Cancelled") return null;
      assertRunTransition(current.status, "Cancelled");
      const now = this.timestamp();
      return { ...current, status: "Cancelled", cancelledAt: now, updatedAt: now };
    });
    if (!result) throw new WorkflowNotFoundError(siteId);

    log(`Cancelled run ${result.record.runId} for site ${siteId}`, "workflow");
    await recordAudit(this.audit, {
      orgId: result.record.orgId,
      siteId,
      eventType: "WORKFLOW_CANCELLED",
      entityId: result.record.runId,
    });
    return result.record;
  }

  // --- Steps ---

  private async loadSteps(siteId: string): Promise<StepRecord[]> {
    const records = await listRecords(this.store, stateKeys.stepPrefix(siteId), stepRecordSchema);
    const byStep = new Map(records.map((r) => [r.record.stepId, r.record]));
    return STEP_IDS.flatMap((s) => {
      const record = byStep.get(s);
      return record ? [record] : [];
    });
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private leaseExpired(record: StepRecord): boolean {
    return !record.lease || Date.parse(record.lease.expiresAt) <= this.now().getTime();
  }

  private async transition(
    orgId: string,
    observed: VersionedRecord<StepRecord>,
    next: StepRecord,
  ): Promise<VersionedRecord<StepRecord> | null> {
    const key = stateKeys.step(next.siteId, next.stepId);
    const cas = await this.store.compareAndSwap(key, observed.version, next);
    if (!cas.ok) return null;

    await recordAudit(this.audit, {
      orgId,
      siteId: next.siteId,
      eventType: "STEP_TRANSITIONED",
      entityId: key,
      metadata: { stepId: next.stepId, from: observed.record.status, to: next.status, attempt: next.attempt },
    });
    return { record: next, version: cas.entry.version };
  }

  /**
   * Execute one step for a site.
   *
   * Read record → check predecessors → prepare (fingerprint + local
   * preconditions) → claim Running by CAS → apply → persist the outcome by
   * CAS against the claimed version. A Succeeded step whose fingerprint is
   * unchanged is returned from the record without touching the vendor.
   */
  async executeStep(siteId: string, stepId: StepId, opts: { retry?: boolean } = {}): Promise<StepOutcome> {
    const observed = await readRecord(this.store, stateKeys.step(siteId, stepId), stepRecordSchema);
    if (!observed) throw new WorkflowNotFoundError(siteId);
    const { record } = observed;

    if (record.status === "Skipped") return { kind: "skipped", stepId };
    if (record.status === "Running" && !this.leaseExpired(record)) return { kind: "busy", stepId, record };
    if (record.status === "Failed" && !opts.retry) return { kind: "awaiting-retry", stepId, record };

    const steps = await this.loadSteps(siteId);
    try {
      assertPredecessorsSucceeded(stepId, statusMap(steps));
    } catch (err) {
      if (err instanceof DependencyNotSatisfiedError) {
        return { kind: "blocked", stepId, unmet: err.unmet };
      }
      throw err;
    }

    const site = await readRecord(this.store, stateKeys.site(siteId), siteSchema);
    if (!site) throw new SiteNotFoundError(siteId);
    const orgId = site.record.orgId;

    let prepared: PreparedStep | null = null;
    let prepareError: unknown = null;
    try {
      prepared = await this.handlers[stepId]({ orgId, siteId, stepId });
    } catch (err) {
      prepareError = err;
    }

    if (prepared && record.status === "Succeeded" && record.fingerprint === prepared.fingerprint) {
      return { kind: "cached", stepId, record };
    }

    const claimed = await this.transition(orgId, observed, {
      ...record,
      status: "Running",
      attempt: record.attempt + 1,
      lease: {
        owner: `${this.options.ownerId}/${randomUUID()}`,
        expiresAt: new Date(this.now().getTime() + this.options.leaseMs).toISOString(),
      },
      updatedAt: this.timestamp(),
    });
    if (!claimed) return { kind: "superseded", stepId };

    let result: JsonObject | null = null;
    let failure: unknown = prepareError;
    if (prepared) {
      try {
        result = await prepared.apply();
      } catch (err) {
        failure = err;
      }
    }

    if (result && prepared) {
      const done = await this.transition(orgId, claimed, {
        ...claimed.record,
        status: "Succeeded",
        fingerprint: prepared.fingerprint,
        lastError: null,
        result,
        lease: null,
        updatedAt: this.timestamp(),
      });
      if (!done) return { kind: "superseded", stepId };
      log(`${siteId}/${stepId} succeeded (attempt ${done.record.attempt})`, "workflow");
      return { kind: "succeeded", stepId, record: done.record };
    }

    const error = toRecordedError(failure);
    const failed = await this.transition(orgId, claimed, {
      ...claimed.record,
      status: "Failed",
      lastError: error,
      lease: null,
      updatedAt: this.timestamp(),
    });
    if (!failed) return { kind: "superseded", stepId };
    logError("workflow", `${siteId}/${stepId} failed (attempt ${failed.record.attempt}) with ${error.code}`, failure);
    return { kind: "failed", stepId, record: failed.record, error };
  }

  /**
   * Steps to launch next in this pass. An in-scope predecessor must also have
   * settled in this pass: a Succeeded step may still be re-applied, and its
   * dependents wait for that to finish.
   */
  private launchable(
    steps: readonly StepRecord[],
    evaluated: ReadonlySet<StepId>,
    inFlight: ReadonlySet<StepId>,
    scope: ReadonlySet<StepId>,
  ): StepId[] {
    const statuses = statusMap(steps);
    const settled = (p: StepId) => !scope.has(p) || (evaluated.has(p) && !inFlight.has(p));
    const ready: StepId[] = [];

    for (const step of steps) {
      if (!scope.has(step.stepId)) continue;
      const predecessorsDone = STEP_DEFINITIONS[step.stepId].predecessors.every(
        (p) => statuses.get(p) === "Succeeded" && settled(p),
      );
      if (!predecessorsDone) continue;

      if (step.status === "Failed") {
        if (step.lastError?.retryable && step.attempt < this.options.maxStepAttempts) ready.push(step.stepId);
        continue;
      }
      if (evaluated.has(step.stepId)) continue;
      if (step.status === "Pending" || step.status === "Succeeded") ready.push(step.stepId);
      if (step.status === "Running" && this.leaseExpired(step)) ready.push(step.stepId);
    }
    return ready;
  }

  private async isActive(siteId: string, runId: string): Promise<boolean> {
    const run = await readRecord(this.store, stateKeys.run(siteId), workflowRunSchema);
    return run !== null && run.record.runId === runId && run.record.status !== "Cancelled";
  }

  /**
   * Advance the site's DAG as far as it goes. Independent steps (the three
   * Day-1 subtrees) run concurrently; a failure leaves its transitive
   * dependents Pending. Each step is evaluated at most once per call, plus
   * automatic retries of retryable failures up to maxStepAttempts.
   */
  async runSite(siteId: string, opts: RunSiteOptions = {}): Promise<RunStatus> {
    const run = await this.startRun(siteId);
    const scope = new Set<StepId>(opts.steps ?? STEP_IDS);
    const evaluated = new Set<StepId>();
    const inFlight = new Map<StepId, Promise<{ stepId: StepId; error: unknown }>>();
    let fatal: unknown = null;

    for (;;) {
      if (fatal === null && (await this.isActive(siteId, run.runId))) {
        const steps = await this.loadSteps(siteId);
        for (const stepId of this.launchable(steps, evaluated, new Set(inFlight.keys()), scope)) {
          if (inFlight.has(stepId)) continue;
          const retry = steps.some((s) => s.stepId === stepId && s.status === "Failed");
          evaluated.add(stepId);
          inFlight.set(
            stepId,
            this.executeStep(siteId, stepId, { retry }).then(
              () => ({ stepId, error: null }),
              (error: unknown) => ({ stepId, error }),
            ),
          );
        }
      }

      if (inFlight.size === 0) break;
      const settled = await Promise.race(inFlight.values());
      inFlight.delete(settled.stepId);
      if (settled.error !== null && fatal === null) {
        fatal = settled.error;
      }
    }

    if (fatal !== null) throw fatal;
    return this.finishRun(siteId, run.runId);
  }

  private async finishRun(siteId: string, runId: string): Promise<RunStatus> {
    const steps = await this.loadSteps(siteId);
    const derived = deriveRunStatus(steps);

    const change = { applied: false };
    const result = await mutateRecord(this.store, stateKeys.run(siteId), workflowRunSchema, (current) => {
      change.applied = false;
      if (!current) throw new WorkflowNotFoundError(siteId);
      if (current.runId !== runId || current.status === "Cancelled" || current.status === derived) return null;
      change.applied = true;
      return { ...current, status: derived, updatedAt: this.timestamp() };
    });
    if (!result) throw new WorkflowNotFoundError(siteId);

    const run = result.record;
    if (change.applied && (derived === "Succeeded" || derived === "Failed")) {
      await recordAudit(this.audit, {
        orgId: run.orgId,
        siteId,
        eventType: "WORKFLOW_FINISHED",
        entityId: run.runId,
        metadata: { status: derived },
      });
    }
    return { run, steps };
  }

  /**
   * Operator retry of a Failed step. On success the rest of the DAG is
   * advanced in the same call.
   */
  async retryStep(siteId: string, stepId: StepId): Promise<{ outcome: StepOutcome; status: RunStatus }> {
    const existing = await readRecord(this.store, stateKeys.step(siteId, stepId), stepRecordSchema);
    if (!existing) throw new WorkflowNotFoundError(siteId);
    if (existing.record.status !== "Failed") {
      throw new InvalidTransitionError("step", existing.record.status, "Running");
    }

    const run = await this.startRun(siteId);
    const outcome = await this.executeStep(siteId, stepId, { retry: true });
    if (outcome.kind === "succeeded") {
      return { outcome, status: await this.runSite(siteId) };
    }
    return { outcome, status: await this.finishRun(siteId, run.runId) };
  }

  /**
   * Rotate a site variable and re-apply only the Succeeded steps whose
   * assigned templates reference it, in DAG order.
   */
  async rotateVariable(
    siteId: string,
    name: string,
    value: VariableValue,
  ): Promise<{ revision: number | null; reapplied: StepOutcome[] }> {
    const site = await readRecord(this.store, stateKeys.site(siteId), siteSchema);
    if (!site) throw new SiteNotFoundError(siteId);
    const { orgId } = site.record;

    const rotated = await rotateSiteVariable(this.store, this.audit, { orgId, siteId, name, value });
    if (!rotated) return { revision: null, reapplied: [] };

    const steps = new Map((await this.loadSteps(siteId)).map((s) => [s.stepId, s.status]));
    const affected: StepId[] = [];
    for (const stepId of topologicalOrder()) {
      if (!isIntentStep(stepId) || steps.get(stepId) !== "Succeeded") continue;
      const template = await getAssignedTemplate(this.store, orgId, stepId);
      if (referencesVariable(template, name)) affected.push(stepId);
    }

    const reapplied: StepOutcome[] = [];
    for (const stepId of affected) {
      reapplied.push(await this.executeStep(siteId, stepId));
    }
    log(`Rotated ${siteId}/${name} to revision ${rotated.revision}; re-applied [${affected.join(", ")}]`, "workflow");
    return { revision: rotated.revision, reapplied };
  }

  /** Run several site workflows concurrently, at most siteConcurrency at a time. */
  async runSites(siteIds: readonly string[], opts: RunSiteOptions = {}): Promise<SiteRunResult[]> {
    const limit = pLimit(this.options.siteConcurrency);
    const settled = await Promise.allSettled(siteIds.map((siteId) => limit(() => this.runSite(siteId, opts))));

    return settled.map((s, i): SiteRunResult => {
      const siteId = siteIds[i];
      if (s.status === "fulfilled") return { siteId, ok: true, status: s.value };
      logError("workflow", `Run for site ${siteId} aborted`, s.reason);
      return { siteId, ok: false, error: toRecordedError(s.reason) };
    });
  }
}

function isIntentStep(stepId: StepId): stepId is IntentStepId {
  return STEP_DEFINITIONS[stepId].intentKind !== null;
}
