import { STEP_IDS, type Day1Domain, type StepId, type StepRecord, type StepStatus } from "@shared/schema";
import { DependencyNotSatisfiedError } from "../errors";
import type { IntentKind } from "../vendor";

export type StepDomain = "day0" | Day1Domain;

export type StepDefinition = Readonly<{
  stepId: StepId;
  domain: StepDomain;
  predecessors: readonly StepId[];
  /** Vendor object kind pushed by template-driven steps. */
  intentKind: IntentKind | null;
}>;

const define = (
  stepId: StepId,
  domain: StepDomain,
  predecessors: StepId[],
  intentKind: IntentKind | null = null,
): StepDefinition => ({ stepId, domain, predecessors, intentKind });

export const STEP_DEFINITIONS: Readonly<Record<StepId, StepDefinition>> = {
  "create-site": define("create-site", "day0", []),
  "assign-devices": define("assign-devices", "day0", ["create-site"]),

  "create-applications": define("create-applications", "wan", ["assign-devices"], "application"),
  "hub-profiles": define("hub-profiles", "wan", ["create-applications"], "hub-profile"),
  "gateway-templates": define("gateway-templates", "wan", ["hub-profiles"], "gateway-template"),

  "lan-networks": define("lan-networks", "wired", ["assign-devices"], "network"),
  "switch-templates": define("switch-templates", "wired", ["lan-networks"], "switch-template"),

  "wlan-templates": define("wlan-templates", "wireless", ["assign-devices"], "wlan-template"),
  "rf-templates": define("rf-templates", "wireless", ["wlan-templates"], "rf-template"),
  "create-wlans": define("create-wlans", "wireless", ["rf-templates"], "wlan"),
  "create-labels": define("create-labels", "wireless", ["create-wlans"], "label"),
  "wlan-policies": define("wlan-policies", "wireless", ["create-labels"], "wlan-policy"),
  "org-psks": define("org-psks", "wireless", ["wlan-policies"], "psk"),
};

export function stepsInDomains(domains: readonly Day1Domain[]): { included: StepId[]; skipped: StepId[] } {
  const included: StepId[] = [];
  const skipped: StepId[] = [];
  for (const stepId of STEP_IDS) {
    const { domain } = STEP_DEFINITIONS[stepId];
    if (domain === "day0" || domains.includes(domain)) {
      included.push(stepId);
    } else {
      skipped.push(stepId);
    }
  }
  return { included, skipped };
}

export function transitiveDependents(stepId: StepId): StepId[] {
  const found = new Set<StepId>();
  const queue: StepId[] = [stepId];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const candidate of STEP_IDS) {
      if (STEP_DEFINITIONS[candidate].predecessors.includes(current) && !found.has(candidate)) {
        found.add(candidate);
        queue.push(candidate);
      }
    }
  }
  return STEP_IDS.filter((s) => found.has(s));
}

export function unmetPredecessors(stepId: StepId, statuses: ReadonlyMap<StepId, StepStatus>): StepId[] {
  return STEP_DEFINITIONS[stepId].predecessors.filter((p) => statuses.get(p) !== "Succeeded");
}

/** Throws DependencyNotSatisfiedError unless every direct predecessor has Succeeded. */
export function assertPredecessorsSucceeded(stepId: StepId, statuses: ReadonlyMap<StepId, StepStatus>): void {
  const unmet = unmetPredecessors(stepId, statuses);
  if (unmet.length > 0) {
    throw new DependencyNotSatisfiedError(stepId, unmet);
  }
}

export function statusMap(records: readonly StepRecord[]): Map<StepId, StepStatus> {
  return new Map(records.map((r) => [r.stepId, r.status]));
}

/**
 * Kahn's algorithm over STEP_DEFINITIONS. Returns the steps in an order
 * where every step follows its predecessors, ties broken by STEP_IDS order.
 */
export function topologicalOrder(): StepId[] {
  const remaining = new Map<StepId, number>(
    STEP_IDS.map((s) => [s, STEP_DEFINITIONS[s].predecessors.length]),
  );
  const order: StepId[] = [];

  while (remaining.size > 0) {
    const next = STEP_IDS.find((s) => remaining.get(s) === 0);
    if (next === undefined) {
      throw new Error(`Step graph has a cycle among: ${Array.from(remaining.keys()).join(", ")}`);
    }
    remaining.delete(next);
    order.push(next);
    for (const s of STEP_IDS) {
      const count = remaining.get(s);
      if (count !== undefined && STEP_DEFINITIONS[s].predecessors.includes(next)) {
        remaining.set(s, count - 1);
      }
    }
  }
  return order;
}
