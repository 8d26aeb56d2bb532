import { describe, it, expect } from "vitest";
import { STEP_IDS, type StepId, type StepStatus } from "@shared/schema";
import {
  STEP_DEFINITIONS,
  assertPredecessorsSucceeded,
  stepsInDomains,
  topologicalOrder,
  transitiveDependents,
} from "../workflow/workflowPlan";
import { DependencyNotSatisfiedError } from "../errors";

describe("workflowPlan", () => {
  it("orders every step after its predecessors", () => {
    const order = topologicalOrder();
    expect(order).toEqual([...STEP_IDS]);
    for (const stepId of order) {
      for (const p of STEP_DEFINITIONS[stepId].predecessors) {
        expect(order.indexOf(p)).toBeLessThan(order.indexOf(stepId));
      }
    }
  });

  it("finds the transitive dependents of a step", () => {
    expect(transitiveDependents("create-applications")).toEqual(["hub-profiles", "gateway-templates"]);
    expect(transitiveDependents("rf-templates")).toEqual([
      "create-wlans",
      "create-labels",
      "wlan-policies",
      "org-psks",
    ]);
    expect(transitiveDependents("assign-devices")).toHaveLength(11);
  });

  it("skips the steps of domains that are out of scope", () => {
    const { included, skipped } = stepsInDomains(["wired"]);
    expect(included).toEqual(["create-site", "assign-devices", "lan-networks", "switch-templates"]);
    expect(skipped).toHaveLength(9);
  });

  it("reports unmet predecessors", () => {
    const statuses = new Map<StepId, StepStatus>([
      ["create-site", "Succeeded"],
      ["assign-devices", "Failed"],
    ]);
    expect(() => assertPredecessorsSucceeded("assign-devices", statuses)).not.toThrow();

    const err = (() => {
      try {
        assertPredecessorsSucceeded("lan-networks", statuses);
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(DependencyNotSatisfiedError);
    expect(err).toMatchObject({ unmet: ["assign-devices"] });
  });
});
