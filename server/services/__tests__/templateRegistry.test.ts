import { describe, it, expect, beforeEach } from "vitest";
import { INTENT_STEP_IDS, type RegisterTemplateRequest } from "@shared/schema";
import { InMemoryStateStore } from "../../../platform/state";
import {
  assignTemplate,
  getAssignedTemplate,
  getAssignments,
  getTemplate,
  registerTemplate,
  seedDefaultTemplates,
} from "../templateRegistry";
import { TemplateNotFoundError, TemplateValidationError } from "../../errors";

const TEMPLATE_ID = "22222222-2222-4222-8222-222222222222";

const lanTemplate: RegisterTemplateRequest = {
  templateId: TEMPLATE_ID,
  name: "branch-lan",
  stepId: "lan-networks",
  variables: ["corp_vlan"],
  body: { vlan_id: "{{corp_vlan}}", internet_access: true },
};

describe("templateRegistry", () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore();
  });

  it("stores a new template at version 1", async () => {
    const template = await registerTemplate(store, lanTemplate);
    expect(template).toMatchObject({ templateId: TEMPLATE_ID, version: 1, stepId: "lan-networks" });
    expect(await getTemplate(store, TEMPLATE_ID)).toEqual(template);
  });

  it("keeps the version when identical content is registered again", async () => {
    await registerTemplate(store, lanTemplate);
    const again = await registerTemplate(store, {
      ...lanTemplate,
      body: { internet_access: true, vlan_id: "{{corp_vlan}}" },
    });
    expect(again.version).toBe(1);
  });

  it("publishes a new version when content changes", async () => {
    await registerTemplate(store, lanTemplate);
    const next = await registerTemplate(store, { ...lanTemplate, body: { vlan_id: "{{corp_vlan}}" } });
    expect(next.version).toBe(2);
  });

  it("assigns a random id when none is given", async () => {
    const { templateId: _omit, ...rest } = lanTemplate;
    const template = await registerTemplate(store, rest);
    expect(template.templateId).not.toBe(TEMPLATE_ID);
    expect(template.templateId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("refuses to move a template to another step", async () => {
    await registerTemplate(store, lanTemplate);
    await expect(
      registerTemplate(store, { ...lanTemplate, stepId: "switch-templates" }),
    ).rejects.toBeInstanceOf(TemplateValidationError);
  });

  it("validates references before storing", async () => {
    await expect(
      registerTemplate(store, { ...lanTemplate, variables: [] }),
    ).rejects.toBeInstanceOf(TemplateValidationError);
    expect(store.size).toBe(0);
  });

  it("throws TemplateNotFoundError for an unknown id", async () => {
    await expect(getTemplate(store, TEMPLATE_ID)).rejects.toBeInstanceOf(TemplateNotFoundError);
  });

  describe("assignments", () => {
    it("assigns a template to its own step", async () => {
      await registerTemplate(store, lanTemplate);
      await assignTemplate(store, { orgId: "org-1", stepId: "lan-networks", templateId: TEMPLATE_ID });

      const assigned = await getAssignedTemplate(store, "org-1", "lan-networks");
      expect(assigned.templateId).toBe(TEMPLATE_ID);
    });

    it("rejects assigning a template to a different step", async () => {
      await registerTemplate(store, lanTemplate);
      await expect(
        assignTemplate(store, { orgId: "org-1", stepId: "create-wlans", templateId: TEMPLATE_ID }),
      ).rejects.toBeInstanceOf(TemplateValidationError);
    });

    it("throws when a step has no assignment", async () => {
      await expect(getAssignedTemplate(store, "org-1", "lan-networks")).rejects.toBeInstanceOf(
        TemplateNotFoundError,
      );
    });
  });

  describe("seedDefaultTemplates", () => {
    it("assigns a default template to every intent step", async () => {
      const seeded = await seedDefaultTemplates(store, "org-1");
      expect(seeded).toHaveLength(INTENT_STEP_IDS.length);

      const assignments = await getAssignments(store, "org-1");
      expect(Object.keys(assignments).sort()).toEqual([...INTENT_STEP_IDS].sort());
    });

    it("keeps existing assignments", async () => {
      await registerTemplate(store, lanTemplate);
      await assignTemplate(store, { orgId: "org-1", stepId: "lan-networks", templateId: TEMPLATE_ID });

      const seeded = await seedDefaultTemplates(store, "org-1");
      expect(seeded).toHaveLength(INTENT_STEP_IDS.length - 1);
      expect((await getAssignments(store, "org-1"))["lan-networks"]).toBe(TEMPLATE_ID);
    });

    it("is idempotent", async () => {
      await seedDefaultTemplates(store, "org-1");
      expect(await seedDefaultTemplates(store, "org-1")).toHaveLength(0);
    });
  });
});
