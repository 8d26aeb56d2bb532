import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  registerTemplateRequestSchema,
  templateAssignmentsSchema,
  templateSchema,
  type IntentStepId,
  type JsonValue,
  type RegisterTemplateRequest,
  type Template,
} from "@shared/schema";
import { mutateRecord, readRecord, stateKeys, type StateStore } from "../../platform/state";
import { TemplateNotFoundError, TemplateValidationError } from "../errors";
import { log } from "../log";
import { validateTemplate } from "./templateBinder";
import defaultTemplatesJson from "../templates/defaultTemplates.json";

function canonical(value: JsonValue): string {
  if (Array.isArray(value)) return `[${value.map(canonical).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonical(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

function sameContent(a: Template, b: RegisterTemplateRequest): boolean {
  return (
    a.name === b.name &&
    a.stepId === b.stepId &&
    canonical(a.variables) === canonical(b.variables) &&
    canonical(a.body) === canonical(b.body)
  );
}

/**
 * Register a template, or publish a new version of an existing one.
 * Re-registering identical content returns the stored version unchanged.
 */
export async function registerTemplate(store: StateStore, input: RegisterTemplateRequest): Promise<Template> {
  const templateId = input.templateId ?? randomUUID();
  validateTemplate({ templateId, variables: input.variables, body: input.body });

  const result = await mutateRecord(store, stateKeys.template(templateId), templateSchema, (current) => {
    if (current && sameContent(current, input)) return null;
    if (current && current.stepId !== input.stepId) {
      throw new TemplateValidationError(
        `Template ${templateId} serves "${current.stepId}" and cannot be moved to "${input.stepId}"`,
      );
    }
    return {
      templateId,
      name: input.name,
      version: current ? current.version + 1 : 1,
      stepId: input.stepId,
      variables: input.variables,
      body: input.body,
      createdAt: new Date().toISOString(),
    };
  });

  if (!result) {
    throw new TemplateNotFoundError(`Template ${templateId} could not be stored`);
  }
  return result.record;
}

export async function getTemplate(store: StateStore, templateId: string): Promise<Template> {
  const found = await readRecord(store, stateKeys.template(templateId), templateSchema);
  if (!found) {
    throw new TemplateNotFoundError(`Template ${templateId} not found`);
  }
  return found.record;
}

export async function getAssignments(store: StateStore, orgId: string): Promise<Partial<Record<IntentStepId, string>>> {
  const found = await readRecord(store, stateKeys.assignments(orgId), templateAssignmentsSchema);
  return found ? found.record.assignments : {};
}

export async function assignTemplate(
  store: StateStore,
  input: { orgId: string; stepId: IntentStepId; templateId: string },
): Promise<Partial<Record<IntentStepId, string>>> {
  const template = await getTemplate(store, input.templateId);
  if (template.stepId !== input.stepId) {
    throw new TemplateValidationError(
      `Template ${template.templateId} serves "${template.stepId}", not "${input.stepId}"`,
    );
  }

  const result = await mutateRecord(store, stateKeys.assignments(input.orgId), templateAssignmentsSchema, (current) => {
    if (current?.assignments[input.stepId] === input.templateId) return null;
    return {
      orgId: input.orgId,
      assignments: { ...(current?.assignments ?? {}), [input.stepId]: input.templateId },
    };
  });
  return result ? result.record.assignments : {};
}

/** The template currently assigned to `stepId` for the organization. */
export async function getAssignedTemplate(store: StateStore, orgId: string, stepId: IntentStepId): Promise<Template> {
  const assignments = await getAssignments(store, orgId);
  const templateId = assignments[stepId];
  if (!templateId) {
    throw new TemplateNotFoundError(`Organization "${orgId}" has no template assigned to "${stepId}"`);
  }
  return getTemplate(store, templateId);
}

const defaultTemplates = z
  .array(registerTemplateRequestSchema.required({ templateId: true }))
  .parse(defaultTemplatesJson);

/**
 * Register the bundled default templates and assign each to the steps of
 * `orgId` that have no assignment yet.
 */
export async function seedDefaultTemplates(store: StateStore, orgId: string): Promise<Template[]> {
  const existing = await getAssignments(store, orgId);
  const seeded: Template[] = [];

  for (const input of defaultTemplates) {
    const template = await registerTemplate(store, input);
    if (!existing[template.stepId]) {
      await assignTemplate(store, { orgId, stepId: template.stepId, templateId: template.templateId });
      seeded.push(template);
    }
  }

  log(`Seeded ${seeded.length} default template assignment(s) for org ${orgId}`, "templates");
  return seeded;
}
