import { createHash } from "node:crypto";
import type { BoundVariable, JsonObject, JsonValue, Template } from "@shared/schema";
import { MissingVariableError, TemplateValidationError } from "../errors";

/**
 * Templates are JSON documents whose string leaves reference site variables
 * as `{{name}}`. A leaf that is exactly one reference takes the bound value
 * with its type; references embedded in longer strings are interpolated.
 */

const REFERENCE_PATTERN = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;
const WHOLE_REFERENCE_PATTERN = /^\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}$/;

type BindableTemplate = Pick<Template, "templateId" | "variables" | "body">;

function walkStrings(value: JsonValue, visit: (s: string) => void): void {
  if (typeof value === "string") {
    visit(value);
  } else if (Array.isArray(value)) {
    value.forEach((v) => walkStrings(v, visit));
  } else if (value !== null && typeof value === "object") {
    Object.values(value).forEach((v) => walkStrings(v, visit));
  }
}

export function collectReferences(body: JsonValue): Set<string> {
  const refs = new Set<string>();
  walkStrings(body, (s) => {
    for (const match of s.matchAll(REFERENCE_PATTERN)) {
      refs.add(match[1]);
    }
  });
  return refs;
}

export function validateTemplate(template: BindableTemplate): void {
  const declared = new Set(template.variables);
  if (declared.size !== template.variables.length) {
    throw new TemplateValidationError(`Template ${template.templateId} declares a variable twice`);
  }

  const referenced = collectReferences(template.body);
  const undeclared = Array.from(referenced).filter((name) => !declared.has(name));
  if (undeclared.length > 0) {
    throw new TemplateValidationError(
      `Template ${template.templateId} references undeclared variables: ${undeclared.join(", ")}`,
    );
  }

  const unused = template.variables.filter((name) => !referenced.has(name));
  if (unused.length > 0) {
    throw new TemplateValidationError(
      `Template ${template.templateId} declares variables it never references: ${unused.join(", ")}`,
    );
  }
}

function substitute(value: JsonValue, bound: Record<string, BoundVariable>): JsonValue {
  if (typeof value === "string") {
    const whole = WHOLE_REFERENCE_PATTERN.exec(value);
    if (whole) {
      return bound[whole[1]].value;
    }
    return value.replace(REFERENCE_PATTERN, (_, name: string) => String(bound[name].value));
  }
  if (Array.isArray(value)) {
    return value.map((v) => substitute(v, bound));
  }
  if (value !== null && typeof value === "object") {
    const out: JsonObject = {};
    for (const [key, v] of Object.entries(value)) {
      out[key] = substitute(v, bound);
    }
    return out;
  }
  return value;
}

/**
 * Resolve every reference of `template` against the site's bound variables.
 * Throws MissingVariableError for the first unbound reference, in
 * declaration order, before producing any payload.
 */
export function resolveTemplate(
  template: BindableTemplate,
  siteId: string,
  variables: Record<string, BoundVariable>,
): JsonObject {
  const required = new Set([...template.variables, ...collectReferences(template.body)]);
  for (const name of required) {
    if (!Object.hasOwn(variables, name)) {
      throw new MissingVariableError(name, template.templateId, siteId);
    }
  }

  const out: JsonObject = {};
  for (const [key, v] of Object.entries(template.body)) {
    out[key] = substitute(v, variables);
  }
  return out;
}

export function referencesVariable(template: BindableTemplate, name: string): boolean {
  return template.variables.includes(name) || collectReferences(template.body).has(name);
}

/**
 * Identity of one application of a template to a site: the template
 * version plus the revision of every variable it reads. Rotating a variable
 * changes the fingerprint of exactly the templates that reference it.
 */
export function fingerprint(
  template: Pick<Template, "templateId" | "version" | "variables" | "body">,
  variables: Record<string, BoundVariable>,
): string {
  const names = Array.from(new Set([...template.variables, ...collectReferences(template.body)])).sort();
  const payload = {
    templateId: template.templateId,
    version: template.version,
    revisions: names.map((name) => [name, variables[name]?.revision ?? 0]),
  };
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex");
}
