import type { BoundVariable, SiteVariables, VariableValue } from "@shared/schema";
import { siteVariablesSchema } from "@shared/schema";
import { recordAudit, type AuditSink } from "../../platform/audit";
import { mutateRecord, readRecord, stateKeys, type StateStore } from "../../platform/state";
import { VariableImmutableError, VariableNotBoundError } from "../errors";

export async function getSiteVariables(store: StateStore, siteId: string): Promise<Record<string, BoundVariable>> {
  const current = await readRecord(store, stateKeys.variables(siteId), siteVariablesSchema);
  return current ? current.record.variables : {};
}

/**
 * Bind values at site scope. Re-binding an identical value is a no-op;
 * a different value for an already-bound name is rejected.
 */
export async function bindVariables(
  store: StateStore,
  audit: AuditSink,
  input: { orgId: string; siteId: string; values: Record<string, VariableValue> },
): Promise<Record<string, BoundVariable>> {
  const { orgId, siteId, values } = input;
  let added: string[] = [];

  const result = await mutateRecord(store, stateKeys.variables(siteId), siteVariablesSchema, (current) => {
    const existing: Record<string, BoundVariable> = current ? current.variables : {};
    const boundAt = new Date().toISOString();
    const next: Record<string, BoundVariable> = { ...existing };
    added = [];

    for (const [name, value] of Object.entries(values)) {
      const prior = existing[name];
      if (prior) {
        if (prior.value !== value) throw new VariableImmutableError(siteId, name);
        continue;
      }
      next[name] = { value, revision: 1, boundAt };
      added.push(name);
    }

    if (added.length === 0 && current) return null;
    const doc: SiteVariables = { siteId, variables: next };
    return doc;
  });

  if (added.length > 0) {
    await recordAudit(audit, {
      orgId,
      siteId,
      eventType: "VARIABLE_BOUND",
      entityId: siteId,
      metadata: { names: added },
    });
  }
  return result ? result.record.variables : {};
}

/**
 * Replace a bound value and bump its revision. Returns null when the value
 * is unchanged.
 */
export async function rotateVariable(
  store: StateStore,
  audit: AuditSink,
  input: { orgId: string; siteId: string; name: string; value: VariableValue },
): Promise<BoundVariable | null> {
  const { orgId, siteId, name, value } = input;
  const outcome: { rotated: BoundVariable | null } = { rotated: null };

  await mutateRecord(store, stateKeys.variables(siteId), siteVariablesSchema, (current) => {
    const prior = current?.variables[name];
    if (!current || !prior) throw new VariableNotBoundError(siteId, name);

    outcome.rotated = null;
    if (prior.value === value) return null;

    const next: BoundVariable = { value, revision: prior.revision + 1, boundAt: new Date().toISOString() };
    outcome.rotated = next;
    return { siteId, variables: { ...current.variables, [name]: next } };
  });

  const { rotated } = outcome;
  if (rotated) {
    await recordAudit(audit, {
      orgId,
      siteId,
      eventType: "VARIABLE_ROTATED",
      entityId: `${siteId}:${name}`,
      metadata: { name, revision: rotated.revision },
    });
  }
  return rotated;
}
