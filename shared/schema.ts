import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, integer, jsonb } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// --- Persistence tables ---

export const stateEntries = pgTable("state_entries", {
  key: text("key").primaryKey(),
  value: jsonb("value").$type<unknown>().notNull(),
  version: integer("version").notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const auditEvents = pgTable("audit_events", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  eventId: text("event_id").notNull().unique(),
  orgId: text("org_id").notNull(),
  siteId: text("site_id"),
  eventType: text("event_type").notNull(),
  entityId: text("entity_id").notNull(),
  metadata: jsonb("metadata").$type<Record<string, unknown>>(),
  occurredAt: timestamp("occurred_at", { mode: "string" }).notNull(),
});

export const insertAuditEventSchema = createInsertSchema(auditEvents).omit({
  id: true,
});

export type StateEntryRow = typeof stateEntries.$inferSelect;
export type InsertAuditEvent = typeof auditEvents.$inferInsert;

// --- JSON documents ---

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

// --- Workflow steps ---

export const STEP_IDS = [
  "create-site",
  "assign-devices",
  "create-applications",
  "hub-profiles",
  "gateway-templates",
  "lan-networks",
  "switch-templates",
  "wlan-templates",
  "rf-templates",
  "create-wlans",
  "create-labels",
  "wlan-policies",
  "org-psks",
] as const;

export const INTENT_STEP_IDS = [
  "create-applications",
  "hub-profiles",
  "gateway-templates",
  "lan-networks",
  "switch-templates",
  "wlan-templates",
  "rf-templates",
  "create-wlans",
  "create-labels",
  "wlan-policies",
  "org-psks",
] as const;

export const DAY1_DOMAINS = ["wan", "wired", "wireless"] as const;

export const stepIdSchema = z.enum(STEP_IDS);
export const intentStepIdSchema = z.enum(INTENT_STEP_IDS);
export const day1DomainSchema = z.enum(DAY1_DOMAINS);

export type StepId = z.infer<typeof stepIdSchema>;
export type IntentStepId = z.infer<typeof intentStepIdSchema>;
export type Day1Domain = z.infer<typeof day1DomainSchema>;

export const stepStatusSchema = z.enum(["Pending", "Running", "Succeeded", "Failed", "Skipped"]);
export type StepStatus = z.infer<typeof stepStatusSchema>;

export const recordedErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
});
export type RecordedError = z.infer<typeof recordedErrorSchema>;

export const stepLeaseSchema = z.object({
  owner: z.string(),
  expiresAt: z.string(),
});
export type StepLease = z.infer<typeof stepLeaseSchema>;

export const stepRecordSchema = z.object({
  siteId: z.string(),
  stepId: stepIdSchema,
  status: stepStatusSchema,
  attempt: z.number().int().nonnegative(),
  fingerprint: z.string().nullable(),
  lastError: recordedErrorSchema.nullable(),
  result: jsonObjectSchema.nullable(),
  lease: stepLeaseSchema.nullable(),
  updatedAt: z.string(),
});
export type StepRecord = z.infer<typeof stepRecordSchema>;

export const workflowRunStatusSchema = z.enum(["Running", "Succeeded", "Failed", "Cancelled"]);
export type WorkflowRunStatus = z.infer<typeof workflowRunStatusSchema>;

export const workflowRunSchema = z.object({
  runId: z.string(),
  orgId: z.string(),
  siteId: z.string(),
  steps: z.array(stepIdSchema),
  status: workflowRunStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string(),
  cancelledAt: z.string().nullable(),
});
export type WorkflowRun = z.infer<typeof workflowRunSchema>;

// --- Address planning ---

export const roleSpecSchema = z.object({
  role: z.string().regex(/^[a-z][a-z0-9_]*$/, "role must be lower snake case"),
  prefixLength: z.number().int().min(1).max(32),
  vlanId: z.number().int().min(1).max(4094),
});
export type RoleSpec = z.infer<typeof roleSpecSchema>;

export const organizationPlanSchema = z.object({
  orgId: z.string(),
  rootBlock: z.string(),
  zoneCount: z.number().int().positive(),
  roles: z.array(roleSpecSchema).min(1),
  createdAt: z.string(),
});
export type OrganizationPlan = z.infer<typeof organizationPlanSchema>;

export const subnetAllocationSchema = z.object({
  role: z.string(),
  cidr: z.string(),
  gateway: z.string(),
  netmask: z.string(),
  vlanId: z.number().int(),
});
export type SubnetAllocation = z.infer<typeof subnetAllocationSchema>;

export const siteAllocationSchema = z.object({
  siteId: z.string(),
  orgId: z.string(),
  zoneIndex: z.number().int().nonnegative(),
  ordinal: z.number().int().nonnegative(),
  zoneBlock: z.string(),
  siteBlock: z.string(),
  subnets: z.array(subnetAllocationSchema),
  allocatedAt: z.string(),
});
export type SiteAllocation = z.infer<typeof siteAllocationSchema>;

// --- Sites & variables ---

export const variableValueSchema = z.union([z.string(), z.number()]);
export type VariableValue = z.infer<typeof variableValueSchema>;

export const latLngSchema = z.object({ lat: z.number(), lng: z.number() });

export const siteSchema = z.object({
  siteId: z.string(),
  orgId: z.string(),
  name: z.string(),
  address: z.string().nullable(),
  timezone: z.string(),
  countryCode: z.string(),
  latlng: latLngSchema.nullable(),
  notes: z.string().nullable(),
  zoneIndex: z.number().int().nonnegative(),
  ordinal: z.number().int().nonnegative(),
  domains: z.array(day1DomainSchema),
  variables: z.record(variableValueSchema),
  vendorSiteId: z.string().nullable(),
  createdAt: z.string(),
});
export type Site = z.infer<typeof siteSchema>;

export const boundVariableSchema = z.object({
  value: variableValueSchema,
  revision: z.number().int().positive(),
  boundAt: z.string(),
});
export type BoundVariable = z.infer<typeof boundVariableSchema>;

export const siteVariablesSchema = z.object({
  siteId: z.string(),
  variables: z.record(boundVariableSchema),
});
export type SiteVariables = z.infer<typeof siteVariablesSchema>;

// --- Templates ---

export const templateSchema = z.object({
  templateId: z.string().uuid(),
  name: z.string().min(1),
  version: z.number().int().positive(),
  stepId: intentStepIdSchema,
  variables: z.array(z.string()),
  body: jsonObjectSchema,
  createdAt: z.string(),
});
export type Template = z.infer<typeof templateSchema>;

export const templateAssignmentsSchema = z.object({
  orgId: z.string(),
  assignments: z.record(intentStepIdSchema, z.string().uuid()),
});
export type TemplateAssignments = z.infer<typeof templateAssignmentsSchema>;

// --- Devices ---

export const deviceTypeSchema = z.enum(["gateway", "switch", "ap"]);
export type DeviceType = z.infer<typeof deviceTypeSchema>;

export const profileDeviceSchema = z.object({
  mac: z.string().regex(/^[0-9a-f]{12}$/, "mac must be 12 lowercase hex digits"),
  type: deviceTypeSchema,
  name: z.string().nullable().default(null),
  claimCode: z.string().nullable().default(null),
});
export type ProfileDevice = z.infer<typeof profileDeviceSchema>;

export const deploymentProfileSchema = z.object({
  siteId: z.string(),
  devices: z.array(profileDeviceSchema).min(1),
  updatedAt: z.string(),
});
export type DeploymentProfile = z.infer<typeof deploymentProfileSchema>;

// --- Assurance ---

export const sleEvaluationSchema = z.object({
  name: z.string(),
  value: z.number().nullable(),
  threshold: z.number(),
  passed: z.boolean(),
});
export type SleEvaluation = z.infer<typeof sleEvaluationSchema>;

export const assuranceReportSchema = z.object({
  siteId: z.string(),
  status: z.enum(["Verified", "Failed"]),
  metrics: z.array(sleEvaluationSchema),
  breaches: z.array(z.string()),
  checkedAt: z.string(),
});
export type AssuranceReport = z.infer<typeof assuranceReportSchema>;

export const lifecycleChangeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("firmware"), version: z.string().min(1) }),
  z.object({ kind: z.literal("device-config"), config: jsonObjectSchema }),
]);
export type LifecycleChange = z.infer<typeof lifecycleChangeSchema>;

export const canaryStatusSchema = z.enum(["Pending", "CanaryDeployed", "Measuring", "Promoted", "RolledBack"]);
export type CanaryStatus = z.infer<typeof canaryStatusSchema>;

export const canarySampleSchema = z.object({
  sampledAt: z.string(),
  metrics: z.array(sleEvaluationSchema),
  passed: z.boolean(),
});
export type CanarySample = z.infer<typeof canarySampleSchema>;

export const canaryRolloutSchema = z.object({
  rolloutId: z.string(),
  orgId: z.string(),
  siteId: z.string(),
  vendorSiteId: z.string(),
  status: canaryStatusSchema,
  change: lifecycleChangeSchema,
  canaryDeviceId: z.string(),
  rolloutDeviceIds: z.array(z.string()),
  priorState: lifecycleChangeSchema.nullable(),
  samples: z.array(canarySampleSchema),
  expectedSamples: z.number().int().positive(),
  measurementPassed: z.boolean(),
  breach: z.object({ metric: z.string(), value: z.number().nullable(), threshold: z.number() }).nullable(),
  lastError: recordedErrorSchema.nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type CanaryRollout = z.infer<typeof canaryRolloutSchema>;

// --- Trigger requests ---

export const registerPlanRequestSchema = z.object({
  rootBlock: z.string(),
  zoneCount: z.number().int().positive(),
  roles: z.array(roleSpecSchema).min(1),
});
export type RegisterPlanRequest = z.infer<typeof registerPlanRequestSchema>;

export const createSiteRequestSchema = z.object({
  siteId: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "siteId must be a lowercase slug"),
  name: z.string().min(1),
  address: z.string().nullable().default(null),
  timezone: z.string().default("America/Chicago"),
  countryCode: z.string().length(2).default("US"),
  latlng: latLngSchema.nullable().default(null),
  notes: z.string().nullable().default(null),
  zoneIndex: z.number().int().nonnegative(),
  ordinal: z.number().int().nonnegative(),
  domains: z.array(day1DomainSchema).default(["wan", "wired", "wireless"]),
  variables: z.record(variableValueSchema).default({}),
});
export type CreateSiteRequest = z.infer<typeof createSiteRequestSchema>;

export const deploymentProfileRequestSchema = z.object({
  devices: z.array(profileDeviceSchema).min(1),
});
export type DeploymentProfileRequest = z.infer<typeof deploymentProfileRequestSchema>;

export const registerTemplateRequestSchema = z.object({
  templateId: z.string().uuid().optional(),
  name: z.string().min(1),
  stepId: intentStepIdSchema,
  variables: z.array(z.string()),
  body: jsonObjectSchema,
});
export type RegisterTemplateRequest = z.infer<typeof registerTemplateRequestSchema>;

export const lifecycleRequestSchema = z.object({
  change: lifecycleChangeSchema,
  canaryDeviceId: z.string().optional(),
  deviceType: deviceTypeSchema.optional(),
});
export type LifecycleRequest = z.infer<typeof lifecycleRequestSchema>;

export const rotateVariableRequestSchema = z.object({
  value: variableValueSchema,
});
