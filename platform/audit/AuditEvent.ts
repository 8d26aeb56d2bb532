export type AuditEventType =
  | "ALLOCATION_PERSISTED"
  | "STEP_TRANSITIONED"
  | "WORKFLOW_STARTED"
  | "WORKFLOW_FINISHED"
  | "WORKFLOW_CANCELLED"
  | "VARIABLE_BOUND"
  | "VARIABLE_ROTATED"
  | "ASSURANCE_EVALUATED"
  | "CANARY_TRANSITIONED";

export type AuditEvent = Readonly<{
  eventId: string;
  orgId: string;
  siteId: string | null;
  eventType: AuditEventType;
  entityId: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}>;
