import { randomUUID } from "crypto";
import type { AuditEventType } from "./AuditEvent";
import type { AuditSink } from "./AuditSink";

/**
 * Emit an audit event. Events describe state already persisted in the
 * StateStore; a sink failure is logged and does not reach the caller.
 */
export async function recordAudit(
  sink: AuditSink,
  event: {
    orgId: string;
    siteId: string | null;
    eventType: AuditEventType;
    entityId: string;
    metadata?: Record<string, unknown>;
  },
): Promise<void> {
  try {
    await sink.emit({
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      ...event,
    });
  } catch (err) {
    console.error(
      `[audit] Failed to emit ${event.eventType} for ${event.entityId}: ${err instanceof Error ? err.message : err}`,
    );
  }
}
