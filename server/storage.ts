import { and, asc, eq, like, sql } from "drizzle-orm";
import { auditEvents, insertAuditEventSchema, stateEntries, type InsertAuditEvent } from "@shared/schema";
import type { AuditEvent, AuditSink } from "../platform/audit";
import { ABSENT_VERSION, type CasResult, type StateKey, type StateStore, type VersionedEntry } from "../platform/state";
import type { Database } from "./db";

function toEntry(row: { key: string; value: unknown; version: number }): VersionedEntry {
  return { key: row.key, value: row.value, version: row.version };
}

function escapeLike(prefix: string): string {
  return prefix.replace(/[\\%_]/g, (c) => `\\${c}`);
}

/** StateStore over the `state_entries` table; CAS is a version-guarded write. */
export class DatabaseStateStore implements StateStore {
  constructor(private readonly db: Database) {}

  async get(key: StateKey): Promise<VersionedEntry | null> {
    const [row] = await this.db.select().from(stateEntries).where(eq(stateEntries.key, key));
    return row ? toEntry(row) : null;
  }

  async compareAndSwap(key: StateKey, expectedVersion: number, value: unknown): Promise<CasResult> {
    const rows =
      expectedVersion === ABSENT_VERSION
        ? await this.db
            .insert(stateEntries)
            .values({ key, value, version: 1 })
            .onConflictDoNothing({ target: stateEntries.key })
            .returning()
        : await this.db
            .update(stateEntries)
            .set({ value, version: expectedVersion + 1, updatedAt: new Date() })
            .where(and(eq(stateEntries.key, key), eq(stateEntries.version, expectedVersion)))
            .returning();

    const [row] = rows;
    if (row) return { ok: true, entry: toEntry(row) };
    return { ok: false, current: await this.get(key) };
  }

  async set(key: StateKey, value: unknown): Promise<VersionedEntry> {
    const [row] = await this.db
      .insert(stateEntries)
      .values({ key, value, version: 1 })
      .onConflictDoUpdate({
        target: stateEntries.key,
        set: { value, version: sql`${stateEntries.version} + 1`, updatedAt: new Date() },
      })
      .returning();
    return toEntry(row);
  }

  async list(prefix: string): Promise<VersionedEntry[]> {
    const rows = await this.db
      .select()
      .from(stateEntries)
      .where(like(stateEntries.key, `${escapeLike(prefix)}%`))
      .orderBy(asc(stateEntries.key));
    return rows.map(toEntry);
  }

  async delete(key: StateKey): Promise<void> {
    await this.db.delete(stateEntries).where(eq(stateEntries.key, key));
  }
}

export class DatabaseAuditSink implements AuditSink {
  constructor(private readonly db: Database) {}

  async emit(event: AuditEvent): Promise<void> {
    const row: InsertAuditEvent = {
      eventId: event.eventId,
      orgId: event.orgId,
      siteId: event.siteId,
      eventType: event.eventType,
      entityId: event.entityId,
      metadata: event.metadata ?? null,
      occurredAt: event.timestamp,
    };
    const parsed = insertAuditEventSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Invalid audit event ${event.eventId}: ${parsed.error.message}`);
    }
    await this.db.insert(auditEvents).values(row).onConflictDoNothing({ target: auditEvents.eventId });
  }
}
