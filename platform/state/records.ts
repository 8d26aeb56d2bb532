import type { z } from "zod";
import type { StateStore } from "./StateStore";
import { StateRecordInvalid, StateStoreError } from "./errors";
import { ABSENT_VERSION, type VersionedEntry } from "./types";

export type VersionedRecord<T> = Readonly<{ record: T; version: number }>;

export function parseEntry<S extends z.ZodTypeAny>(entry: VersionedEntry, schema: S): VersionedRecord<z.output<S>> {
  const parsed = schema.safeParse(entry.value);
  if (!parsed.success) {
    throw new StateRecordInvalid(entry.key, parsed.error.message);
  }
  return { record: parsed.data, version: entry.version };
}

/**
 * Read a typed document. Entries that do not match the schema are treated
 * as corruption and raise rather than being coerced.
 */
export async function readRecord<S extends z.ZodTypeAny>(
  store: StateStore,
  key: string,
  schema: S,
): Promise<VersionedRecord<z.output<S>> | null> {
  const entry = await store.get(key);
  return entry ? parseEntry(entry, schema) : null;
}

export async function listRecords<S extends z.ZodTypeAny>(
  store: StateStore,
  prefix: string,
  schema: S,
): Promise<VersionedRecord<z.output<S>>[]> {
  const entries = await store.list(prefix);
  return entries.map((e) => parseEntry(e, schema));
}

const MAX_MUTATION_ATTEMPTS = 5;

/**
 * Read-modify-write a document under compare-and-swap. `mutate` sees the
 * current record (null when absent) and returns the replacement, or null to
 * leave the entry untouched. A lost race re-reads and re-applies `mutate`.
 */
export async function mutateRecord<S extends z.ZodTypeAny>(
  store: StateStore,
  key: string,
  schema: S,
  mutate: (current: z.output<S> | null) => z.output<S> | null,
): Promise<VersionedRecord<z.output<S>> | null> {
  for (let attempt = 1; attempt <= MAX_MUTATION_ATTEMPTS; attempt++) {
    const current = await readRecord(store, key, schema);
    const next = mutate(current ? current.record : null);
    if (next === null) return current;

    const result = await store.compareAndSwap(key, current ? current.version : ABSENT_VERSION, next);
    if (result.ok) {
      return { record: next, version: result.entry.version };
    }
  }
  throw new StateStoreError("STATE_CONTENTION", `Gave up updating "${key}" after ${MAX_MUTATION_ATTEMPTS} lost races`);
}
