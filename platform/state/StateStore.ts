import type { CasResult, StateKey, VersionedEntry } from "./types";

/**
 * StateStore is the only shared mutable resource of the provisioning engine.
 *
 * Rules:
 * - Values are opaque JSON documents; callers validate on read
 * - Every write bumps the entry version by one
 * - compareAndSwap is the only conditional write
 * - No transactions spanning several keys
 */
export interface StateStore {
  get(key: StateKey): Promise<VersionedEntry | null>;

  compareAndSwap(key: StateKey, expectedVersion: number, value: unknown): Promise<CasResult>;

  /** Unconditional write, used for first-write and last-writer-wins cases. */
  set(key: StateKey, value: unknown): Promise<VersionedEntry>;

  /** Entries whose key starts with prefix, ordered by key. */
  list(prefix: string): Promise<VersionedEntry[]>;

  delete(key: StateKey): Promise<void>;
}
