import type { StateStore } from "./StateStore";
import { ABSENT_VERSION, type CasResult, type StateKey, type VersionedEntry } from "./types";

export class InMemoryStateStore implements StateStore {
  private readonly entries = new Map<StateKey, VersionedEntry>();

  async get(key: StateKey): Promise<VersionedEntry | null> {
    const entry = this.entries.get(key);
    return entry ? this.copy(entry) : null;
  }

  async compareAndSwap(key: StateKey, expectedVersion: number, value: unknown): Promise<CasResult> {
    const existing = this.entries.get(key);
    const currentVersion = existing?.version ?? ABSENT_VERSION;

    if (currentVersion !== expectedVersion) {
      return { ok: false, current: existing ? this.copy(existing) : null };
    }

    const entry = this.write(key, currentVersion + 1, value);
    return { ok: true, entry };
  }

  async set(key: StateKey, value: unknown): Promise<VersionedEntry> {
    const existing = this.entries.get(key);
    return this.write(key, (existing?.version ?? ABSENT_VERSION) + 1, value);
  }

  async list(prefix: string): Promise<VersionedEntry[]> {
    return Array.from(this.entries.values())
      .filter((e) => e.key.startsWith(prefix))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
      .map((e) => this.copy(e));
  }

  async delete(key: StateKey): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private write(key: StateKey, version: number, value: unknown): VersionedEntry {
    const entry = { key, version, value: structuredClone(value) };
    this.entries.set(key, entry);
    return this.copy(entry);
  }

  private copy(entry: VersionedEntry): VersionedEntry {
    return { key: entry.key, version: entry.version, value: structuredClone(entry.value) };
  }
}
