export type StateKey = string;

export type VersionedEntry = Readonly<{
  key: StateKey;
  value: unknown;
  version: number;
}>;

/**
 * Outcome of a compare-and-swap. A lost race is not an error:
 * callers receive the entry that won instead.
 */
export type CasResult =
  | Readonly<{ ok: true; entry: VersionedEntry }>
  | Readonly<{ ok: false; current: VersionedEntry | null }>;

/** expectedVersion 0 means "the key must not exist yet". */
export const ABSENT_VERSION = 0;
