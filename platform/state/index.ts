export type { StateStore } from "./StateStore";
export type { CasResult, StateKey, VersionedEntry } from "./types";
export { ABSENT_VERSION } from "./types";
export { InMemoryStateStore } from "./InMemoryStateStore";
export { stateKeys } from "./keys";
export { StateStoreError, StateRecordInvalid } from "./errors";
export { readRecord, listRecords, parseEntry, mutateRecord } from "./records";
export type { VersionedRecord } from "./records";
