export class StateStoreError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "StateStoreError";
    this.code = code;
  }
}

export class StateRecordInvalid extends StateStoreError {
  public readonly key: string;

  constructor(key: string, detail: string) {
    super("STATE_RECORD_INVALID", `State entry "${key}" failed validation: ${detail}`);
    this.name = "StateRecordInvalid";
    this.key = key;
  }
}
