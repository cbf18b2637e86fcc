export class HooklogError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HooklogError';
  }
}

/** The key-value backend could not serve a request. Maps to HTTP 503. */
export class StoreUnavailableError extends HooklogError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super(`Store unavailable during ${operation}`, 'STORE_UNAVAILABLE', { cause });
    this.name = 'StoreUnavailableError';
  }
}

/** A persisted value is not a StoredRecord. */
export class RecordDecodeError extends HooklogError {
  constructor(key: string, cause: unknown) {
    super(`Stored value under '${key}' is not a valid record`, 'RECORD_DECODE_FAILED', { cause });
    this.name = 'RecordDecodeError';
  }
}

export class ConfigError extends HooklogError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}
