/** Raised by a store that cannot serve a request. */
export class LogStoreError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'LogStoreError';
  }
}

/** Raised by EventLogger.query when the backing store fails. */
export class StorageUnavailableError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StorageUnavailableError';
  }
}
