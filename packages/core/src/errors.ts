export enum CredscopeErrorCode {
  CONFIG = "CONFIG",
  FETCH = "FETCH",
  IO = "IO",
}

/** Base class for every error the pipeline treats as fatal. */
export class CredscopeError extends Error {
  constructor(
    message: string,
    public readonly code: CredscopeErrorCode,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "CredscopeError";
  }
}

/** A required setting (the API key) is missing or unusable. */
export class ConfigError extends CredscopeError {
  constructor(message: string) {
    super(message, CredscopeErrorCode.CONFIG);
    this.name = "ConfigError";
  }
}

/** Network, auth or response-shape failure while talking to the provider. */
export class FetchError extends CredscopeError {
  constructor(
    message: string,
    public readonly status?: number,
    originalError?: unknown,
  ) {
    super(message, CredscopeErrorCode.FETCH, originalError);
    this.name = "FetchError";
  }
}

/** The report could not be written to `path`. */
export class IOError extends CredscopeError {
  constructor(
    message: string,
    public readonly path: string,
    originalError?: unknown,
  ) {
    super(message, CredscopeErrorCode.IO, originalError);
    this.name = "IOError";
  }
}

export function isCredscopeError(err: unknown): err is CredscopeError {
  return err instanceof CredscopeError;
}
