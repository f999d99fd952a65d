export class AdapterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AdapterError";
  }
}

/** A required input (config file, branding file, bootstrap key) is missing or malformed. */
export class ConfigurationError extends AdapterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** Homarr or Docker could not be reached, or a request timed out. */
export class ConnectionError extends AdapterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export type ApiFailureKind =
  | "auth"
  | "validation"
  | "conflict"
  | "not-found"
  | "server";

/** Homarr answered, but rejected the call. */
export class ApiError extends AdapterError {
  constructor(
    readonly kind: ApiFailureKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export class StateError extends AdapterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StateError";
  }
}

export class BootstrapError extends AdapterError {
  constructor(message: string) {
    super(message);
    this.name = "BootstrapError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
