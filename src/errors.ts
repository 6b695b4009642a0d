/**
 * Error kinds surfaced by a sync run.
 *
 * Everything except `apply-item` is fatal: it propagates to the CLI, which logs
 * a single line and exits non-zero. `apply-item` failures are recorded per
 * subscription and the run carries on.
 */
export type SyncErrorKind =
  | "configuration"
  | "authentication"
  | "source-fetch"
  | "aggregator"
  | "apply-item";

export class SyncError extends Error {
  readonly kind: SyncErrorKind;

  constructor(kind: SyncErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SyncError";
    this.kind = kind;
  }
}

/** Unknown provider, invalid apply mode, unreadable or incomplete credentials. */
export class ConfigurationError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super("configuration", message, options);
    this.name = "ConfigurationError";
  }
}

export class AuthenticationError extends SyncError {
  readonly service: string;

  constructor(service: string, message: string, options?: ErrorOptions) {
    super("authentication", `${service}: authentication failed: ${message}`, options);
    this.name = "AuthenticationError";
    this.service = service;
  }
}

export class SourceFetchError extends SyncError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: ErrorOptions) {
    super("source-fetch", `${provider}: listing subscriptions failed: ${message}`, options);
    this.name = "SourceFetchError";
    this.provider = provider;
  }
}

export class AggregatorError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super("aggregator", `aggregator: ${message}`, options);
    this.name = "AggregatorError";
  }
}

export type ApplyAction = "add" | "remove";

export class ApplyItemError extends SyncError {
  readonly action: ApplyAction;
  readonly identifier: string;

  constructor(action: ApplyAction, identifier: string, message: string, options?: ErrorOptions) {
    super("apply-item", `${action} ${identifier} failed: ${message}`, options);
    this.name = "ApplyItemError";
    this.action = action;
    this.identifier = identifier;
  }
}

/**
 * Non-2xx response from a remote API.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
