/**
 * Error hierarchy for configuration, request building and dispatch.
 *
 * Every error carries a stable `code` and optional structured context,
 * so callers can branch on `code` and log `context` without parsing messages.
 */

export type ErrorContext = Record<string, unknown>;

export abstract class NotifierError extends Error {
  public readonly code: string;
  public readonly context?: ErrorContext;

  constructor(message: string, code: string, context?: ErrorContext) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Invalid or missing configuration: unknown default key, no target at all. */
export class ConfigurationError extends NotifierError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

/** Mutually exclusive inputs, or a file that already exists. */
export class ConflictError extends NotifierError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'CONFLICT', context);
  }
}

export class NotFoundError extends NotifierError {
  constructor(resource: string, context?: ErrorContext) {
    super(`${resource} not found`, 'NOT_FOUND', context);
  }
}

/** A single HTTP call failed or the gateway answered with a non-2xx status. */
export class TransportError extends NotifierError {
  public readonly status?: number;

  constructor(message: string, status?: number, context?: ErrorContext) {
    super(message, 'TRANSPORT_ERROR', { ...context, status });
    this.status = status;
  }
}

export interface DispatchFailure {
  readonly destination: string;
  readonly url: string;
  readonly error: unknown;
}

/**
 * Raised after a fan-out in which at least one request failed.
 * Every request was still attempted; `destinations` lists all of them in order.
 */
export class DispatchError extends NotifierError {
  public readonly destinations: readonly string[];
  public readonly failures: readonly DispatchFailure[];

  constructor(destinations: readonly string[], failures: readonly DispatchFailure[]) {
    super(
      `${failures.length} of ${destinations.length} notification request(s) failed`,
      'DISPATCH_ERROR',
      { failed: failures.map((f) => f.destination) },
    );
    this.destinations = destinations;
    this.failures = failures;
  }
}
