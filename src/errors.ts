import type { HeatingStatus } from "./types.js";

export type PortalErrorKind =
  | "authentication"
  | "configuration"
  | "invalid_input"
  | "element_not_found"
  | "navigation_timeout"
  | "session_expired"
  | "device_selection"
  | "status_parse"
  | "mode_verification"
  | "temperature_verification"
  | "retry_exhausted";

export interface PortalErrorOptions {
  operation?: string;
  cause?: unknown;
}

/**
 * Base of the agent's error taxonomy.
 *
 * `kind` is the machine-readable discriminant callers branch on. RetryPolicy
 * fills in `attempts`, `artifactId` and `terminal` once it stops retrying.
 */
export class PortalAutomationError extends Error {
  readonly kind: PortalErrorKind;
  readonly retryable: boolean;
  operation?: string;
  attempts?: number;
  artifactId?: string;
  terminal = false;

  constructor(kind: PortalErrorKind, message: string, retryable: boolean, options: PortalErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "PortalAutomationError";
    this.kind = kind;
    this.retryable = retryable;
    this.operation = options.operation;
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      operation: this.operation,
      attempts: this.attempts,
      artifactId: this.artifactId
    };
  }
}

export class AuthenticationError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("authentication", message, false, options);
    this.name = "AuthenticationError";
  }
}

export class ConfigurationError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("configuration", message, false, options);
    this.name = "ConfigurationError";
  }
}

export class InvalidInputError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("invalid_input", message, false, options);
    this.name = "InvalidInputError";
  }
}

export class ElementNotFoundError extends PortalAutomationError {
  readonly selector: string;

  constructor(selector: string, message: string, options?: PortalErrorOptions) {
    super("element_not_found", message, true, options);
    this.name = "ElementNotFoundError";
    this.selector = selector;
  }
}

export class NavigationTimeoutError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("navigation_timeout", message, true, options);
    this.name = "NavigationTimeoutError";
  }
}

export class SessionExpiredError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("session_expired", message, false, options);
    this.name = "SessionExpiredError";
  }
}

export class DeviceSelectionError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("device_selection", message, true, options);
    this.name = "DeviceSelectionError";
  }
}

export class StatusParseError extends PortalAutomationError {
  readonly partial: HeatingStatus;

  constructor(message: string, partial: HeatingStatus, options?: PortalErrorOptions) {
    super("status_parse", message, true, options);
    this.name = "StatusParseError";
    this.partial = partial;
  }
}

export class ModeVerificationError extends PortalAutomationError {
  readonly observed: HeatingStatus;

  constructor(message: string, observed: HeatingStatus, options?: PortalErrorOptions) {
    super("mode_verification", message, true, options);
    this.name = "ModeVerificationError";
    this.observed = observed;
  }
}

export class TemperatureVerificationError extends PortalAutomationError {
  readonly observed: HeatingStatus;

  constructor(message: string, observed: HeatingStatus, options?: PortalErrorOptions) {
    super("temperature_verification", message, true, options);
    this.name = "TemperatureVerificationError";
    this.observed = observed;
  }
}

export class RetryExhaustedError extends PortalAutomationError {
  constructor(message: string, options?: PortalErrorOptions) {
    super("retry_exhausted", message, false, options);
    this.name = "RetryExhaustedError";
  }
}

export function isPortalError(error: unknown): error is PortalAutomationError {
  return error instanceof PortalAutomationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
