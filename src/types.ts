export const MODES = ["heat", "aux_heat", "cool", "auto", "off"] as const;

export type Mode = (typeof MODES)[number];

export const UNKNOWN = "unknown";

export type Unknown = typeof UNKNOWN;

/** State machine states: a requested mode, or `unknown` before the first read. */
export type ObservedMode = Mode | Unknown;

export type StatusField = "currentTemp" | "targetTemp" | "mode" | "isHeating";

export interface HeatingStatus {
  device: string;
  currentTemp: number | Unknown;
  targetTemp: number | Unknown;
  mode: ObservedMode;
  isHeating: boolean | Unknown;
  /** Fields that fell back to `unknown`; empty when the read was complete. */
  degradedFields: StatusField[];
  readAt: string;
}

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export type LocatorStrategy = "css" | "xpath" | "text" | "testId";

export interface LocatorDescriptor {
  strategy: LocatorStrategy;
  value: string;
  /** Read this attribute instead of the element text. */
  attribute?: string;
}

/** A descriptor after `{param}` placeholders were filled in. */
export interface ResolvedLocator extends LocatorDescriptor {
  name: string;
}

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  backoffMultiplier: number;
}

export interface RetryContext extends RetrySettings {
  operation: string;
  attempt: number;
  elapsedMs: number;
}

export interface BrowserSettings {
  headless: boolean;
  actionTimeoutMs: number;
  navigationTimeoutMs: number;
  statusFieldTimeoutMs: number;
  viewportWidth: number;
  viewportHeight: number;
  userAgent: string;
}

export interface DiagnosticsSettings {
  enabled: boolean;
  dir: string;
  maxArtifacts: number;
  maxAgeMs: number;
}

export interface PortalUrls {
  loginUrl: string;
  homeUrl: string;
}

export interface ServerSettings {
  host: string;
  port: number;
}

export interface DiagnosticArtifact {
  id: string;
  createdAt: string;
  operation: string;
  attempt: number;
  errorSummary: string;
  url?: string;
  snapshotPath?: string;
  capturePath?: string;
}

export interface DiagnosticContext {
  operation: string;
  attempt: number;
  error: unknown;
}

export interface SessionState {
  id: string;
  authenticated: boolean;
  createdAt: string;
  lastActivityAt: string;
  selectedDevice?: string;
}

export type WaitState = "attached" | "visible" | "hidden" | "detached";

export interface ActionLogEntry {
  type: string;
  selector?: string;
  status: "ok" | "skipped" | "failed";
  durationMs: number;
}
