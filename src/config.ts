import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { configSchema, formatIssues, type ParsedConfig } from "./contracts.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { SelectorMap } from "./selectors.js";
import type {
  BrowserSettings,
  Credentials,
  DiagnosticsSettings,
  PortalUrls,
  RetrySettings,
  ServerSettings
} from "./types.js";

export interface AgentConfig {
  readonly portal: Readonly<PortalUrls>;
  readonly credentials: Credentials;
  readonly thermostats: Readonly<Record<string, string>>;
  readonly selectors: SelectorMap;
  readonly retry: Readonly<RetrySettings>;
  readonly browser: Readonly<BrowserSettings>;
  readonly diagnostics: Readonly<DiagnosticsSettings>;
  readonly server: Readonly<ServerSettings>;
  readonly logLevel: ParsedConfig["logLevel"];
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ConfigOverrides = DeepPartial<ParsedConfig>;

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/** Merged in order; later files win. `local.json` is meant to stay out of version control. */
export const CONFIG_FILES = ["default.json", "config.json", "local.json"] as const;

const DEFAULTS: ConfigOverrides = {
  portal: {
    loginUrl: "https://www.ecobee.com/consumerportal/index.html",
    homeUrl: "https://www.ecobee.com/consumerportal/index.html#/devices"
  },
  credentials: {
    username: "",
    password: ""
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    backoffMultiplier: 2
  },
  browser: {
    headless: true,
    actionTimeoutMs: 10_000,
    navigationTimeoutMs: 30_000,
    statusFieldTimeoutMs: 2_000,
    viewportWidth: 1920,
    viewportHeight: 1080,
    // Headless Chromium otherwise announces itself as HeadlessChrome.
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36"
  },
  diagnostics: {
    enabled: true,
    dir: ".ecobee-agent/diagnostics",
    maxArtifacts: 20,
    maxAgeMs: 7 * 24 * 60 * 60 * 1000
  },
  server: {
    host: "0.0.0.0",
    port: 5000
  },
  logLevel: "info"
};

type EnvValueType = "string" | "number" | "boolean";

const ENV_MAPPINGS: ReadonlyArray<{ variable: string; path: string[]; type: EnvValueType }> = [
  { variable: "ECOBEE_USERNAME", path: ["credentials", "username"], type: "string" },
  { variable: "ECOBEE_PASSWORD", path: ["credentials", "password"], type: "string" },
  { variable: "ECOBEE_LOGIN_URL", path: ["portal", "loginUrl"], type: "string" },
  { variable: "ECOBEE_HOME_URL", path: ["portal", "homeUrl"], type: "string" },
  { variable: "ECOBEE_HEADLESS", path: ["browser", "headless"], type: "boolean" },
  { variable: "ECOBEE_USER_AGENT", path: ["browser", "userAgent"], type: "string" },
  { variable: "ECOBEE_ACTION_TIMEOUT_MS", path: ["browser", "actionTimeoutMs"], type: "number" },
  { variable: "ECOBEE_NAVIGATION_TIMEOUT_MS", path: ["browser", "navigationTimeoutMs"], type: "number" },
  { variable: "ECOBEE_MAX_RETRY_ATTEMPTS", path: ["retry", "maxAttempts"], type: "number" },
  { variable: "ECOBEE_RETRY_BASE_DELAY_MS", path: ["retry", "baseDelayMs"], type: "number" },
  { variable: "ECOBEE_RETRY_BACKOFF_MULTIPLIER", path: ["retry", "backoffMultiplier"], type: "number" },
  { variable: "ECOBEE_DIAGNOSTICS", path: ["diagnostics", "enabled"], type: "boolean" },
  { variable: "ECOBEE_DIAGNOSTICS_DIR", path: ["diagnostics", "dir"], type: "string" },
  { variable: "ECOBEE_DIAGNOSTICS_MAX_ARTIFACTS", path: ["diagnostics", "maxArtifacts"], type: "number" },
  { variable: "ECOBEE_API_HOST", path: ["server", "host"], type: "string" },
  { variable: "ECOBEE_API_PORT", path: ["server", "port"], type: "number" },
  { variable: "ECOBEE_LOG_LEVEL", path: ["logLevel"], type: "string" }
];

/**
 * Resolve configuration: built-in defaults, then the JSON files in
 * `configDir`, then `ECOBEE_*` environment variables, then explicit overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): AgentConfig {
  const configDir = resolve(options.configDir ?? options.env?.ECOBEE_CONFIG_DIR ?? process.env.ECOBEE_CONFIG_DIR ?? "config");
  let merged: Record<string, unknown> = deepMerge({}, DEFAULTS);

  for (const fileName of CONFIG_FILES) {
    const filePath = join(configDir, fileName);
    if (!existsSync(filePath)) {
      continue;
    }
    merged = deepMerge(merged, readConfigFile(filePath));
  }

  merged = deepMerge(merged, envOverrides(options.env ?? process.env));
  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return buildConfig(merged);
}

/**
 * Copy `KEY=value` lines of a dotenv file into `process.env`. Variables that
 * are already set keep their value. Returns false when there is no file.
 */
export function loadDotEnv(filePath = ".env"): boolean {
  if (!existsSync(filePath)) {
    return false;
  }
  try {
    process.loadEnvFile(filePath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read env file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  return true;
}

/** Validate an already merged configuration object and freeze it. */
export function buildConfig(raw: unknown): AgentConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  return Object.freeze({
    portal: Object.freeze({ ...data.portal }),
    credentials: Object.freeze({ ...data.credentials }),
    thermostats: Object.freeze({ ...data.thermostats }),
    selectors: SelectorMap.from(data.selectors),
    retry: Object.freeze({ ...data.retry }),
    browser: Object.freeze({ ...data.browser }),
    diagnostics: Object.freeze({ ...data.diagnostics }),
    server: Object.freeze({ ...data.server }),
    logLevel: data.logLevel
  });
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const mapping of ENV_MAPPINGS) {
    const raw = env[mapping.variable];
    if (raw === undefined || raw === "") {
      continue;
    }
    setPath(result, mapping.path, convertEnvValue(raw, mapping.type));
  }
  return result;
}

function convertEnvValue(raw: string, type: EnvValueType): unknown {
  if (type === "boolean") {
    return parseBooleanFlag(raw) ?? raw;
  }

  if (type === "number") {
    const value = Number(raw);
    return Number.isFinite(value) ? value : raw;
  }

  return raw;
}

/** "true/yes/1/on" and "false/no/0/off", any case; anything else is undefined. */
export function parseBooleanFlag(raw: string): boolean | undefined {
  const lowered = raw.trim().toLowerCase();
  if (["true", "yes", "1", "on"].includes(lowered)) {
    return true;
  }
  if (["false", "no", "0", "off"].includes(lowered)) {
    return false;
  }
  return undefined;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
  let current = target;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
      continue;
    }
    const created: Record<string, unknown> = {};
    current[key] = created;
    current = created;
  }
  const last = path[path.length - 1];
  if (last !== undefined) {
    current[last] = value;
  }
}

export function deepMerge(base: Record<string, unknown>, override: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  const entries: Array<[string, unknown]> = Object.entries(override);
  for (const [key, value] of entries) {
    if (value === undefined) {
      continue;
    }
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
