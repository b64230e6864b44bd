import { StatusParseError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { NavigationEngine } from "./navigation.js";
import { classifyPortalError, type RetryPolicy } from "./retry.js";
import { UNKNOWN, type BrowserSettings, type HeatingStatus, type Mode, type ObservedMode, type StatusField, type Unknown } from "./types.js";

export interface StatusReaderOptions {
  navigation: NavigationEngine;
  browser: BrowserSettings;
  logger: Logger;
  now?: () => number;
}

const MODE_ALIASES = new Map<string, Mode>([
  ["heat", "heat"],
  ["heatonly", "heat"],
  ["auxheat", "aux_heat"],
  ["aux", "aux_heat"],
  ["auxheatonly", "aux_heat"],
  ["emergencyheat", "aux_heat"],
  ["emergency", "aux_heat"],
  ["cool", "cool"],
  ["coolonly", "cool"],
  ["auto", "auto"],
  ["off", "off"]
]);

const TRUE_FLAGS = new Set(["true", "on", "heating", "active", "1"]);
const FALSE_FLAGS = new Set(["false", "off", "idle", "inactive", "0"]);
const HEATING_MODES = new Set<ObservedMode>(["heat", "aux_heat", "auto"]);

/** Strips degree signs and unit letters: "71.5°F" -> 71.5. */
export function parseTemperature(raw: string | undefined): number | Unknown {
  if (raw === undefined) {
    return UNKNOWN;
  }
  const cleaned = raw.replace(/°/g, "").replace(/\s*[FfCc]\s*$/, "").trim();
  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) {
    return UNKNOWN;
  }
  return Number(cleaned);
}

export function normalizeMode(raw: string | undefined): ObservedMode {
  if (raw === undefined) {
    return UNKNOWN;
  }
  const key = raw.toLowerCase().replace(/[^a-z]/g, "");
  return MODE_ALIASES.get(key) ?? UNKNOWN;
}

export function parseHeatingFlag(raw: string | undefined): boolean | Unknown {
  if (raw === undefined) {
    return UNKNOWN;
  }
  const key = raw.trim().toLowerCase();
  if (TRUE_FLAGS.has(key)) {
    return true;
  }
  if (FALSE_FLAGS.has(key)) {
    return false;
  }
  return UNKNOWN;
}

/** Fallback when the portal shows no heating indicator. */
export function deriveHeating(
  currentTemp: number | Unknown,
  targetTemp: number | Unknown,
  mode: ObservedMode
): boolean | Unknown {
  if (currentTemp === UNKNOWN || targetTemp === UNKNOWN) {
    return UNKNOWN;
  }
  return currentTemp < targetTemp && HEATING_MODES.has(mode);
}

/**
 * Reads the selected thermostat's status panel. Every field is read on its
 * own; an unreadable field degrades to "unknown" instead of failing the call.
 */
export class StatusReader {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: StatusReaderOptions) {
    this.logger = options.logger.child({ component: "status" });
    this.now = options.now ?? Date.now;
  }

  async read(device: string): Promise<HeatingStatus> {
    const { navigation, browser } = this.options;
    await navigation.waitFor("status.panel");

    const timeout = browser.statusFieldTimeoutMs;
    const currentRaw = await navigation.readOptional("status.current_temp", timeout);
    const targetRaw = await navigation.readOptional("status.target_temp", timeout);
    const modeRaw = await navigation.readOptional("status.mode", timeout);
    const heatingRaw = await navigation.readOptional("status.heating_indicator", timeout);

    const currentTemp = parseTemperature(currentRaw);
    const targetTemp = parseTemperature(targetRaw);
    const mode = normalizeMode(modeRaw);
    const indicated = parseHeatingFlag(heatingRaw);
    const isHeating = indicated === UNKNOWN ? deriveHeating(currentTemp, targetTemp, mode) : indicated;

    const degradedFields: StatusField[] = [];
    if (currentTemp === UNKNOWN) degradedFields.push("currentTemp");
    if (targetTemp === UNKNOWN) degradedFields.push("targetTemp");
    if (mode === UNKNOWN) degradedFields.push("mode");
    if (isHeating === UNKNOWN) degradedFields.push("isHeating");

    const status: HeatingStatus = {
      device,
      currentTemp,
      targetTemp,
      mode,
      isHeating,
      degradedFields,
      readAt: new Date(this.now()).toISOString()
    };

    if (degradedFields.length === 4) {
      throw new StatusParseError(`No status field could be read for '${device}'`, status, {
        operation: "status.read"
      });
    }
    if (degradedFields.length > 0) {
      this.logger.warn({ device, degradedFields, raw: { currentRaw, targetRaw, modeRaw, heatingRaw } }, "status read degraded");
    } else {
      this.logger.debug({ device, mode, currentTemp, targetTemp }, "status read");
    }
    return status;
  }
}

export function readStatusWithRetry(reader: StatusReader, retry: RetryPolicy, device: string): Promise<HeatingStatus> {
  return retry.execute(() => reader.read(device), classifyPortalError, { operation: `status.read:${device}` });
}
