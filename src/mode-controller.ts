import { modeSchema, type PortalAction } from "./contracts.js";
import { InvalidInputError, ModeVerificationError } from "./errors.js";
import type { Logger } from "./logger.js";
import { classifyPortalError, type RetryClassifier, type RetryPolicy } from "./retry.js";
import type { SessionManager } from "./session-manager.js";
import { readStatusWithRetry, type StatusReader } from "./status-reader.js";
import { MODES, UNKNOWN, type HeatingStatus, type Mode, type ObservedMode } from "./types.js";

export interface ModeControllerOptions {
  session: SessionManager;
  reader: StatusReader;
  retry: RetryPolicy;
  logger: Logger;
}

export const MODE_OPTION_SELECTORS: Readonly<Record<Mode, string>> = {
  heat: "mode_menu.option_heat",
  aux_heat: "mode_menu.option_aux",
  cool: "mode_menu.option_cool",
  auto: "mode_menu.option_auto",
  off: "mode_menu.option_off"
};

/** Apply and verify runs at most twice: the first try and one re-check. */
const VERIFY_ATTEMPTS = 2;

export function parseMode(raw: string): Mode {
  const parsed = modeSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    throw new InvalidInputError(`Unsupported mode '${raw}'. Expected one of: ${MODES.join(", ")}`);
  }
  return parsed.data;
}

/** open menu, pick the option, then save when the portal asks for it. */
export function transitionSequence(target: Mode): PortalAction[] {
  return [
    { type: "click", selector: "mode_menu.open" },
    { type: "click", selector: MODE_OPTION_SELECTORS[target] },
    { type: "click", selector: "mode_menu.confirm", optional: true }
  ];
}

const retryVerificationOnly: RetryClassifier = (error) =>
  error instanceof ModeVerificationError ? "retryable" : "fatal";

/**
 * Drives a thermostat from whatever mode the portal shows to the requested
 * one. The portal is the only source of truth: every decision starts from a
 * fresh read.
 */
export class ModeController {
  private readonly observed = new Map<string, ObservedMode>();
  private readonly logger: Logger;

  constructor(private readonly options: ModeControllerOptions) {
    this.logger = options.logger.child({ component: "mode" });
  }

  /** Last mode seen on the portal. Informational only. */
  lastObserved(device: string): ObservedMode {
    return this.observed.get(device) ?? UNKNOWN;
  }

  async setMode(device: string, requested: string): Promise<HeatingStatus> {
    const target = parseMode(requested);
    return this.options.session.runForDevice(device, () => this.converge(device, target));
  }

  private async converge(device: string, target: Mode): Promise<HeatingStatus> {
    const verifyPolicy = this.options.retry.withOverrides({ maxAttempts: VERIFY_ATTEMPTS });

    return verifyPolicy.execute(
      async ({ attempt }) => {
        const before = await this.read(device);

        if (before.mode === target) {
          if (attempt > 1) {
            return before;
          }
          this.logger.info({ device, mode: target }, "thermostat already in requested mode");
          return this.verify(device, target, await this.read(device));
        }

        this.logger.info({ device, from: before.mode, to: target, attempt }, "changing mode");
        await this.options.retry.execute(
          () => this.options.session.navigation.run(transitionSequence(target)),
          classifyPortalError,
          { operation: `mode.apply:${device}` }
        );

        const after = this.verify(device, target, await this.read(device));
        this.logger.info({ device, from: before.mode, to: target }, "mode changed");
        return after;
      },
      retryVerificationOnly,
      { operation: `mode.set:${device}` }
    );
  }

  private verify(device: string, target: Mode, status: HeatingStatus): HeatingStatus {
    if (status.mode !== target) {
      throw new ModeVerificationError(
        `Thermostat '${device}' reports mode '${status.mode}' after requesting '${target}'`,
        status,
        { operation: `mode.verify:${device}` }
      );
    }
    return status;
  }

  private async read(device: string): Promise<HeatingStatus> {
    const status = await readStatusWithRetry(this.options.reader, this.options.retry, device);
    this.observed.set(device, status.mode);
    return status;
  }
}
