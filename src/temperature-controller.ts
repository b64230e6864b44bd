import { temperatureSchema, type PortalAction } from "./contracts.js";
import { InvalidInputError, StatusParseError, TemperatureVerificationError } from "./errors.js";
import type { Logger } from "./logger.js";
import { classifyPortalError, type RetryClassifier, type RetryPolicy } from "./retry.js";
import type { SessionManager } from "./session-manager.js";
import { readStatusWithRetry, type StatusReader } from "./status-reader.js";
import { UNKNOWN, type HeatingStatus } from "./types.js";

export interface TemperatureControllerOptions {
  session: SessionManager;
  reader: StatusReader;
  retry: RetryPolicy;
  logger: Logger;
}

/** Differences below this are treated as already at target. */
export const TEMPERATURE_TOLERANCE = 0.5;

export function parseTargetTemperature(raw: number | string): number {
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  const parsed = temperatureSchema.safeParse(value);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new InvalidInputError(`Invalid target temperature '${String(raw)}': ${reason}`);
  }
  return parsed.data;
}

/** The portal's up/down controls move the target one whole degree per click. */
export function reachableTarget(requested: number): number {
  return Math.round(requested);
}

/** One click per degree, then save when the portal asks for it. */
export function stepSequence(current: number, target: number): PortalAction[] {
  const steps = Math.round(Math.abs(target - current));
  const selector = target > current ? "temperature.up" : "temperature.down";
  const sequence: PortalAction[] = Array.from({ length: steps }, () => ({ type: "click" as const, selector }));
  sequence.push({ type: "click", selector: "temperature.confirm", optional: true });
  return sequence;
}

const retryVerificationOnly: RetryClassifier = (error) =>
  error instanceof TemperatureVerificationError ? "retryable" : "fatal";

export class TemperatureController {
  private readonly logger: Logger;

  constructor(private readonly options: TemperatureControllerOptions) {
    this.logger = options.logger.child({ component: "temperature" });
  }

  async setTargetTemperature(device: string, requested: number | string): Promise<HeatingStatus> {
    const parsed = parseTargetTemperature(requested);
    const target = reachableTarget(parsed);
    if (target !== parsed) {
      this.logger.info({ device, requested: parsed, target }, "rounded target temperature to a whole degree");
    }
    return this.options.session.runForDevice(device, () => this.converge(device, target));
  }

  private async converge(device: string, target: number): Promise<HeatingStatus> {
    const verifyPolicy = this.options.retry.withOverrides({ maxAttempts: 2 });

    return verifyPolicy.execute(
      async () => {
        const before = await this.read(device);
        const current = this.knownTarget(device, before);
        if (Math.abs(current - target) < TEMPERATURE_TOLERANCE) {
          this.logger.info({ device, target }, "target temperature already set");
          return before;
        }

        this.logger.info({ device, from: current, to: target }, "changing target temperature");
        await this.options.retry.execute(
          () => this.options.session.navigation.run(stepSequence(current, target)),
          classifyPortalError,
          { operation: `temperature.apply:${device}` }
        );

        const after = await this.read(device);
        if (after.targetTemp === UNKNOWN || Math.abs(after.targetTemp - target) >= TEMPERATURE_TOLERANCE) {
          throw new TemperatureVerificationError(
            `Thermostat '${device}' reports target ${after.targetTemp} after requesting ${target}`,
            after,
            { operation: `temperature.verify:${device}` }
          );
        }
        return after;
      },
      retryVerificationOnly,
      { operation: `temperature.set:${device}` }
    );
  }

  private knownTarget(device: string, status: HeatingStatus): number {
    if (status.targetTemp === UNKNOWN) {
      throw new StatusParseError(`Target temperature of '${device}' is unreadable`, status, {
        operation: "temperature.read"
      });
    }
    return status.targetTemp;
  }

  private read(device: string): Promise<HeatingStatus> {
    return readStatusWithRetry(this.options.reader, this.options.retry, device);
  }
}
