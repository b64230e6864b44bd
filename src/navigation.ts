import { setTimeout as delay } from "node:timers/promises";
import { ZodError } from "zod";
import { formatIssues, parseSequence, type PortalAction } from "./contracts.js";
import { DriverTimeoutError, type PageDriver } from "./driver.js";
import {
  ConfigurationError,
  ElementNotFoundError,
  NavigationTimeoutError,
  SessionExpiredError,
  errorMessage,
  isPortalError
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { SelectorMap } from "./selectors.js";
import type { ActionLogEntry, BrowserSettings, WaitState } from "./types.js";

export interface NavigationEngineOptions {
  selectors: SelectorMap;
  /** Borrow the live page; throws when no browser is open. */
  driver: () => PageDriver;
  browser: BrowserSettings;
  logger: Logger;
  /** Guard for the "no UI action before login" invariant. */
  isAuthenticated?: () => boolean;
  pollIntervalMs?: number;
  maxLogEntries?: number;
}

export interface RunOptions {
  /** The login sequence is the only one allowed on an unauthenticated session. */
  login?: boolean;
}

interface ActionOutcome {
  output?: string;
  skipped?: boolean;
}

const DEFAULT_POLL_INTERVAL_MS = 100;
const DEFAULT_MAX_LOG_ENTRIES = 200;

/**
 * Executes symbolic action sequences against the borrowed page. Knows nothing
 * about modes or devices: every element is addressed through the SelectorMap.
 */
export class NavigationEngine {
  private readonly actionLog: ActionLogEntry[] = [];

  constructor(private readonly options: NavigationEngineOptions) {}

  /** Runs the sequence in order; returns the values produced by read and race actions. */
  async run(rawSequence: PortalAction[], runOptions: RunOptions = {}): Promise<string[]> {
    const sequence = this.parse(rawSequence);

    if (!runOptions.login && this.options.isAuthenticated && !this.options.isAuthenticated()) {
      throw new SessionExpiredError("No authenticated session; UI actions require login first");
    }

    const outputs: string[] = [];
    for (const action of sequence) {
      const outcome = await this.perform(action, runOptions);
      if (outcome.output !== undefined) {
        outputs.push(outcome.output);
      }
    }
    return outputs;
  }

  async open(url: string, runOptions?: RunOptions): Promise<void> {
    await this.run([{ type: "open", url }], runOptions);
  }

  async click(selector: string, params?: Record<string, string>): Promise<void> {
    await this.run([{ type: "click", selector, params }]);
  }

  async setValue(selector: string, value: string): Promise<void> {
    await this.run([{ type: "setValue", selector, value }]);
  }

  async waitFor(selector: string, timeoutMs?: number, state?: WaitState): Promise<void> {
    await this.run([{ type: "waitFor", selector, timeoutMs, state }]);
  }

  async readText(selector: string, timeoutMs?: number): Promise<string> {
    const [value] = await this.run([{ type: "readText", selector, timeoutMs }]);
    return value ?? "";
  }

  /** Like readText, but an absent element yields undefined instead of an error. */
  async readOptional(selector: string, timeoutMs?: number): Promise<string | undefined> {
    if (!this.options.selectors.has(selector)) {
      return undefined;
    }
    try {
      return await this.readText(selector, timeoutMs);
    } catch (error) {
      if (error instanceof ElementNotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  /** Probe without waiting; unknown or unconfigured names count as absent. */
  async isPresent(selector: string, params?: Record<string, string>): Promise<boolean> {
    if (!this.options.selectors.has(selector)) {
      return false;
    }
    try {
      return await this.options.driver().isPresent(this.options.selectors.resolve(selector, params));
    } catch (error) {
      this.options.logger.debug({ selector, error: errorMessage(error) }, "presence probe failed");
      return false;
    }
  }

  recentActions(): ActionLogEntry[] {
    return [...this.actionLog];
  }

  clearActionLog(): void {
    this.actionLog.length = 0;
  }

  private parse(rawSequence: PortalAction[]): PortalAction[] {
    try {
      return parseSequence(rawSequence);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigurationError(`Invalid action sequence: ${formatIssues(error)}`);
      }
      throw error;
    }
  }

  private async perform(action: PortalAction, runOptions: RunOptions): Promise<ActionOutcome> {
    const startedAt = Date.now();
    const selector = describeTarget(action);

    try {
      const outcome = await this.execute(action);
      this.record({
        type: action.type,
        selector,
        status: outcome.skipped ? "skipped" : "ok",
        durationMs: Date.now() - startedAt
      });
      this.options.logger.debug({ action: action.type, selector, skipped: outcome.skipped ?? false }, "action done");
      return outcome;
    } catch (error) {
      this.record({ type: action.type, selector, status: "failed", durationMs: Date.now() - startedAt });
      throw await this.translate(error, action, runOptions);
    }
  }

  private async execute(action: PortalAction): Promise<ActionOutcome> {
    const driver = this.options.driver();
    const selectors = this.options.selectors;
    const { actionTimeoutMs, navigationTimeoutMs, statusFieldTimeoutMs } = this.options.browser;

    switch (action.type) {
      case "open": {
        await driver.goto(action.url, action.timeoutMs ?? navigationTimeoutMs);
        return {};
      }

      case "click": {
        if (action.optional && !selectors.has(action.selector)) {
          return { skipped: true };
        }
        const locator = selectors.resolve(action.selector, action.params);
        const timeout = action.timeoutMs ?? actionTimeoutMs;
        if (action.optional) {
          try {
            await driver.waitFor(locator, "visible", Math.min(timeout, statusFieldTimeoutMs));
          } catch (error) {
            if (error instanceof DriverTimeoutError) {
              return { skipped: true };
            }
            throw error;
          }
        }
        await driver.click(locator, timeout);
        return {};
      }

      case "setValue": {
        await driver.fill(selectors.resolve(action.selector), action.value, action.timeoutMs ?? actionTimeoutMs);
        return {};
      }

      case "waitFor": {
        await driver.waitFor(
          selectors.resolve(action.selector, action.params),
          action.state ?? "visible",
          action.timeoutMs ?? actionTimeoutMs
        );
        return {};
      }

      case "waitForFirst": {
        const output = await this.waitForFirst(driver, action.selectors, action.timeoutMs ?? actionTimeoutMs);
        return { output };
      }

      case "readText": {
        const output = await driver.read(
          selectors.resolve(action.selector, action.params),
          action.timeoutMs ?? actionTimeoutMs
        );
        return { output };
      }

      default: {
        const neverAction: never = action;
        throw new Error(`Unsupported action: ${JSON.stringify(neverAction)}`);
      }
    }
  }

  private async waitForFirst(driver: PageDriver, names: string[], timeoutMs: number): Promise<string> {
    const locators = names.map((name) => ({ name, locator: this.options.selectors.resolve(name) }));
    const pollIntervalMs = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      for (const candidate of locators) {
        if (await driver.isPresent(candidate.locator)) {
          return candidate.name;
        }
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new DriverTimeoutError(`None of [${names.join(", ")}] appeared within ${timeoutMs}ms`);
      }
      await delay(Math.min(pollIntervalMs, remaining));
    }
  }

  private async translate(error: unknown, action: PortalAction, runOptions: RunOptions): Promise<unknown> {
    if (isPortalError(error)) {
      return error;
    }

    const message = errorMessage(error).split("\n")[0] ?? "";
    const operation = `${action.type}${describeTarget(action) ? `:${describeTarget(action)}` : ""}`;

    if (action.type === "open" || action.type === "waitForFirst") {
      if (error instanceof DriverTimeoutError || isTransientNetworkMessage(message)) {
        return new NavigationTimeoutError(`${operation} timed out: ${message}`, { operation, cause: error });
      }
      return error;
    }

    if (error instanceof DriverTimeoutError) {
      if (!runOptions.login && (await this.loginFormVisible())) {
        return new SessionExpiredError(`Portal returned to the login page during ${operation}`, { operation, cause: error });
      }
      return new ElementNotFoundError(action.selector, `Element '${action.selector}' not found: ${message}`, {
        operation,
        cause: error
      });
    }

    if (isTransientNetworkMessage(message)) {
      return new NavigationTimeoutError(`${operation} interrupted: ${message}`, { operation, cause: error });
    }

    return error;
  }

  private async loginFormVisible(): Promise<boolean> {
    return this.isPresent("login.username_field");
  }

  private record(entry: ActionLogEntry): void {
    this.actionLog.push(entry);
    const max = this.options.maxLogEntries ?? DEFAULT_MAX_LOG_ENTRIES;
    if (this.actionLog.length > max) {
      this.actionLog.splice(0, this.actionLog.length - max);
    }
  }
}

function describeTarget(action: PortalAction): string | undefined {
  switch (action.type) {
    case "open":
      return undefined;
    case "waitForFirst":
      return action.selectors.join("|");
    default:
      return action.selector;
  }
}

function isTransientNetworkMessage(message: string): boolean {
  const lowered = message.toLowerCase();
  return (
    lowered.includes("net::err") ||
    lowered.includes("target closed") ||
    lowered.includes("navigation") ||
    lowered.includes("timeout")
  );
}
