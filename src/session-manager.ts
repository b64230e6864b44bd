import { randomUUID } from "node:crypto";
import type { AgentConfig } from "./config.js";
import type { PortalAction } from "./contracts.js";
import type { CaptureSource } from "./diagnostics.js";
import { launchChromium, type BrowserHandle, type BrowserLauncher, type PageDriver } from "./driver.js";
import {
  AuthenticationError,
  ConfigurationError,
  DeviceSelectionError,
  SessionExpiredError,
  errorMessage
} from "./errors.js";
import type { Logger } from "./logger.js";
import { NavigationEngine } from "./navigation.js";
import { classifyPortalError, type RetryPolicy } from "./retry.js";
import type { SessionState } from "./types.js";

export interface SessionManagerOptions {
  config: AgentConfig;
  retry: RetryPolicy;
  logger: Logger;
  launcher?: BrowserLauncher;
  now?: () => number;
}

/**
 * Sole owner of the browser. Creates it on first login, hands out the page
 * through `driver()`, and tears it down on `close()`.
 */
export class SessionManager {
  readonly navigation: NavigationEngine;

  private handle: BrowserHandle | null = null;
  private state: SessionState | null = null;
  private readonly logger: Logger;
  private readonly launcher: BrowserLauncher;
  private readonly now: () => number;

  constructor(private readonly options: SessionManagerOptions) {
    this.logger = options.logger.child({ component: "session" });
    this.launcher = options.launcher ?? launchChromium;
    this.now = options.now ?? Date.now;
    this.navigation = new NavigationEngine({
      selectors: options.config.selectors,
      driver: () => this.driver(),
      browser: options.config.browser,
      logger: options.logger.child({ component: "navigation" }),
      isAuthenticated: () => this.state?.authenticated ?? false
    });
  }

  get session(): SessionState | undefined {
    return this.state ? { ...this.state } : undefined;
  }

  get browserOpen(): boolean {
    return this.handle !== null;
  }

  driver(): PageDriver {
    if (!this.handle) {
      throw new SessionExpiredError("No browser is open for this session");
    }
    return this.handle.driver;
  }

  captureSource(): CaptureSource | undefined {
    return this.handle?.driver;
  }

  async login(): Promise<SessionState> {
    return this.options.retry.execute(() => this.loginOnce(), classifyPortalError, { operation: "session.login" });
  }

  /**
   * Guarantee an authenticated session with `deviceRef` selected. A missing
   * landmark means the portal dropped the session: log in again.
   */
  async ensureSession(deviceRef: string): Promise<SessionState> {
    this.resolveDevice(deviceRef);

    if (!this.handle || !this.state?.authenticated) {
      await this.login();
    } else if (!(await this.navigation.isPresent("portal.landmark"))) {
      this.logger.info({ sessionId: this.state.id }, "session landmark missing; logging in again");
      this.invalidate();
      await this.login();
    }

    await this.selectDevice(deviceRef);
    return this.requireState();
  }

  /** Idempotent: an already selected device is only read back, never clicked. */
  async selectDevice(deviceRef: string): Promise<void> {
    const deviceId = this.resolveDevice(deviceRef);
    const selectors = this.options.config.selectors;

    await this.options.retry.execute(
      async () => {
        if ((await this.readSelectedDevice()) === deviceId) {
          this.markSelected(deviceRef);
          return;
        }

        const sequence: PortalAction[] = [];
        if (selectors.has("device.menu")) {
          sequence.push({ type: "click", selector: "device.menu" });
        }
        sequence.push({ type: "click", selector: "device.option", params: { deviceId } });
        sequence.push({ type: "waitFor", selector: "status.panel" });
        await this.navigation.run(sequence);

        const selected = await this.readSelectedDevice();
        if (selected !== deviceId) {
          throw new DeviceSelectionError(
            `Portal shows device '${selected ?? "none"}' after selecting '${deviceRef}' (${deviceId})`
          );
        }
        this.markSelected(deviceRef);
        this.logger.info({ device: deviceRef }, "selected thermostat");
      },
      classifyPortalError,
      { operation: `session.select:${deviceRef}` }
    );
  }

  /**
   * Run a device-scoped operation. A SessionExpiredError raised anywhere
   * inside is absorbed once by logging in again and re-running.
   */
  async runForDevice<T>(deviceRef: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await this.runOnce(deviceRef, operation);
    } catch (error) {
      if (!(error instanceof SessionExpiredError)) {
        throw error;
      }
      this.logger.warn({ device: deviceRef, error: error.message }, "session expired mid-command; re-authenticating");
      this.invalidate();
      return this.runOnce(deviceRef, operation);
    }
  }

  resolveDevice(deviceRef: string): string {
    const deviceId = Object.hasOwn(this.options.config.thermostats, deviceRef)
      ? this.options.config.thermostats[deviceRef]
      : undefined;
    if (!deviceId) {
      const known = Object.keys(this.options.config.thermostats).join(", ");
      throw new ConfigurationError(`Unknown thermostat '${deviceRef}'. Configured: ${known}`);
    }
    return deviceId;
  }

  invalidate(): void {
    if (this.state) {
      this.state.authenticated = false;
      this.state.selectedDevice = undefined;
    }
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.state = null;
    if (!handle) {
      return;
    }

    try {
      await handle.close();
      this.logger.info("browser closed");
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "error while closing browser");
    }
  }

  private async runOnce<T>(deviceRef: string, operation: () => Promise<T>): Promise<T> {
    await this.ensureSession(deviceRef);
    const result = await operation();
    this.touch();
    return result;
  }

  private async loginOnce(): Promise<SessionState> {
    await this.ensureBrowser();
    const { portal, credentials, browser } = this.options.config;
    const timestamp = new Date(this.now()).toISOString();
    this.state = {
      id: randomUUID(),
      authenticated: false,
      createdAt: timestamp,
      lastActivityAt: timestamp
    };

    this.logger.info({ sessionId: this.state.id }, "logging in to portal");
    const [outcome] = await this.navigation.run(
      [
        { type: "open", url: portal.loginUrl },
        { type: "waitFor", selector: "login.username_field" },
        { type: "setValue", selector: "login.username_field", value: credentials.username },
        { type: "setValue", selector: "login.password_field", value: credentials.password },
        { type: "click", selector: "login.submit_button" },
        {
          type: "waitForFirst",
          selectors: ["portal.landmark", "login.error_banner"],
          timeoutMs: browser.navigationTimeoutMs
        }
      ],
      { login: true }
    );

    if (outcome === "login.error_banner") {
      const banner = await this.readLoginBanner();
      throw new AuthenticationError(
        banner ? `Portal rejected the credentials: ${banner}` : "Portal rejected the credentials",
        { operation: "session.login" }
      );
    }

    this.state.authenticated = true;
    this.touch();
    this.logger.info({ sessionId: this.state.id }, "logged in");
    return { ...this.state };
  }

  private async readLoginBanner(): Promise<string | undefined> {
    try {
      const [text] = await this.navigation.run(
        [{ type: "readText", selector: "login.error_banner", timeoutMs: this.options.config.browser.statusFieldTimeoutMs }],
        { login: true }
      );
      return text && text.length > 0 ? text : undefined;
    } catch (error) {
      this.logger.debug({ error: errorMessage(error) }, "login banner text unavailable");
      return undefined;
    }
  }

  private async ensureBrowser(): Promise<void> {
    if (this.handle) {
      return;
    }
    const { browser } = this.options.config;
    this.handle = await this.launcher({
      headless: browser.headless,
      viewportWidth: browser.viewportWidth,
      viewportHeight: browser.viewportHeight,
      actionTimeoutMs: browser.actionTimeoutMs,
      navigationTimeoutMs: browser.navigationTimeoutMs,
      userAgent: browser.userAgent
    });
    this.logger.info({ headless: browser.headless }, "browser launched");
  }

  private async readSelectedDevice(): Promise<string | undefined> {
    const value = await this.navigation.readOptional(
      "device.selected_indicator",
      this.options.config.browser.statusFieldTimeoutMs
    );
    return value && value.length > 0 ? value : undefined;
  }

  private markSelected(deviceRef: string): void {
    const state = this.requireState();
    state.selectedDevice = deviceRef;
    this.touch();
  }

  private touch(): void {
    if (this.state) {
      this.state.lastActivityAt = new Date(this.now()).toISOString();
    }
  }

  private requireState(): SessionState {
    if (!this.state) {
      throw new SessionExpiredError("Session not started; call login() first");
    }
    return this.state;
  }
}
