import { DriverTimeoutError, type BrowserLauncher, type LaunchOptions, type PageDriver } from "../../src/driver.js";
import type { ResolvedLocator, WaitState } from "../../src/types.js";

export const LOGIN_URL = "https://portal.test/login";
export const HOME_URL = "https://portal.test/home";
export const TEST_USERNAME = "owner@example.test";
export const TEST_PASSWORD = "test-secret";

export interface FakeThermostat {
  id: string;
  /** Raw portal value, e.g. "heat" or "auxHeatOnly". */
  mode: string;
  currentTemp: number;
  targetTemp: number;
  /** Undefined removes the heating indicator from the page. */
  heating?: boolean;
}

const MODE_OPTIONS = new Map<string, string>([
  ["#mode-heat", "heat"],
  ["#mode-aux", "auxHeatOnly"],
  ["#mode-cool", "cool"],
  ["#mode-auto", "auto"],
  ["#mode-off", "off"]
]);

const DEVICE_OPTION = /^\[data-device='(.+)'\]$/;

export function defaultThermostats(): FakeThermostat[] {
  return [
    { id: "tstat-main", mode: "heat", currentTemp: 68, targetTemp: 70, heating: true },
    { id: "tstat-up", mode: "cool", currentTemp: 74, targetTemp: 72, heating: false }
  ];
}

/**
 * In-memory stand-in for the portal. Elements are addressed by the locator
 * values used in `testSelectors()`.
 */
export class FakePortal {
  page: "blank" | "login" | "dashboard" = "blank";
  loggedIn = false;
  loginError = false;
  selectedId: string | undefined;
  menuOpen = false;
  pendingMode: string | undefined;
  pendingTarget: number | undefined;
  /** No save button: choices apply on click. */
  autoSave = false;
  ignoreModeChanges = 0;
  ignoreDeviceClicks = 0;
  failNavigations = 0;
  closeFails = false;
  launches = 0;
  closes = 0;
  loginAttempts = 0;
  password = TEST_PASSWORD;
  lastLaunch: LaunchOptions | undefined;

  readonly thermostats = new Map<string, FakeThermostat>();
  readonly clicks: string[] = [];
  readonly filled: Record<string, string> = {};
  readonly hidden = new Set<string>();
  /** Locator values masked in each screenshot taken. */
  readonly screenshotMasks: string[][] = [];
  /** Upcoming timeouts to raise for a locator value. */
  readonly failures = new Map<string, number>();

  constructor(thermostats: FakeThermostat[] = defaultThermostats()) {
    for (const thermostat of thermostats) {
      this.thermostats.set(thermostat.id, { ...thermostat });
    }
  }

  readonly launcher: BrowserLauncher = async (options) => {
    this.launches += 1;
    this.lastLaunch = options;
    const driver = new FakePageDriver(this);
    return {
      driver,
      close: async () => {
        this.closes += 1;
        this.page = "blank";
        this.loggedIn = false;
        if (this.closeFails) {
          throw new Error("browser process already gone");
        }
      }
    };
  };

  thermostat(id: string): FakeThermostat {
    const thermostat = this.thermostats.get(id);
    if (!thermostat) {
      throw new Error(`no fake thermostat '${id}'`);
    }
    return thermostat;
  }

  failNext(value: string, times = 1): void {
    this.failures.set(value, (this.failures.get(value) ?? 0) + times);
  }

  /** The portal drops the session and shows its login form. */
  expireSession(): void {
    this.loggedIn = false;
    this.page = "login";
    this.menuOpen = false;
  }

  clicksOn(value: string): number {
    return this.clicks.filter((click) => click === value).length;
  }

  navigate(url: string): void {
    if (this.failNavigations > 0) {
      this.failNavigations -= 1;
      throw new DriverTimeoutError(`page.goto: Timeout exceeded navigating to ${url}`);
    }
    if (url === LOGIN_URL) {
      this.page = "login";
      this.loggedIn = false;
      this.loginError = false;
      delete this.filled["#username"];
      delete this.filled["#password"];
      return;
    }
    this.page = this.loggedIn ? "dashboard" : "login";
  }

  consumeFailure(value: string): void {
    const remaining = this.failures.get(value) ?? 0;
    if (remaining > 0) {
      this.failures.set(value, remaining - 1);
      throw new DriverTimeoutError(`Timeout waiting for ${value}`);
    }
  }

  present(value: string): boolean {
    if (this.hidden.has(value)) {
      return false;
    }
    if (this.page === "login") {
      return ["#username", "#password", "#login"].includes(value) || (value === "#login-error" && this.loginError);
    }
    if (this.page !== "dashboard") {
      return false;
    }

    const selected = this.selected();
    switch (value) {
      case "#account-menu":
      case "#device-menu":
      case "#selected-device":
        return true;
      case "#status":
      case "#current-temp":
      case "#target-temp":
      case "#mode":
      case "#mode-menu":
      case "#temp-up":
      case "#temp-down":
        return selected !== undefined;
      case "#heating":
        return selected?.heating !== undefined;
      case "#mode-save":
        return this.menuOpen && this.pendingMode !== undefined && !this.autoSave;
      case "#temp-save":
        return this.pendingTarget !== undefined && !this.autoSave;
    }

    if (MODE_OPTIONS.has(value)) {
      return this.menuOpen;
    }
    const option = DEVICE_OPTION.exec(value);
    return option !== null && this.thermostats.has(option[1] ?? "");
  }

  text(value: string): string {
    const selected = this.selected();
    switch (value) {
      case "#selected-device":
        return this.selectedId ?? "";
      case "#current-temp":
        return selected ? `${selected.currentTemp}°F` : "";
      case "#target-temp":
        return selected ? `${selected.targetTemp}°F` : "";
      case "#mode":
        return selected?.mode ?? "";
      case "#heating":
        return String(selected?.heating ?? "");
      case "#login-error":
        return "Incorrect email or password";
      default:
        return "";
    }
  }

  activate(value: string): void {
    this.clicks.push(value);

    if (value === "#login") {
      this.loginAttempts += 1;
      if (this.filled["#username"] === TEST_USERNAME && this.filled["#password"] === this.password) {
        this.loggedIn = true;
        this.loginError = false;
        this.page = "dashboard";
        this.selectedId = this.selectedId ?? [...this.thermostats.keys()][0];
      } else {
        this.loginError = true;
      }
      return;
    }

    const option = DEVICE_OPTION.exec(value);
    if (option) {
      if (this.ignoreDeviceClicks > 0) {
        this.ignoreDeviceClicks -= 1;
        return;
      }
      this.selectedId = option[1];
      this.menuOpen = false;
      this.pendingMode = undefined;
      this.pendingTarget = undefined;
      return;
    }

    const mode = MODE_OPTIONS.get(value);
    if (mode !== undefined) {
      this.pendingMode = mode;
      if (this.autoSave) {
        this.applyMode();
      }
      return;
    }

    const selected = this.selected();
    switch (value) {
      case "#mode-menu":
        this.menuOpen = true;
        return;
      case "#mode-save":
        this.applyMode();
        return;
      case "#temp-up":
      case "#temp-down":
        if (selected) {
          this.pendingTarget = (this.pendingTarget ?? selected.targetTemp) + (value === "#temp-up" ? 1 : -1);
          if (this.autoSave) {
            this.applyTarget();
          }
        }
        return;
      case "#temp-save":
        this.applyTarget();
        return;
    }
  }

  html(): string {
    return [
      `<html><body data-page="${this.page}">`,
      `<input id="username" value="${this.filled["#username"] ?? ""}">`,
      `<input id="password" type="password" value="${this.filled["#password"] ?? ""}">`,
      "</body></html>"
    ].join("");
  }

  private selected(): FakeThermostat | undefined {
    return this.selectedId ? this.thermostats.get(this.selectedId) : undefined;
  }

  private applyMode(): void {
    const mode = this.pendingMode;
    this.pendingMode = undefined;
    this.menuOpen = false;
    if (this.ignoreModeChanges > 0) {
      this.ignoreModeChanges -= 1;
      return;
    }
    const selected = this.selected();
    if (selected && mode !== undefined) {
      selected.mode = mode;
    }
  }

  private applyTarget(): void {
    const target = this.pendingTarget;
    this.pendingTarget = undefined;
    const selected = this.selected();
    if (selected && target !== undefined) {
      selected.targetTemp = target;
    }
  }
}

class FakePageDriver implements PageDriver {
  constructor(private readonly portal: FakePortal) {}

  async goto(url: string): Promise<void> {
    this.portal.navigate(url);
  }

  async waitFor(locator: ResolvedLocator, state: WaitState): Promise<void> {
    this.portal.consumeFailure(locator.value);
    const wanted = state === "visible" || state === "attached";
    if (this.portal.present(locator.value) !== wanted) {
      throw new DriverTimeoutError(`Timeout waiting for ${locator.value} to be ${state}`);
    }
  }

  async click(locator: ResolvedLocator): Promise<void> {
    this.require(locator);
    this.portal.activate(locator.value);
  }

  async fill(locator: ResolvedLocator, value: string): Promise<void> {
    this.require(locator);
    this.portal.filled[locator.value] = value;
  }

  async read(locator: ResolvedLocator): Promise<string> {
    this.require(locator);
    return this.portal.text(locator.value);
  }

  async isPresent(locator: ResolvedLocator): Promise<boolean> {
    return this.portal.present(locator.value);
  }

  async content(): Promise<string> {
    return this.portal.html();
  }

  async screenshot(masked: readonly ResolvedLocator[]): Promise<Buffer> {
    this.portal.screenshotMasks.push(masked.map((locator) => locator.value));
    return Buffer.from("fake-png");
  }

  url(): string {
    return this.portal.page === "login" ? LOGIN_URL : HOME_URL;
  }

  private require(locator: ResolvedLocator): void {
    this.portal.consumeFailure(locator.value);
    if (!this.portal.present(locator.value)) {
      throw new DriverTimeoutError(`Timeout waiting for locator ${locator.value}`);
    }
  }
}
