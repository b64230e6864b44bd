import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from "playwright-core";
import type { ResolvedLocator, WaitState } from "./types.js";

/**
 * The narrow page surface the agent drives. SessionManager owns the only
 * instance; everything else borrows it through `SessionManager.driver()`.
 */
export interface PageDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitFor(locator: ResolvedLocator, state: WaitState, timeoutMs: number): Promise<void>;
  click(locator: ResolvedLocator, timeoutMs: number): Promise<void>;
  fill(locator: ResolvedLocator, value: string, timeoutMs: number): Promise<void>;
  /** The descriptor's attribute when set and present, otherwise the element text. */
  read(locator: ResolvedLocator, timeoutMs: number): Promise<string>;
  isPresent(locator: ResolvedLocator): Promise<boolean>;
  content(): Promise<string>;
  /** Masked elements are painted over in the image. */
  screenshot(masked: readonly ResolvedLocator[]): Promise<Buffer>;
  url(): string;
}

export interface BrowserHandle {
  readonly driver: PageDriver;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  viewportWidth: number;
  viewportHeight: number;
  actionTimeoutMs: number;
  navigationTimeoutMs: number;
  /** Playwright's own default when unset. */
  userAgent?: string;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserHandle>;

/** A bounded wait ran out. Raised for both element waits and page loads. */
export class DriverTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DriverTimeoutError";
  }
}

const CHROMIUM_ARGS = ["--no-sandbox", "--disable-dev-shm-usage", "--disable-gpu"];

export const launchChromium: BrowserLauncher = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    args: CHROMIUM_ARGS
  });

  try {
    const context = await browser.newContext({
      viewport: {
        width: options.viewportWidth,
        height: options.viewportHeight
      },
      userAgent: options.userAgent
    });
    const page = await context.newPage();
    page.setDefaultTimeout(options.actionTimeoutMs);
    page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
    return new PlaywrightBrowserHandle(browser, context, page);
  } catch (error) {
    await browser.close();
    throw error;
  }
};

class PlaywrightBrowserHandle implements BrowserHandle {
  readonly driver: PageDriver;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    page: Page
  ) {
    this.driver = new PlaywrightPageDriver(page);
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

export class PlaywrightPageDriver implements PageDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await translateTimeout(() => this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs }));
  }

  async waitFor(locator: ResolvedLocator, state: WaitState, timeoutMs: number): Promise<void> {
    await translateTimeout(() => this.locate(locator).waitFor({ state, timeout: timeoutMs }));
  }

  async click(locator: ResolvedLocator, timeoutMs: number): Promise<void> {
    await translateTimeout(() => this.locate(locator).click({ timeout: timeoutMs }));
  }

  async fill(locator: ResolvedLocator, value: string, timeoutMs: number): Promise<void> {
    await translateTimeout(() => this.locate(locator).fill(value, { timeout: timeoutMs }));
  }

  async read(locator: ResolvedLocator, timeoutMs: number): Promise<string> {
    return translateTimeout(async () => {
      const target = this.locate(locator);
      await target.waitFor({ state: "attached", timeout: timeoutMs });
      if (locator.attribute) {
        const value = await target.getAttribute(locator.attribute, { timeout: timeoutMs });
        if (value !== null) {
          return value.trim();
        }
      }
      return ((await target.textContent({ timeout: timeoutMs })) ?? "").trim();
    });
  }

  async isPresent(locator: ResolvedLocator): Promise<boolean> {
    return (await this.locate(locator).count()) > 0;
  }

  content(): Promise<string> {
    return this.page.content();
  }

  screenshot(masked: readonly ResolvedLocator[]): Promise<Buffer> {
    return this.page.screenshot({ fullPage: true, mask: masked.map((locator) => this.locate(locator)) });
  }

  url(): string {
    return this.page.url();
  }

  private locate(locator: ResolvedLocator): Locator {
    switch (locator.strategy) {
      case "css":
        return this.page.locator(locator.value).first();
      case "xpath":
        return this.page.locator(`xpath=${locator.value}`).first();
      case "text":
        return this.page.getByText(locator.value, { exact: true }).first();
      case "testId":
        return this.page.getByTestId(locator.value).first();
      default: {
        const neverStrategy: never = locator.strategy;
        throw new Error(`Unsupported locator strategy: ${String(neverStrategy)}`);
      }
    }
  }
}

async function translateTimeout<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      throw new DriverTimeoutError(error.message.split("\n")[0] ?? error.message);
    }
    throw error;
  }
}
