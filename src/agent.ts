import type { AgentConfig } from "./config.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import type { BrowserLauncher } from "./driver.js";
import { errorMessage, isPortalError, type PortalErrorKind } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { ModeController } from "./mode-controller.js";
import { RetryPolicy } from "./retry.js";
import { SessionManager } from "./session-manager.js";
import { StatusReader, readStatusWithRetry } from "./status-reader.js";
import { TemperatureController } from "./temperature-controller.js";
import type { DiagnosticArtifact, HeatingStatus, ObservedMode, SessionState } from "./types.js";

export interface ThermostatAgentOptions {
  config: AgentConfig;
  logger?: Logger;
  launcher?: BrowserLauncher;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface AgentHealth {
  status: "ok";
  uptimeS: number;
  browserOpen: boolean;
  session?: SessionState;
  queued: number;
  diagnostics: number;
}

/** Errors that leave the browser in a state no later command should inherit. */
const SESSION_ENDING_KINDS = new Set<PortalErrorKind>(["authentication", "session_expired", "retry_exhausted"]);

/**
 * Public entry point. Every command runs alone: calls made while another is
 * in flight wait their turn on a promise-chain lock.
 */
export class ThermostatAgent {
  readonly session: SessionManager;
  readonly diagnostics: DiagnosticsCollector;

  private readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly reader: StatusReader;
  private readonly modes: ModeController;
  private readonly temperatures: TemperatureController;
  private readonly now: () => number;
  private readonly startedAt: number;
  private operationLock: Promise<void> = Promise.resolve();
  private pending = 0;
  private diagnosticsLoaded = false;

  constructor(private readonly options: ThermostatAgentOptions) {
    const { config } = options;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();

    this.diagnostics = new DiagnosticsCollector({
      settings: config.diagnostics,
      source: () => this.session.captureSource(),
      secrets: [config.credentials.password, config.credentials.username],
      masked: [config.selectors.resolve("login.username_field"), config.selectors.resolve("login.password_field")],
      logger: this.logger.child({ component: "diagnostics" }),
      now: options.now
    });
    this.retry = new RetryPolicy({
      settings: config.retry,
      logger: this.logger.child({ component: "retry" }),
      diagnostics: this.diagnostics,
      sleep: options.sleep,
      now: options.now
    });
    this.session = new SessionManager({
      config,
      retry: this.retry,
      logger: this.logger,
      launcher: options.launcher,
      now: options.now
    });
    this.reader = new StatusReader({
      navigation: this.session.navigation,
      browser: config.browser,
      logger: this.logger,
      now: options.now
    });

    const controllerOptions = { session: this.session, reader: this.reader, retry: this.retry, logger: this.logger };
    this.modes = new ModeController(controllerOptions);
    this.temperatures = new TemperatureController(controllerOptions);
  }

  get devices(): string[] {
    return Object.keys(this.options.config.thermostats);
  }

  login(): Promise<SessionState> {
    return this.exclusive("login", () => this.session.login());
  }

  getStatus(device: string): Promise<HeatingStatus> {
    return this.exclusive("getStatus", () =>
      this.session.runForDevice(device, () => readStatusWithRetry(this.reader, this.retry, device))
    );
  }

  setMode(device: string, mode: string): Promise<HeatingStatus> {
    return this.exclusive("setMode", () => this.modes.setMode(device, mode));
  }

  setTargetTemperature(device: string, temperature: number | string): Promise<HeatingStatus> {
    return this.exclusive("setTargetTemperature", () => this.temperatures.setTargetTemperature(device, temperature));
  }

  lastObservedMode(device: string): ObservedMode {
    return this.modes.lastObserved(device);
  }

  recentArtifacts(): DiagnosticArtifact[] {
    return this.diagnostics.list();
  }

  health(): AgentHealth {
    return {
      status: "ok",
      uptimeS: Math.round((this.now() - this.startedAt) / 1000),
      browserOpen: this.session.browserOpen,
      session: this.session.session,
      queued: this.pending,
      diagnostics: this.diagnostics.list().length
    };
  }

  /** Waits for queued commands, then releases the browser. Safe to call twice. */
  close(): Promise<void> {
    return this.exclusive("close", () => this.session.close());
  }

  private exclusive<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const previous = this.operationLock;
    let release!: () => void;
    const next = new Promise<void>((resolvePromise) => {
      release = resolvePromise;
    });
    this.operationLock = previous.then(() => next);
    this.pending += 1;

    return previous
      .then(async () => {
        await this.loadDiagnostics();
        try {
          return await run();
        } catch (error) {
          await this.releaseIfSessionEnding(operation, error);
          throw error;
        }
      })
      .finally(() => {
        this.pending -= 1;
        release();
      });
  }

  private async loadDiagnostics(): Promise<void> {
    if (this.diagnosticsLoaded) {
      return;
    }
    this.diagnosticsLoaded = true;
    try {
      await this.diagnostics.load();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, "could not index existing diagnostics");
    }
  }

  private async releaseIfSessionEnding(operation: string, error: unknown): Promise<void> {
    if (isPortalError(error) && !SESSION_ENDING_KINDS.has(error.kind)) {
      return;
    }
    this.logger.warn(
      { operation, kind: isPortalError(error) ? error.kind : "unclassified", error: errorMessage(error) },
      "releasing browser after unrecoverable error"
    );
    await this.session.close();
  }
}

/** Scoped acquisition: the browser is released however `run` exits. */
export async function withThermostatAgent<T>(
  options: ThermostatAgentOptions,
  run: (agent: ThermostatAgent) => Promise<T>
): Promise<T> {
  const agent = new ThermostatAgent(options);
  try {
    return await run(agent);
  } finally {
    await agent.close();
  }
}
