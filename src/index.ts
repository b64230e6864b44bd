export { ThermostatAgent, withThermostatAgent, type AgentHealth, type ThermostatAgentOptions } from "./agent.js";
export { buildConfig, loadConfig, type AgentConfig, type ConfigOverrides, type LoadConfigOptions } from "./config.js";
export {
  OPTIONAL_SELECTOR_NAMES,
  REQUIRED_SELECTOR_NAMES,
  TEMPERATURE_RANGE,
  type PortalAction,
  type SelectorName
} from "./contracts.js";
export { DiagnosticsCollector, type CaptureSource } from "./diagnostics.js";
export { DriverTimeoutError, launchChromium, type BrowserHandle, type BrowserLauncher, type PageDriver } from "./driver.js";
export * from "./errors.js";
export { createLogger, type Logger } from "./logger.js";
export { MODE_OPTION_SELECTORS, ModeController, parseMode } from "./mode-controller.js";
export { NavigationEngine } from "./navigation.js";
export { RetryPolicy, classifyPortalError, type RetryClassifier } from "./retry.js";
export { SelectorMap } from "./selectors.js";
export { buildServer, statusCodeFor } from "./server.js";
export { SessionManager } from "./session-manager.js";
export { StatusReader, normalizeMode, parseHeatingFlag, parseTemperature } from "./status-reader.js";
export { TemperatureController, parseTargetTemperature } from "./temperature-controller.js";
export * from "./types.js";
