import process from "node:process";
import { Command, InvalidArgumentError } from "commander";
import { withThermostatAgent, ThermostatAgent } from "./agent.js";
import { loadConfig, parseBooleanFlag, type AgentConfig, type ConfigOverrides } from "./config.js";
import type { BrowserLauncher } from "./driver.js";
import { createLogger, type Logger } from "./logger.js";
import { buildServer } from "./server.js";
import type { HeatingStatus } from "./types.js";

export interface GlobalOptions {
  configDir?: string;
  headless?: boolean;
  logLevel?: string;
}

/** Seams for tests; the installed binary uses the defaults. */
export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  launcher?: BrowserLauncher;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  print?: (line: string) => void;
}

export function buildProgram(runtime: CliRuntime = {}): Command {
  const program = new Command();
  program
    .name("ecobee-agent")
    .description("Read and change ecobee thermostats through the consumer web portal")
    .version("0.1.0")
    .option("--config-dir <dir>", "Directory holding default.json, config.json and local.json")
    .option("--headless <bool>", "Run Chromium headless (true|false)", parseHeadless)
    .option("--log-level <level>", "trace|debug|info|warn|error|fatal|silent");

  const print = runtime.print ?? ((line: string) => console.log(line));

  program
    .command("status")
    .description("Print the current status of a thermostat as JSON")
    .argument("<device>", "Configured thermostat name")
    .action(async (device: string) => {
      const status = await runWithAgent(program, runtime, (agent) => agent.getStatus(device));
      print(formatStatus(status));
    });

  program
    .command("set-mode")
    .description("Switch a thermostat to heat, aux_heat, cool, auto or off")
    .argument("<device>", "Configured thermostat name")
    .argument("<mode>", "Target mode")
    .action(async (device: string, mode: string) => {
      const status = await runWithAgent(program, runtime, (agent) => agent.setMode(device, mode));
      print(formatStatus(status));
    });

  program
    .command("set-temp")
    .description("Set the target temperature (°F) of a thermostat")
    .argument("<device>", "Configured thermostat name")
    .argument("<temperature>", "Target temperature between 40 and 95")
    .action(async (device: string, temperature: string) => {
      const status = await runWithAgent(program, runtime, (agent) => agent.setTargetTemperature(device, temperature));
      print(formatStatus(status));
    });

  program
    .command("serve")
    .description("Serve the HTTP API until interrupted")
    .option("--port <port>", "Override the configured port", parsePort)
    .option("--host <host>", "Override the configured host")
    .action(async (options: { port?: number; host?: string }) => {
      const config = resolveConfig(program, runtime, {
        server: { port: options.port, host: options.host }
      });
      await serve(config, runtime);
    });

  return program;
}

export function formatStatus(status: HeatingStatus): string {
  return JSON.stringify(status, null, 2);
}

function resolveConfig(program: Command, runtime: CliRuntime, extra: ConfigOverrides = {}): AgentConfig {
  const globals = program.opts<GlobalOptions>();
  return loadConfig({
    configDir: globals.configDir,
    env: runtime.env,
    overrides: {
      ...extra,
      browser: { headless: globals.headless },
      logLevel: parseLogLevel(globals.logLevel)
    }
  });
}

function loggerFor(config: AgentConfig, runtime: CliRuntime): Logger {
  return runtime.logger ?? createLogger({ level: config.logLevel, stream: "stderr" });
}

async function runWithAgent<T>(
  program: Command,
  runtime: CliRuntime,
  command: (agent: ThermostatAgent) => Promise<T>
): Promise<T> {
  const config = resolveConfig(program, runtime);
  return withThermostatAgent(
    { config, logger: loggerFor(config, runtime), launcher: runtime.launcher, sleep: runtime.sleep },
    command
  );
}

async function serve(config: AgentConfig, runtime: CliRuntime): Promise<void> {
  const logger = loggerFor(config, runtime);
  const agent = new ThermostatAgent({ config, logger, launcher: runtime.launcher, sleep: runtime.sleep });
  const server = buildServer(agent, { logLevel: config.logLevel });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    try {
      await server.close();
    } finally {
      await agent.close();
    }
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, "shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await server.listen({ host: config.server.host, port: config.server.port });
  } catch (error) {
    await agent.close();
    throw error;
  }
  logger.info({ devices: agent.devices }, "thermostat agent ready");
}

function parseHeadless(raw: string): boolean {
  const value = parseBooleanFlag(raw);
  if (value === undefined) {
    throw new InvalidArgumentError("Expected true or false.");
  }
  return value;
}

function parsePort(raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 65_535) {
    throw new InvalidArgumentError("Expected a port number between 1 and 65535.");
  }
  return value;
}

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

function parseLogLevel(raw: string | undefined): (typeof LOG_LEVELS)[number] | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const level = LOG_LEVELS.find((candidate) => candidate === raw.toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`Unknown log level '${raw}'. Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}
