import { destination, pino, type Logger } from "pino";

export type { Logger } from "pino";

const REDACT_PATHS = [
  "password",
  "*.password",
  "credentials",
  "*.credentials",
  "config.credentials"
];

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  /** The CLI logs to stderr so stdout carries only command output. */
  stream?: "stdout" | "stderr";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const fd = options.stream === "stderr" ? 2 : 1;
  const pretty = options.pretty ?? Boolean(fd === 2 ? process.stderr.isTTY : process.stdout.isTTY);
  const base = {
    name: "ecobee-agent",
    level: options.level ?? "info",
    redact: {
      paths: REDACT_PATHS,
      censor: "[redacted]"
    }
  };

  if (pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "SYS:HH:MM:ss", destination: fd }
      }
    });
  }
  return pino(base, destination(fd));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

/** Replace every occurrence of the given secrets; used before text leaves the process. */
export function redactSecrets(text: string, secrets: readonly string[]): string {
  let redacted = text;
  for (const secret of secrets) {
    if (secret.length === 0) {
      continue;
    }
    redacted = redacted.split(secret).join("[redacted]");
  }
  return redacted;
}
