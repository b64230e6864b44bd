import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import type { ThermostatAgent } from "./agent.js";
import { formatIssues, temperatureRequestSchema } from "./contracts.js";
import { errorMessage, isPortalError, type PortalErrorKind } from "./errors.js";

export interface ServerOptions {
  logLevel: string;
  pretty?: boolean;
}

/** The part of the agent the HTTP surface needs. */
export type ThermostatCommands = Pick<ThermostatAgent, "getStatus" | "setMode" | "setTargetTemperature" | "health">;

const STATUS_BY_KIND: Record<PortalErrorKind, number> = {
  invalid_input: 400,
  authentication: 401,
  configuration: 404,
  mode_verification: 409,
  temperature_verification: 409,
  element_not_found: 502,
  navigation_timeout: 502,
  session_expired: 502,
  device_selection: 502,
  status_parse: 502,
  retry_exhausted: 502
};

/** Path aliases accepted on top of the canonical mode names. */
const MODE_PATH_ALIASES = new Map<string, string>([
  ["aux", "aux_heat"],
  ["aux-heat", "aux_heat"]
]);

export function statusCodeFor(error: unknown): number {
  return isPortalError(error) ? STATUS_BY_KIND[error.kind] : 500;
}

export function buildServer(agent: ThermostatCommands, options: ServerOptions): FastifyInstance {
  const pretty = options.pretty ?? Boolean(process.stdout.isTTY);
  const server = Fastify({
    logger: {
      level: options.logLevel,
      ...(pretty
        ? {
            transport: {
              target: "pino-pretty",
              options: { colorize: true, translateTime: "SYS:HH:MM:ss" }
            }
          }
        : {})
    }
  });

  function sendError(reply: FastifyReply, error: unknown): FastifyReply {
    const statusCode = statusCodeFor(error);
    if (statusCode >= 500) {
      reply.log.error({ error: errorMessage(error) }, "command failed");
    } else {
      reply.log.warn({ error: errorMessage(error) }, "command rejected");
    }

    return reply.code(statusCode).send({
      success: false,
      error: isPortalError(error)
        ? { kind: error.kind, message: error.message, attempts: error.attempts, artifactId: error.artifactId }
        : { kind: "internal", message: errorMessage(error) }
    });
  }

  server.get("/health", async () => {
    const health = agent.health();
    return {
      status: health.status,
      uptime_s: health.uptimeS,
      browser_open: health.browserOpen,
      authenticated: health.session?.authenticated ?? false,
      selected_device: health.session?.selectedDevice ?? null,
      queued: health.queued,
      diagnostics: health.diagnostics
    };
  });

  server.get<{ Params: { device: string } }>("/ecobee/:device/status", async (req, reply) => {
    try {
      const status = await agent.getStatus(req.params.device);
      return { success: true, status };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // Registered before /:mode; the static segment wins either way.
  server.post<{ Params: { device: string }; Body: unknown }>("/ecobee/:device/temperature", async (req, reply) => {
    const parsed = temperatureRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        success: false,
        error: { kind: "invalid_input", message: `Invalid request body: ${formatIssues(parsed.error)}` }
      });
    }

    try {
      const status = await agent.setTargetTemperature(req.params.device, parsed.data.temperature);
      return { success: true, status };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  server.post<{ Params: { device: string; mode: string } }>("/ecobee/:device/:mode", async (req, reply) => {
    const requested = req.params.mode.toLowerCase();
    try {
      const status = await agent.setMode(req.params.device, MODE_PATH_ALIASES.get(requested) ?? requested);
      return { success: true, status };
    } catch (error) {
      return sendError(reply, error);
    }
  });

  return server;
}
