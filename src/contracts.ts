import { z } from "zod";
import { MODES } from "./types.js";

const locatorSchema = z
  .object({
    strategy: z.enum(["css", "xpath", "text", "testId"]),
    value: z.string().min(1),
    attribute: z.string().min(1).optional()
  })
  .strict();

export const REQUIRED_SELECTOR_NAMES = [
  "login.username_field",
  "login.password_field",
  "login.submit_button",
  "login.error_banner",
  "portal.landmark",
  "device.selected_indicator",
  "device.option",
  "status.panel",
  "status.current_temp",
  "status.target_temp",
  "status.mode",
  "mode_menu.open",
  "mode_menu.option_heat",
  "mode_menu.option_aux",
  "mode_menu.option_cool",
  "mode_menu.option_auto",
  "mode_menu.option_off",
  "temperature.up",
  "temperature.down"
] as const;

export const OPTIONAL_SELECTOR_NAMES = [
  "device.menu",
  "status.heating_indicator",
  "mode_menu.confirm",
  "temperature.confirm"
] as const;

export type RequiredSelectorName = (typeof REQUIRED_SELECTOR_NAMES)[number];
export type OptionalSelectorName = (typeof OPTIONAL_SELECTOR_NAMES)[number];
export type SelectorName = RequiredSelectorName | OptionalSelectorName;

const optionalLocator = locatorSchema.optional();

const selectorShape = {
  "login.username_field": locatorSchema,
  "login.password_field": locatorSchema,
  "login.submit_button": locatorSchema,
  "login.error_banner": locatorSchema,
  "portal.landmark": locatorSchema,
  "device.menu": optionalLocator,
  "device.selected_indicator": locatorSchema,
  "device.option": locatorSchema,
  "status.panel": locatorSchema,
  "status.current_temp": locatorSchema,
  "status.target_temp": locatorSchema,
  "status.mode": locatorSchema,
  "status.heating_indicator": optionalLocator,
  "mode_menu.open": locatorSchema,
  "mode_menu.option_heat": locatorSchema,
  "mode_menu.option_aux": locatorSchema,
  "mode_menu.option_cool": locatorSchema,
  "mode_menu.option_auto": locatorSchema,
  "mode_menu.option_off": locatorSchema,
  "mode_menu.confirm": optionalLocator,
  "temperature.up": locatorSchema,
  "temperature.down": locatorSchema,
  "temperature.confirm": optionalLocator
} satisfies Record<SelectorName, z.ZodTypeAny>;

/** Closed mapping: unknown names are rejected, required names enforced. */
export const selectorMapSchema = z.object(selectorShape).strict();

export const modeSchema = z.enum(MODES);

export const configSchema = z.object({
  portal: z.object({
    loginUrl: z.string().url(),
    homeUrl: z.string().url()
  }),
  credentials: z.object({
    username: z.string().min(1, "username is required (set ECOBEE_USERNAME)"),
    password: z.string().min(1, "password is required (set ECOBEE_PASSWORD)")
  }),
  thermostats: z
    .record(z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "thermostat names are lower-case kebab identifiers"), z.string().min(1))
    .refine((table) => Object.keys(table).length > 0, "at least one thermostat must be configured"),
  selectors: selectorMapSchema,
  retry: z.object({
    maxAttempts: z.number().int().positive().max(10),
    baseDelayMs: z.number().int().nonnegative(),
    backoffMultiplier: z.number().min(1)
  }),
  browser: z.object({
    headless: z.boolean(),
    actionTimeoutMs: z.number().int().positive(),
    navigationTimeoutMs: z.number().int().positive(),
    statusFieldTimeoutMs: z.number().int().positive(),
    viewportWidth: z.number().int().positive(),
    viewportHeight: z.number().int().positive(),
    userAgent: z.string().min(1)
  }),
  diagnostics: z.object({
    enabled: z.boolean(),
    dir: z.string().min(1),
    maxArtifacts: z.number().int().positive(),
    maxAgeMs: z.number().int().positive()
  }),
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65_535)
  }),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
});

const selectorNameSchema = z.string().min(1);
const paramsSchema = z.record(z.string(), z.string()).optional();
const timeoutSchema = z.number().int().positive().optional();

export const portalActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("open"),
    url: z.string().url(),
    timeoutMs: timeoutSchema
  }),
  z.object({
    type: z.literal("click"),
    selector: selectorNameSchema,
    params: paramsSchema,
    optional: z.boolean().optional(),
    timeoutMs: timeoutSchema
  }),
  z.object({
    type: z.literal("setValue"),
    selector: selectorNameSchema,
    value: z.string(),
    timeoutMs: timeoutSchema
  }),
  z.object({
    type: z.literal("waitFor"),
    selector: selectorNameSchema,
    params: paramsSchema,
    state: z.enum(["attached", "visible", "hidden", "detached"]).optional(),
    timeoutMs: timeoutSchema
  }),
  z.object({
    type: z.literal("waitForFirst"),
    selectors: z.array(selectorNameSchema).min(1),
    timeoutMs: timeoutSchema
  }),
  z.object({
    type: z.literal("readText"),
    selector: selectorNameSchema,
    params: paramsSchema,
    timeoutMs: timeoutSchema
  })
]);

export const portalSequenceSchema = z.array(portalActionSchema).min(1);

export const TEMPERATURE_RANGE = { min: 40, max: 95 } as const;

export const temperatureSchema = z
  .number({ invalid_type_error: "temperature must be a number" })
  .finite()
  .min(TEMPERATURE_RANGE.min, `temperature must be at least ${TEMPERATURE_RANGE.min}°F`)
  .max(TEMPERATURE_RANGE.max, `temperature must be at most ${TEMPERATURE_RANGE.max}°F`);

export const temperatureRequestSchema = z.object({
  temperature: temperatureSchema
});

export type ParsedConfig = z.infer<typeof configSchema>;
export type SelectorMapInput = z.infer<typeof selectorMapSchema>;
export type PortalAction = z.infer<typeof portalActionSchema>;

export function parseConfig(raw: unknown): ParsedConfig {
  return configSchema.parse(raw);
}

export function parseSequence(raw: unknown): PortalAction[] {
  return portalSequenceSchema.parse(raw);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
