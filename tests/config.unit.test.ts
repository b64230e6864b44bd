import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildConfig, deepMerge, envOverrides, loadConfig, loadDotEnv, parseBooleanFlag } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { rawTestConfig, testConfig, testSelectors } from "./helpers/testConfig.js";

describe("config", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ecobee-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("builds a frozen configuration", () => {
    const config = testConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.credentials)).toBe(true);
    expect(config.selectors.resolve("status.mode")).toEqual({
      name: "status.mode",
      strategy: "css",
      value: "#mode",
      attribute: "data-mode"
    });
  });

  it("rejects missing credentials", () => {
    const raw = deepMerge(rawTestConfig(), { credentials: { password: "" } });
    expect(() => buildConfig(raw)).toThrow(ConfigurationError);
    expect(() => buildConfig(raw)).toThrow("credentials.password: password is required (set ECOBEE_PASSWORD)");
  });

  it("rejects unknown selector names", () => {
    const raw = deepMerge(rawTestConfig(), {
      selectors: { "login.remember_me": { strategy: "css", value: "#remember" } }
    });
    expect(() => buildConfig(raw)).toThrow(/login\.remember_me/);
  });

  it("rejects a map missing a required selector", () => {
    const selectors = testSelectors();
    delete selectors["status.mode"];
    const raw = { ...rawTestConfig(), selectors };
    expect(() => buildConfig(raw)).toThrow("selectors.status.mode: Required");
  });

  it("accepts a map without the optional selectors", () => {
    const selectors = testSelectors();
    delete selectors["device.menu"];
    delete selectors["mode_menu.confirm"];
    const config = buildConfig({ ...rawTestConfig(), selectors });
    expect(config.selectors.has("device.menu")).toBe(false);
    expect(config.selectors.has("mode_menu.open")).toBe(true);
  });

  it("rejects badly named thermostats", () => {
    const raw = { ...rawTestConfig(), thermostats: { "Main Floor": "tstat-main" } };
    expect(() => buildConfig(raw)).toThrow(/lower-case kebab identifiers/);
  });

  it("layers files, environment and overrides", async () => {
    const { credentials: _credentials, ...withoutCredentials } = rawTestConfig();
    await writeFile(join(dir, "default.json"), JSON.stringify(withoutCredentials), "utf8");
    await writeFile(
      join(dir, "local.json"),
      JSON.stringify({ credentials: { username: "owner@example.test", password: "file-secret" } }),
      "utf8"
    );

    const config = loadConfig({
      configDir: dir,
      env: { ECOBEE_PASSWORD: "test-secret", ECOBEE_HEADLESS: "false", ECOBEE_MAX_RETRY_ATTEMPTS: "5" },
      overrides: { logLevel: "debug", retry: { baseDelayMs: 10 } }
    });

    expect(config.credentials).toEqual({ username: "owner@example.test", password: "test-secret" });
    expect(config.browser.headless).toBe(false);
    expect(config.browser.userAgent).toMatch(/^Mozilla\/5\.0 .* Chrome\/[\d.]+ Safari\/537\.36$/);
    expect(config.retry).toEqual({ maxAttempts: 5, baseDelayMs: 10, backoffMultiplier: 2 });
    expect(config.logLevel).toBe("debug");
  });

  it("loads a dotenv file into the environment", async () => {
    const envFile = join(dir, ".env");
    await writeFile(envFile, "ECOBEE_DOTENV_USERNAME=owner@example.test\n", "utf8");

    try {
      expect(loadDotEnv(envFile)).toBe(true);
      expect(process.env.ECOBEE_DOTENV_USERNAME).toBe("owner@example.test");
    } finally {
      delete process.env.ECOBEE_DOTENV_USERNAME;
    }
    expect(loadDotEnv(join(dir, "missing.env"))).toBe(false);
  });

  it("reports unreadable config files", async () => {
    await writeFile(join(dir, "config.json"), "{ not json", "utf8");
    expect(() => loadConfig({ configDir: dir, env: {} })).toThrow(/Failed to read config file/);
  });

  it("loads the shipped default configuration once credentials are supplied", () => {
    const config = loadConfig({
      configDir: "config",
      env: { ECOBEE_USERNAME: "owner@example.test", ECOBEE_PASSWORD: "test-secret" }
    });
    expect(Object.keys(config.thermostats)).toEqual(["main-floor", "upstairs"]);
    expect(config.selectors.resolve("device.option", { deviceId: "abc" }).value).toBe(
      "[data-qa='device-option'][data-thermostat-id='abc']"
    );
  });

  it("maps environment variables onto config paths", () => {
    expect(envOverrides({ ECOBEE_API_PORT: "8080", ECOBEE_DIAGNOSTICS: "off", ECOBEE_LOG_LEVEL: "" })).toEqual({
      server: { port: 8080 },
      diagnostics: { enabled: false }
    });
  });

  it("parses boolean flags", () => {
    expect(parseBooleanFlag("YES")).toBe(true);
    expect(parseBooleanFlag(" off ")).toBe(false);
    expect(parseBooleanFlag("maybe")).toBeUndefined();
  });
});
