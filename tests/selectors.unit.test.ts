import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { SelectorMap } from "../src/selectors.js";
import { testSelectors } from "./helpers/testConfig.js";

describe("SelectorMap", () => {
  const selectors = SelectorMap.from(testSelectors());

  it("fills placeholders from params", () => {
    expect(selectors.resolve("device.option", { deviceId: "tstat-up" })).toEqual({
      name: "device.option",
      strategy: "css",
      value: "[data-device='tstat-up']",
      attribute: undefined
    });
  });

  it("fails when a placeholder has no param", () => {
    expect(() => selectors.resolve("device.option")).toThrow("Selector 'device.option' needs parameter 'deviceId'");
  });

  it("rejects names outside the known set", () => {
    expect(() => selectors.resolve("status.humidity")).toThrow(ConfigurationError);
    expect(() => selectors.resolve("status.humidity")).toThrow("Unknown selector name 'status.humidity'");
  });

  it("reports known but unconfigured optional names", () => {
    const raw = testSelectors();
    delete raw["temperature.confirm"];
    const partial = SelectorMap.from(raw);
    expect(partial.has("temperature.confirm")).toBe(false);
    expect(() => partial.resolve("temperature.confirm")).toThrow("Selector 'temperature.confirm' is not configured");
  });

  it("is immutable", () => {
    expect(Object.isFrozen(selectors)).toBe(true);
    expect(selectors.names()).toContain("portal.landmark");
    expect(selectors.names()).toHaveLength(23);
  });

  it("rejects invalid locator strategies", () => {
    const raw = { ...testSelectors(), "status.panel": { strategy: "jquery", value: "#status" } };
    expect(() => SelectorMap.from(raw)).toThrow(/^Invalid selector map: status\.panel\.strategy/);
  });
});
