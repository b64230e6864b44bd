import { describe, expect, it } from "vitest";
import { createLogger, redactSecrets, silentLogger } from "../src/logger.js";

describe("createLogger", () => {
  it("writes plain JSON to the requested stream at the requested level", () => {
    const logger = createLogger({ level: "warn", pretty: false, stream: "stderr" });

    expect(logger.level).toBe("warn");
    expect(logger.isLevelEnabled("info")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  it("defaults to info", () => {
    expect(createLogger({ pretty: false }).level).toBe("info");
    expect(silentLogger().level).toBe("silent");
  });
});

describe("redactSecrets", () => {
  it("replaces every occurrence and ignores empty secrets", () => {
    expect(redactSecrets("user=owner@example.test&pw=test-secret&again=test-secret", ["test-secret", "", "owner@example.test"])).toBe(
      "user=[redacted]&pw=[redacted]&again=[redacted]"
    );
  });
});
