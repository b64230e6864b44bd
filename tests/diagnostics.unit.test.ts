import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DiagnosticsCollector, type CaptureSource } from "../src/diagnostics.js";
import { ElementNotFoundError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";
import type { DiagnosticsSettings } from "../src/types.js";

const PAGE: CaptureSource = {
  content: async () => '<input id="password" value="test-secret">',
  screenshot: async () => Buffer.from("fake-png"),
  url: () => "https://portal.test/home"
};

describe("DiagnosticsCollector", () => {
  let dir: string;
  let clock: number;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ecobee-diagnostics-"));
    clock = Date.parse("2026-01-05T10:00:00.000Z");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function collector(overrides: Partial<DiagnosticsSettings> = {}, source: CaptureSource | undefined = PAGE) {
    return new DiagnosticsCollector({
      settings: { enabled: true, dir, maxArtifacts: 3, maxAgeMs: 60_000, ...overrides },
      source: () => source,
      secrets: ["test-secret"],
      logger: silentLogger(),
      now: () => clock
    });
  }

  it("keeps the newest maxArtifacts and evicts the oldest first", async () => {
    const diagnostics = collector();
    const ids: string[] = [];
    for (let attempt = 1; attempt <= 8; attempt += 1) {
      clock += 1_000;
      const artifact = await diagnostics.capture({
        operation: "mode.set",
        attempt,
        error: new ElementNotFoundError("mode_menu.open", "menu missing")
      });
      ids.push(artifact?.id ?? "");
    }

    expect(diagnostics.list().map((artifact) => artifact.id)).toEqual(ids.slice(5));
    const files = (await readdir(dir)).sort();
    expect(files).toHaveLength(9);
    for (const evicted of ids.slice(0, 5)) {
      expect(files.some((file) => file.startsWith(evicted))).toBe(false);
    }
  });

  it("writes a redacted page, a screenshot and metadata", async () => {
    const artifact = await collector().capture({
      operation: "session.login",
      attempt: 2,
      error: new ElementNotFoundError("login.submit_button", "button missing\nstack detail")
    });

    expect(artifact).toMatchObject({
      operation: "session.login",
      attempt: 2,
      errorSummary: "element_not_found: button missing",
      url: "https://portal.test/home"
    });
    expect(artifact?.id).toBe("2026-01-05T10-00-00-000Z_session-login_a2_0001");
    expect(await readFile(join(dir, `${artifact?.id}.html`), "utf8")).toBe('<input id="password" value="[redacted]">');
    expect(await readFile(join(dir, `${artifact?.id}.png`), "utf8")).toBe("fake-png");
    const metadata: unknown = JSON.parse(await readFile(join(dir, `${artifact?.id}.json`), "utf8"));
    expect(metadata).toMatchObject({ id: artifact?.id, attempt: 2 });
  });

  it("hands the masked locators to the screenshot", async () => {
    const masks: string[][] = [];
    const page: CaptureSource = {
      ...PAGE,
      screenshot: async (masked) => {
        masks.push(masked.map((locator) => locator.name));
        return Buffer.from("fake-png");
      }
    };
    const diagnostics = new DiagnosticsCollector({
      settings: { enabled: true, dir, maxArtifacts: 3, maxAgeMs: 60_000 },
      source: () => page,
      masked: [
        { name: "login.username_field", strategy: "css", value: "#username" },
        { name: "login.password_field", strategy: "css", value: "#password" }
      ],
      logger: silentLogger(),
      now: () => clock
    });

    await diagnostics.capture({ operation: "session.login", attempt: 1, error: new Error("rejected") });

    expect(masks).toEqual([["login.username_field", "login.password_field"]]);
  });

  it("still records metadata when the page cannot be captured", async () => {
    const broken: CaptureSource = {
      content: async () => {
        throw new Error("page crashed");
      },
      screenshot: async () => {
        throw new Error("page crashed");
      },
      url: () => "about:blank"
    };
    const artifact = await collector({}, broken).capture({ operation: "status.read", attempt: 1, error: new Error("boom") });

    expect(artifact?.snapshotPath).toBeUndefined();
    expect(artifact?.capturePath).toBeUndefined();
    expect(artifact?.errorSummary).toBe("boom");
  });

  it("does nothing when disabled", async () => {
    const diagnostics = collector({ enabled: false });
    expect(await diagnostics.capture({ operation: "status.read", attempt: 1, error: new Error("boom") })).toBeUndefined();
    expect(await readdir(dir)).toEqual([]);
  });

  it("re-indexes artifacts from a previous run and drops expired ones", async () => {
    const first = collector();
    await first.capture({ operation: "status.read", attempt: 1, error: new Error("old") });
    clock += 30_000;
    await first.capture({ operation: "status.read", attempt: 1, error: new Error("recent") });

    clock += 45_000;
    const second = collector();
    await second.load();

    expect(second.list().map((artifact) => artifact.errorSummary)).toEqual(["recent"]);
  });
});
