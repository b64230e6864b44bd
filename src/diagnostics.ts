import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { errorMessage, isPortalError } from "./errors.js";
import { redactSecrets, type Logger } from "./logger.js";
import type { DiagnosticArtifact, DiagnosticContext, DiagnosticsSettings, ResolvedLocator } from "./types.js";

/** The part of the page a capture needs. */
export interface CaptureSource {
  content(): Promise<string>;
  screenshot(masked: readonly ResolvedLocator[]): Promise<Buffer>;
  url(): string;
}

export interface DiagnosticsCollectorOptions {
  settings: DiagnosticsSettings;
  /** Returns the live page, or undefined when no browser is open. */
  source: () => CaptureSource | undefined;
  secrets?: readonly string[];
  /** Elements that may show credentials; hidden in screenshots. */
  masked?: readonly ResolvedLocator[];
  logger: Logger;
  now?: () => number;
}

const artifactSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string().min(1),
  operation: z.string(),
  attempt: z.number().int().nonnegative(),
  errorSummary: z.string(),
  url: z.string().optional(),
  snapshotPath: z.string().optional(),
  capturePath: z.string().optional()
});

const ARTIFACT_EXTENSIONS = [".html", ".png", ".json"] as const;

/**
 * Captures failure evidence (rendered page + screenshot + metadata) into a
 * bounded directory. Oldest artifacts are evicted first.
 */
export class DiagnosticsCollector {
  private readonly dir: string;
  private readonly artifacts: DiagnosticArtifact[] = [];
  private readonly now: () => number;
  private sequence = 0;

  constructor(private readonly options: DiagnosticsCollectorOptions) {
    this.dir = resolve(options.settings.dir);
    this.now = options.now ?? Date.now;
  }

  get enabled(): boolean {
    return this.options.settings.enabled;
  }

  get directory(): string {
    return this.dir;
  }

  list(): DiagnosticArtifact[] {
    return [...this.artifacts];
  }

  /** Re-index artifacts left by a previous run, then apply the retention bound. */
  async load(): Promise<void> {
    if (!this.enabled) {
      return;
    }

    let fileNames: string[];
    try {
      fileNames = await readdir(this.dir);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    const known = new Set(this.artifacts.map((artifact) => artifact.id));
    for (const fileName of fileNames.filter((name) => name.endsWith(".json"))) {
      try {
        const parsed = artifactSchema.safeParse(JSON.parse(await readFile(join(this.dir, fileName), "utf8")));
        if (parsed.success && !known.has(parsed.data.id)) {
          this.artifacts.push(parsed.data);
        }
      } catch (error) {
        this.options.logger.warn({ file: fileName, error: errorMessage(error) }, "skipping unreadable diagnostic metadata");
      }
    }

    this.artifacts.sort((left, right) => Date.parse(left.createdAt) - Date.parse(right.createdAt));
    await this.prune();
  }

  async capture(context: DiagnosticContext): Promise<DiagnosticArtifact | undefined> {
    if (!this.enabled) {
      return undefined;
    }

    try {
      return await this.writeArtifact(context);
    } catch (error) {
      this.options.logger.warn(
        { operation: context.operation, attempt: context.attempt, error: errorMessage(error) },
        "diagnostic capture failed"
      );
      return undefined;
    }
  }

  async prune(): Promise<void> {
    const cutoff = this.now() - this.options.settings.maxAgeMs;

    while (this.artifacts.length > 0) {
      const oldest = this.artifacts[0];
      const overCount = this.artifacts.length > this.options.settings.maxArtifacts;
      const expired = oldest !== undefined && Date.parse(oldest.createdAt) < cutoff;
      if (!oldest || (!overCount && !expired)) {
        break;
      }

      this.artifacts.shift();
      await Promise.all(
        ARTIFACT_EXTENSIONS.map((extension) => rm(join(this.dir, `${oldest.id}${extension}`), { force: true }))
      );
      this.options.logger.debug({ artifactId: oldest.id, expired }, "evicted diagnostic artifact");
    }
  }

  private async writeArtifact(context: DiagnosticContext): Promise<DiagnosticArtifact> {
    const secrets = this.options.secrets ?? [];
    const createdAtMs = this.now();
    const id = [
      new Date(createdAtMs).toISOString().replace(/[:.]/g, "-"),
      slug(context.operation),
      `a${context.attempt}`,
      String(++this.sequence).padStart(4, "0")
    ].join("_");

    await mkdir(this.dir, { recursive: true });

    const artifact: DiagnosticArtifact = {
      id,
      createdAt: new Date(createdAtMs).toISOString(),
      operation: context.operation,
      attempt: context.attempt,
      errorSummary: redactSecrets(summarizeError(context.error), secrets)
    };

    const source = this.options.source();
    if (source) {
      artifact.url = redactSecrets(source.url(), secrets);

      try {
        const html = redactSecrets(await source.content(), secrets);
        artifact.snapshotPath = join(this.dir, `${id}.html`);
        await writeFile(artifact.snapshotPath, html, "utf8");
      } catch (error) {
        artifact.snapshotPath = undefined;
        this.options.logger.warn({ artifactId: id, error: errorMessage(error) }, "page snapshot capture failed");
      }

      try {
        const image = await source.screenshot(this.options.masked ?? []);
        artifact.capturePath = join(this.dir, `${id}.png`);
        await writeFile(artifact.capturePath, image);
      } catch (error) {
        artifact.capturePath = undefined;
        this.options.logger.warn({ artifactId: id, error: errorMessage(error) }, "screenshot capture failed");
      }
    }

    await writeFile(join(this.dir, `${id}.json`), JSON.stringify(artifact, null, 2), "utf8");
    this.artifacts.push(artifact);
    await this.prune();

    this.options.logger.info(
      { artifactId: id, operation: context.operation, attempt: context.attempt },
      "captured diagnostic artifact"
    );
    return artifact;
  }
}

function summarizeError(error: unknown): string {
  const message = errorMessage(error).split("\n")[0] ?? "";
  return isPortalError(error) ? `${error.kind}: ${message}` : message;
}

function slug(input: string): string {
  return input.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "") || "operation";
}
