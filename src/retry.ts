import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError, errorMessage, isPortalError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { DiagnosticArtifact, DiagnosticContext, RetryContext, RetrySettings } from "./types.js";

export type RetryVerdict = "retryable" | "fatal";

export type RetryClassifier = (error: unknown, attempt: number) => RetryVerdict;

export interface ArtifactSink {
  capture(context: DiagnosticContext): Promise<DiagnosticArtifact | undefined>;
}

export interface RetryPolicyOptions {
  settings: RetrySettings;
  logger: Logger;
  diagnostics?: ArtifactSink;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Retry whatever the error itself declares retryable. */
export const classifyPortalError: RetryClassifier = (error) =>
  isPortalError(error) && error.retryable ? "retryable" : "fatal";

/**
 * Bounded retry with exponential backoff around an operation closure.
 *
 * The error that leaves `execute` is always the error the operation raised
 * (annotated with attempts and the last artifact id), except for foreign
 * errors that exhaust their retries, which are wrapped in RetryExhaustedError.
 */
export class RetryPolicy {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
  }

  get settings(): RetrySettings {
    return { ...this.options.settings };
  }

  withOverrides(overrides: Partial<RetrySettings>): RetryPolicy {
    return new RetryPolicy({
      ...this.options,
      settings: { ...this.options.settings, ...overrides }
    });
  }

  delayFor(attempt: number): number {
    const { baseDelayMs, backoffMultiplier } = this.options.settings;
    return Math.round(baseDelayMs * Math.pow(backoffMultiplier, Math.max(0, attempt - 1)));
  }

  async execute<T>(
    operation: (context: RetryContext) => Promise<T>,
    classify: RetryClassifier = classifyPortalError,
    meta: { operation: string } = { operation: "operation" }
  ): Promise<T> {
    const { maxAttempts } = this.options.settings;
    const startedAt = this.now();

    for (let attempt = 1; ; attempt += 1) {
      const context: RetryContext = {
        ...this.options.settings,
        operation: meta.operation,
        attempt,
        elapsedMs: this.now() - startedAt
      };

      try {
        return await operation(context);
      } catch (error) {
        // Already settled by an inner policy: pass through untouched.
        if (isPortalError(error) && error.terminal) {
          throw error;
        }

        const verdict = classify(error, attempt);
        const artifact = await this.options.diagnostics?.capture({
          operation: meta.operation,
          attempt,
          error
        });

        if (verdict === "fatal") {
          this.options.logger.error(
            { operation: meta.operation, attempt, kind: kindOf(error), error: errorMessage(error) },
            "operation failed with a fatal error"
          );
          throw settle(error, meta.operation, attempt, artifact);
        }

        if (attempt >= maxAttempts) {
          this.options.logger.error(
            { operation: meta.operation, attempts: attempt, kind: kindOf(error), error: errorMessage(error) },
            "retries exhausted"
          );
          if (!isPortalError(error)) {
            throw settle(
              new RetryExhaustedError(`${meta.operation} failed after ${attempt} attempts: ${errorMessage(error)}`, {
                operation: meta.operation,
                cause: error
              }),
              meta.operation,
              attempt,
              artifact
            );
          }
          throw settle(error, meta.operation, attempt, artifact);
        }

        const waitMs = this.delayFor(attempt);
        this.options.logger.warn(
          {
            operation: meta.operation,
            attempt,
            maxAttempts,
            delayMs: waitMs,
            kind: kindOf(error),
            error: errorMessage(error),
            artifactId: artifact?.id
          },
          "retrying after failure"
        );
        await this.sleep(waitMs);
      }
    }
  }
}

function settle(error: unknown, operation: string, attempts: number, artifact: DiagnosticArtifact | undefined): unknown {
  if (!isPortalError(error)) {
    return error;
  }
  error.operation = error.operation ?? operation;
  error.attempts = attempts;
  error.artifactId = artifact?.id ?? error.artifactId;
  error.terminal = true;
  return error;
}

function kindOf(error: unknown): string {
  return isPortalError(error) ? error.kind : "unclassified";
}
