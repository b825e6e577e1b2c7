import type { PipelineStage, TradingState } from "./types.js";

/** Invalid or missing configuration. Fatal before any stage runs. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigurationError";
  }
}

export type ToolFailureKind = "transient" | "permanent";

/**
 * Raised by data collaborators. Transient failures (timeouts, rate limits,
 * upstream 5xx) may succeed on a later attempt; permanent ones will not.
 */
export class ToolFailure extends Error {
  constructor(
    readonly kind: ToolFailureKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ToolFailure";
  }
}

/** An agent or synthesizer produced no usable output. */
export class SynthesisFailure extends Error {
  constructor(
    readonly agent: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${agent}: ${message}`, options);
    this.name = "SynthesisFailure";
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, what = "operation") {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * A run that could not reach a final decision. The partial trace is kept on
 * `state` (stage "aborted", `failure` filled in).
 */
export class PipelineAbortedError extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly reason: string,
    readonly state: TradingState,
    options?: { cause?: unknown },
  ) {
    super(`Pipeline aborted during ${stage}: ${reason}`, options);
    this.name = "PipelineAbortedError";
  }
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
