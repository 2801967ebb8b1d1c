/**
 * Error taxonomy for the stream bridge.
 *
 * Every class carries a machine-readable `code` next to the human message so
 * the HTTP layer can report `{ success: false, error }` without string matching.
 */

/** Missing or invalid startup configuration. The process does not start. */
export class ConfigError extends Error {
  public readonly fields: string[];

  constructor(message: string, fields: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.fields = fields;
  }
}

export type BuildErrorCode = "ENGINE_FAULT" | "LINK_FAILED" | "INCOMPLETE_GRAPH" | "CANCELLED";

/** The pipeline graph could not be constructed or linked. Session-fatal. */
export class BuildError extends Error {
  public readonly code: BuildErrorCode;
  /** Stages that never reported ready (INCOMPLETE_GRAPH only). */
  public readonly missingStages: string[];

  constructor(code: BuildErrorCode, message: string, missingStages: string[] = []) {
    super(message);
    this.name = "BuildError";
    this.code = code;
    this.missingStages = missingStages;
  }
}

export type NegotiationErrorCode =
  | "BUSY"
  | "INVALID_SDP"
  | "TIMEOUT"
  | "CANCELLED"
  | "BUILD_FAILED"
  | "ENGINE_FAULT";

/** Offer/answer exchange failed. Session-fatal. */
export class NegotiationError extends Error {
  public readonly code: NegotiationErrorCode;

  constructor(code: NegotiationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NegotiationError";
    this.code = code;
  }
}

/** A remote candidate could not be applied. Logged, never reported. */
export class IceApplyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IceApplyError";
  }
}

/** The capture stage could not deliver a frame. Feeds the watchdog. */
export class CaptureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaptureError";
  }
}

/** A cross-domain wait outlived its deadline. */
export class EngineTimeoutError extends Error {
  public readonly label: string;

  constructor(label: string, timeoutMs: number) {
    super(`${label} did not complete within ${timeoutMs}ms`);
    this.name = "EngineTimeoutError";
    this.label = label;
  }
}

/** A cross-domain wait was abandoned by its caller. */
export class EngineCancelledError extends Error {
  public readonly label: string;

  constructor(label: string) {
    super(`${label} was cancelled`);
    this.name = "EngineCancelledError";
    this.label = label;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
