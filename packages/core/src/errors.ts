/**
 * Error classes for the highlight engine.
 *
 * Only structurally invalid input raises. "Found nothing" results are
 * returned as empty collections by the detectors and the renderer.
 */

/**
 * Base error for all streamcut failures
 */
export class StreamcutError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "StreamcutError";
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A comment log with an unsupported extension or malformed content
 */
export class FormatError extends StreamcutError {
  constructor(path: string, message: string) {
    super(`${message}: ${path}`, "FORMAT_ERROR", { path });
    this.name = "FormatError";
  }
}

/**
 * A required input file that does not exist
 */
export class InputNotFoundError extends StreamcutError {
  constructor(kind: string, path: string) {
    super(`${kind} not found: ${path}`, "INPUT_NOT_FOUND", { kind, path });
    this.name = "InputNotFoundError";
  }
}

/**
 * A media tool invocation that exited non-zero, could not start, or timed out
 */
export class MediaToolError extends StreamcutError {
  public readonly exitCode: number | null;
  public readonly stderr: string;
  public readonly timedOut: boolean;

  constructor(
    operation: string,
    message: string,
    options: { exitCode?: number | null; stderr?: string; timedOut?: boolean } = {}
  ) {
    super(`${operation} failed: ${message}`, options.timedOut ? "MEDIA_TIMEOUT" : "MEDIA_TOOL_ERROR", {
      operation,
      exitCode: options.exitCode ?? null,
    });
    this.name = "MediaToolError";
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? "";
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * A digest that cannot be assembled, e.g. no highlight clips
 */
export class DigestError extends StreamcutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "DIGEST_ERROR", details);
    this.name = "DigestError";
  }
}

/** Extract a printable message from an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
