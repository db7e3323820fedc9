/**
 * Error taxonomy for novelty evaluation.
 *
 * Every error carries a stable `code` and the HTTP `statusCode` the API maps it to.
 * Empty candidate lists are a valid outcome and have no error type.
 */

export type PitchcheckErrorCode =
  | "VALIDATION_ERROR"
  | "KEYWORD_GENERATION_EXHAUSTED"
  | "PROVIDER_ERROR"
  | "TIMEOUT";

export class PitchcheckError extends Error {
  constructor(
    message: string,
    public readonly code: PitchcheckErrorCode,
    public readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PitchcheckError";
  }
}

/** Malformed caller input (repository URL, empty summary). Never retried. */
export class ValidationError extends PitchcheckError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR", 400);
    this.name = "ValidationError";
  }
}

export class KeywordGenerationExhaustedError extends PitchcheckError {
  constructor(
    public readonly attempts: number,
    public readonly lastResponse: string | null,
  ) {
    super(`Could not generate keywords in ${attempts} attempts`, "KEYWORD_GENERATION_EXHAUSTED", 502);
    this.name = "KeywordGenerationExhaustedError";
  }
}

/**
 * An external collaborator was unavailable or answered with something we could not decode.
 */
export class TransientProviderError extends PitchcheckError {
  public readonly provider: string;
  public readonly status: number | null;
  /** Provider-specific classification, e.g. LLM_AUTH_ERROR */
  public readonly reason: string | null;

  constructor(params: {
    provider: string;
    message: string;
    status?: number | null;
    reason?: string | null;
    cause?: unknown;
  }) {
    super(params.message, "PROVIDER_ERROR", 502, { cause: params.cause });
    this.name = "TransientProviderError";
    this.provider = params.provider;
    this.status = params.status ?? null;
    this.reason = params.reason ?? null;
  }
}

export class TimeoutError extends PitchcheckError {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT", 504);
    this.name = "TimeoutError";
  }
}

export function isPitchcheckError(error: unknown): error is PitchcheckError {
  return error instanceof PitchcheckError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
