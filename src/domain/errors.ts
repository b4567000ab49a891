export type DocumentQaErrorCode =
  | "configuration_error"
  | "invalid_request"
  | "fetch_failed"
  | "extraction_failed"
  | "ai_service_failed";

export class DocumentQaError extends Error {
  constructor(
    message: string,
    public readonly code: DocumentQaErrorCode,
    public readonly statusCode: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DocumentQaError";
  }
}

export class ConfigurationError extends DocumentQaError {
  constructor(message: string) {
    super(message, "configuration_error", 500);
    this.name = "ConfigurationError";
  }
}

export class RequestValidationError extends DocumentQaError {
  constructor(message: string) {
    super(message, "invalid_request", 400);
    this.name = "RequestValidationError";
  }
}

/**
 * Unreachable URL, upstream error status, non-PDF payload, oversized payload or
 * a request deadline hit while downloading. Always fatal for the request.
 */
export class DocumentFetchError extends DocumentQaError {
  constructor(message: string, statusCode = 400, options?: { cause?: unknown }) {
    super(message, "fetch_failed", statusCode, options);
    this.name = "DocumentFetchError";
  }
}

export class DocumentExtractionError extends DocumentQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "extraction_failed", 422, options);
    this.name = "DocumentExtractionError";
  }
}

export class AiServiceError extends DocumentQaError {
  constructor(
    message: string,
    public readonly provider: string,
    options?: { cause?: unknown },
  ) {
    super(message, "ai_service_failed", 502, options);
    this.name = "AiServiceError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
