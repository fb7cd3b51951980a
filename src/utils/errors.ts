/**
 * Error taxonomy. Operational errors are expected failures a caller can
 * react to; non-operational ones indicate a misconfigured process.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly isOperational: boolean = true,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
    if (cause?.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      ...(this.cause
        ? {
            cause: {
              name: this.cause.name,
              message: this.cause.message,
            },
          }
        : {}),
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "VALIDATION_ERROR", 400, true, cause);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, cause?: Error) {
    super(`${resource} not found`, "NOT_FOUND", 404, true, cause);
  }
}

/** Invalid component wiring (e.g. a router with no providers). Fatal. */
export class ConstructionError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "CONSTRUCTION_ERROR", 500, false, cause);
  }
}

/** A single provider failed a call or a liveness check. Recorded, not raised. */
export class ProviderUnavailableError extends AppError {
  constructor(
    message: string,
    public readonly endpoint: string,
    cause?: Error
  ) {
    super(message, "PROVIDER_UNAVAILABLE", 503, true, cause);
  }
}

export class AllProvidersExhaustedError extends AppError {
  constructor(
    public readonly attempts: number,
    public readonly lastEndpoint: string | null,
    cause?: Error
  ) {
    super(
      `All providers failed after ${attempts} attempts. Last error: ${cause?.message ?? "unknown"}`,
      "ALL_PROVIDERS_EXHAUSTED",
      503,
      true,
      cause
    );
  }

  toJSON() {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
    };
  }
}

export class TransactionBuildError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "TRANSACTION_BUILD_ERROR", 400, true, cause);
  }
}

export class TransactionSubmitError extends AppError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: Error
  ) {
    super(message, "TRANSACTION_SUBMIT_ERROR", 502, true, cause);
  }
}

export class BlockchainError extends AppError {
  constructor(
    message: string,
    public readonly txSignature?: string,
    cause?: Error
  ) {
    super(message, "BLOCKCHAIN_ERROR", 500, true, cause);
  }

  toJSON() {
    return {
      ...super.toJSON(),
      txSignature: this.txSignature,
    };
  }
}

export class RequestTimeoutError extends AppError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
    cause?: Error
  ) {
    super(`Request timed out after ${timeoutMs}ms`, "REQUEST_TIMEOUT", 504, true, cause);
  }
}

export class HttpStatusError extends AppError {
  constructor(public readonly status: number) {
    super(`HTTP ${status}`, "HTTP_STATUS", 502, true);
  }
}

export class IdentityPoolError extends AppError {
  constructor(message: string, cause?: Error) {
    super(message, "IDENTITY_POOL_ERROR", 500, true, cause);
  }
}

export class OperationCancelledError extends AppError {
  constructor(message: string = "Operation cancelled") {
    super(message, "OPERATION_CANCELLED", 499, true);
  }
}

/**
 * Type guard to check if error is operational
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) return error;
  return new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return toError(error).message;
}
