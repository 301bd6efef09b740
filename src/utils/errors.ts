/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - Domain errors for request validation and the provider chain
 * - errorMessage: Message of any thrown value
 * - httpStatusFor: Maps errors onto response codes for the routes
 */

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Client input is missing or malformed. */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', false, context);
    this.name = 'ValidationError';
  }
}

/** A referenced resource (session, template) does not exist. */
export class NotFoundError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', false, context);
    this.name = 'NotFoundError';
  }
}

/** A single provider call failed; the chain moves on to the next provider. */
export class ProviderError extends AppError {
  constructor(
    public readonly provider: string,
    message: string,
    public readonly status?: number
  ) {
    super(`${provider}: ${message}`, 'PROVIDER_ERROR', true, { provider, status });
    this.name = 'ProviderError';
  }
}

/** No LLM provider has the configuration it needs. */
export class NoProviderAvailableError extends AppError {
  constructor() {
    super('Failed to initialize LLM', 'NO_PROVIDER_AVAILABLE');
    this.name = 'NoProviderAvailableError';
  }
}

/** Every configured provider failed or returned empty content. */
export class GenerationFailedError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GENERATION_FAILED', false, context);
    this.name = 'GenerationFailedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HTTP status for an error thrown out of a service call.
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  return 500;
}
