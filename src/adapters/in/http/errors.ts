import type { DomainError, DomainErrorType } from "../../../domain/models/errors.ts";

/**
 * Common interface for API error responses
 * @template E - Type of error details
 */
export interface ApiErrorResponse<E = Record<string, unknown>> {
  status: "error";
  message: string;
  error?: E;
}

export function createErrorResponse<E = Record<string, unknown>>(
  message: string,
  error?: E,
): ApiErrorResponse<E> {
  return {
    status: "error",
    message,
    error,
  };
}

export function domainErrorToResponse(
  error: DomainError,
): ApiErrorResponse<{ type: DomainErrorType; details?: unknown }> {
  return createErrorResponse(error.message, { type: error.type, details: error.details });
}
