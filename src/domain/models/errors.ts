export type DomainErrorType =
  | "validation" // Validation error (400)
  | "parse" // Parse error (400)
  | "not_found" // Resource not found (404)
  | "unauthorized" // Authentication error (401)
  | "rate_limit" // Rate limit (429)
  | "server" // Server error (500)
  | "external"; // External service error (502)

export interface DomainError {
  type: DomainErrorType;
  message: string;
  details?: unknown;
}

export type ErrorStatusCode = 400 | 401 | 404 | 429 | 500 | 502;

export function getErrorStatusCode(error: DomainError | { type: string }): ErrorStatusCode {
  switch (error.type) {
    case "validation":
    case "parse":
      return 400;
    case "not_found":
      return 404;
    case "unauthorized":
      return 401;
    case "rate_limit":
      return 429;
    case "external":
      return 502;
    case "server":
    default:
      return 500;
  }
}
