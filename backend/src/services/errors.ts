/**
 * Domain errors raised by the interview and portfolio services.
 * The HTTP error middleware maps them to status codes; services never see HTTP.
 */

/** Unknown (or evicted) interview session id. */
export class SessionNotFoundError extends Error {
  constructor(message = "Interview session not found") {
    super(message);
    this.name = "SessionNotFoundError";
  }
}

/** Answer for the wrong round, or summary before the last answer. */
export class InvalidSessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSessionStateError";
  }
}

/**
 * The LLM provider failed: error response, timeout, missing key or empty content.
 * `message` already carries the operation prefix, e.g. "Error generating question: ...".
 */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
