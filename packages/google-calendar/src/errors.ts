/**
 * Credential and session failures: missing or malformed key material,
 * rejected credentials, or a calendar component run before authentication.
 */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/**
 * A Google Calendar API call that did not succeed.
 */
export class RequestError extends Error {
  constructor(
    public readonly operation: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`${operation} failed: ${message}`, options);
    this.name = "RequestError";
  }
}

export class ParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
  }
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;

  if ("response" in error) {
    const { response } = error;
    if (
      typeof response === "object" &&
      response !== null &&
      "status" in response &&
      typeof response.status === "number"
    ) {
      return response.status;
    }
  }
  if ("code" in error && typeof error.code === "number") {
    return error.code;
  }
  return undefined;
}

/**
 * Wrap a failure raised by the API client, keeping it as `cause`.
 */
export function toRequestError(operation: string, error: unknown): RequestError {
  if (error instanceof RequestError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new RequestError(operation, message, readStatus(error), {
    cause: error,
  });
}
