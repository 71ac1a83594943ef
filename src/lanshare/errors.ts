export class ProtocolError extends Error {
  constructor(
    public code: string,
    message: string,
  ) {
    super(message);
  }
}

export class HttpError extends Error {
  constructor(
    public status: number,
    public code: string,
    message: string,
  ) {
    super(message);
  }
}

export class AuthError extends HttpError {
  constructor(message = "Invalid access code") {
    super(401, "unauthorized", message);
  }
}

export class AuthorizationError extends HttpError {
  constructor(message = "Only the host can do that") {
    super(403, "forbidden", message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "File not found") {
    super(404, "not_found", message);
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, "invalid_request", message);
  }
}

export class PayloadTooLargeError extends HttpError {
  constructor(message = "Upload too large") {
    super(413, "payload_too_large", message);
  }
}

export class RateLimitedError extends HttpError {
  constructor(message = "Too many failed attempts") {
    super(429, "rate_limited", message);
  }
}

/** Disk failure; the underlying message is surfaced as-is. */
export class StorageError extends HttpError {
  constructor(cause: unknown) {
    super(500, "storage_error", cause instanceof Error ? cause.message : String(cause));
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}
