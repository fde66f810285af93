/**
 * Base application error with an HTTP status code.
 * Handlers throw these; the router's catch-all turns them into the
 * matching HTTP response.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "AppError";
    this.statusCode = statusCode;
    this.details = details;
    // Restore prototype chain (required when extending built-ins in TS)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Convenience subclasses ─────────────────────────────────────────────

export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class MethodNotAllowedError extends AppError {
  public readonly allowedMethods: string[];

  constructor(method: string, path: string, allowedMethods: string[]) {
    super(405, `Method ${method} is not allowed on ${path}`, {
      allowedMethods,
    });
    this.name = "MethodNotAllowedError";
    this.allowedMethods = allowedMethods;
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal server error") {
    super(500, message);
    this.name = "InternalError";
  }
}
