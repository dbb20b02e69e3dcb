export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The shared password is not configured. Access stays denied until it is.
 */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string) {
    super(message, 401);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 404);
  }
}

/**
 * Every candidate model failed, or a model answered with unusable JSON.
 */
export class ExtractionError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class ExportError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

/**
 * A single candidate model call failed. Consumed by the fallback loop.
 */
export class ModelCallError extends Error {
  constructor(
    public readonly model: string,
    message: string,
    public readonly providerStatus?: number
  ) {
    super(message);
    this.name = "ModelCallError";
  }

  get isAuthFailure(): boolean {
    return this.providerStatus === 401 || this.providerStatus === 403;
  }
}

export class ResultNotFoundError extends AppError {
  constructor() {
    super("No current result. Submit some input first", 404);
  }
}
