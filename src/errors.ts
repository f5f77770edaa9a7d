/**
 * Application error hierarchy
 *
 * Every error raised on purpose by the bot derives from AppError so handlers
 * can tell operational failures (bad input, missing store, backend outage)
 * from programming errors.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, code: string = "INTERNAL_ERROR", isOperational: boolean = true) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR", false);
  }
}

export class ValidationError extends AppError {
  public readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION_ERROR");
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
  }
}

export class AccessDeniedError extends AppError {
  constructor(message: string = "Access denied.") {
    super(message, "ACCESS_DENIED");
  }
}

/** A remote backend (Gemini, NotebookLM, Drive) failed or returned nothing usable */
export class BackendError extends AppError {
  public readonly backend: string;

  constructor(backend: string, message: string) {
    super(message, "BACKEND_ERROR");
    this.backend = backend;
  }
}

export class TimeoutError extends AppError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, "TIMEOUT");
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Race a promise against a timer. The timer is cleared once the promise settles.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${Math.round(timeoutMs / 1000)}s`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
