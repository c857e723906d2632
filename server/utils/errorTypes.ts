export class ShellcastError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigError extends ShellcastError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/**
 * Spawn failures and adapter misuse. `fatal` marks programming errors
 * (such as resizing through an adapter built for another platform).
 */
export class ProcessError extends ShellcastError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    cause?: Error,
    public readonly fatal = false
  ) {
    super(message, context, cause);
  }
}

/**
 * Raised for unknown or already-closed session ids. Callers racing a
 * teardown should treat it as a no-op.
 */
export class SessionNotFoundError extends ShellcastError {
  constructor(sessionId: string) {
    super("PTY session not found", { sessionId });
  }
}

export class ValidationError extends ShellcastError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, context, cause);
  }
}

/** Request body exceeded the configured limit. */
export class PayloadTooLargeError extends ShellcastError {
  constructor(limitBytes: number) {
    super("Request body too large", { limitBytes });
  }
}

export function isShellcastError(error: unknown): error is ShellcastError {
  return error instanceof ShellcastError;
}

function errnoCode(error: unknown): string | undefined {
  if (!error || typeof error !== "object" || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}

/** For embedding code that decides whether to retry a failed call; nothing in the server retries on its own. */
export function isTransientError(error: unknown): boolean {
  const code = errnoCode(error);
  return ["EBUSY", "EAGAIN", "ETIMEDOUT", "ECONNRESET", "ENOTFOUND"].includes(code ?? "");
}

export function getUserMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Handles circular references safely to prevent infinite recursion
 */
export function getErrorDetails(
  error: unknown,
  seen = new WeakSet<Error>()
): Record<string, unknown> {
  const details: Record<string, unknown> = {
    message: getUserMessage(error),
  };

  if (error instanceof Error) {
    details.name = error.name;
    details.stack = error.stack;
  }

  if (isShellcastError(error)) {
    details.context = error.context;
    if (error.cause && !seen.has(error.cause)) {
      seen.add(error.cause);
      details.cause = getErrorDetails(error.cause, seen);
    }
  }

  if (error && typeof error === "object") {
    const code = errnoCode(error);
    if (code) details.code = code;
    if ("errno" in error && typeof error.errno === "number") details.errno = error.errno;
    if ("syscall" in error && typeof error.syscall === "string") details.syscall = error.syscall;
    if ("path" in error && typeof error.path === "string") details.path = error.path;
  }

  return details;
}
