type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const IS_TEST = typeof process !== "undefined" && process.env.NODE_ENV === "test";

let verbose = typeof process !== "undefined" && Boolean(process.env.SHELLCAST_DEBUG);

export function setClientVerboseLogging(enabled: boolean): void {
  verbose = enabled;
}

// Client diagnostics go to stderr; stdout carries the remote terminal.
function writeLog(level: LogLevel, message: string, context?: LogContext): void {
  if (IS_TEST) return;
  if (level === "debug" && !verbose) return;
  console.error(`[${level.toUpperCase()}] ${message}`, context ?? "");
}

export function logDebug(message: string, context?: LogContext): void {
  writeLog("debug", message, context);
}

export function logInfo(message: string, context?: LogContext): void {
  writeLog("info", message, context);
}

export function logWarn(message: string, context?: LogContext): void {
  writeLog("warn", message, context);
}

export function logError(message: string, error?: unknown, context?: LogContext): void {
  const errorContext: LogContext = { ...context };
  if (error !== undefined) {
    if (error instanceof Error) {
      errorContext.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else {
      errorContext.error = error;
    }
  }
  writeLog("error", message, errorContext);
}
