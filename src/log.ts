// src/log.ts
// Centralized console logging for the relay

export interface LogContext {
  functionName?: string;
  requestId?: string;
  durationMs?: number;
  errorCode?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: Omit<LogContext, "functionName">): void;
  warn(message: string, context?: Omit<LogContext, "functionName">): void;
  error(message: string, error: unknown, context?: Omit<LogContext, "functionName">): void;
}

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

function prefix(context?: LogContext): string {
  return context?.requestId ? `[${context.requestId}] ` : "";
}

/**
 * Log info message with request-id
 */
export function logInfo(message: string, context?: LogContext): void {
  console.log(`${prefix(context)}[INFO] ${message}`, context ? JSON.stringify(context) : "");
}

/**
 * Log warning with request-id
 */
export function logWarn(message: string, context?: LogContext): void {
  console.warn(`${prefix(context)}[WARN] ${message}`, context ? JSON.stringify(context) : "");
}

/**
 * Log error with stack and request-id
 */
export function logError(message: string, error: unknown, context?: LogContext): void {
  const errorMessage = error instanceof Error ? error.message : String(error);
  const stackTrace = error instanceof Error ? error.stack : undefined;

  console.error(`${prefix(context)}[ERROR] ${message}`, {
    error: errorMessage,
    stack: stackTrace,
    ...context,
  });
}

/**
 * Create a scoped logger for a specific component
 */
export function createLogger(functionName: string): Logger {
  return {
    info: (message, context) => logInfo(message, { ...context, functionName }),
    warn: (message, context) => logWarn(message, { ...context, functionName }),
    error: (message, error, context) => logError(message, error, { ...context, functionName }),
  };
}
