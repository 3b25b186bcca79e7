import { redactAccessTokens } from "../utils/sanitizer-util.ts";
import type { LogMetadata } from "../types.ts";

export interface LoggerOptions {
  /**
   * Determines whether debug logs should be emitted.
   * Defaults to always logging debug messages.
   */
  shouldLogDebug?: () => boolean;
  /**
   * Allows overriding the timestamp generator, primarily for testing.
   */
  now?: () => string;
}

export interface StructuredLogger {
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(
    message: string,
    error?: unknown | null,
    metadata?: LogMetadata,
  ): void;
  debug(message: string, metadata?: LogMetadata): void;
}

export interface ServiceLogger {
  info?(message: string, metadata?: Record<string, unknown>): void;
  warn?(message: string, metadata?: Record<string, unknown>): void;
  error?(
    message: string,
    error?: Error | null,
    metadata?: Record<string, unknown>,
  ): void;
  debug?(message: string, metadata?: Record<string, unknown>): void;
}

const defaultNow = () => new Date().toISOString();

export function resolveServiceLogger(
  logger: ServiceLogger | undefined,
  fallback: Required<ServiceLogger>,
): Required<ServiceLogger> {
  if (!logger) {
    return fallback;
  }

  return {
    info: logger.info ?? fallback.info,
    warn: logger.warn ?? fallback.warn,
    error: logger.error ?? fallback.error,
    debug: logger.debug ?? fallback.debug,
  };
}

function normalizeError(error: unknown): Record<string, unknown> | undefined {
  if (!error) return undefined;

  if (error instanceof Error) {
    const normalized: Record<string, unknown> = {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
    if ("code" in error && typeof error.code === "string") {
      normalized.code = error.code;
    }
    return normalized;
  }

  return { details: error };
}

function write(
  consoleFn: (message?: unknown, ...optionalParams: unknown[]) => void,
  severity: "INFO" | "WARNING" | "ERROR" | "DEBUG",
  message: string,
  metadata: LogMetadata = {},
  now: () => string,
  error?: unknown | null,
): void {
  const payload: Record<string, unknown> = {
    severity,
    message,
    timestamp: now(),
    ...metadata,
  };

  const normalized = normalizeError(error ?? undefined);
  if (normalized) {
    payload.error = normalized;
  }

  try {
    consoleFn(redactAccessTokens(JSON.stringify(payload)));
  } catch (serializationError) {
    // Fallback to a safe console output if JSON serialization fails.
    consoleFn(
      JSON.stringify({
        severity: "ERROR",
        message: "Failed to serialize log payload",
        originalMessage: redactAccessTokens(message),
        timestamp: now(),
        serializationError: serializationError instanceof Error
          ? {
            message: serializationError.message,
            name: serializationError.name,
          }
          : String(serializationError),
      }),
    );
  }
}

/**
 * JSON-per-line console logger. Access tokens are redacted from every line.
 */
export function createStructuredLogger(
  options: LoggerOptions = {},
): StructuredLogger {
  const {
    shouldLogDebug = () => true,
    now = defaultNow,
  } = options;

  return {
    info(message, metadata) {
      write(console.log, "INFO", message, metadata, now);
    },
    warn(message, metadata) {
      write(console.warn, "WARNING", message, metadata, now);
    },
    error(message, error, metadata) {
      write(console.error, "ERROR", message, metadata, now, error);
    },
    debug(message, metadata) {
      if (!shouldLogDebug()) return;
      write(console.debug, "DEBUG", message, metadata, now);
    },
  };
}
