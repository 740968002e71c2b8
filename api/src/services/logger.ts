/**
 * Logging through the effect logger.
 *
 * Callers outside an Effect program get plain functions; each call runs a
 * single log effect with its annotations and the configured minimum level.
 */

import { Effect, Logger, LogLevel } from "effect";

export type LogAnnotations = Record<string, unknown>;

export interface ServiceLogger {
  debug(message: string, annotations?: LogAnnotations): void;
  info(message: string, annotations?: LogAnnotations): void;
  warn(message: string, annotations?: LogAnnotations): void;
  error(message: string, annotations?: LogAnnotations): void;
}

/**
 * Create a logger that drops messages below `minimumLevel`.
 *
 * @param minimumLevel - Lowest level written (default: Info)
 * @param logger - Replacement for the default effect logger, e.g. in tests
 */
export function createLogger(
  minimumLevel: LogLevel.LogLevel = LogLevel.Info,
  logger?: Logger.Logger<unknown, void>
): ServiceLogger {
  const emit = (log: Effect.Effect<void>, annotations: LogAnnotations) => {
    const program = log.pipe(
      Effect.annotateLogs(annotations),
      Logger.withMinimumLogLevel(minimumLevel)
    );
    Effect.runSync(
      logger
        ? program.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger)))
        : program
    );
  };

  return {
    debug: (message, annotations = {}) => emit(Effect.logDebug(message), annotations),
    info: (message, annotations = {}) => emit(Effect.logInfo(message), annotations),
    warn: (message, annotations = {}) => emit(Effect.logWarning(message), annotations),
    error: (message, annotations = {}) => emit(Effect.logError(message), annotations),
  };
}
