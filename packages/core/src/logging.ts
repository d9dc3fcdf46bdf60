import { Cause, Effect, Logger, LogLevel } from "effect";
import type { MachineOptions } from "./types.js";

/**
 * Synchronous log sink for one machine definition.
 * Lines go through effect's logger, annotated with the machine id.
 */
export interface MachineLog {
  readonly debug: (message: string, annotations?: Record<string, unknown>) => void;
  readonly error: (message: string, cause: unknown) => void;
}

export function makeMachineLog(options: MachineOptions): MachineLog {
  const minimumLevel = options.debug ? LogLevel.Debug : LogLevel.Info;

  const run = (log: Effect.Effect<void>): void => {
    const annotated = log.pipe(
      Effect.annotateLogs("machine", options.id),
      Logger.withMinimumLogLevel(minimumLevel),
    );
    Effect.runSync(
      options.logger
        ? Effect.provide(annotated, Logger.replace(Logger.defaultLogger, options.logger))
        : annotated,
    );
  };

  return {
    debug: (message, annotations = {}) => {
      // Dropped before any effect is built
      if (!options.debug) return;
      run(Effect.logDebug(message).pipe(Effect.annotateLogs(annotations)));
    },
    error: (message, cause) => {
      run(Effect.logError(message, Cause.die(cause)));
    },
  };
}
