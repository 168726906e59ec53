/**
 * Logging helpers
 *
 * Builds the root pino logger (components receive `logger.child({ component })`)
 * and a lazy variant of `logger[level]()` for hot paths.
 */

import type { Logger, Level, LevelWithSilent } from 'pino';
import { pino } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

const LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string | undefined): value is LevelWithSilent {
  return value !== undefined && LEVELS.some((level) => level === value);
}

/**
 * Create the root logger. `INFERENCE_LOG_LEVEL` overrides the configured level.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.INFERENCE_LOG_LEVEL;
  const level = isLogLevel(envLevel) ? envLevel : options.level ?? 'info';

  return pino({
    name: options.name ?? 'local-inference-core',
    level,
  });
}

/**
 * Child logger tagged with a component name, or undefined without a parent.
 */
export function componentLogger(parent: Logger | undefined, component: string): Logger | undefined {
  return parent?.child({ component });
}

/**
 * Build the log context only when `level` is enabled.
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ key, tier }), 'Cache hit');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: Level,
  contextBuilder: () => Record<string, unknown>,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
