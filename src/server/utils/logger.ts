import pino from 'pino';
import type { Logger } from 'pino';
import { AsyncLocalStorage } from 'async_hooks';

/**
 * AsyncLocalStorage for run context (run ID, stage name, etc.)
 */
export const runContext = new AsyncLocalStorage<Record<string, unknown>>();

/**
 * Get current run context
 */
export function getRunContext(): Record<string, unknown> {
  return runContext.getStore() || {};
}

const LEVELS: ReadonlySet<string> = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Map a configured level name (ERROR, WARN, INFO, DEBUG, ...) onto a pino level
 */
export function toPinoLevel(level: string | undefined): pino.LevelWithSilent | undefined {
  if (!level) return undefined;
  const normalized = level.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  return isPinoLevel(normalized) ? normalized : undefined;
}

function isPinoLevel(value: string): value is pino.LevelWithSilent {
  return LEVELS.has(value);
}

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const isTest = nodeEnv === 'test' || process.env.VITEST !== undefined;
  const isDevelopment = nodeEnv !== 'production' && !isTest;
  const defaultLevel = isTest ? 'silent' : isDevelopment ? 'debug' : 'info';
  const logLevel = toPinoLevel(process.env.LOG_LEVEL) ?? defaultLevel;

  return pino({
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'newslookout',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Apply the level named in the configuration file, unless LOG_LEVEL pins it
 */
export function applyConfiguredLogLevel(level: string | undefined): void {
  if (process.env.LOG_LEVEL) return;
  const pinoLevel = toPinoLevel(level);
  if (pinoLevel) {
    logger.level = pinoLevel;
  }
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  const context = { ...getRunContext(), ...additionalContext };
  return logger.child(context);
}
