/**
 * Process-wide pino logger.
 * Emoji console lines by default, JSON lines with LOG_PRETTY=false.
 */
import pino from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = pino.Level;

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const LEVEL_ICONS: Partial<Record<string, string>> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  sync: '🔄',
  startup: '🚀',
} as const;

// Scalar fields shown after the message in pretty output, in this order
const INLINE_KEYS = ['hostname', 'ip', 'stage', 'status', 'interval', 'logLevel', 'tick', 'action', 'ticks', 'signal', 'count'];

export function inlineFields(log: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const key of INLINE_KEYS) {
    const value = log[key];
    if (typeof value === 'string' || typeof value === 'number') {
      parts.push(`${key}=${value}`);
    }
  }
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function prettyLine(log: Record<string, unknown>, messageKey: string): string {
  const icon = LEVEL_ICONS[String(log['level'])] ?? 'ℹ️';
  const service = log['service'];
  const prefix = typeof service === 'string' ? `[${service}] ` : '';
  return `${icon} ${prefix}${String(log[messageKey])}${inlineFields(log)}`;
}

function initialLevel(): LogLevel {
  const wanted = process.env['LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((l) => l === wanted) ?? 'info';
}

const loggerOptions: pino.LoggerOptions = {
  level: initialLevel(),
  // replaces pino's default pid and machine hostname bindings
  base: { app: 'namecom-ddns' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

export const logger: pino.Logger =
  process.env['LOG_PRETTY'] === 'false'
    ? pino(loggerOptions)
    : pino(
        loggerOptions,
        pretty({
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'app',
          hideObject: true,
          messageFormat: prettyLine,
          customPrettifiers: { level: () => '' },
        })
      );

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}
