/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error'];

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

function parseLevel(raw: string | undefined): LogLevel {
  const candidate = (raw || 'info').toLowerCase();
  return LOG_LEVELS.find(level => level === candidate) ?? 'info';
}

export function getLoggingConfig(): LoggingConfig {
  const isDev = process.env.NODE_ENV !== 'production';

  return {
    level: parseLevel(process.env.LOG_LEVEL),
    pretty: process.env.LOG_PRETTY === 'true' || isDev,
    // File output is opt-in; the rotation timer would otherwise outlive short-lived processes
    toFile: process.env.LOG_TO_FILE === 'true',
    dir: process.env.LOG_DIR || './logs',
    rotateDays: Number(process.env.LOG_ROTATE_DAYS || 14),
    console: process.env.LOG_CONSOLE !== 'false',
    redactFields: (process.env.LOG_REDACT_FIELDS ||
      'authorization,cookie,key,token,password,apiKey,api_key,secret,*.apiKey,*.key')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
