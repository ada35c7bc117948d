/**
 * Structured Logger with Pino
 *
 * - Fast JSON logging with Pino
 * - Pretty console output outside production
 * - Daily rotated log files when LOG_TO_FILE=true
 * - Automatic secret redaction
 * - Request/session tracking via child loggers
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

let fileStream: rfs.RotatingFileStream | undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const streams: pino.StreamEntry[] = [];
if (config.console && config.level !== 'silent') {
  streams.push({
    level: config.level,
    stream: config.pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}
if (fileStream && config.level !== 'silent') {
  streams.push({ level: config.level, stream: fileStream });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = typeof logger;
