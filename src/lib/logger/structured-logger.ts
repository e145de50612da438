/**
 * Structured Logger with Pino
 *
 * Features:
 * - Fast JSON logging with Pino
 * - Size-rotated conversation log (opt-in via LOG_TO_FILE)
 * - Pretty console output outside production
 * - Automatic secret redaction
 * - Request tracking via child loggers
 */

import pino from 'pino';
import { createStream, type RotatingFileStream } from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

let fileStream: RotatingFileStream | undefined = undefined;
if (config.toFile) {
  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  fileStream = createStream(config.fileName, {
    size: config.rotateSize,
    path: logsDir,
    maxFiles: config.maxFiles,
    compress: 'gzip',
  });
}

function buildStreams(): pino.StreamEntry[] {
  const level = config.level;
  if (level === 'silent') return [];

  const streams: pino.StreamEntry[] = [];

  if (config.console) {
    streams.push({
      level,
      stream: config.pretty
        ? pinoPretty({
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          })
        : process.stdout,
    });
  }

  if (fileStream) {
    streams.push({ level, stream: fileStream });
  }

  return streams;
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
  pino.multistream(buildStreams())
);

export type Logger = typeof logger;
