/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LoggingConfig {
  level: LogLevel;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  fileName: string;
  rotateSize: string;
  maxFiles: number;
  console: boolean;
  redactFields: string[];
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isProd = env.NODE_ENV === 'production';
  const isTest = env.NODE_ENV === 'test';

  const level = LogLevelSchema.safeParse(env.LOG_LEVEL);

  return {
    level: level.success ? level.data : isTest ? 'silent' : 'info',
    pretty: env.LOG_PRETTY === 'true' || (!isProd && env.LOG_PRETTY !== 'false'),
    toFile: env.LOG_TO_FILE === 'true',
    dir: env.LOG_DIR || './logs',
    // Conversation log rotates by size; old files are gzipped
    fileName: env.LOG_FILE_NAME || 'conversation.log',
    rotateSize: env.LOG_ROTATE_SIZE || '1M',
    maxFiles: Number(env.LOG_MAX_FILES || 5),
    console: env.LOG_CONSOLE !== 'false',
    redactFields: (env.LOG_REDACT_FIELDS ||
      'authorization,cookie,x-api-key,key,token,password,apiKey,api_key,secret')
      .split(',').map(f => f.trim()).filter(Boolean),
  };
}
