import { registerAs } from '@nestjs/config';
import { LogLevel } from '@nestjs/common';

export interface LoggingConfig {
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
  consoleLevels: LogLevel[];
}

const DEFAULT_CONSOLE_LEVELS: LogLevel[] = ['log', 'warn', 'error', 'fatal'];

const CONSOLE_LEVELS = new Map<string, LogLevel[]>([
  ['error', ['error', 'fatal']],
  ['warn', ['warn', 'error', 'fatal']],
  ['log', DEFAULT_CONSOLE_LEVELS],
  ['debug', ['debug', ...DEFAULT_CONSOLE_LEVELS]],
  ['verbose', ['verbose', 'debug', ...DEFAULT_CONSOLE_LEVELS]],
]);

export function resolveConsoleLevels(level: string | undefined): LogLevel[] {
  return CONSOLE_LEVELS.get((level || 'log').toLowerCase()) ?? DEFAULT_CONSOLE_LEVELS;
}

export default registerAs(
  'logging',
  (): LoggingConfig => ({
    filePath: process.env.LOG_FILE || 'logs/trading_bot.log',
    maxFileSize: Number(process.env.LOG_MAX_BYTES || 10 * 1024 * 1024), // 10 MB
    maxFiles: Number(process.env.LOG_MAX_FILES || 5),
    consoleLevels: resolveConsoleLevels(process.env.LOG_LEVEL),
  }),
);
