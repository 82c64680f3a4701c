import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggingConfig } from '../../config/logging.config';
import { RotatingFileWriter } from './rotating-file.writer';

const ALL_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

// Framework bootstrap chatter; kept out of the terminal
const FILE_ONLY_CONTEXTS = new Set(['NestFactory', 'InstanceLoader', 'NestApplicationContext']);

/**
 * Nest logger that keeps the console quiet and the log file verbose.
 *
 * Every level reaches the log file. The console (stderr only, so rendered
 * tables on stdout stay clean) shows the configured levels.
 */
@Injectable()
export class RotatingFileLogger extends ConsoleLogger {
  private readonly writer: RotatingFileWriter;
  private readonly consoleLevels: Set<LogLevel>;
  private lastPrintedToConsole = false;

  constructor(configService: ConfigService) {
    super();
    const config = configService.getOrThrow<LoggingConfig>('logging');
    this.consoleLevels = new Set(config.consoleLevels);
    this.writer = new RotatingFileWriter({
      filePath: config.filePath,
      maxFileSize: config.maxFileSize,
      maxFiles: config.maxFiles,
    });
    // Filtering happens per sink in printMessages
    this.setLogLevels(ALL_LEVELS);
  }

  protected printMessages(
    messages: unknown[],
    context = '',
    logLevel: LogLevel = 'log',
  ): void {
    for (const message of messages) {
      this.writer.write(formatFileLine(logLevel, context, stringify(message)));
    }

    const toConsole = this.consoleLevels.has(logLevel) && !FILE_ONLY_CONTEXTS.has(context);
    this.lastPrintedToConsole = toConsole;
    if (toConsole) {
      super.printMessages(messages, context, logLevel, 'stderr');
    }
  }

  protected printStackTrace(stack: string): void {
    if (!stack) {
      return;
    }
    this.writer.write(stack);
    // A stack trace follows the error line it belongs to
    if (this.lastPrintedToConsole) {
      super.printStackTrace(stack);
    }
  }
}

export function formatFileLine(
  level: LogLevel,
  context: string,
  message: string,
  now: Date = new Date(),
): string {
  return `${now.toISOString()} | ${level.toUpperCase().padEnd(8)} | ${context || '-'} - ${message}`;
}

function stringify(message: unknown): string {
  if (typeof message === 'string') return message;
  if (message instanceof Error) return message.stack ?? message.message;
  return JSON.stringify(message);
}
