#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CommanderError } from 'commander';
import { AppModule } from './app.module';
import { createCliProgram } from './cli/cli.program';
import { RotatingFileLogger } from './common/logging/rotating-file.logger';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(app.get(RotatingFileLogger));

  const logger = new Logger('Cli');
  logger.debug(`Invoked with: ${process.argv.slice(2).join(' ')}`);

  try {
    const program = createCliProgram(app, (code) => {
      process.exitCode = code;
    });

    await program.parseAsync(process.argv);
  } catch (error) {
    // --help, --version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
    } else {
      throw error;
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error(error instanceof Error ? (error.stack ?? error.message) : error);
  process.exitCode = 1;
});
