#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { hideBin } from 'yargs/helpers';
import { AppModule } from './app.module';
import { parseCommandLine } from './cli/cli.parser';
import { RunControllerService } from './lifecycle/run-controller.service';
import { LifecycleError } from './lifecycle/lifecycle.errors';
import { EXIT_FAILURE } from './config/config.constants';
import { getErrorMessage } from './shared/error.utils';
import type { RunParameters } from './lifecycle/interfaces';

const DEFAULT_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn'];
const DEBUG_LOG_LEVELS: LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose'];

/**
 * BootStrap
 */
async function bootstrap(): Promise<number> {
  const logger = new Logger('bootstrap');

  let params: RunParameters;
  try {
    params = parseCommandLine(hideBin(process.argv));
  } catch (error) {
    logger.error(error instanceof LifecycleError ? error.message : `Invalid arguments: ${getErrorMessage(error)}`);
    return EXIT_FAILURE;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: params.debug ? DEBUG_LOG_LEVELS : DEFAULT_LOG_LEVELS,
  });

  // Closing the context terminates running tools, then removes credential files and the run lock.
  const shutdown = async (signal: string) => {
    logger.warn(`Received ${signal}, aborting run`);
    try {
      await app.close();
    } catch (shutdownError) {
      logger.error(`Error during shutdown: ${getErrorMessage(shutdownError)}`);
    }
    process.exit(EXIT_FAILURE);
  };

  const handleSignal = (signal: NodeJS.Signals) => {
    void shutdown(signal);
  };

  process.on('SIGTERM', handleSignal);
  process.on('SIGINT', handleSignal);

  try {
    const result = await app.get(RunControllerService).run(params);
    return result.exitCode;
  } finally {
    process.off('SIGTERM', handleSignal);
    process.off('SIGINT', handleSignal);
    await app.close();
  }
}

bootstrap()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const logger = new Logger('bootstrap');
    logger.error(`Failed to start: ${getErrorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    process.exitCode = EXIT_FAILURE;
  });
