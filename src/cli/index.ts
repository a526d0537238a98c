#!/usr/bin/env node
/**
 * skillbook CLI Entry Point
 *
 * Starts the log handle, parses arguments, and makes sure every exit
 * path (success, command error, uncaught error) stops it.
 */

import { createCli } from './program.js';
import { APP_NAME } from '../config/index.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

async function main(): Promise<void> {
  const { program, logger, errorOptions } = createCli();
  const stopLogger = () => logger.stop();

  // These catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(errorOptions, stopLogger);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  logger.start({ app: APP_NAME, pid: process.pid });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, errorOptions(), stopLogger);
  }

  stopLogger();
}

void main();
