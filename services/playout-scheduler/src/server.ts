#!/usr/bin/env node

import dotenv from 'dotenv';
import { App } from './app';
import { loadSchedulerConfig } from './config/scheduler.config';
import { BaseError } from './utils/errors';
import { Logger } from './utils/Logger';

/**
 * Server Entry Point
 *
 * Main application bootstrap and startup
 */

const logger = new Logger('Server');

// Load environment variables
dotenv.config();

function loadConfigOrExit() {
  try {
    return loadSchedulerConfig();
  } catch (error) {
    if (error instanceof BaseError) {
      logger.error(error.message, error.details);
    } else {
      logger.error('Failed to load configuration:', error);
    }
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const app = new App(config);

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);
  try {
    await app.shutdown();
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown:', error);
    process.exit(1);
  }
}

// Graceful shutdown handlers
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection:', reason);
  process.exit(1);
});

// Start the application
app.start().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
