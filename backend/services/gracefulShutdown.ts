/**
 * Graceful Shutdown Service
 * Stops accepting connections, drains in-flight requests, then runs the
 * registered cleanup steps
 */
import type { Server } from 'http';
import type { NextFunction, Request, Response } from 'express';
import { getErrorMessage } from '../utils/errors';
import logger from '../utils/logger';

// Configuration
const SHUTDOWN_TIMEOUT_MS = parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '30000', 10);
const DRAIN_TIMEOUT_MS = parseInt(process.env.DRAIN_TIMEOUT_MS || '10000', 10);

export interface CleanupStep {
  name: string;
  run: () => Promise<void> | void;
}

let inFlightRequests = 0;
let isShuttingDown = false;

async function drainConnections(): Promise<void> {
  const startTime = Date.now();

  while (inFlightRequests > 0) {
    if (Date.now() - startTime > DRAIN_TIMEOUT_MS) {
      logger.warn('Drain timeout exceeded, forcing shutdown', { remainingRequests: inFlightRequests });
      break;
    }
    logger.info('Waiting for in-flight requests', { count: inFlightRequests, elapsed: Date.now() - startTime });
    await new Promise(resolve => setTimeout(resolve, 500));
  }
}

async function runCleanup(steps: readonly CleanupStep[]): Promise<void> {
  const results = await Promise.allSettled(steps.map(async step => step.run()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      logger.error('Cleanup step failed', { step: steps[index].name, error: getErrorMessage(result.reason) });
    }
  });
}

async function performShutdown(server: Server, steps: readonly CleanupStep[], signal: string): Promise<void> {
  logger.info('Initiating graceful shutdown', { signal });
  isShuttingDown = true;

  const forceExitTimeout = setTimeout(() => {
    logger.error('Shutdown timeout exceeded, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimeout.unref();

  try {
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    });
    logger.info('HTTP server stopped');

    await drainConnections();
    await runCleanup(steps);

    clearTimeout(forceExitTimeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: getErrorMessage(error) });
    clearTimeout(forceExitTimeout);
    process.exit(1);
  }
}

/**
 * Register signal and crash handlers; call once after `listen`
 */
export function setupGracefulShutdown(server: Server, steps: readonly CleanupStep[]): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach(signal => {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.warn('Shutdown already in progress, ignoring signal', { signal });
        return;
      }
      void performShutdown(server, steps, signal);
    });
  });

  process.on('uncaughtException', error => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    if (!isShuttingDown) {
      void performShutdown(server, steps, 'uncaughtException');
    }
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled rejection', { reason: getErrorMessage(reason) });
  });

  logger.info('Graceful shutdown handlers registered');
}

/**
 * 503 once shutdown starts; counts requests until their response closes
 */
export function requestTrackingMiddleware() {
  return (_req: Request, res: Response, next: NextFunction): void => {
    if (isShuttingDown) {
      res.status(503).json({ success: false, error: 'Server is shutting down', code: 'SHUTTING_DOWN' });
      return;
    }

    inFlightRequests++;
    let tracked = true;
    const untrack = () => {
      if (!tracked) return;
      tracked = false;
      inFlightRequests = Math.max(0, inFlightRequests - 1);
    };
    res.on('finish', untrack);
    res.on('close', untrack);

    next();
  };
}

export default {
  setupGracefulShutdown,
  requestTrackingMiddleware
};
