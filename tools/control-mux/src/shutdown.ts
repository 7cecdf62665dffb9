import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

export interface ShutdownDeps {
  onSignal: (signal: NodeJS.Signals, handler: () => void) => void;
  exit: (code: number) => void;
}

/** The part of a client the signal handlers drive. */
export interface Interruptible {
  interrupt(): Promise<void>;
  close(): Promise<void>;
}

export interface ShutdownOptions {
  client: Interruptible;
  logger: Logger;
}

const EXIT_CODES: Record<'SIGINT' | 'SIGTERM', number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

const defaultDeps: ShutdownDeps = {
  onSignal: (signal, handler) => process.on(signal, handler),
  exit: (code) => process.exit(code),
};

/**
 * Register SIGINT and SIGTERM handlers that end the session gracefully.
 *
 * On the first signal: interrupt the current turn, close the session, then
 * exit with 128 + signal number. Later signals are ignored while shutdown
 * runs. Returns the shutdown function so callers can trigger it directly.
 */
export function setupShutdownHandlers(
  options: ShutdownOptions,
  deps: Partial<ShutdownDeps> = {},
): (signal: 'SIGINT' | 'SIGTERM') => Promise<void> {
  const resolved: ShutdownDeps = { ...defaultDeps, ...deps };
  const { client, logger } = options;

  let shutdownInProgress = false;

  async function performShutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
    if (shutdownInProgress) return;
    shutdownInProgress = true;

    logger.info('Received shutdown signal, closing session...', { signal });
    try {
      await client.interrupt();
    } catch (err) {
      // Usually the session already ended.
      logger.debug('Interrupt not sent', { error: errorMessage(err) });
    }

    try {
      await client.close();
    } catch (err) {
      logger.error('Error closing session', { error: errorMessage(err) });
    }

    logger.info('Shutdown complete');
    resolved.exit(EXIT_CODES[signal]);
  }

  resolved.onSignal('SIGINT', () => {
    void performShutdown('SIGINT');
  });
  resolved.onSignal('SIGTERM', () => {
    void performShutdown('SIGTERM');
  });

  return performShutdown;
}
