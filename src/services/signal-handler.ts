/**
 * Signal and process manager for graceful shutdown handling
 */

import { errorMessage } from '../exceptions.js';
import { createLogger, type Logger } from '../logging-config.js';

export type CleanupFunction = () => Promise<void> | void;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM' | 'manual';

export interface SignalHandlerConfig {
  /** Cleanup function to run on shutdown */
  cleanup?: CleanupFunction;
  /** Timeout for cleanup operations in milliseconds */
  cleanupTimeout?: number;
  logger?: Logger;
  /** Replaces process.exit, mainly for tests */
  exit?: (code: number) => void;
}

/**
 * Signal handler class for managing graceful application shutdown
 */
export class SignalHandler {
  private readonly cleanupTimeout: number;
  private readonly logger: Logger;
  private readonly exit: (code: number) => void;
  private cleanupFunctions: CleanupFunction[] = [];
  private isShuttingDown = false;
  private readonly listeners = new Map<NodeJS.Signals, () => void>();

  constructor(config: SignalHandlerConfig = {}) {
    this.cleanupTimeout = config.cleanupTimeout ?? 10_000;
    this.logger = config.logger ?? createLogger('shutdown');
    this.exit = config.exit ?? ((code) => process.exit(code));

    if (config.cleanup) {
      this.cleanupFunctions.push(config.cleanup);
    }
  }

  /**
   * Add a cleanup function to be called on shutdown
   */
  addCleanupFunction(cleanup: CleanupFunction): void {
    this.cleanupFunctions.push(cleanup);
  }

  /**
   * Execute all cleanup functions; returns false if any failed or the timeout hit
   */
  private async executeCleanup(): Promise<boolean> {
    if (this.cleanupFunctions.length === 0) {
      return true;
    }

    const cleanupPromises = this.cleanupFunctions.map(async (cleanup, index) => {
      try {
        await cleanup();
        this.logger.debug(`Cleanup function ${index + 1} completed successfully`);
        return true;
      } catch (error) {
        this.logger.error(`Cleanup function ${index + 1} failed: ${errorMessage(error)}`);
        return false;
      }
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.cleanupTimeout);
    });

    try {
      const outcome = await Promise.race([Promise.all(cleanupPromises), timeout]);
      if (outcome === 'timeout') {
        this.logger.error(`Cleanup operations timed out after ${this.cleanupTimeout} ms`);
        return false;
      }
      return outcome.every(Boolean);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Handle shutdown signals
   */
  private async handleShutdown(signal: ShutdownSignal): Promise<void> {
    if (this.isShuttingDown) {
      this.logger.warning(`Received ${signal} during shutdown, forcing exit`);
      this.exit(1);
      return;
    }

    this.isShuttingDown = true;
    this.logger.info(`Received ${signal}, shutting down gracefully...`);

    const clean = await this.executeCleanup();
    if (clean) {
      this.logger.info('Graceful shutdown completed');
    }
    this.exit(clean ? 0 : 1);
  }

  /**
   * Register signal handlers for graceful shutdown
   */
  register(): void {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const listener = () => {
        void this.handleShutdown(signal);
      };
      this.listeners.set(signal, listener);
      process.on(signal, listener);
    }
    this.logger.debug('Signal handlers registered');
  }

  /**
   * Unregister signal handlers
   */
  unregister(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }
    this.listeners.clear();
    this.logger.debug('Signal handlers unregistered');
  }

  /**
   * Manually trigger shutdown
   */
  async shutdown(): Promise<void> {
    await this.handleShutdown('manual');
  }

  /**
   * Check if currently shutting down
   */
  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }
}
