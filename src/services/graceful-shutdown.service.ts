/**
 * Graceful Shutdown Service
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Stops accepting new requests
 * - Waits for in-flight work with a timeout
 * - Forces exit if shutdown hangs
 */

import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';

export interface ShutdownConfig {
  /** Timeout in milliseconds to wait for in-flight work */
  timeout: number;
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  /** Callback to stop accepting new work (e.g. close the HTTP server) */
  onShutdownStart?: () => Promise<void>;
  /** Callback before final exit */
  onBeforeExit?: () => void | Promise<void>;
  /** Process exit, replaceable in tests */
  exit?: (code: number) => void;
  logger?: StructuredLogger;
}

export class GracefulShutdownService {
  private isShuttingDown = false;
  private readonly shutdownConfig: ShutdownConfig;
  private readonly logger: StructuredLogger;
  private readonly exit: (code: number) => void;
  private shutdownTimeout?: NodeJS.Timeout;
  private forceShutdownTimeout?: NodeJS.Timeout;

  constructor(config: ShutdownConfig) {
    this.shutdownConfig = config;
    this.logger = config.logger ?? defaultLogger;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    // Handle SIGTERM (e.g., container stop)
    process.on('SIGTERM', () => {
      void this.handleShutdown('SIGTERM');
    });

    // Handle SIGINT (e.g., Ctrl+C in terminal)
    process.on('SIGINT', () => {
      void this.handleShutdown('SIGINT');
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection', { error: reason });
      void this.handleShutdown('UNHANDLED_REJECTION', 1);
    });
  }

  /**
   * Handles graceful shutdown process
   */
  async handleShutdown(signal: string, exitCode = 0): Promise<void> {
    // Prevent multiple shutdown attempts
    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress', { signal });
      return;
    }

    this.isShuttingDown = true;
    this.setupForceShutdownTimeout(this.shutdownConfig.forceTimeout);
    this.logger.shutdownStarted({ signal });

    const startTime = Date.now();

    try {
      const drained = await this.waitWithTimeout(
        this.shutdownConfig.onShutdownStart,
        this.shutdownConfig.timeout
      );
      if (!drained) {
        this.logger.warn(`Shutdown timeout (${this.shutdownConfig.timeout}ms) expired, some requests may be interrupted`);
      }

      if (this.shutdownConfig.onBeforeExit) {
        await this.shutdownConfig.onBeforeExit();
      }

      this.logger.shutdownCompleted({ duration: Date.now() - startTime });
      this.clearTimers();
      this.exit(exitCode);
    } catch (error) {
      this.logger.error('Error during graceful shutdown', { error });
      this.clearTimers();
      this.exit(1);
    }
  }

  /**
   * Waits for a callback with timeout; resolves false on timeout or error
   */
  private async waitWithTimeout(
    callback: (() => Promise<void>) | undefined,
    timeoutMs: number
  ): Promise<boolean> {
    if (!callback) {
      return true;
    }

    return new Promise((resolve) => {
      let completed = false;

      this.shutdownTimeout = setTimeout(() => {
        if (!completed) {
          completed = true;
          resolve(false);
        }
      }, timeoutMs);

      callback()
        .then(() => {
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(true);
          }
        })
        .catch((error: unknown) => {
          this.logger.error('Error while stopping the server', { error });
          if (!completed) {
            completed = true;
            clearTimeout(this.shutdownTimeout);
            resolve(false);
          }
        });
    });
  }

  /**
   * If graceful shutdown takes too long, force exit
   */
  private setupForceShutdownTimeout(timeoutMs: number): void {
    this.forceShutdownTimeout = setTimeout(() => {
      this.logger.error('Force shutdown timeout expired, exiting');
      this.exit(1);
    }, timeoutMs);
    this.forceShutdownTimeout.unref();
  }

  private clearTimers(): void {
    clearTimeout(this.shutdownTimeout);
    clearTimeout(this.forceShutdownTimeout);
  }

  isShutdownInProgress(): boolean {
    return this.isShuttingDown;
  }
}

/**
 * Creates a graceful shutdown service with default configuration
 */
export function createGracefulShutdown(customConfig?: Partial<ShutdownConfig>): GracefulShutdownService {
  const defaultConfig: ShutdownConfig = {
    timeout: 10000,
    forceTimeout: 20000,
    ...customConfig,
  };

  return new GracefulShutdownService(defaultConfig);
}
