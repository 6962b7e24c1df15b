/**
 * Structured Logger Service
 *
 * Structured JSON logging for validation events.
 *
 * Common fields per event:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name (email.validated, mx.lookup, list.loaded, ...)
 * - email / domain: subject of the event (when applicable)
 * - message: human-readable message
 */

import pino from 'pino';
import { config } from '../config/env.js';

/**
 * Log context for validation events
 */
export interface ValidationLogContext {
  email?: string;
  domain?: string | null;
  list?: string;
  filePath?: string;
  count?: number;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'mailcheck-api',
    environment: config.nodeEnv,
  },

  // Timestamp in ISO 8601 format
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

function describeError(error: unknown): { error?: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return error === undefined ? {} : { error: String(error) };
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  /**
   * Creates a child logger with additional context
   */
  child(bindings: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger(this.logger.child(bindings));
  }

  /**
   * Logs email validation
   */
  emailValidated(context: ValidationLogContext & { valid: boolean; errors: string[] }) {
    this.logger.debug({
      event: 'email.validated',
      email: context.email,
      domain: context.domain,
      valid: context.valid,
      errors: context.errors,
      message: context.valid
        ? `Email validated: ${context.email}`
        : `Email invalid: ${context.email} (${context.errors.join(', ')})`,
    });
  }

  /**
   * Logs an MX lookup, served from cache or the resolver
   */
  mxLookup(context: { domain: string; hasMx: boolean; outcome: string; cached: boolean }) {
    this.logger.debug({
      event: 'mx.lookup',
      domain: context.domain,
      hasMx: context.hasMx,
      outcome: context.outcome,
      cached: context.cached,
      message: `MX ${context.cached ? 'cache hit' : 'lookup'} for ${context.domain}: ${context.outcome}`,
    });
  }

  /**
   * Logs a resolver failure that was collapsed to "no record"
   */
  dnsLookupFailed(context: { domain: string; type: string; code?: string; error: string }) {
    this.logger.warn({
      event: 'dns.lookup_failed',
      domain: context.domain,
      type: context.type,
      error_code: context.code,
      error: context.error,
      message: `${context.type} lookup failed for ${context.domain}: ${context.code ?? context.error}`,
    });
  }

  /**
   * Logs MX cache invalidation
   */
  mxCacheCleared(context: { entries: number }) {
    this.logger.info({
      event: 'mx.cache_cleared',
      entries: context.entries,
      message: `MX cache cleared (${context.entries} entries)`,
    });
  }

  /**
   * Logs a domain list read from disk
   */
  listLoaded(context: { filePath: string; count: number; cached: boolean }) {
    this.logger.debug({
      event: 'list.loaded',
      filePath: context.filePath,
      count: context.count,
      cached: context.cached,
      message: `Loaded ${context.count} domains from ${context.filePath}${context.cached ? ' (cache)' : ''}`,
    });
  }

  /**
   * Logs a domain list written to disk
   */
  listSaved(context: { filePath: string; count: number }) {
    this.logger.info({
      event: 'list.saved',
      filePath: context.filePath,
      count: context.count,
      message: `Saved ${context.count} domains to ${context.filePath}`,
    });
  }

  /**
   * Logs server start
   */
  serverStarted(context: { address: string; blocklistCount: number; allowlistCount: number }) {
    this.logger.info({
      event: 'server.started',
      address: context.address,
      blocklistCount: context.blocklistCount,
      allowlistCount: context.allowlistCount,
      message: `Server listening at ${context.address}`,
    });
  }

  /**
   * Logs graceful shutdown
   */
  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `Graceful shutdown initiated (${context.signal})`,
    });
  }

  /**
   * Logs shutdown completion
   */
  shutdownCompleted(context: { duration: number }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  /**
   * Generic info log
   */
  info(message: string, context?: ValidationLogContext) {
    this.logger.info({ ...context, message });
  }

  /**
   * Generic warn log
   */
  warn(message: string, context?: ValidationLogContext) {
    this.logger.warn({ ...context, message });
  }

  /**
   * Generic error log
   */
  error(message: string, context?: ValidationLogContext & { error?: unknown }) {
    const { error, ...rest } = context ?? {};
    this.logger.error({
      ...rest,
      ...describeError(error),
      message,
    });
  }

  /**
   * Generic debug log
   */
  debug(message: string, context?: ValidationLogContext) {
    this.logger.debug({ ...context, message });
  }

  /**
   * Gets the underlying Pino logger
   */
  getPinoLogger(): pino.Logger {
    return this.logger;
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();

/**
 * Creates a child logger with specific context
 */
export function createLogger(context: Record<string, unknown>): StructuredLogger {
  return logger.child(context);
}
