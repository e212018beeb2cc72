/**
 * @fileoverview Pino-backed singleton logger with environment-adaptive output.
 * Implements RFC5424 level mapping, structured context, redaction of credential
 * fields, per-message rate limiting, and flushing on shutdown. The logger stays
 * silent until `initialize()` is called, so library consumers that never
 * initialize it get no output.
 * @module src/utils/internal/logger
 */
import { mkdirSync } from 'fs';
import { createRequire } from 'node:module';
import path from 'path';
import type { LevelWithSilent, Logger as PinoLogger } from 'pino';
import pino from 'pino';

import { config } from '@/config/index.js';
import {
  requestContextService,
  type RequestContext,
} from '@/utils/internal/requestContext.js';
import { sanitization } from '@/utils/security/sanitization.js';

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'crit'
  | 'alert'
  | 'emerg';

const levelToPino: Record<LogLevel, LevelWithSilent> = {
  emerg: 'fatal',
  alert: 'fatal',
  crit: 'error',
  error: 'error',
  warning: 'warn',
  notice: 'info',
  info: 'info',
  debug: 'debug',
};

const pinoLevelSeverity: Record<string, number> = {
  fatal: 0,
  error: 2,
  warn: 4,
  info: 6,
  debug: 7,
};

export interface LoggerInitOptions {
  /** Use pino-pretty for console output. Defaults to true in development. */
  pretty?: boolean;
}

export class Logger {
  private static readonly instance: Logger = new Logger();
  private pinoLogger?: PinoLogger;
  private initialized = false;
  private currentLevel: LogLevel = 'info';

  private rateLimitThreshold = 10;
  private rateLimitWindow = 60000;
  private messageCounts = new Map<
    string,
    { count: number; firstSeen: number }
  >();
  private suppressedMessages = new Map<string, number>();
  private cleanupTimer?: NodeJS.Timeout;

  private constructor() {}

  public static getInstance(): Logger {
    return Logger.instance;
  }

  private createPinoLogger(level: LogLevel, pretty: boolean): PinoLogger {
    const pinoLevel = levelToPino[level] || 'info';

    const pinoOptions: pino.LoggerOptions = {
      level: pinoLevel,
      base: {
        env: config.environment,
        version: config.pkg.version,
        pid: process.pid,
      },
      redact: {
        paths: sanitization.getSensitivePinoFields(),
        censor: '[REDACTED]',
      },
    };

    const transports: pino.TransportTargetOptions[] = [];
    const isTest = config.environment === 'testing';

    if (pretty) {
      // Resolve pino-pretty from this module so bundled builds still find it,
      // falling back to JSON stdout if resolution fails.
      try {
        const require = createRequire(import.meta.url);
        transports.push({
          target: require.resolve('pino-pretty'),
          options: { colorize: true, translateTime: 'yyyy-mm-dd HH:MM:ss' },
        });
      } catch (err) {
        console.warn(
          `[Logger Init] Pretty transport unavailable (${err instanceof Error ? err.message : String(err)}); falling back to stdout JSON.`,
        );
        transports.push({ target: 'pino/file', options: { destination: 1 } });
      }
    } else if (!isTest) {
      transports.push({ target: 'pino/file', options: { destination: 1 } });
    }

    if (config.logsPath) {
      try {
        mkdirSync(config.logsPath, { recursive: true });
        transports.push({
          level: pinoLevel,
          target: 'pino/file',
          options: {
            destination: path.join(config.logsPath, 'combined.log'),
            mkdir: true,
          },
        });
        transports.push({
          level: 'error',
          target: 'pino/file',
          options: {
            destination: path.join(config.logsPath, 'error.log'),
            mkdir: true,
          },
        });
      } catch (err) {
        console.error(
          `[Logger Init] Failed to configure file logging: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }

    if (transports.length === 0) {
      return pino({ ...pinoOptions, enabled: false });
    }
    return pino({ ...pinoOptions, transport: { targets: transports } });
  }

  public initialize(
    level: LogLevel = 'info',
    options: LoggerInitOptions = {},
  ): void {
    if (this.initialized) {
      this.warning(
        'Logger already initialized.',
        requestContextService.createRequestContext({
          operation: 'loggerReinit',
        }),
      );
      return;
    }
    this.currentLevel = level;
    this.pinoLogger = this.createPinoLogger(
      level,
      options.pretty ?? config.environment === 'development',
    );

    if (!this.cleanupTimer) {
      this.cleanupTimer = setInterval(
        () => this.flushSuppressedMessages(),
        this.rateLimitWindow,
      );
      this.cleanupTimer.unref();
    }

    this.initialized = true;
    this.info(
      `Logger initialized. Level: ${level}.`,
      requestContextService.createRequestContext({ operation: 'loggerInit' }),
    );
  }

  public async close(): Promise<void> {
    if (!this.initialized) return;
    this.info(
      'Logger shutting down.',
      requestContextService.createRequestContext({ operation: 'loggerClose' }),
    );
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.flushSuppressedMessages();

    const pinoLogger = this.pinoLogger;
    if (pinoLogger) {
      await new Promise<void>((resolve) => {
        pinoLogger.flush((err) => {
          if (err) console.error('Error flushing logger:', err);
          resolve();
        });
      });
    }

    this.initialized = false;
  }

  public isInitialized(): boolean {
    return this.initialized;
  }

  private isRateLimited(message: string): boolean {
    const now = Date.now();
    const entry = this.messageCounts.get(message);
    if (!entry || now - entry.firstSeen > this.rateLimitWindow) {
      this.messageCounts.set(message, { count: 1, firstSeen: now });
      return false;
    }
    entry.count++;
    if (entry.count > this.rateLimitThreshold) {
      this.suppressedMessages.set(
        message,
        (this.suppressedMessages.get(message) || 0) + 1,
      );
      return true;
    }
    return false;
  }

  private flushSuppressedMessages(): void {
    if (this.suppressedMessages.size === 0) return;
    const suppressed = [...this.suppressedMessages.entries()];
    this.suppressedMessages.clear();
    this.messageCounts.clear();
    for (const [message, count] of suppressed) {
      this.warning(
        `Log message suppressed ${count} times due to rate limiting.`,
        requestContextService.createRequestContext({
          operation: 'loggerRateLimitFlush',
          additionalContext: { originalMessage: message },
        }),
      );
    }
  }

  private log(
    level: LogLevel,
    msg: string,
    context?: RequestContext,
    error?: Error,
  ): void {
    if (!this.pinoLogger || !this.initialized) return;

    const pinoLevel = levelToPino[level] || 'info';
    const currentPinoLevel = levelToPino[this.currentLevel] || 'info';

    const levelSeverity = pinoLevelSeverity[pinoLevel];
    const currentLevelSeverity = pinoLevelSeverity[currentPinoLevel];

    if (
      typeof levelSeverity === 'number' &&
      typeof currentLevelSeverity === 'number' &&
      levelSeverity > currentLevelSeverity
    ) {
      return;
    }

    if (this.isRateLimited(msg)) return;

    const logObject: Record<string, unknown> = { ...context };
    if (error) logObject.err = pino.stdSerializers.err(error);

    this.pinoLogger[pinoLevel](logObject, msg);
  }

  public debug(msg: string, context?: RequestContext): void {
    this.log('debug', msg, context);
  }
  public info(msg: string, context?: RequestContext): void {
    this.log('info', msg, context);
  }
  public warning(msg: string, context?: RequestContext): void {
    this.log('warning', msg, context);
  }

  public error(
    msg: string,
    errorOrContext: Error | RequestContext,
    context?: RequestContext,
  ): void {
    const errorObj =
      errorOrContext instanceof Error ? errorOrContext : undefined;
    const actualContext =
      errorOrContext instanceof Error ? context : errorOrContext;
    this.log('error', msg, actualContext, errorObj);
  }
}

/**
 * The subset of the logger a storage or secret provider writes to. Any object
 * with these methods can be injected in place of the shared logger.
 */
export type StorageLogger = Pick<Logger, 'debug' | 'info' | 'warning' | 'error'>;

export const logger = Logger.getInstance();
