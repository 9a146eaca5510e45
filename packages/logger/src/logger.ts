import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { type LoggerEnvConfig, type LogLevel, validateLoggerEnv } from './env.schema.js';

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  fatal(msg: string): void;
  fatal(obj: Record<string, unknown>, msg: string): void;
}

export interface LoggerOverrides {
  /** Explicit destination stream; bypasses transports and the test-mode sink */
  destination?: pino.DestinationStream | undefined;
  level?: LogLevel | undefined;
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, pino.Logger>();

let rootLogger: pino.Logger | undefined;
let overrides: LoggerOverrides = {};
let env: LoggerEnvConfig | undefined;

function getEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function isTestEnv(config: LoggerEnvConfig): boolean {
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

function buildTransportTargets(config: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (config.LOGGER_CONSOLE_ENABLED) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: { ignore: 'pid,hostname,categoryLabel,service,environment' },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stdout for log processors
      targets.push({ level: 'trace', options: { destination: 1 }, target: 'pino/file' });
    }
  }

  if (config.LOGGER_FILE_LOG_ENABLED) {
    fs.mkdirSync(config.LOGGER_FILE_LOG_DIRNAME, { recursive: true });
    targets.push({
      level: 'trace',
      options: {
        destination: path.join(config.LOGGER_FILE_LOG_DIRNAME, config.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): pino.Logger {
  const config = getEnv();

  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: overrides.level ?? config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (overrides.destination) {
    return pino.pino(pinoConfig, overrides.destination);
  }

  // Test runs discard output and never spawn transport workers
  if (isTestEnv(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino.pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(config);
  if (targets.length > 0) {
    pinoConfig.transport = { targets };
  }
  return pino.pino(pinoConfig);
}

function getOrCreateCategoryLogger(category: string): pino.Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Category logger that resolves the underlying pino logger on every call, so loggers
 * captured at module load pick up later reconfiguration.
 */
class CategoryLogger implements Logger {
  constructor(private readonly category: string) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  fatal(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('fatal', msgOrObj, maybeMsg);
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    const target = getOrCreateCategoryLogger(this.category);
    if (typeof msgOrObj === 'string') {
      target[level](msgOrObj);
    } else {
      target[level](msgOrObj, maybeMsg);
    }
  }
}

export function getLogger(category: string): Logger {
  return new CategoryLogger(category);
}

/**
 * Replace destination or level at runtime. Resets cached loggers so the new
 * configuration applies immediately; called with no argument it restores the environment defaults.
 */
export function configureLogger(next: LoggerOverrides = {}): void {
  overrides = next;
  env = undefined;
  rootLogger = undefined;
  loggerCache.clear();
}
