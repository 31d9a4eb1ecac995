import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Exploration context stored in AsyncLocalStorage so that every log line
 * emitted during one exploration carries its run id without threading it
 * through the call chain.
 */
export interface ExplorationContext {
  runId: string;
  source?: string;
}

// ============================================================================
// Exploration Context (AsyncLocalStorage)
// ============================================================================

export const explorationContextStorage = new AsyncLocalStorage<ExplorationContext>();

/**
 * Returns undefined if called outside of an exploration context.
 */
export const getExplorationContext = (): ExplorationContext | undefined => {
  return explorationContextStorage.getStore();
};

export const runWithContext = <T>(context: ExplorationContext, fn: () => T): T => {
  return explorationContextStorage.run(context, fn);
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const addExplorationContext = winston.format((info) => {
  const context = getExplorationContext();
  if (context) {
    info.runId = context.runId;
    if (context.source) {
      info.source = context.source;
    }
  }
  return info;
});

/**
 * Serialise Error objects placed under `error` so they survive JSON output.
 */
const errorMetaFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (file transport, and console when
 * LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addExplorationContext(),
  errorMetaFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addExplorationContext(),
  errorMetaFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, runId, ...meta }) => {
    const runStr = typeof runId === 'string' ? ` [${runId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${runStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: 'klotski-explorer',
  },
  transports: [
    // Logs go to stderr so that --json output on stdout stays parseable.
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

const configuredLogFile = config.logging.file;
if (configuredLogFile) {
  const logPath = path.resolve(configuredLogFile);
  const logDir = path.dirname(logPath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
