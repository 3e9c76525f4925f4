/**
 * Logging setup for the application.
 * Two outputs work side by side:
 * 1. the pino stream (console, plus a daily JSON-lines file)
 * 2. the tabular audit log (services/enhanced-logging)
 */

import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import type { LevelWithSilent } from 'pino';
import { APP_NAME, APP_SLUG, LOG_DIR, dailyLogFileName } from '../config.js';
import { configureLogging, createLogger, logger, type ModuleLogger } from '../logger.js';
import { registerInternalModule } from '../tabular/caller.js';
import type { ProcessTypeInput } from '../types.js';
import { enhancedLevelSchema } from '../validation/schemas.js';
import * as enhanced from './enhanced-logging.js';

registerInternalModule(import.meta.url);

const log = createLogger('logging');

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';

export interface SetupLoggingOptions {
  level?: LevelWithSilent;
  logToConsole?: boolean;
  logToFile?: boolean;
  /** Also install the process-wide tabular writer */
  useEnhanced?: boolean;
  logDir?: string;
}

export function dailyLogFile(logDir: string = LOG_DIR, now: Date = new Date()): string {
  return path.join(logDir, dailyLogFileName(format(now, 'yyyy-MM-dd')));
}

/**
 * Configure the root logger and, optionally, the tabular writer.
 * Safe to call more than once; each call replaces the previous outputs.
 */
export function setupLogging(options: SetupLoggingOptions = {}): ModuleLogger {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const logDir = options.logDir ?? LOG_DIR;
  const logToFile = options.logToFile ?? true;

  const file = logToFile ? dailyLogFile(logDir) : null;
  configureLogging({ level, console: options.logToConsole ?? true, file });

  logger.info(`Logging started: level=${level}, file=${file ?? 'disabled'}`);

  if (options.useEnhanced) {
    enhanced.setup(APP_NAME, { logDir, debug: level === 'debug' || level === 'trace' });
    logger.info('Tabular logging enabled');
  }

  return logger;
}

/** Logger for one module; pass the module's own name */
export function getLogger(name: string): ModuleLogger {
  return createLogger(name);
}

/**
 * Route a message to the tabular writer by level name.
 * Returns false (after logging plainly) when no writer is installed.
 */
export function logEnhanced(
  functionName: string,
  message: string,
  level = 'info',
  processType: ProcessTypeInput = 'system'
): boolean {
  const parsed = enhancedLevelSchema.safeParse(level.toLowerCase());

  if (!enhanced.hasWriter()) {
    const plain = `${functionName}: ${message}`;
    switch (parsed.success ? parsed.data : 'info') {
      case 'debug':
        log.debug(plain);
        break;
      case 'warning':
        log.warn(plain);
        break;
      case 'error':
        log.error(plain);
        break;
      case 'critical':
        log.fatal(plain);
        break;
      default:
        log.info(plain);
    }
    return false;
  }

  switch (parsed.success ? parsed.data : 'info') {
    case 'debug':
      enhanced.debug(functionName, message, processType);
      break;
    case 'success':
      enhanced.success(functionName, message, processType);
      break;
    case 'warning':
      enhanced.warning(functionName, message, processType);
      break;
    case 'error':
      enhanced.error(functionName, message, processType);
      break;
    case 'critical':
      enhanced.critical(functionName, message, processType);
      break;
    default:
      enhanced.info(functionName, message, processType);
  }
  return true;
}

/** Daily log files, newest first */
export function listLogFiles(logDir: string = LOG_DIR): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(logDir);
  } catch {
    return [];
  }

  const pattern = new RegExp(`^${APP_SLUG}-.*\\.log$`);
  return names
    .filter(name => pattern.test(name))
    .map(name => {
      const file = path.join(logDir, name);
      return { file, mtime: fs.statSync(file).mtimeMs };
    })
    .sort((a, b) => b.mtime - a.mtime || b.file.localeCompare(a.file))
    .map(entry => entry.file);
}

/**
 * Delete daily logs beyond the newest maxFiles, and any older than maxAgeDays.
 * Returns how many files were removed.
 */
export function purgeOldLogs(
  options: { maxFiles?: number; maxAgeDays?: number; logDir?: string; now?: Date } = {}
): number {
  const maxFiles = options.maxFiles ?? 20;
  const maxAgeMs = (options.maxAgeDays ?? 30) * 24 * 60 * 60 * 1000;
  const now = (options.now ?? new Date()).getTime();

  const files = listLogFiles(options.logDir);
  const doomed = files.filter((file, index) => index >= maxFiles || now - fs.statSync(file).mtimeMs > maxAgeMs);

  let removed = 0;
  for (const file of doomed) {
    try {
      fs.unlinkSync(file);
      removed++;
    } catch (err) {
      log.warn({ err, file }, 'Could not remove old log file');
    }
  }
  return removed;
}
