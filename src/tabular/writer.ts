/**
 * Tabular log writer
 * Appends structured records to a per-run text file as a fixed-width,
 * pipe-delimited table and mirrors each one to the console logger.
 */

import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { APP_NAME, APP_VERSION, LOG_DIR } from '../config.js';
import { createLogger, type ModuleLogger } from '../logger.js';
import type {
  EntryOptions,
  LogRecord,
  LogStatus,
  LogStatusInput,
  ProcessTypeInput,
  TabularReporter,
} from '../types.js';
import { registerInternalModule, resolveCallerFile } from './caller.js';
import {
  MESSAGE_WIDTH,
  footerLine,
  formatContinuationRow,
  formatRow,
  separatorLine,
  tableHeader,
} from './layout.js';
import { coerceLogStatus, coerceProcessType, consoleLevelFor } from './taxonomy.js';
import { wrapText } from './wrap.js';

registerInternalModule(import.meta.url);

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const FILE_STAMP_FORMAT = 'yyyyMMdd_HHmmss';

export interface TabularLogWriterOptions {
  /** Used in the file name and as the default TASK value */
  projectName?: string;
  version?: string;
  logDir?: string;
  /** logDebug writes nothing unless this is on */
  debug?: boolean;
  /** Where every record is mirrored; defaults to the 'tabular-log' module logger */
  console?: ModuleLogger;
  /** Append the footer when the process exits */
  registerExitHook?: boolean;
  clock?: () => Date;
}

export function logFileName(projectName: string, startedAt: Date): string {
  return `${projectName}_${format(startedAt, FILE_STAMP_FORMAT)}.log`;
}

/**
 * Render one record as table lines: a full row, one continuation row per
 * extra wrapped message line, and a trailing separator for critical records.
 */
export function renderRecord(record: LogRecord): string[] {
  const messageLines = wrapText(record.message, MESSAGE_WIDTH);
  const [first = '', ...rest] = messageLines;

  const lines = [
    formatRow({
      timestamp: format(record.timestamp, TIMESTAMP_FORMAT),
      task: record.taskName,
      function: record.functionName,
      file: record.sourceFile,
      message: first,
      process_type: record.processType,
      status: record.status,
    }),
    ...rest.map(formatContinuationRow),
  ];

  if (record.status === 'critical') {
    lines.push(separatorLine());
  }
  return lines;
}

export class TabularLogWriter implements TabularReporter {
  readonly projectName: string;
  readonly version: string;
  readonly logDir: string;
  private readonly logFile: string;
  private readonly console: ModuleLogger;
  private readonly clock: () => Date;
  private debugMode: boolean;
  private closed = false;
  private exitHook: (() => void) | null = null;

  constructor(options: TabularLogWriterOptions = {}) {
    this.projectName = options.projectName ?? APP_NAME;
    this.version = options.version ?? APP_VERSION;
    this.logDir = options.logDir ?? LOG_DIR;
    this.debugMode = options.debug ?? false;
    this.console = options.console ?? createLogger('tabular-log');
    this.clock = options.clock ?? (() => new Date());

    this.logFile = path.join(this.logDir, logFileName(this.projectName, this.clock()));

    try {
      fs.mkdirSync(this.logDir, { recursive: true });
      fs.writeFileSync(this.logFile, tableHeader(), 'utf8');
    } catch (err) {
      this.console.warn({ err, file: this.logFile }, 'Could not create tabular log file');
    }

    if (options.registerExitHook ?? true) {
      this.exitHook = () => this.close();
      process.once('exit', this.exitHook);
    }

    this.logInfo('setupLogging', `Logger started for ${this.projectName} v${this.version}`);
  }

  getLogFile(): string {
    return this.logFile;
  }

  isDebugMode(): boolean {
    return this.debugMode;
  }

  isClosed(): boolean {
    return this.closed;
  }

  logEntry(
    functionName: string,
    message: string,
    processType: ProcessTypeInput = 'system',
    status: LogStatusInput = 'information',
    taskName?: string,
    options: EntryOptions = {}
  ): void {
    const record: LogRecord = {
      timestamp: this.clock(),
      taskName: taskName ?? this.projectName,
      functionName,
      sourceFile: options.sourceFile ?? resolveCallerFile(),
      message,
      processType: coerceProcessType(processType),
      status: coerceLogStatus(status),
    };

    this.append(renderRecord(record).join('\n') + '\n');

    const level = consoleLevelFor(record.status);
    this.console[level](`${record.taskName} - ${record.functionName}: ${record.message}`);
  }

  logInfo(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    this.logEntry(functionName, message, processType, 'information', undefined, options);
  }

  logDebug(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    if (!this.debugMode) return;
    this.logEntry(functionName, message, processType, 'debug', undefined, options);
  }

  logSuccess(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    this.logEntry(functionName, message, processType, 'success', undefined, options);
  }

  logWarning(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    this.logEntry(functionName, message, processType, 'warning', undefined, options);
  }

  logError(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    this.logEntry(functionName, message, processType, 'failure', undefined, options);
  }

  logCritical(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    this.logEntry(functionName, message, processType, 'critical', undefined, options);
  }

  /** Log at an arbitrary status; used by callers that pick the status at run time */
  logStatus(status: LogStatus, functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
    if (status === 'debug') {
      this.logDebug(functionName, message, processType, options);
      return;
    }
    this.logEntry(functionName, message, processType, status, undefined, options);
  }

  setDebugMode(enabled = true): void {
    this.debugMode = enabled;
    this.logInfo('setDebugMode', `Debug mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  /**
   * Append the closing footer. Only the first call writes; later records
   * are still appended below it.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.exitHook) {
      process.removeListener('exit', this.exitHook);
      this.exitHook = null;
    }

    if (!fs.existsSync(this.logFile)) return;
    const sep = separatorLine();
    const stamp = format(this.clock(), TIMESTAMP_FORMAT);
    this.append(`${sep}\n${footerLine(`Log closed at: ${stamp}`)}\n${sep}\n`);
  }

  private append(text: string): void {
    try {
      fs.appendFileSync(this.logFile, text, 'utf8');
    } catch (err) {
      this.console.warn({ err, file: this.logFile }, 'Tabular log write failed');
    }
  }
}
