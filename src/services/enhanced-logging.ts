/**
 * Process-wide tabular logger.
 * setup() installs the writer explicitly at startup; the convenience functions
 * create a default one on first use when nothing was installed.
 */

import { APP_NAME } from '../config.js';
import { setLogLevel } from '../logger.js';
import { registerInternalModule } from '../tabular/caller.js';
import { TabularLogWriter, type TabularLogWriterOptions } from '../tabular/writer.js';
import type { EntryOptions, ProcessTypeInput } from '../types.js';

registerInternalModule(import.meta.url);

let current: TabularLogWriter | null = null;

/** Replace the process-wide writer; the previous one gets its footer */
export function setup(projectName: string = APP_NAME, options: Omit<TabularLogWriterOptions, 'projectName'> = {}): TabularLogWriter {
  current?.close();
  current = new TabularLogWriter({ ...options, projectName });
  return current;
}

export function getWriter(): TabularLogWriter {
  if (!current) {
    current = new TabularLogWriter();
  }
  return current;
}

export function hasWriter(): boolean {
  return current !== null;
}

/** Close the process-wide writer and forget it */
export function shutdown(): void {
  current?.close();
  current = null;
}

export function info(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logInfo(functionName, message, processType, options);
}

export function debug(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logDebug(functionName, message, processType, options);
}

export function success(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logSuccess(functionName, message, processType, options);
}

export function warning(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logWarning(functionName, message, processType, options);
}

export function error(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logError(functionName, message, processType, options);
}

export function critical(functionName: string, message: string, processType: ProcessTypeInput = 'system', options?: EntryOptions): void {
  getWriter().logCritical(functionName, message, processType, options);
}

/** Toggle debug records and the console level together */
export function setDebug(enabled = true): void {
  setLogLevel(enabled ? 'debug' : 'info');
  getWriter().setDebugMode(enabled);
}

export function getLogFile(): string {
  return getWriter().getLogFile();
}
