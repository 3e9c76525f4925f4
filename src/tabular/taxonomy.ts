import { logStatusSchema, processTypeSchema } from '../validation/schemas.js';
import type { LogStatus, ProcessType } from '../types.js';

export const PROCESS_TYPES: readonly ProcessType[] = processTypeSchema.options;
export const LOG_STATUSES: readonly LogStatus[] = logStatusSchema.options;

export const DEFAULT_PROCESS_TYPE: ProcessType = 'system';
export const DEFAULT_STATUS: LogStatus = 'information';

/** Case-insensitive; anything outside the closed set becomes 'system' */
export function coerceProcessType(value: unknown): ProcessType {
  const parsed = processTypeSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value);
  return parsed.success ? parsed.data : DEFAULT_PROCESS_TYPE;
}

/** Case-insensitive; anything outside the closed set becomes 'information' */
export function coerceLogStatus(value: unknown): LogStatus {
  const parsed = logStatusSchema.safeParse(typeof value === 'string' ? value.trim().toLowerCase() : value);
  return parsed.success ? parsed.data : DEFAULT_STATUS;
}

export type ConsoleLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug';

const CONSOLE_LEVELS: Record<LogStatus, ConsoleLevel> = {
  critical: 'fatal',
  failure: 'error',
  warning: 'warn',
  information: 'info',
  success: 'info',
  debug: 'debug',
};

export function consoleLevelFor(status: LogStatus): ConsoleLevel {
  return CONSOLE_LEVELS[status];
}
