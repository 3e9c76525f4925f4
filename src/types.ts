/** Shared types for the logging and settings modules */

/** Category of the component that produced a log record */
export type ProcessType = 'ui' | 'core' | 'system' | 'speech' | 'input';

/** Outcome/severity of a log record; the string forms are written verbatim to log files */
export type LogStatus =
  | 'failure'
  | 'success'
  | 'warning'
  | 'critical'
  | 'information'
  | 'debug';

/** Anything a caller may pass where a ProcessType / LogStatus is expected; coerced on use */
export type ProcessTypeInput = ProcessType | (string & {});
export type LogStatusInput = LogStatus | (string & {});

export type ColumnKey =
  | 'timestamp'
  | 'task'
  | 'function'
  | 'file'
  | 'message'
  | 'process_type'
  | 'status';

export interface ColumnSpec {
  key: ColumnKey;
  title: string;
  /** Content width, excluding the padding on each side */
  width: number;
}

export type RowValues = Record<ColumnKey, string>;

export interface LogRecord {
  timestamp: Date;
  taskName: string;
  functionName: string;
  sourceFile: string;
  message: string;
  processType: ProcessType;
  status: LogStatus;
}

export interface EntryOptions {
  /** File name to show in the FILE column; resolved from the call stack when omitted */
  sourceFile?: string;
}

/** Minimal sink a collaborator needs to report problems into the tabular log */
export interface TabularReporter {
  logError(functionName: string, message: string, processType?: ProcessTypeInput, options?: EntryOptions): void;
}
