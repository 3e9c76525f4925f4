import { pino, transport as pinoTransport, type Logger, type LevelWithSilent, type TransportTargetOptions } from 'pino';
import { logLevelSchema } from './validation/schemas.js';

const isProd = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

export interface LoggingOptions {
  level: LevelWithSilent;
  /** Write to stdout */
  console: boolean;
  /** Human-readable stdout through pino-pretty instead of JSON lines */
  pretty: boolean;
  /** Also append JSON lines to this file */
  file: string | null;
}

function levelFromEnv(): LevelWithSilent {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL?.trim().toLowerCase());
  if (parsed.success) return parsed.data;
  return isProd ? 'info' : 'debug';
}

let options: LoggingOptions = {
  level: levelFromEnv(),
  console: true,
  pretty: !isProd && !isTest,
  file: null,
};

// Worker-backed destination behind the current root, if any
interface TransportStream {
  end: () => void;
}

function buildRoot(opts: LoggingOptions): { root: Logger; transport: TransportStream | null } {
  if (!opts.console && !opts.file) {
    return { root: pino({ level: opts.level, enabled: false }), transport: null };
  }
  if (opts.console && !opts.pretty && !opts.file) {
    return { root: pino({ level: opts.level }), transport: null };
  }

  const targets: TransportTargetOptions[] = [];
  if (opts.console) {
    targets.push(
      opts.pretty
        ? {
            target: 'pino-pretty',
            level: opts.level,
            options: { colorize: true, translateTime: 'SYS:yyyy-mm-dd HH:MM:ss', ignore: 'pid,hostname' },
          }
        : { target: 'pino/file', level: opts.level, options: { destination: 1 } }
    );
  }
  if (opts.file) {
    targets.push({ target: 'pino/file', level: opts.level, options: { destination: opts.file, mkdir: true } });
  }
  const transport = pinoTransport({ targets });
  return { root: pino({ level: opts.level }, transport), transport };
}

let { root, transport } = buildRoot(options);
// Bumped whenever the root changes, so cached children are re-derived
let generation = 0;

/**
 * Rebuild the root logger; loggers created earlier follow the new root on their next call.
 * The previous transport is ended, which flushes its buffered lines and stops its worker.
 */
export function configureLogging(next: Partial<LoggingOptions>): LoggingOptions {
  options = { ...options, ...next };
  const previous = transport;
  ({ root, transport } = buildRoot(options));
  generation++;
  previous?.end();
  return { ...options };
}

/** Flush and stop the current transport; later records go nowhere until configureLogging runs */
export function closeLogging(): void {
  configureLogging({ console: false, file: null });
}

export function getLoggingOptions(): LoggingOptions {
  return { ...options };
}

export function setLogLevel(level: LevelWithSilent): void {
  options = { ...options, level };
  root.level = level;
  generation++;
}

export type LogFn = (...args: unknown[]) => void;

export interface ModuleLogger {
  fatal: LogFn;
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  child: (bindings: Record<string, unknown>) => ModuleLogger;
}

type WrappedLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug';

function memoChild(resolveParent: () => Logger, bindings: Record<string, unknown>): () => Logger {
  let parent: Logger | null = null;
  let gen = -1;
  let child: Logger | null = null;
  return () => {
    const p = resolveParent();
    if (!child || p !== parent || gen !== generation) {
      parent = p;
      gen = generation;
      child = p.child(bindings);
    }
    return child;
  };
}

/** Wrap a pino logger into a console-compatible logger */
function wrapChild(resolve: () => Logger): ModuleLogger {
  const wrap = (level: WrappedLevel): LogFn =>
    (...args: unknown[]) => {
      if (args.length === 0) return;
      const target = resolve();
      const [first, ...rest] = args;
      // If first arg is an object (not string), use pino's object-first form
      if (typeof first === 'object' && first !== null && !(first instanceof Error)) {
        target[level](first, rest.length > 0 ? rest.map(String).join(' ') : undefined);
        return;
      }
      // console-compatible: all args are message parts
      const parts = args.map(a =>
        a instanceof Error ? a.message : (typeof a === 'string' ? a : JSON.stringify(a))
      );
      const errObj = args.find((a): a is Error => a instanceof Error);
      if (errObj) {
        target[level]({ err: errObj }, parts.join(' '));
      } else {
        target[level](parts.join(' '));
      }
    };

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    child: (bindings: Record<string, unknown>) => wrapChild(memoChild(resolve, bindings)),
  };
}

/** Root application logger */
export const logger: ModuleLogger = wrapChild(() => root);

/** Create a console-compatible structured logger with module context */
export function createLogger(module: string): ModuleLogger {
  return wrapChild(memoChild(() => root, { module }));
}

/** Adapt a caller-owned pino instance (e.g. one writing to an in-memory destination) */
export function wrapLogger(instance: Logger): ModuleLogger {
  return wrapChild(() => instance);
}
