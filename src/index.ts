#!/usr/bin/env node
/**
 * Voice Dictation entry point
 * Parses the command line, sets up both loggers and loads the settings.
 */
import './preload-dotenv.js';
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import {
  APP_AUTHOR,
  APP_NAME,
  APP_VERSION,
  APP_WEBSITE,
  ensureAppDirectories,
} from './config.js';
import { closeLogging, createLogger } from './logger.js';
import * as enhanced from './services/enhanced-logging.js';
import { setupLogging } from './services/logging.js';
import { createSettingsStore } from './settings/store.js';

export interface CliArgs {
  debug: boolean;
  noGui: boolean;
  version: boolean;
  listDevices: boolean;
  help: boolean;
  config?: string;
}

export type ParseResult = { ok: true; args: CliArgs } | { ok: false; error: string };

export const USAGE = [
  `Usage: voice-dictation [options]`,
  ``,
  `  --debug            verbose logs, including debug records`,
  `  --no-gui           run without the graphical interface`,
  `  --version          print the version and exit`,
  `  --config FILE      use FILE instead of the default settings file`,
  `  --list-devices     list audio input devices and exit`,
  `  -h, --help         show this help`,
].join('\n');

export function parseArgs(argv: string[]): ParseResult {
  const args: CliArgs = { debug: false, noGui: false, version: false, listDevices: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--debug':
        args.debug = true;
        break;
      case '--no-gui':
        args.noGui = true;
        break;
      case '--version':
        args.version = true;
        break;
      case '--list-devices':
        args.listDevices = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          return { ok: false, error: '--config requires a file argument' };
        }
        args.config = value;
        i++;
        break;
      }
      default:
        if (arg.startsWith('--config=')) {
          const value = arg.slice('--config='.length);
          if (!value) return { ok: false, error: '--config requires a file argument' };
          args.config = value;
          break;
        }
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }
  return { ok: true, args };
}

export function versionText(): string {
  return [`${APP_NAME} v${APP_VERSION}`, `Author: ${APP_AUTHOR}`, `Website: ${APP_WEBSITE}`].join('\n');
}

type Print = (text: string) => void;

const stdoutPrint: Print = text => {
  process.stdout.write(text + '\n');
};

export function main(argv: string[] = process.argv.slice(2), print: Print = stdoutPrint): number {
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    print(`${parsed.error}\n\n${USAGE}`);
    return 2;
  }
  const args = parsed.args;

  if (args.help) {
    print(USAGE);
    return 0;
  }
  if (args.version) {
    print(versionText());
    return 0;
  }
  if (args.listDevices) {
    print('Audio device listing is not available in this build.');
    return 1;
  }

  const { failed } = ensureAppDirectories();
  setupLogging({ level: args.debug ? 'debug' : 'info', useEnhanced: true });
  const log = createLogger('main');
  for (const dir of failed) {
    log.warn({ dir }, 'Could not create application directory');
  }
  if (args.debug) {
    enhanced.setDebug(true);
  }

  const settings = createSettingsStore({
    reporter: enhanced.getWriter(),
    ...(args.config ? { filePath: path.resolve(args.config) } : {}),
  });

  log.info(`Starting ${APP_NAME} v${APP_VERSION}`);
  enhanced.info('main', `Starting ${APP_NAME} v${APP_VERSION}`, 'system');

  try {
    const language = settings.get('speech_recognition.language', 'en-US');
    enhanced.debug('main', `Settings loaded from ${settings.filePath} (language=${String(language)})`, 'core');

    if (args.noGui) {
      log.info('Starting in CLI mode (no graphical interface)');
      enhanced.info('main', 'Starting in CLI mode (no graphical interface)', 'system');
      print('CLI mode is not implemented yet.');
      return 1;
    }

    if (!process.env.DISPLAY && !process.env.WAYLAND_DISPLAY) {
      log.error('No graphical session (X11/Wayland) detected');
      enhanced.critical('main', 'No graphical session (X11/Wayland) detected', 'system');
      print('Error: this application needs a graphical session.');
      print('On a remote machine, use SSH with X11 forwarding.');
      return 1;
    }

    log.warn('The graphical interface is not part of this build');
    enhanced.warning('main', 'The graphical interface is not part of this build', 'ui');
    return 1;
  } catch (err) {
    log.fatal({ err }, 'Unhandled application error');
    enhanced.critical('main', `Unhandled application error: ${err instanceof Error ? err.message : String(err)}`, 'system');
    return 1;
  } finally {
    log.info('Application stopped');
    enhanced.info('main', 'Application stopped', 'system');
    enhanced.shutdown();
    closeLogging();
  }
}

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;

interface SignalSource {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Close the tabular log (footer included) when the process is interrupted.
 * Returns a function that removes the handlers again.
 */
export function installShutdownHandlers(
  exit: (code: number) => void = code => process.exit(code),
  source: SignalSource = process
): () => void {
  const signals = ['SIGINT', 'SIGTERM'] as const;
  const handlers = signals.map(signal => {
    const handler = () => {
      if (enhanced.hasWriter()) {
        enhanced.warning('main', `Received ${signal}, shutting down`, 'system');
      }
      enhanced.shutdown();
      closeLogging();
      exit(SIGNAL_EXIT_CODES[signal]);
    };
    source.once(signal, handler);
    return [signal, handler] as const;
  });
  return () => {
    for (const [signal, handler] of handlers) source.off(signal, handler);
  };
}

/**
 * Whether `entry` (process.argv[1]) is the module at `moduleUrl`.
 * npm links `bin` scripts, so the symlink is resolved first.
 */
export function isEntryPoint(moduleUrl: string, entry: string | undefined): boolean {
  if (!entry) return false;
  let resolved: string;
  try {
    resolved = fs.realpathSync(entry);
  } catch {
    resolved = path.resolve(entry);
  }
  return moduleUrl === pathToFileURL(resolved).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  installShutdownHandlers();
  process.exitCode = main();
}
