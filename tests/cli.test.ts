import { EventEmitter } from 'events';
import fs from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { USAGE, installShutdownHandlers, isEntryPoint, main, parseArgs, versionText } from '../src/index.js';
import { configureLogging, getLoggingOptions } from '../src/logger.js';
import * as enhanced from '../src/services/enhanced-logging.js';
import { captureConsole, makeTempDir, readLines } from './helpers.js';

describe('parseArgs', () => {
  it('defaults every flag to off', () => {
    expect(parseArgs([])).toEqual({
      ok: true,
      args: { debug: false, noGui: false, version: false, listDevices: false, help: false },
    });
  });

  it('reads flags and the config file', () => {
    const result = parseArgs(['--debug', '--no-gui', '--config', 'my.json']);

    expect(result).toEqual({
      ok: true,
      args: { debug: true, noGui: true, version: false, listDevices: false, help: false, config: 'my.json' },
    });
    expect(parseArgs(['--config=other.json'])).toMatchObject({ ok: true, args: { config: 'other.json' } });
  });

  it('rejects unknown options and a missing config value', () => {
    expect(parseArgs(['--fast'])).toEqual({ ok: false, error: 'Unknown option: --fast' });
    expect(parseArgs(['--config'])).toEqual({ ok: false, error: '--config requires a file argument' });
    expect(parseArgs(['--config', '--debug'])).toEqual({ ok: false, error: '--config requires a file argument' });
  });
});

describe('main', () => {
  it('prints the version and exits with 0', () => {
    const print = vi.fn<(text: string) => void>();

    expect(main(['--version'], print)).toBe(0);
    expect(print).toHaveBeenCalledWith(versionText());
    expect(versionText().split('\n')[0]).toBe('Voice Dictation v0.1.0');
  });

  it('prints usage for help and for bad options', () => {
    const print = vi.fn<(text: string) => void>();

    expect(main(['--help'], print)).toBe(0);
    expect(main(['--nope'], print)).toBe(2);
    expect(print.mock.calls).toEqual([[USAGE], [`Unknown option: --nope\n\n${USAGE}`]]);
  });

  it('reports that device listing is unavailable', () => {
    const print = vi.fn<(text: string) => void>();

    expect(main(['--list-devices'], print)).toBe(1);
    expect(print).toHaveBeenCalledWith('Audio device listing is not available in this build.');
  });
});

describe('isEntryPoint', () => {
  it('matches the module through an npm-style bin symlink', () => {
    const dir = makeTempDir('bin');
    const script = path.join(dir, 'index.js');
    fs.writeFileSync(script, '');
    const link = path.join(dir, 'voice-dictation');
    fs.symlinkSync(script, link);
    const moduleUrl = pathToFileURL(fs.realpathSync(script)).href;

    expect(isEntryPoint(moduleUrl, script)).toBe(true);
    expect(isEntryPoint(moduleUrl, link)).toBe(true);
  });

  it('rejects other scripts and a missing argv entry', () => {
    const dir = makeTempDir('bin');
    const moduleUrl = pathToFileURL(path.join(fs.realpathSync(dir), 'index.js')).href;

    expect(isEntryPoint(moduleUrl, path.join(dir, 'other.js'))).toBe(false);
    expect(isEntryPoint(moduleUrl, undefined)).toBe(false);
  });
});

describe('installShutdownHandlers', () => {
  const saved = getLoggingOptions();

  afterEach(() => {
    enhanced.shutdown();
    configureLogging(saved);
  });

  it('writes the footer and exits with the signal code', () => {
    const writer = enhanced.setup('Dictation', {
      logDir: makeTempDir('signal'),
      console: captureConsole().console,
      registerExitHook: false,
    });
    const signals = new EventEmitter();
    const exit = vi.fn<(code: number) => void>();

    installShutdownHandlers(exit, signals);
    signals.emit('SIGTERM');

    expect(exit).toHaveBeenCalledWith(143);
    expect(writer.isClosed()).toBe(true);
    expect(enhanced.hasWriter()).toBe(false);
    const rows = readLines(writer.getLogFile());
    expect(rows[rows.length - 2].startsWith('| Log closed at:')).toBe(true);
  });

  it('removes both handlers', () => {
    const signals = new EventEmitter();
    const remove = installShutdownHandlers(vi.fn<(code: number) => void>(), signals);

    expect(signals.listenerCount('SIGINT')).toBe(1);
    expect(signals.listenerCount('SIGTERM')).toBe(1);
    remove();
    expect(signals.listenerCount('SIGINT')).toBe(0);
    expect(signals.listenerCount('SIGTERM')).toBe(0);
  });
});
