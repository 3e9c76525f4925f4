import fs from 'fs';
import path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { closeLogging, configureLogging, createLogger, getLoggingOptions } from '../src/logger.js';
import { makeTempDir } from './helpers.js';

function readIfExists(file: string): string {
  return fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : '';
}

describe('configureLogging', () => {
  const saved = getLoggingOptions();

  afterEach(() => {
    configureLogging(saved);
  });

  it('flushes the previous file transport when the root is replaced', async () => {
    const first = path.join(makeTempDir('logger'), 'first.log');
    const second = path.join(makeTempDir('logger'), 'second.log');
    const log = createLogger('recorder');

    configureLogging({ level: 'info', console: false, file: first });
    log.info('before reconfigure');
    configureLogging({ file: second });
    log.info('after reconfigure');
    closeLogging();

    await vi.waitFor(() => {
      expect(readIfExists(first)).toContain('"msg":"before reconfigure"');
      expect(readIfExists(second)).toContain('"msg":"after reconfigure"');
    }, { timeout: 5000 });
    expect(readIfExists(first)).not.toContain('after reconfigure');
  });

  it('turns every output off on close', () => {
    configureLogging({ console: true, file: null });
    closeLogging();

    expect(getLoggingOptions()).toMatchObject({ console: false, file: null });
  });
});
