import fs from 'fs';
import os from 'os';
import path from 'path';
import { pino } from 'pino';
import { wrapLogger, type ModuleLogger } from '../src/logger.js';

export interface CapturedLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** Console logger whose JSON lines land in memory */
export function captureConsole(level = 'debug'): { console: ModuleLogger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const instance = pino({ level }, {
    write(chunk: string) {
      lines.push(JSON.parse(chunk));
    },
  });
  return { console: wrapLogger(instance), lines };
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function readLines(file: string): string[] {
  const text = fs.readFileSync(file, 'utf8');
  return text.endsWith('\n') ? text.slice(0, -1).split('\n') : text.split('\n');
}

/** Cells of a table row, without the outer borders */
export function cells(row: string): string[] {
  return row.split('|').slice(1, -1);
}
