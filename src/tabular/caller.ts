import path from 'path';
import { fileURLToPath } from 'url';

export const UNKNOWN_SOURCE = 'unknown';

// Files whose frames are logging plumbing, never the "caller"
const internalFiles = new Set<string>();

function normalize(file: string): string {
  return file.startsWith('file://') ? fileURLToPath(file) : file;
}

/** Mark a module (by its import.meta.url) as part of the logging plumbing */
export function registerInternalModule(moduleUrl: string): void {
  internalFiles.add(normalize(moduleUrl));
}

registerInternalModule(import.meta.url);

// "    at fn (/path/file.ts:12:3)" or "    at /path/file.ts:12:3"
const FRAME_RE = /^\s*at\s+(?:.*?\s+\()?((?:file:\/\/)?[^()\s]+?):\d+:\d+\)?\s*$/;

export function frameFile(frame: string): string | null {
  const m = FRAME_RE.exec(frame);
  if (!m || !m[1]) return null;
  const file = m[1];
  if (file.startsWith('node:') || file === 'native') return null;
  return normalize(file);
}

/**
 * Base name of the first stack frame outside the logging modules.
 * Depth-independent, so wrappers at any level report the real call site.
 */
export function resolveCallerFile(): string {
  const stack = new Error().stack;
  if (!stack) return UNKNOWN_SOURCE;

  for (const frame of stack.split('\n').slice(1)) {
    const file = frameFile(frame);
    if (file && !internalFiles.has(file)) {
      return path.basename(file);
    }
  }
  return UNKNOWN_SOURCE;
}
