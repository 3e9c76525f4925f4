/**
 * Settings persisted as JSON, layered over compiled-in defaults.
 * Nothing here throws: failures are logged and fall back to defaults / false.
 */

import fs from 'fs';
import path from 'path';
import { CONFIG_FILE } from '../config.js';
import { createLogger, type ModuleLogger } from '../logger.js';
import type { TabularReporter } from '../types.js';
import { settingsDocumentSchema, type JsonValue } from '../validation/schemas.js';
import { DEFAULT_SETTINGS, type SettingsDocument } from './defaults.js';

// Keys that would reach Object.prototype instead of the document
const FORBIDDEN_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

export interface SettingsStoreOptions {
  filePath: string;
  defaults: SettingsDocument;
  /** Tabular log that also receives load/save failures */
  reporter?: TabularReporter;
  log?: ModuleLogger;
}

export function isPlainObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively copy `override` onto `base` (mutated and returned).
 * Nested objects merge; any other value from `override` replaces the one in `base`.
 */
export function deepMerge(base: SettingsDocument, override: SettingsDocument): SettingsDocument {
  for (const key of Object.keys(override)) {
    if (FORBIDDEN_KEYS.has(key)) continue;
    const next = override[key];
    const existing = Object.prototype.hasOwnProperty.call(base, key) ? base[key] : undefined;
    if (isPlainObject(existing) && isPlainObject(next)) {
      deepMerge(existing, next);
    } else {
      base[key] = next;
    }
  }
  return base;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class SettingsStore {
  readonly filePath: string;
  private readonly defaults: SettingsDocument;
  private readonly reporter: TabularReporter | undefined;
  private readonly log: ModuleLogger;

  constructor(options: SettingsStoreOptions) {
    this.filePath = options.filePath;
    this.defaults = structuredClone(options.defaults);
    this.reporter = options.reporter;
    this.log = options.log ?? createLogger('settings');
  }

  /** Fresh copy of the compiled-in defaults */
  getDefaults(): SettingsDocument {
    return structuredClone(this.defaults);
  }

  /**
   * Persisted document merged onto the defaults.
   * Without a settings file the defaults are written out first.
   */
  load(): SettingsDocument {
    try {
      if (!fs.existsSync(this.filePath)) {
        this.save(this.defaults);
        return this.getDefaults();
      }
      const raw = fs.readFileSync(this.filePath, 'utf8');
      const user = settingsDocumentSchema.parse(JSON.parse(raw));
      return deepMerge(this.getDefaults(), user);
    } catch (err) {
      this.report('load', 'Could not load settings, using defaults', err);
      return this.getDefaults();
    }
  }

  save(document: SettingsDocument): boolean {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(document, null, 4), 'utf8');
      fs.renameSync(tmp, this.filePath);
      return true;
    } catch (err) {
      this.report('save', 'Could not save settings', err);
      return false;
    }
  }

  /** Value at a dotted path such as "speech_recognition.language", or `fallback` */
  get(dottedPath: string, fallback?: JsonValue): JsonValue | undefined {
    let node: JsonValue = this.load();
    for (const part of dottedPath.split('.')) {
      if (FORBIDDEN_KEYS.has(part) || !isPlainObject(node) || !Object.prototype.hasOwnProperty.call(node, part)) {
        return fallback;
      }
      node = node[part];
    }
    return node;
  }

  /**
   * Assign at a dotted path, creating missing levels, then persist.
   * Refuses (false) when a level on the way holds a non-object value.
   */
  set(dottedPath: string, value: JsonValue): boolean {
    const parts = dottedPath.split('.');
    if (parts.some(p => FORBIDDEN_KEYS.has(p))) {
      this.report('set', `Refusing to write reserved key in "${dottedPath}"`);
      return false;
    }

    const document = this.load();
    const last = parts.pop();
    if (last === undefined) return false;

    let node: SettingsDocument = document;
    for (const part of parts) {
      const next = Object.prototype.hasOwnProperty.call(node, part) ? node[part] : undefined;
      if (next === undefined) {
        const created: SettingsDocument = {};
        node[part] = created;
        node = created;
      } else if (isPlainObject(next)) {
        node = next;
      } else {
        this.report('set', `Cannot set "${dottedPath}": "${part}" is not a section`);
        return false;
      }
    }

    node[last] = value;
    return this.save(document);
  }

  /** Overwrite the settings file with the defaults */
  reset(): boolean {
    return this.save(this.getDefaults());
  }

  private report(operation: string, message: string, err?: unknown): void {
    if (err === undefined) {
      this.log.warn({ file: this.filePath }, message);
    } else {
      this.log.error({ err, file: this.filePath }, message);
    }
    const detail = err === undefined ? message : `${message}: ${errorMessage(err)}`;
    this.reporter?.logError(`settings.${operation}`, detail, 'core');
  }
}

/** Store on the user's settings file with the compiled-in defaults */
export function createSettingsStore(overrides: Partial<SettingsStoreOptions> = {}): SettingsStore {
  return new SettingsStore({ filePath: CONFIG_FILE, defaults: DEFAULT_SETTINGS, ...overrides });
}
