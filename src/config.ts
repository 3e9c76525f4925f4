/**
 * Application constants and per-user paths.
 * Directories can be relocated through VOICE_DICTATION_*_DIR (see .env.example).
 */
import fs from 'fs';
import os from 'os';
import path from 'path';

export const APP_NAME = 'Voice Dictation';
export const APP_ID = 'io.github.voice-dictation';
export const APP_VERSION = '0.1.0';
export const APP_AUTHOR = 'Voice Dictation contributors';
export const APP_WEBSITE = 'https://github.com/voice-dictation/voice-dictation';
export const APP_ICON_NAME = 'microphone';

/** Slug used for directory and daily log file names */
export const APP_SLUG = 'voice-dictation';

function envDir(name: string, fallback: string): string {
  const v = process.env[name];
  return v && v.trim() ? path.resolve(v.trim()) : fallback;
}

const home = os.homedir();

export const USER_CONFIG_DIR = envDir('VOICE_DICTATION_CONFIG_DIR', path.join(home, '.config', APP_SLUG));
export const USER_CACHE_DIR = envDir('VOICE_DICTATION_CACHE_DIR', path.join(home, '.cache', APP_SLUG));
export const USER_DATA_DIR = envDir('VOICE_DICTATION_DATA_DIR', path.join(home, '.local', 'share', APP_SLUG));
export const LOG_DIR = path.join(USER_DATA_DIR, 'logs');
export const MODELS_DIR = path.join(USER_CACHE_DIR, 'models');

export const CONFIG_FILE = path.join(USER_CONFIG_DIR, 'settings.json');

/** Daily file for the console/structured log stream, one per calendar day */
export function dailyLogFileName(date: string): string {
  return `${APP_SLUG}-${date}.log`;
}

/**
 * Creates every per-user directory the app writes to.
 * Returns the directories that could not be created instead of throwing.
 */
export function ensureAppDirectories(): { failed: string[] } {
  const failed: string[] = [];
  for (const dir of [USER_CONFIG_DIR, USER_CACHE_DIR, USER_DATA_DIR, LOG_DIR, MODELS_DIR]) {
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch {
      failed.push(dir);
    }
  }
  return { failed };
}
