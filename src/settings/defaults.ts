import type { JsonValue } from '../validation/schemas.js';

export type SettingsDocument = { [key: string]: JsonValue };

export const DEFAULT_SETTINGS = {
  general: {
    startup_with_system: false,
    minimize_to_tray: true,
    notification_sounds: true,
    save_dictation_history: true,
    max_history_items: 100,
    theme: 'system', // light | dark | system
    log_level: 'INFO', // DEBUG | INFO | WARNING | ERROR
  },

  hotkeys: {
    toggle_dictation: 'super+h',
    pause_dictation: 'ctrl+space',
    cancel_dictation: 'escape',
  },

  speech_recognition: {
    engine: 'vosk', // vosk | whisper | google | system
    language: 'pt-BR',
    auto_punctuation: true,
    sensitivity: 0.6, // 0.0 - 1.0
    timeout: 5, // seconds
    auto_stop_after_silence: 2.0, // seconds, 0 disables
    capitalize_sentences: true,
  },

  ui: {
    floating_panel: true,
    panel_width: 500,
    panel_height: 200,
    opacity: 0.9,
    show_confidence: false,
    font_size: 12,
  },

  advanced: {
    audio_device: 'default',
    sample_rate: 16000,
    debug_mode: false,
    keep_logs_days: 30,
    max_log_size_mb: 5,
    keyboard_backend: 'auto', // auto | xdotool | ydotool | wtype
  },
} satisfies SettingsDocument;
