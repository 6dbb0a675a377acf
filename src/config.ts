import os from 'node:os';
import path from 'node:path';
import { AppConfig } from './types';

const DEFAULT_TITLE_COLOR = '#62A4C7';

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const optionalPath = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const resolveConfig = (): AppConfig => {
  const homeDir = os.homedir();

  return {
    captureBin: process.env.CASTLINE_CAPTURE_BIN ?? 'screencast-capture',
    externalCaptureProcess: process.env.CASTLINE_EXTERNAL_PROCESS ?? 'wl-screenrec',
    videosDir: process.env.CASTLINE_VIDEOS_DIR ?? path.join(homeDir, 'Videos', 'Screencasts'),
    logDir: process.env.CASTLINE_LOG_DIR ?? path.join(homeDir, '.config', 'castline', 'logs'),
    logToConsole: parseBoolOrDefault(process.env.CASTLINE_LOG_CONSOLE, false),
    defaultMonitor: process.env.CASTLINE_MONITOR ?? '',
    countdownSeconds: parseIntOrDefault(process.env.CASTLINE_COUNTDOWN_SECONDS, 5),
    completeHoldMs: parseIntOrDefault(process.env.CASTLINE_COMPLETE_HOLD_MS, 1500),
    sentinelPollMs: parseIntOrDefault(process.env.CASTLINE_SENTINEL_POLL_MS, 1000),
    relayQueueCapacity: parseIntOrDefault(process.env.CASTLINE_RELAY_QUEUE_CAPACITY, 100),
    captureStartDelayMs: parseIntOrDefault(process.env.CASTLINE_CAPTURE_START_DELAY_MS, 300),
    captureStopTimeoutMs: parseIntOrDefault(process.env.CASTLINE_CAPTURE_STOP_TIMEOUT_MS, 2000),
    audioCues: parseBoolOrDefault(process.env.CASTLINE_AUDIO_CUES, true),
    recordAudio: parseBoolOrDefault(process.env.CASTLINE_RECORD_AUDIO, true),
    recordScreen: parseBoolOrDefault(process.env.CASTLINE_RECORD_SCREEN, true),
    recordWebcam: parseBoolOrDefault(process.env.CASTLINE_RECORD_WEBCAM, false),
    verticalVideo: parseBoolOrDefault(process.env.CASTLINE_VERTICAL_VIDEO, false),
    logos: {
      left: optionalPath(process.env.CASTLINE_LOGO_LEFT),
      right: optionalPath(process.env.CASTLINE_LOGO_RIGHT),
      bottom: optionalPath(process.env.CASTLINE_LOGO_BOTTOM),
      titleColor: process.env.CASTLINE_TITLE_COLOR ?? DEFAULT_TITLE_COLOR
    },
    presenter: process.env.CASTLINE_PRESENTER ?? ''
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.captureBin.trim()) {
    errors.push('CASTLINE_CAPTURE_BIN must not be empty.');
  }

  if (!config.externalCaptureProcess.trim()) {
    errors.push('CASTLINE_EXTERNAL_PROCESS must not be empty.');
  }

  if (!config.videosDir.trim()) {
    errors.push('CASTLINE_VIDEOS_DIR must not be empty.');
  }

  if (!config.logDir.trim()) {
    errors.push('CASTLINE_LOG_DIR must not be empty.');
  }

  if (config.countdownSeconds < 0 || config.countdownSeconds > 9) {
    errors.push('CASTLINE_COUNTDOWN_SECONDS must be between 0 and 9.');
  }

  if (config.completeHoldMs < 0 || config.completeHoldMs > 30000) {
    errors.push('CASTLINE_COMPLETE_HOLD_MS must be between 0 and 30000 milliseconds.');
  }

  if (config.sentinelPollMs < 250 || config.sentinelPollMs > 60000) {
    errors.push('CASTLINE_SENTINEL_POLL_MS must be between 250 and 60000 milliseconds.');
  }

  if (config.relayQueueCapacity < 1 || config.relayQueueCapacity > 10000) {
    errors.push('CASTLINE_RELAY_QUEUE_CAPACITY must be between 1 and 10000.');
  }

  if (config.captureStartDelayMs < 0 || config.captureStartDelayMs > 5000) {
    errors.push('CASTLINE_CAPTURE_START_DELAY_MS must be between 0 and 5000 milliseconds.');
  }

  if (config.captureStopTimeoutMs < 100 || config.captureStopTimeoutMs > 30000) {
    errors.push('CASTLINE_CAPTURE_STOP_TIMEOUT_MS must be between 100 and 30000 milliseconds.');
  }

  if (config.logos.titleColor && !/^#[0-9a-fA-F]{6}$/.test(config.logos.titleColor)) {
    errors.push('CASTLINE_TITLE_COLOR must be a hex colour such as #62A4C7.');
  }

  return errors;
};
