/**
 * Application configuration
 *
 * Values come from the process environment, populated from a `.env` file by
 * dotenv the first time loadConfig() runs. The returned object is frozen and
 * owned by the caller; nothing in the services reads process.env directly.
 */

import * as dotenv from 'dotenv';
import * as ffprobeStatic from 'ffprobe-static';
import { createLogger, isLogLevel, LogLevel } from './services/log';
import { DEFAULT_MAX_CHARS_PER_CUE, DEFAULT_MAX_CUE_DURATION_MS } from './services/segmenter';

const log = createLogger('CONFIG');

export type EncoderKind = 'system' | 'fluent';

export interface AppConfig {
  openaiApiKey?: string;
  transcribeModel: string;
  translateModel: string;
  ffmpegPath: string;
  ffprobePath: string;
  fontsDir?: string;
  logFile?: string;
  logLevel: LogLevel;
  maxCharsPerCue: number;
  maxCueDurationMs: number;
  encoder: EncoderKind;
}

let dotenvLoaded = false;

function positiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    log.warn(`Ignoring ${key}=${raw}: expected a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Build the configuration from `env` (defaults to process.env after loading .env).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env && !dotenvLoaded) {
    dotenv.config();
    dotenvLoaded = true;
  }

  const level = nonEmpty(env.LOG_LEVEL)?.toLowerCase() ?? 'info';
  const encoder = nonEmpty(env.ENCODER)?.toLowerCase() ?? 'system';

  if (!isLogLevel(level)) log.warn(`Unknown LOG_LEVEL '${level}', using 'info'`);
  if (encoder !== 'system' && encoder !== 'fluent') log.warn(`Unknown ENCODER '${encoder}', using 'system'`);

  return Object.freeze({
    openaiApiKey: nonEmpty(env.OPENAI_API_KEY),
    transcribeModel: nonEmpty(env.TRANSCRIBE_MODEL) ?? 'whisper-1',
    translateModel: nonEmpty(env.TRANSLATE_MODEL) ?? 'gpt-4o-mini',
    ffmpegPath: nonEmpty(env.FFMPEG_PATH) ?? 'ffmpeg',
    ffprobePath: nonEmpty(env.FFPROBE_PATH) ?? ffprobeStatic.path,
    fontsDir: nonEmpty(env.FONTS_DIR),
    logFile: nonEmpty(env.LOG_FILE),
    logLevel: isLogLevel(level) ? level : 'info',
    maxCharsPerCue: positiveInt(env, 'MAX_CHARS_PER_CUE', DEFAULT_MAX_CHARS_PER_CUE),
    maxCueDurationMs: positiveInt(env, 'MAX_CUE_DURATION_MS', DEFAULT_MAX_CUE_DURATION_MS),
    encoder: encoder === 'fluent' ? 'fluent' : 'system',
  });
}
