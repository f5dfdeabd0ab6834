/**
 * Request payload validation
 *
 * Handler arguments arrive as `unknown` (they may come off a socket or a
 * window bridge). Each reader either returns a typed value or throws
 * InvalidRequestError, which withErrorHandling turns into an ErrorResponse.
 */

import {
  CancelRenderRequest,
  ExportSrtRequest,
  GenerateCaptionsRequest,
  ImportSrtRequest,
  RenderVideoRequest,
  ResegmentRequest,
} from '../../types/api';
import { TARGET_RESOLUTIONS, TargetResolution } from '../../types/media';
import { CaptionTrack, Cue, LanguageStyle, Word } from '../../types/subtitles';
import { isValidCue, validateWords } from '../services/cues';
import { InvalidCueError, InvalidRequestError } from '../services/errors';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) throw new InvalidRequestError('expected an object');
  return value;
}

function requireString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidRequestError(`'${key}' must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  return obj[key] === undefined ? undefined : requireString(obj, key);
}

function optionalPositiveInt(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidRequestError(`'${key}' must be a positive integer`);
  }
  return value;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function readWord(value: unknown, index: number): Word {
  if (isRecord(value) && typeof value.text === 'string' && isFiniteNumber(value.startMs) && isFiniteNumber(value.endMs)) {
    return { text: value.text, startMs: value.startMs, endMs: value.endMs };
  }
  throw new InvalidRequestError(`word at index ${index} must have text, startMs and endMs`);
}

function readCue(value: unknown, index: number): Cue {
  if (isRecord(value) && typeof value.text === 'string' && isFiniteNumber(value.startMs) && isFiniteNumber(value.endMs)) {
    const cue: Cue = { startMs: value.startMs, endMs: value.endMs, text: value.text };
    if (!isValidCue(cue)) {
      throw new InvalidRequestError(
        `cue at index ${index} needs integer times with 0 <= startMs < endMs (got ${cue.startMs} -> ${cue.endMs})`
      );
    }
    return cue;
  }
  throw new InvalidRequestError(`cue at index ${index} must have startMs, endMs and text`);
}

function readWords(obj: Record<string, unknown>): Word[] {
  const words = readArray(obj, 'words').map(readWord);
  try {
    validateWords(words);
  } catch (e) {
    if (e instanceof InvalidCueError) throw new InvalidRequestError(e.message);
    throw e;
  }
  return words;
}

function readStyle(value: unknown, language: string): LanguageStyle | undefined {
  if (value === undefined) return undefined;
  if (
    isRecord(value) &&
    typeof value.fontFamily === 'string' &&
    isFiniteNumber(value.fontSizePercent) &&
    isFiniteNumber(value.colorARGB) &&
    isFiniteNumber(value.verticalPositionPercent) &&
    isFiniteNumber(value.outlineWidth)
  ) {
    return {
      fontFamily: value.fontFamily,
      fontSizePercent: value.fontSizePercent,
      colorARGB: value.colorARGB,
      verticalPositionPercent: value.verticalPositionPercent,
      outlineWidth: value.outlineWidth,
    };
  }
  throw new InvalidRequestError(`style for '${language}' is incomplete`);
}

function readArray(obj: Record<string, unknown>, key: string): unknown[] {
  const value = obj[key];
  if (!Array.isArray(value)) throw new InvalidRequestError(`'${key}' must be an array`);
  return value;
}

function readTracks(obj: Record<string, unknown>): CaptionTrack[] {
  return readArray(obj, 'tracks').map((entry, i) => {
    const track = requireObject(entry);
    const language = requireString(track, 'language');
    if (!Array.isArray(track.cues)) throw new InvalidRequestError(`track ${i} ('${language}') has no cues array`);
    return {
      language,
      cues: track.cues.map((cue: unknown, j: number) => readCue(cue, j)),
      style: readStyle(track.style, language),
    };
  });
}

function readTargetResolution(obj: Record<string, unknown>): TargetResolution {
  const value = obj.targetResolution ?? 'original';
  const match = TARGET_RESOLUTIONS.find((r) => r === value);
  if (!match) {
    throw new InvalidRequestError(`'targetResolution' must be one of ${TARGET_RESOLUTIONS.join(', ')}`);
  }
  return match;
}

export function readGenerateCaptionsRequest(request: unknown): GenerateCaptionsRequest {
  const obj = requireObject(request);
  const targets = obj.targetLanguages === undefined ? [] : readArray(obj, 'targetLanguages');
  return {
    videoPath: requireString(obj, 'videoPath'),
    sourceLanguage: requireString(obj, 'sourceLanguage'),
    targetLanguages: targets.map((lang, i) => {
      if (typeof lang !== 'string' || lang.trim() === '') {
        throw new InvalidRequestError(`target language at index ${i} must be a non-empty string`);
      }
      return lang;
    }),
    maxCharsPerCue: optionalPositiveInt(obj, 'maxCharsPerCue'),
  };
}

export function readResegmentRequest(request: unknown): ResegmentRequest {
  const obj = requireObject(request);
  const maxCharsPerCue = optionalPositiveInt(obj, 'maxCharsPerCue');
  if (maxCharsPerCue === undefined) throw new InvalidRequestError(`'maxCharsPerCue' is required`);
  return {
    words: readWords(obj),
    maxCharsPerCue,
    maxCueDurationMs: optionalPositiveInt(obj, 'maxCueDurationMs'),
  };
}

export function readRenderVideoRequest(request: unknown): RenderVideoRequest {
  const obj = requireObject(request);
  return {
    inputPath: requireString(obj, 'inputPath'),
    outputPath: optionalString(obj, 'outputPath'),
    tracks: readTracks(obj),
    targetResolution: readTargetResolution(obj),
  };
}

export function readCancelRenderRequest(request: unknown): CancelRenderRequest {
  if (request === undefined || request === null) return {};
  return { jobId: optionalString(requireObject(request), 'jobId') };
}

export function readImportSrtRequest(request: unknown): ImportSrtRequest {
  return { path: requireString(requireObject(request), 'path') };
}

export function readExportSrtRequest(request: unknown): ExportSrtRequest {
  const obj = requireObject(request);
  return {
    videoPath: requireString(obj, 'videoPath'),
    tracks: readTracks(obj),
    outputDir: optionalString(obj, 'outputDir'),
  };
}
