import ffmpeg from 'fluent-ffmpeg';
import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig } from '../config';
import { Word } from '../../types/subtitles';
import { createLogger } from './log';
import { getOpenAIClient } from './openai-client';

const log = createLogger('TRANSCRIBE');

/** Word timestamps are only returned by whisper-1 */
const WORD_TIMESTAMP_MODEL = 'whisper-1';

type TranscriptionConfig = Pick<AppConfig, 'openaiApiKey' | 'transcribeModel'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function secondsToMs(value: unknown): number | null {
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? Math.round(n * 1000) : null;
}

/**
 * Map the `words` array of a verbose_json transcription to Words.
 * Entries without text or timing are skipped; an end before the start is
 * raised to the start, and starts never go backwards.
 */
export function wordsFromTranscription(response: unknown): Word[] {
  const raw = isRecord(response) && Array.isArray(response.words) ? response.words : [];
  const words: Word[] = [];
  let lastStart = 0;

  for (const entry of raw) {
    if (!isRecord(entry)) continue;
    const text = String(entry.word ?? '').trim();
    const start = secondsToMs(entry.start);
    const end = secondsToMs(entry.end);
    if (!text || start === null || end === null) continue;

    const startMs = Math.max(start, lastStart);
    words.push({ text, startMs, endMs: Math.max(end, startMs) });
    lastStart = startMs;
  }
  return words;
}

/**
 * Transcribe an audio file into timed words.
 */
export async function transcribeWords(audioPath: string, config: TranscriptionConfig): Promise<Word[]> {
  if (!fs.existsSync(audioPath)) {
    throw new Error(`Audio file not found: ${audioPath}`);
  }

  const client = getOpenAIClient(config.openaiApiKey);

  const tryTranscribe = async (model: string): Promise<unknown> => {
    log.info(`Attempting model='${model}' with response_format='verbose_json'`);
    return client.audio.transcriptions.create({
      file: fs.createReadStream(audioPath),
      model,
      response_format: 'verbose_json',
      timestamp_granularities: ['word'],
    });
  };

  let resp: unknown;
  try {
    resp = await tryTranscribe(config.transcribeModel);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    log.warn('Primary model failed:', msg);
    const isFormatIncompatible = /response_format|timestamp_granularities|400/i.test(msg);
    if (!isFormatIncompatible || config.transcribeModel === WORD_TIMESTAMP_MODEL) throw e;
    log.info(`Falling back to model='${WORD_TIMESTAMP_MODEL}'`);
    resp = await tryTranscribe(WORD_TIMESTAMP_MODEL);
  }

  const words = wordsFromTranscription(resp);
  if (words.length === 0) {
    log.warn('Transcription returned no timed words');
  } else {
    log.info(`Transcribed ${words.length} words`);
  }
  return words;
}

/**
 * Extract the audio track of a video to mono 16 kHz PCM WAV, the format the
 * transcription endpoint handles best.
 */
export function extractAudioToWav(videoPath: string, wavPath: string, ffmpegPath = 'ffmpeg'): Promise<void> {
  fs.mkdirSync(path.dirname(wavPath), { recursive: true });

  return new Promise((resolve, reject) => {
    ffmpeg(videoPath)
      .setFfmpegPath(ffmpegPath)
      .noVideo()
      .audioChannels(1)
      .audioFrequency(16000)
      .audioCodec('pcm_s16le')
      .format('wav')
      .on('start', (commandLine: string) => {
        log.info(`executing: ${commandLine}`);
      })
      .on('end', () => {
        log.info(`Audio extracted to ${wavPath}`);
        resolve();
      })
      .on('error', (err: Error) => {
        log.error('Audio extraction failed:', err.message);
        reject(err);
      })
      .save(wavPath);
  });
}
