/**
 * Caption translation
 *
 * translateTrack() splits a cue list into batches, sends up to three batches
 * at a time to a Translator and stitches the answers back in order. Timings
 * are never touched: the result has the same length and the same
 * startMs/endMs as the input, only the text changes. A batch that keeps
 * failing after its retries keeps its original text.
 */

import OpenAI from 'openai';
import type { AppConfig } from '../config';
import { Cue } from '../../types/subtitles';
import { createLogger } from './log';
import { getOpenAIClient } from './openai-client';

const log = createLogger('TRANSLATE');

export const SUPPORTED_LANGUAGES: Readonly<Record<string, string>> = Object.freeze({
  en: 'English',
  pt: 'Portuguese',
  es: 'Spanish',
  fr: 'French',
  de: 'German',
  it: 'Italian',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
  ru: 'Russian',
  ar: 'Arabic',
  hi: 'Hindi',
  vi: 'Vietnamese',
  th: 'Thai',
  id: 'Indonesian',
});

/** Human-readable name for a language code; unknown codes are returned as-is */
export function languageName(code: string): string {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_LANGUAGES, code) ? SUPPORTED_LANGUAGES[code] : code;
}

export interface Translator {
  /**
   * Translate every cue's text. Must resolve to exactly one string per cue,
   * in order; anything else counts as a failed attempt.
   */
  translateBatch(cues: readonly Cue[], sourceLabel: string, targetLabel: string): Promise<string[]>;
}

export interface TranslateOptions {
  batchSize?: number;
  concurrency?: number;
  /** retries after the first attempt */
  maxRetries?: number;
  /** first backoff delay; doubles on every retry */
  baseDelayMs?: number;
  /** replaced in tests to skip real waiting */
  delay?: (ms: number) => Promise<void>;
  /** 0..1, called once per finished batch */
  onProgress?: (progress: number) => void;
}

export const DEFAULT_BATCH_SIZE = 40;
export const DEFAULT_CONCURRENCY = 3;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function translateWithRetry(
  batch: readonly Cue[],
  sourceLabel: string,
  targetLabel: string,
  translator: Translator,
  opts: Required<Pick<TranslateOptions, 'maxRetries' | 'baseDelayMs' | 'delay'>>
): Promise<string[]> {
  for (let attempt = 1; ; attempt++) {
    try {
      const texts = await translator.translateBatch(batch, sourceLabel, targetLabel);
      if (texts.length !== batch.length) {
        throw new Error(`Expected ${batch.length} translations, received ${texts.length}`);
      }
      return texts;
    } catch (e) {
      if (attempt > opts.maxRetries) throw e;
      const wait = opts.baseDelayMs * 2 ** (attempt - 1);
      log.warn(
        `Batch failed (attempt ${attempt}/${opts.maxRetries}), retrying in ${wait}ms:`,
        e instanceof Error ? e.message : String(e)
      );
      await opts.delay(wait);
    }
  }
}

/**
 * Translate a cue list from one language to another.
 */
export async function translateTrack(
  cues: readonly Cue[],
  sourceLanguage: string,
  targetLanguage: string,
  translator: Translator,
  options: TranslateOptions = {}
): Promise<Cue[]> {
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const retry = {
    maxRetries: options.maxRetries ?? DEFAULT_MAX_RETRIES,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
    delay: options.delay ?? sleep,
  };
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  if (cues.length === 0) return [];

  const sourceLabel = languageName(sourceLanguage);
  const targetLabel = languageName(targetLanguage);

  const batches: Cue[][] = [];
  for (let i = 0; i < cues.length; i += batchSize) {
    batches.push(cues.slice(i, i + batchSize));
  }
  log.info(`Translating ${cues.length} cues ${sourceLabel} -> ${targetLabel} in ${batches.length} batch(es)`);

  const results: string[][] = new Array(batches.length);
  let next = 0;
  let completed = 0;

  const worker = async () => {
    while (next < batches.length) {
      const index = next++;
      const batch = batches[index];
      try {
        results[index] = await translateWithRetry(batch, sourceLabel, targetLabel, translator, retry);
      } catch (e) {
        log.error(`Batch ${index} failed, keeping original text:`, e instanceof Error ? e.message : String(e));
        results[index] = batch.map((cue) => cue.text);
      }
      completed++;
      options.onProgress?.(completed / batches.length);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, batches.length) }, () => worker()));

  const texts = results.flat();
  return cues.map((cue, i) => ({ startMs: cue.startMs, endMs: cue.endMs, text: texts[i] }));
}

const SYSTEM_PROMPT = (source: string, target: string) =>
  [
    'You are a professional subtitle translator for video captions.',
    `Translate the following subtitles from ${source} to ${target}.`,
    'IMPORTANT RULES:',
    '1. Keep translations CONCISE and SHORT - subtitles must fit on ONE LINE.',
    '2. Preserve the meaning but use fewer words when possible.',
    '3. Do not add explanations or expand the text.',
    '4. Do not merge or split subtitles, and do not change the "id" values.',
    'Return ONLY a JSON object of the form {"translations":[{"id":0,"text":"..."}]}.',
  ].join('\n');

/**
 * Read `{"translations":[{id,text}]}` back into an array ordered by id.
 * Throws when an id is missing so the batch is retried.
 */
export function parseTranslationResponse(content: string, expected: number): string[] {
  const cleaned = content
    .trim()
    .replace(/^```(?:json)?/, '')
    .replace(/```$/, '')
    .trim();
  const parsed: unknown = JSON.parse(cleaned);
  const items: unknown[] | null =
    typeof parsed === 'object' && parsed !== null && 'translations' in parsed && Array.isArray(parsed.translations)
      ? parsed.translations
      : Array.isArray(parsed)
        ? parsed
        : null;
  if (!items) throw new Error('Translation response has no translations array');

  const out = new Array<string | undefined>(expected).fill(undefined);
  for (const item of items) {
    if (typeof item !== 'object' || item === null || !('id' in item) || !('text' in item)) continue;
    const id = Number(item.id);
    if (Number.isInteger(id) && id >= 0 && id < expected && typeof item.text === 'string') {
      out[id] = item.text;
    }
  }

  const result: string[] = [];
  for (let i = 0; i < expected; i++) {
    const text = out[i];
    if (text === undefined) throw new Error(`Translation missing for id ${i}`);
    result.push(text);
  }
  return result;
}

/**
 * Translator backed by OpenAI chat completions in JSON mode. Cues are sent
 * keyed by their position in the batch.
 */
export class OpenAiTranslator implements Translator {
  private client: OpenAI | null = null;

  constructor(private readonly config: Pick<AppConfig, 'openaiApiKey' | 'translateModel'>) {}

  async translateBatch(cues: readonly Cue[], sourceLabel: string, targetLabel: string): Promise<string[]> {
    if (!this.client) this.client = getOpenAIClient(this.config.openaiApiKey);

    const payload = cues.map((cue, id) => ({ id, text: cue.text }));
    const completion = await this.client.chat.completions.create({
      model: this.config.translateModel,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT(sourceLabel, targetLabel) },
        { role: 'user', content: JSON.stringify(payload) },
      ],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) throw new Error('Empty translation response');
    return parseTranslationResponse(content, cues.length);
  }
}
