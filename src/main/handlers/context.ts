import * as os from 'os';
import * as path from 'path';
import type { AppConfig } from '../config';
import { Word } from '../../types/subtitles';
import { createEncoder } from '../services/encoders';
import { FontRegistry } from '../services/fonts';
import { RenderOrchestrator } from '../services/render';
import { extractAudioToWav, transcribeWords } from '../services/transcription';
import { OpenAiTranslator, Translator } from '../services/translation';

/**
 * Everything the handlers depend on. Built once by the host and passed to each
 * call; tests substitute fakes for the collaborators.
 */
export interface HandlerContext {
  config: AppConfig;
  /** scratch space for extracted audio and subtitle documents */
  workDir: string;
  orchestrator: RenderOrchestrator;
  translator: Translator;
  fonts?: FontRegistry;
  transcribe(audioPath: string): Promise<Word[]>;
  extractAudio(videoPath: string, wavPath: string): Promise<void>;
  /** in-flight renders by job id */
  renders: Map<string, AbortController>;
}

export function createHandlerContext(config: AppConfig, workDir = path.join(os.tmpdir(), 'subburn')): HandlerContext {
  return {
    config,
    workDir,
    orchestrator: new RenderOrchestrator(createEncoder(config)),
    translator: new OpenAiTranslator(config),
    fonts: config.fontsDir ? new FontRegistry(config.fontsDir, workDir) : undefined,
    transcribe: (audioPath) => transcribeWords(audioPath, config),
    extractAudio: (videoPath, wavPath) => extractAudioToWav(videoPath, wavPath, config.ffmpegPath),
    renders: new Map(),
  };
}
