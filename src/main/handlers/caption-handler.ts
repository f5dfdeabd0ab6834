import * as fs from 'fs';
import * as path from 'path';
import {
  API_CHANNELS,
  CaptionPhase,
  EventSender,
  GenerateCaptionsResponse,
  ResegmentResponse,
  Result,
} from '../../types/api';
import { CaptionTrack } from '../../types/subtitles';
import { createLogger } from '../services/log';
import { segment } from '../services/segmenter';
import { translateTrack } from '../services/translation';
import { HandlerContext } from './context';
import { createJobId, withErrorHandling } from './handlers';
import { readGenerateCaptionsRequest, readResegmentRequest } from './validate';

const log = createLogger('CAPTIONS');

// Share of the overall percent each phase ends at
const PHASE_END = {
  'extracting-audio': 10,
  transcribing: 40,
  segmenting: 45,
  translating: 100,
} as const;

/**
 * Video -> words -> cues in the source language -> one translated track per
 * target language. Tracks come back source first, then targets in request
 * order; duplicates and the source language itself are skipped.
 */
export const handleGenerateCaptions = withErrorHandling(
  'generate-captions',
  async (ctx: HandlerContext, sender: EventSender, request: unknown): Promise<Result<GenerateCaptionsResponse>> => {
    const req = readGenerateCaptionsRequest(request);
    const jobId = createJobId('captions');
    const emit = (phase: CaptionPhase, percent: number, extra: { language?: string; errorMessage?: string } = {}) =>
      sender.send(API_CHANNELS.GENERATE_CAPTIONS_PROGRESS, { jobId, phase, percent, ...extra });

    try {
      emit('extracting-audio', 0);
      await fs.promises.mkdir(ctx.workDir, { recursive: true });
      const wavPath = path.join(ctx.workDir, `${jobId}.wav`);
      await ctx.extractAudio(req.videoPath, wavPath);

      emit('transcribing', PHASE_END['extracting-audio']);
      const words = await ctx.transcribe(wavPath).finally(() => fs.promises.rm(wavPath, { force: true }));

      emit('segmenting', PHASE_END.transcribing);
      const maxChars = req.maxCharsPerCue ?? ctx.config.maxCharsPerCue;
      const cues = segment(words, maxChars, ctx.config.maxCueDurationMs);
      log.info(`${words.length} words -> ${cues.length} cues (maxChars=${maxChars})`);

      const tracks: CaptionTrack[] = [{ language: req.sourceLanguage, cues }];
      const targets = [...new Set(req.targetLanguages)].filter((lang) => lang !== req.sourceLanguage);
      const span = PHASE_END.translating - PHASE_END.segmenting;

      for (const [i, language] of targets.entries()) {
        emit('translating', PHASE_END.segmenting + (span * i) / targets.length, { language });
        const translated = await translateTrack(cues, req.sourceLanguage, language, ctx.translator, {
          onProgress: (p) =>
            emit('translating', PHASE_END.segmenting + (span * (i + p)) / targets.length, { language }),
        });
        tracks.push({ language, cues: translated });
      }

      emit('complete', 100);
      return { success: true, jobId, words, tracks };
    } catch (e) {
      emit('error', 0, { errorMessage: e instanceof Error ? e.message : String(e) });
      throw e;
    }
  }
);

/**
 * Re-run segmentation over stored words, e.g. after the user changed the
 * characters-per-cue slider. Translations are not redone here.
 */
export const handleResegment = withErrorHandling(
  'resegment',
  async (ctx: HandlerContext, request: unknown): Promise<Result<ResegmentResponse>> => {
    const req = readResegmentRequest(request);
    const cues = segment(req.words, req.maxCharsPerCue, req.maxCueDurationMs ?? ctx.config.maxCueDurationMs);
    return { success: true, cues };
  }
);
