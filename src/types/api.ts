/**
 * Application API channel names and message types
 *
 * NAMING CONVENTION:
 * - Channel names use kebab-case (e.g., 'render-video')
 * - Constant names use SCREAMING_SNAKE_CASE (e.g., RENDER_VIDEO)
 * - Request/Response interfaces use PascalCase with suffix (e.g., RenderVideoRequest)
 *
 * Handlers never throw: they resolve to either their response type or an
 * ErrorResponse. Long-running handlers stream progress through an EventSender.
 */

import { VideoDimensions, RenderState, TargetResolution } from './media';
import { CaptionTrack, Cue, Word } from './subtitles';

export const API_CHANNELS = {
  /** Extract audio, transcribe, segment and translate a video */
  GENERATE_CAPTIONS: 'generate-captions',
  /** Streaming progress for GENERATE_CAPTIONS */
  GENERATE_CAPTIONS_PROGRESS: 'generate-captions-progress',
  /** Re-run segmentation over stored words with a new character limit */
  RESEGMENT: 'resegment',
  /** Burn caption tracks into a video */
  RENDER_VIDEO: 'render-video',
  /** Streaming progress for RENDER_VIDEO */
  RENDER_PROGRESS: 'render-progress',
  /** Abort one or all in-flight renders */
  CANCEL_RENDER: 'cancel-render',
  /** Read an .srt file into cues */
  IMPORT_SRT: 'import-srt',
  /** Write one .srt file per caption track */
  EXPORT_SRT: 'export-srt',
} as const;

export type ApiChannel = typeof API_CHANNELS[keyof typeof API_CHANNELS];

/**
 * Standard error shape returned by every handler
 */
export interface ErrorResponse {
  success: false;
  error: string;
  /** stack trace or captured FFmpeg log */
  details?: string;
}

export type Result<T> = T | ErrorResponse;

export function isErrorResponse(value: unknown): value is ErrorResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    value.success === false &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

// ---------------------------------------------------------------------------
// Caption generation
// ---------------------------------------------------------------------------

export interface GenerateCaptionsRequest {
  videoPath: string;
  /** language spoken in the video, e.g. 'pt' */
  sourceLanguage: string;
  /** languages to translate into; the source language is skipped if listed */
  targetLanguages: string[];
  /** overrides the configured limit */
  maxCharsPerCue?: number;
}

export interface GenerateCaptionsResponse {
  success: true;
  jobId: string;
  /** kept so the caller can re-segment without transcribing again */
  words: Word[];
  /** source language first, then targets in request order */
  tracks: CaptionTrack[];
}

export type CaptionPhase = 'extracting-audio' | 'transcribing' | 'segmenting' | 'translating' | 'complete' | 'error';

export interface GenerateCaptionsProgressEvent {
  jobId: string;
  phase: CaptionPhase;
  /** 0..100 across the whole job */
  percent: number;
  /** set while translating */
  language?: string;
  errorMessage?: string;
}

export interface ResegmentRequest {
  words: Word[];
  maxCharsPerCue: number;
  maxCueDurationMs?: number;
}

export interface ResegmentResponse {
  success: true;
  cues: Cue[];
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export interface RenderVideoRequest {
  inputPath: string;
  /** defaults to `<input>_captioned.mp4` */
  outputPath?: string;
  tracks: CaptionTrack[];
  targetResolution: TargetResolution;
}

export interface RenderVideoResponse {
  success: true;
  jobId: string;
  outputPath: string;
  dimensions?: VideoDimensions;
  durationMs?: number;
}

export type RenderStatus = 'processing' | 'complete' | 'error' | 'cancelled';

export interface RenderProgressEvent {
  jobId: string;
  /** 0..100, never decreases within a job */
  percent: number;
  status: RenderStatus;
  state?: RenderState;
  errorMessage?: string;
}

export interface CancelRenderRequest {
  /** cancels every in-flight render when omitted */
  jobId?: string;
}

export interface CancelRenderResponse {
  success: true;
  cancelled: number;
}

// ---------------------------------------------------------------------------
// Interchange files
// ---------------------------------------------------------------------------

export interface ImportSrtRequest {
  path: string;
}

export interface ImportSrtResponse {
  success: true;
  cues: Cue[];
}

export interface ExportSrtRequest {
  videoPath: string;
  tracks: CaptionTrack[];
  /** defaults to the video's directory */
  outputDir?: string;
}

export interface ExportSrtResponse {
  success: true;
  files: { language: string; path: string }[];
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface EventPayloads {
  [API_CHANNELS.GENERATE_CAPTIONS_PROGRESS]: GenerateCaptionsProgressEvent;
  [API_CHANNELS.RENDER_PROGRESS]: RenderProgressEvent;
}

/** Anything that can push progress events to the caller (a socket, a window, a test spy) */
export interface EventSender {
  send<C extends keyof EventPayloads>(channel: C, payload: EventPayloads[C]): void;
}
