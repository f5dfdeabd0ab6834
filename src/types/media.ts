/**
 * Media and render types
 *
 * USAGE:
 * - Encoders return ProbeResult / EncodeOutcome
 * - RenderOrchestrator consumes RenderJob and returns RenderResult
 */

/**
 * Display dimensions of a video, already corrected for rotation metadata.
 *
 * @example
 * // a phone clip stored as 1920x1080 with rotate=90
 * const dims: VideoDimensions = { width: 1080, height: 1920 };
 */
export interface VideoDimensions {
  width: number;
  height: number;
}

/** What the encoder's info mode tells us about an input */
export interface ProbeResult {
  dimensions: VideoDimensions;
  /** 0 when unknown; progress then stays indeterminate */
  durationMs: number;
  /** absolute rotation in degrees, 0 when none */
  rotation: number;
  /** false when defaults were substituted for unparseable output */
  parsed: boolean;
  /** raw diagnostic text, kept for logging */
  raw: string;
}

export const TARGET_RESOLUTIONS = ['original', '4k', '1440p', '1080p', '720p', '480p'] as const;

export type TargetResolution = typeof TARGET_RESOLUTIONS[number];

/** Receives a 0..1 progress value as encoder output arrives */
export interface ProgressSink {
  report(progress: number): void;
}

export interface RenderJob {
  inputPath: string;
  outputPath: string;
  subtitleDocumentPath: string;
  targetResolution: TargetResolution;
  progressSink?: ProgressSink;
  /** directory passed to the subtitles filter as fontsdir */
  fontsDir?: string;
}

/** Arguments an Encoder needs for the burn step */
export interface EncodeRequest {
  inputPath: string;
  outputPath: string;
  /** complete -vf filter graph */
  filter: string;
  /** known input duration, 0 when unknown */
  durationMs: number;
}

export interface EncodeOutcome {
  success: boolean;
  /** process exit code, or null when killed by a signal */
  exitCode: number | null;
  cancelled: boolean;
  /** captured diagnostic output */
  log: string;
}

export type RenderState = 'idle' | 'probing' | 'building-filter' | 'encoding' | 'succeeded' | 'failed';

export type RenderFailureReason = 'prepare-failed' | 'encode-failed' | 'launch-failed' | 'cancelled' | 'busy';

export interface RenderResult {
  success: boolean;
  state: Extract<RenderState, 'succeeded' | 'failed'>;
  reason?: RenderFailureReason;
  /** human-readable status line */
  message: string;
  log: string;
  dimensions?: VideoDimensions;
  durationMs?: number;
}
