/**
 * FFmpeg Service Module
 *
 * Logic shared by every Encoder implementation:
 * - parsing `ffmpeg -i` diagnostics (duration, size, rotation)
 * - building the -vf filter graph (subtitle burn-in + optional scale)
 * - turning `time=` progress lines into a 0..1 signal
 *
 * Nothing here starts a process; see ./encoders for that.
 */

import * as path from 'path';
import { EncodeRequest, ProbeResult, ProgressSink, TargetResolution, VideoDimensions } from '../../types/media';
import { createLogger } from './log';
import { parseClockToMs } from './timecode';

const log = createLogger('FFMPEG');

export const DEFAULT_DIMENSIONS: Readonly<VideoDimensions> = Object.freeze({ width: 1920, height: 1080 });

/** Short side in pixels for each target; 'original' means no scaling */
export const TARGET_SHORT_SIDE: Record<Exclude<TargetResolution, 'original'>, number> = {
  '4k': 2160,
  '1440p': 1440,
  '1080p': 1080,
  '720p': 720,
  '480p': 480,
};

const DURATION_RE = /Duration:\s*(\d+):(\d{2}):(\d{2})(?:\.(\d+))?/;
const SIZE_RE = /\b(\d{2,5})x(\d{2,5})\b/;
const ROTATE_TAG_RE = /rotate\s*:\s*(-?\d+)/;
const DISPLAY_MATRIX_RE = /rotation of\s*(-?\d+(?:\.\d+)?)/;
const PROGRESS_TIME_RE = /time=\s*(\d+):(\d{2}):(\d{2})(?:\.(\d+))?/;

/** Normalise any rotation in degrees to 0, 90, 180 or 270 */
export function normalizeRotation(degrees: number): number {
  const rounded = Math.round(Math.abs(degrees) / 90) * 90;
  return rounded % 360;
}

/** Swap width/height for quarter-turn rotations so we report display orientation */
export function applyRotation(dims: VideoDimensions, rotation: number): VideoDimensions {
  const r = normalizeRotation(rotation);
  return r === 90 || r === 270 ? { width: dims.height, height: dims.width } : { ...dims };
}

export function parseDurationMs(output: string): number {
  const m = DURATION_RE.exec(output);
  return m ? parseClockToMs(m[1], m[2], m[3], m[4]) : 0;
}

export function parseRotation(output: string): number {
  const tag = ROTATE_TAG_RE.exec(output);
  if (tag) return normalizeRotation(Number(tag[1]));
  const matrix = DISPLAY_MATRIX_RE.exec(output);
  if (matrix) return normalizeRotation(Number(matrix[1]));
  return 0;
}

function parseStorageSize(output: string): VideoDimensions | null {
  // Prefer the video stream line; the container header can contain other NxM tokens
  const videoLine = output.split(/\r?\n/).find((l) => /Stream .*Video:/.test(l));
  const m = (videoLine && SIZE_RE.exec(videoLine)) || SIZE_RE.exec(output);
  if (!m) return null;
  const width = Number(m[1]);
  const height = Number(m[2]);
  return width > 0 && height > 0 ? { width, height } : null;
}

/**
 * Parse the diagnostic text `ffmpeg -i <file>` writes to stderr.
 * Unparseable output is not an error: dimensions fall back to 1920x1080 and
 * duration to 0 (progress then stays indeterminate).
 */
export function parseProbeOutput(output: string): ProbeResult {
  const durationMs = parseDurationMs(output);
  const storage = parseStorageSize(output);
  const rotation = parseRotation(output);

  if (!storage) {
    log.warn('Could not parse video dimensions, defaulting to 1920x1080');
  } else if (rotation === 90 || rotation === 270) {
    log.info(`Video has rotation=${rotation}°, swapping dimensions`);
  }
  if (durationMs === 0) {
    log.warn('Could not parse video duration, progress will be indeterminate');
  }

  return {
    dimensions: storage ? applyRotation(storage, rotation) : { ...DEFAULT_DIMENSIONS },
    durationMs,
    rotation,
    parsed: storage !== null && durationMs > 0,
    raw: output,
  };
}

/**
 * Escape a path for use inside a quoted filter-graph option value:
 * backslashes become forward slashes, `'` becomes `'\''`, `:` becomes `\:`.
 */
export function escapeFilterPath(p: string): string {
  return p.replace(/\\/g, '/').replace(/'/g, "'\\''").replace(/:/g, '\\:');
}

export function buildSubtitlesFilter(subtitlePath: string, fontsDir?: string): string {
  const filter = `subtitles='${escapeFilterPath(subtitlePath)}'`;
  return fontsDir ? `${filter}:fontsdir='${escapeFilterPath(fontsDir)}'` : filter;
}

/**
 * Build the scale stage for a target resolution. Portrait videos fix the
 * width, landscape (and square) videos fix the height; the other side is
 * derived and kept even (-2).
 */
export function buildScaleFilter(target: TargetResolution, dims: VideoDimensions): string | null {
  if (target === 'original') return null;
  const shortSide = TARGET_SHORT_SIDE[target];
  const isPortrait = dims.height > dims.width;
  return isPortrait ? `scale=${shortSide}:-2` : `scale=-2:${shortSide}`;
}

/**
 * Subtitles are burned at the source resolution first, then the result is scaled.
 */
export function buildVideoFilter(
  subtitlePath: string,
  target: TargetResolution,
  dims: VideoDimensions,
  fontsDir?: string
): string {
  const subtitles = buildSubtitlesFilter(subtitlePath, fontsDir);
  const scale = buildScaleFilter(target, dims);
  return scale ? `${subtitles},${scale}` : subtitles;
}

export function buildProbeArgs(inputPath: string): string[] {
  return ['-hide_banner', '-i', inputPath];
}

export function buildEncodeArgs(req: Pick<EncodeRequest, 'inputPath' | 'outputPath' | 'filter'>): string[] {
  return ['-i', req.inputPath, '-vf', req.filter, '-c:a', 'copy', '-y', req.outputPath];
}

/** Elapsed encoded time from a `time=HH:MM:SS.cc` token, or null */
export function parseProgressTimeMs(line: string): number | null {
  const m = PROGRESS_TIME_RE.exec(line);
  return m ? parseClockToMs(m[1], m[2], m[3], m[4]) : null;
}

/**
 * Feeds encoder output lines to a ProgressSink. Values are clamped to
 * [0, 1] and never go backwards, even when `time=` regresses on a seek.
 */
export class ProgressTracker {
  private last = 0;

  constructor(
    private readonly durationMs: number,
    private readonly sink?: ProgressSink
  ) {}

  get progress(): number {
    return this.last;
  }

  /** Returns the reported value, or null when the line carried no usable progress */
  feed(line: string): number | null {
    if (this.durationMs <= 0 || !line.includes('time=')) return null;
    const elapsed = parseProgressTimeMs(line);
    if (elapsed === null) return null;
    const value = Math.min(1, Math.max(0, elapsed / this.durationMs));
    if (value < this.last) return null;
    this.last = value;
    this.sink?.report(value);
    return value;
  }

  complete(): void {
    this.last = 1;
    this.sink?.report(1);
  }
}

/**
 * Split a chunked stream into lines. FFmpeg ends progress lines with a bare
 * carriage return, so \r, \n and \r\n all terminate a line.
 */
export function createLineSplitter(onLine: (line: string) => void): { push(chunk: string): void; flush(): void } {
  let pending = '';
  return {
    push(chunk: string) {
      pending += chunk;
      const parts = pending.split(/\r\n|\r|\n/);
      pending = parts.pop() ?? '';
      for (const part of parts) {
        if (part.length > 0) onLine(part);
      }
    },
    flush() {
      if (pending.length > 0) onLine(pending);
      pending = '';
    },
  };
}

/**
 * Keeps the last `maxChars` characters of diagnostic output so a long
 * encode cannot grow the captured log without bound.
 */
export class LogTail {
  private parts: string[] = [];
  private size = 0;

  constructor(private readonly maxChars = 64 * 1024) {}

  push(line: string): void {
    this.parts.push(line);
    this.size += line.length + 1;
    while (this.size > this.maxChars && this.parts.length > 1) {
      const dropped = this.parts.shift();
      this.size -= (dropped?.length ?? 0) + 1;
    }
  }

  toString(): string {
    return this.parts.join('\n');
  }
}

/**
 * `/videos/clip.mov` -> `/videos/clip_captioned.mp4`
 */
export function defaultOutputPath(inputPath: string): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return path.join(path.dirname(inputPath), `${base}_captioned.mp4`);
}
