/**
 * Encoder backed by fluent-ffmpeg.
 *
 * Probing goes through ffprobe (the binary shipped by ffprobe-static unless
 * configured otherwise) and reads structured metadata instead of scraping
 * text; encoding reuses the shared filter graph and progress parsing.
 */

import ffmpeg from 'fluent-ffmpeg';
import * as ffprobeStatic from 'ffprobe-static';
import { EncodeOutcome, EncodeRequest, ProbeResult, ProgressSink, VideoDimensions } from '../../../types/media';
import { ProcessLaunchFailedError } from '../errors';
import { applyRotation, DEFAULT_DIMENSIONS, LogTail, normalizeRotation, ProgressTracker } from '../ffmpeg';
import { createLogger } from '../log';
import { Encoder } from './types';

const log = createLogger('FFMPEG');

export interface FluentEncoderOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toNumber(value: unknown): number | null {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(n) ? n : null;
}

/**
 * Rotation lives either in the legacy `rotate` tag or, for newer muxers,
 * in a display-matrix entry of side_data_list.
 */
export function rotationFromStream(stream: unknown): number {
  if (!isRecord(stream)) return 0;
  const tags = stream.tags;
  const tag = isRecord(tags) ? toNumber(tags.rotate) : null;
  if (tag !== null) return normalizeRotation(tag);

  const sideData = stream.side_data_list;
  if (Array.isArray(sideData)) {
    for (const entry of sideData) {
      const rotation = isRecord(entry) ? toNumber(entry.rotation) : null;
      if (rotation !== null) return normalizeRotation(rotation);
    }
  }
  return 0;
}

/**
 * Map ffprobe JSON to a ProbeResult, applying the same defaults and
 * rotation handling as the text parser.
 */
export function probeResultFromMetadata(metadata: unknown): ProbeResult {
  const format: Record<string, unknown> = isRecord(metadata) && isRecord(metadata.format) ? metadata.format : {};
  const streams = isRecord(metadata) && Array.isArray(metadata.streams) ? metadata.streams : [];
  const video: unknown = streams.find((s: unknown) => isRecord(s) && s.codec_type === 'video');

  const seconds = toNumber(format.duration);
  const durationMs = seconds !== null && seconds > 0 ? Math.round(seconds * 1000) : 0;

  let storage: VideoDimensions | null = null;
  if (isRecord(video)) {
    const width = toNumber(video.width);
    const height = toNumber(video.height);
    if (width && height && width > 0 && height > 0) storage = { width, height };
  }
  const rotation = rotationFromStream(video);

  return {
    dimensions: storage ? applyRotation(storage, rotation) : { ...DEFAULT_DIMENSIONS },
    durationMs,
    rotation,
    parsed: storage !== null && durationMs > 0,
    raw: JSON.stringify({ format, video: video ?? null }),
  };
}

const EXIT_CODE_RE = /exited with code (\d+)/;

function isLaunchFailure(err: Error): boolean {
  return /ENOENT|EACCES|Cannot find ffmpeg/i.test(err.message);
}

export class FluentEncoder implements Encoder {
  readonly name = 'fluent';
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;

  constructor(options: FluentEncoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? ffprobeStatic.path;
  }

  checkAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      ffmpeg()
        .setFfmpegPath(this.ffmpegPath)
        .getAvailableFormats((err) => {
          if (err) log.warn(`${this.ffmpegPath} is not available:`, err.message);
          resolve(!err);
        });
    });
  }

  probe(inputPath: string): Promise<ProbeResult> {
    return new Promise((resolve, reject) => {
      ffmpeg(inputPath)
        .setFfprobePath(this.ffprobePath)
        .ffprobe((err: Error | null, metadata: ffmpeg.FfprobeData) => {
          if (err) {
            if (isLaunchFailure(err)) {
              reject(new ProcessLaunchFailedError(this.ffprobePath, err));
              return;
            }
            log.warn('ffprobe failed, using defaults:', err.message);
            resolve({ ...probeResultFromMetadata(null), raw: err.message });
            return;
          }
          resolve(probeResultFromMetadata(metadata));
        });
    });
  }

  encode(request: EncodeRequest, sink?: ProgressSink, signal?: AbortSignal): Promise<EncodeOutcome> {
    if (signal?.aborted) {
      return Promise.resolve({ success: false, exitCode: null, cancelled: true, log: '' });
    }

    return new Promise((resolve, reject) => {
      const tail = new LogTail();
      const tracker = new ProgressTracker(request.durationMs, sink);
      let cancelled = false;

      const cmd = ffmpeg(request.inputPath)
        .setFfmpegPath(this.ffmpegPath)
        .videoFilters(request.filter)
        .audioCodec('copy')
        .output(request.outputPath);

      const onAbort = () => {
        cancelled = true;
        log.warn('Render cancelled, killing ffmpeg');
        cmd.kill('SIGKILL');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      cmd
        .on('start', (commandLine: string) => {
          log.info(`executing: ${commandLine}`);
        })
        .on('stderr', (line: string) => {
          tail.push(line);
          tracker.feed(line);
        })
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          tracker.complete();
          resolve({ success: true, exitCode: 0, cancelled: false, log: tail.toString() });
        })
        .on('error', (err: Error) => {
          signal?.removeEventListener('abort', onAbort);
          if (!cancelled && isLaunchFailure(err)) {
            reject(new ProcessLaunchFailedError(this.ffmpegPath, err));
            return;
          }
          const code = EXIT_CODE_RE.exec(err.message);
          if (!cancelled) log.error('failed:', err.message);
          tail.push(err.message);
          resolve({
            success: false,
            exitCode: code ? Number(code[1]) : null,
            cancelled,
            log: tail.toString(),
          });
        });

      cmd.run();
    });
  }
}
