/**
 * Render Orchestrator
 *
 * Drives one burn-in job through
 *   idle -> probing -> building-filter -> encoding -> succeeded | failed
 * on top of an Encoder. Failures never throw: they come back as a
 * RenderResult with a reason, a status line and the captured FFmpeg log.
 *
 * Jobs writing to the same output path do not run concurrently; the second
 * request fails with reason 'busy'.
 */

import * as fs from 'fs';
import * as path from 'path';
import { CaptionTrack } from '../../types/subtitles';
import {
  ProbeResult,
  ProgressSink,
  RenderFailureReason,
  RenderJob,
  RenderResult,
  RenderState,
  TargetResolution,
} from '../../types/media';
import { composeAss } from './ass';
import { Encoder } from './encoders/types';
import { EncodeFailedError, ProcessLaunchFailedError, RenderCancelledError } from './errors';
import { buildVideoFilter, DEFAULT_DIMENSIONS, defaultOutputPath } from './ffmpeg';
import { FontRegistry } from './fonts';
import { createLogger } from './log';

const log = createLogger('RENDER');

export interface RenderOptions {
  signal?: AbortSignal;
  onStateChange?: (state: RenderState) => void;
  /** skip probing and use this result (the caller already probed the input) */
  probe?: ProbeResult;
}

export interface BurnCaptionsOptions {
  inputPath: string;
  /** defaults to `<input>_captioned.mp4` next to the input */
  outputPath?: string;
  tracks: CaptionTrack[];
  targetResolution: TargetResolution;
  /** where the temporary .ass document is written */
  workDir: string;
  fonts?: FontRegistry;
  progressSink?: ProgressSink;
  signal?: AbortSignal;
  onStateChange?: (state: RenderState) => void;
}

const LAUNCH_FAILED_MESSAGE = 'FFmpeg is not installed or could not be started';

function failure(reason: RenderFailureReason, message: string, logText = ''): RenderResult {
  return { success: false, state: 'failed', reason, message, log: logText };
}

async function removeFile(file: string): Promise<void> {
  try {
    await fs.promises.rm(file, { force: true });
  } catch (e) {
    log.warn(`Could not remove ${file}:`, e instanceof Error ? e.message : String(e));
  }
}

export class RenderOrchestrator {
  private readonly active = new Set<string>();
  private available = false;

  constructor(private readonly encoder: Encoder) {}

  /** True while a job is writing to `outputPath` */
  isBusy(outputPath: string): boolean {
    return this.active.has(path.resolve(outputPath));
  }

  /**
   * Run a job whose subtitle document is already on disk.
   */
  render(job: RenderJob, options: RenderOptions = {}): Promise<RenderResult> {
    return this.exclusive(job.outputPath, () => this.run(job, options));
  }

  /**
   * Full pipeline: probe, compose the ASS document at the display size of
   * the input, write it under workDir, render, and delete the document.
   */
  burnCaptions(opts: BurnCaptionsOptions): Promise<RenderResult> {
    const outputPath = opts.outputPath ?? defaultOutputPath(opts.inputPath);
    return this.exclusive(outputPath, async () => {
      if (opts.signal?.aborted) return failure('cancelled', new RenderCancelledError().message);
      if (!(await this.ensureAvailable())) return failure('launch-failed', LAUNCH_FAILED_MESSAGE);

      opts.onStateChange?.('probing');
      let probe: ProbeResult;
      try {
        probe = await this.probeInput(opts.inputPath);
      } catch (e) {
        return this.launchFailure(e, opts.onStateChange);
      }

      const documentPath = path.join(opts.workDir, `subtitles-${Date.now()}.ass`);
      let fontsDir: string | undefined;
      try {
        const { width, height } = probe.dimensions;
        const document = composeAss(opts.tracks, width, height);
        fontsDir = opts.fonts ? await opts.fonts.initialize() : undefined;

        await fs.promises.mkdir(opts.workDir, { recursive: true });
        await fs.promises.writeFile(documentPath, document, 'utf8');
        log.debug(`ASS document (${document.length} bytes) written to ${documentPath}`);
        log.debug(document.slice(0, 500));
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        log.error('Could not prepare subtitles:', message);
        await removeFile(documentPath);
        opts.onStateChange?.('failed');
        return failure('prepare-failed', `Could not prepare subtitles: ${message}`, message);
      }

      try {
        return await this.run(
          {
            inputPath: opts.inputPath,
            outputPath,
            subtitleDocumentPath: documentPath,
            targetResolution: opts.targetResolution,
            progressSink: opts.progressSink,
            fontsDir,
          },
          { signal: opts.signal, onStateChange: opts.onStateChange, probe }
        );
      } finally {
        await removeFile(documentPath);
      }
    });
  }

  private async exclusive(outputPath: string, task: () => Promise<RenderResult>): Promise<RenderResult> {
    const key = path.resolve(outputPath);
    if (this.active.has(key)) {
      return failure('busy', `A render to ${outputPath} is already running`);
    }
    this.active.add(key);
    try {
      return await task();
    } finally {
      this.active.delete(key);
    }
  }

  /** A positive availability check is remembered; a negative one is retried next time */
  private async ensureAvailable(): Promise<boolean> {
    if (!this.available) {
      this.available = await this.encoder.checkAvailable();
    }
    return this.available;
  }

  /** Probe failures other than a missing binary degrade to defaults */
  private async probeInput(inputPath: string): Promise<ProbeResult> {
    try {
      const probe = await this.encoder.probe(inputPath);
      log.info(
        `Probed ${inputPath}: ${probe.dimensions.width}x${probe.dimensions.height}, ` +
          `${probe.durationMs}ms, rotation=${probe.rotation}`
      );
      return probe;
    } catch (e) {
      if (e instanceof ProcessLaunchFailedError) throw e;
      log.warn('Probe failed, using defaults:', e instanceof Error ? e.message : String(e));
      return { dimensions: { ...DEFAULT_DIMENSIONS }, durationMs: 0, rotation: 0, parsed: false, raw: '' };
    }
  }

  private launchFailure(e: unknown, onStateChange?: (state: RenderState) => void): RenderResult {
    if (!(e instanceof ProcessLaunchFailedError)) throw e;
    this.available = false;
    log.error(e.message);
    onStateChange?.('failed');
    return failure('launch-failed', LAUNCH_FAILED_MESSAGE, e.message);
  }

  private async run(job: RenderJob, options: RenderOptions): Promise<RenderResult> {
    const { signal, onStateChange } = options;
    const setState = (state: RenderState) => {
      log.debug(`state -> ${state}`);
      onStateChange?.(state);
    };
    const fail = (reason: RenderFailureReason, message: string, logText = ''): RenderResult => {
      setState('failed');
      return failure(reason, message, logText);
    };

    log.info(`Input: ${job.inputPath}`);
    log.info(`Output: ${job.outputPath}`);
    log.info(`Subtitles: ${job.subtitleDocumentPath} (target ${job.targetResolution})`);

    if (signal?.aborted) return fail('cancelled', new RenderCancelledError().message);

    let probe = options.probe;
    if (!probe) {
      if (!(await this.ensureAvailable())) return fail('launch-failed', LAUNCH_FAILED_MESSAGE);
      setState('probing');
      try {
        probe = await this.probeInput(job.inputPath);
      } catch (e) {
        return this.launchFailure(e, onStateChange);
      }
    }

    setState('building-filter');
    const filter = buildVideoFilter(job.subtitleDocumentPath, job.targetResolution, probe.dimensions, job.fontsDir);
    log.info(`Video filter: ${filter}`);

    setState('encoding');
    let outcome;
    try {
      outcome = await this.encoder.encode(
        { inputPath: job.inputPath, outputPath: job.outputPath, filter, durationMs: probe.durationMs },
        job.progressSink,
        signal
      );
    } catch (e) {
      return this.launchFailure(e, onStateChange);
    }

    const details = { dimensions: probe.dimensions, durationMs: probe.durationMs };

    if (outcome.cancelled) {
      await removeFile(job.outputPath);
      return { ...fail('cancelled', new RenderCancelledError().message, outcome.log), ...details };
    }
    if (!outcome.success) {
      await removeFile(job.outputPath);
      const err = new EncodeFailedError(outcome.exitCode, outcome.log);
      return { ...fail('encode-failed', err.message, outcome.log), ...details };
    }

    setState('succeeded');
    log.info('Completed successfully');
    return { success: true, state: 'succeeded', message: 'Render complete', log: outcome.log, ...details };
  }
}
