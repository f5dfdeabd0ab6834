/**
 * Runs the ffmpeg binary found on PATH (or at a configured location) as a
 * child process and reads its stderr for diagnostics and progress.
 */

import { spawn } from 'child_process';
import { EncodeOutcome, EncodeRequest, ProbeResult, ProgressSink } from '../../../types/media';
import { ProcessLaunchFailedError } from '../errors';
import {
  buildEncodeArgs,
  buildProbeArgs,
  createLineSplitter,
  LogTail,
  parseProbeOutput,
  ProgressTracker,
} from '../ffmpeg';
import { createLogger } from '../log';
import { Encoder } from './types';

const log = createLogger('FFMPEG');

export class SystemEncoder implements Encoder {
  readonly name = 'system';

  constructor(private readonly binary: string = 'ffmpeg') {}

  checkAvailable(): Promise<boolean> {
    return new Promise((resolve) => {
      const proc = spawn(this.binary, ['-version']);
      proc.on('error', (err) => {
        log.warn(`${this.binary} is not available:`, err.message);
        resolve(false);
      });
      proc.on('close', (code) => resolve(code === 0));
    });
  }

  probe(inputPath: string): Promise<ProbeResult> {
    return new Promise((resolve, reject) => {
      const proc = spawn(this.binary, buildProbeArgs(inputPath));
      let output = '';
      proc.stdout?.on('data', (data: Buffer) => {
        output += data.toString();
      });
      proc.stderr?.on('data', (data: Buffer) => {
        output += data.toString();
      });
      proc.on('error', (err) => reject(new ProcessLaunchFailedError(this.binary, err)));
      // `-i` without an output exits 1 by design; only the text matters
      proc.on('close', () => resolve(parseProbeOutput(output)));
    });
  }

  encode(request: EncodeRequest, sink?: ProgressSink, signal?: AbortSignal): Promise<EncodeOutcome> {
    if (signal?.aborted) {
      return Promise.resolve({ success: false, exitCode: null, cancelled: true, log: '' });
    }

    return new Promise((resolve, reject) => {
      const args = buildEncodeArgs(request);
      log.info(`executing: ${this.binary} ${args.join(' ')}`);

      const proc = spawn(this.binary, args);
      const tail = new LogTail();
      const tracker = new ProgressTracker(request.durationMs, sink);
      const lines = createLineSplitter((line) => {
        tail.push(line);
        tracker.feed(line);
      });
      let cancelled = false;

      const onAbort = () => {
        cancelled = true;
        log.warn('Render cancelled, killing ffmpeg');
        proc.kill('SIGKILL');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.stderr?.setEncoding('utf8');
      proc.stderr?.on('data', (chunk: string) => lines.push(chunk));

      proc.on('error', (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(new ProcessLaunchFailedError(this.binary, err));
      });

      proc.on('close', (code) => {
        signal?.removeEventListener('abort', onAbort);
        lines.flush();
        const success = code === 0 && !cancelled;
        if (success) {
          tracker.complete();
        } else if (!cancelled) {
          log.error(`failed with exit code ${code}`);
        }
        resolve({ success, exitCode: code, cancelled, log: tail.toString() });
      });
    });
  }
}
