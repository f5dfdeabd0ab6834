import { EncodeOutcome, EncodeRequest, ProbeResult, ProgressSink } from '../../../types/media';

/**
 * One way of running FFmpeg. Filter construction and progress parsing live in
 * ../ffmpeg and are shared; implementations only start and watch the process.
 */
export interface Encoder {
  readonly name: string;

  /** Resolves false when the binary cannot be started */
  checkAvailable(): Promise<boolean>;

  /**
   * Read duration, display dimensions and rotation of `inputPath`.
   * Unparseable output resolves with defaults (`parsed: false`).
   *
   * @throws ProcessLaunchFailedError when the binary cannot be started
   */
  probe(inputPath: string): Promise<ProbeResult>;

  /**
   * Burn `request.filter` into the video. Resolves with the outcome for
   * both success and failure; aborting `signal` kills the process.
   *
   * @throws ProcessLaunchFailedError when the binary cannot be started
   */
  encode(request: EncodeRequest, sink?: ProgressSink, signal?: AbortSignal): Promise<EncodeOutcome>;
}
