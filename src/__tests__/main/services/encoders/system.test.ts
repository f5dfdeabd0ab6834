import { EventEmitter } from 'events';
import { beforeEach, describe, it, expect, vi } from 'vitest';

const spawnMock = vi.hoisted(() => vi.fn());
vi.mock('child_process', () => ({ spawn: spawnMock }));

import { SystemEncoder } from '../../../../main/services/encoders/system';
import { ProcessLaunchFailedError } from '../../../../main/services/errors';

class FakeStream extends EventEmitter {
  setEncoding = vi.fn();
}

class FakeProcess extends EventEmitter {
  stdout = new FakeStream();
  stderr = new FakeStream();
  kill = vi.fn(() => true);
}

function nextProcess(): FakeProcess {
  const proc = new FakeProcess();
  spawnMock.mockReturnValueOnce(proc);
  return proc;
}

const request = {
  inputPath: 'in.mp4',
  outputPath: 'out.mp4',
  filter: "subtitles='a.ass'",
  durationMs: 10_000,
};

describe('SystemEncoder', () => {
  beforeEach(() => {
    spawnMock.mockReset();
  });

  describe('checkAvailable', () => {
    it('is true when -version exits 0', async () => {
      const proc = nextProcess();
      const available = new SystemEncoder('/opt/ffmpeg').checkAvailable();
      proc.emit('close', 0);
      await expect(available).resolves.toBe(true);
      expect(spawnMock).toHaveBeenCalledWith('/opt/ffmpeg', ['-version']);
    });

    it('is false when the binary cannot be started', async () => {
      const proc = nextProcess();
      const available = new SystemEncoder().checkAvailable();
      proc.emit('error', new Error('spawn ffmpeg ENOENT'));
      await expect(available).resolves.toBe(false);
    });
  });

  describe('probe', () => {
    it('parses the diagnostic output regardless of exit code', async () => {
      const proc = nextProcess();
      const probe = new SystemEncoder().probe('in.mp4');
      proc.stderr.emit('data', Buffer.from('  Duration: 00:00:10.00, start: 0.000000\n'));
      proc.stderr.emit('data', Buffer.from('  Stream #0:0: Video: h264, yuv420p, 1280x720, 30 fps\n'));
      proc.emit('close', 1);

      const result = await probe;
      expect(result.dimensions).toEqual({ width: 1280, height: 720 });
      expect(result.durationMs).toBe(10_000);
      expect(spawnMock).toHaveBeenCalledWith('ffmpeg', ['-hide_banner', '-i', 'in.mp4']);
    });

    it('rejects with ProcessLaunchFailedError when ffmpeg is missing', async () => {
      const proc = nextProcess();
      const probe = new SystemEncoder().probe('in.mp4');
      proc.emit('error', new Error('spawn ffmpeg ENOENT'));
      await expect(probe).rejects.toThrow(ProcessLaunchFailedError);
    });
  });

  describe('encode', () => {
    it('reports progress and succeeds on exit code 0', async () => {
      const proc = nextProcess();
      const reported: number[] = [];
      const outcome = new SystemEncoder().encode(request, { report: (p) => reported.push(p) });

      proc.stderr.emit('data', 'frame=1 time=00:00:05.00 bitrate=1\r');
      proc.emit('close', 0);

      await expect(outcome).resolves.toEqual({
        success: true,
        exitCode: 0,
        cancelled: false,
        log: 'frame=1 time=00:00:05.00 bitrate=1',
      });
      expect(reported).toEqual([0.5, 1]);
      expect(spawnMock).toHaveBeenCalledWith('ffmpeg', [
        '-i',
        'in.mp4',
        '-vf',
        "subtitles='a.ass'",
        '-c:a',
        'copy',
        '-y',
        'out.mp4',
      ]);
    });

    it('fails with the exit code and captured log', async () => {
      const proc = nextProcess();
      const outcome = new SystemEncoder().encode(request);
      proc.stderr.emit('data', 'Error opening file\n');
      proc.emit('close', 1);

      await expect(outcome).resolves.toEqual({
        success: false,
        exitCode: 1,
        cancelled: false,
        log: 'Error opening file',
      });
    });

    it('kills the process on abort', async () => {
      const proc = nextProcess();
      const controller = new AbortController();
      const outcome = new SystemEncoder().encode(request, undefined, controller.signal);

      controller.abort();
      expect(proc.kill).toHaveBeenCalledWith('SIGKILL');
      proc.emit('close', null);

      await expect(outcome).resolves.toEqual({ success: false, exitCode: null, cancelled: true, log: '' });
    });

    it('does not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const outcome = await new SystemEncoder().encode(request, undefined, controller.signal);
      expect(outcome.cancelled).toBe(true);
      expect(spawnMock).not.toHaveBeenCalled();
    });

    it('rejects when the process cannot be launched', async () => {
      const proc = nextProcess();
      const outcome = new SystemEncoder().encode(request);
      proc.emit('error', new Error('spawn ffmpeg ENOENT'));
      await expect(outcome).rejects.toThrow('Failed to launch "ffmpeg": spawn ffmpeg ENOENT. Make sure FFmpeg is installed.');
    });
  });
});
