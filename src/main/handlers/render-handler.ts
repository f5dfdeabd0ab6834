import {
  API_CHANNELS,
  CancelRenderResponse,
  EventSender,
  RenderProgressEvent,
  RenderStatus,
  RenderVideoResponse,
  Result,
} from '../../types/api';
import { defaultOutputPath } from '../services/ffmpeg';
import { createLogger } from '../services/log';
import { HandlerContext } from './context';
import { createJobId, withErrorHandling } from './handlers';
import { readCancelRenderRequest, readRenderVideoRequest } from './validate';

const log = createLogger('RENDER');

/**
 * Burn the requested caption tracks into a video. Progress is streamed as
 * `render-progress` events; the promise resolves once the job has ended.
 */
export const handleRenderVideo = withErrorHandling(
  'render-video',
  async (ctx: HandlerContext, sender: EventSender, request: unknown): Promise<Result<RenderVideoResponse>> => {
    const req = readRenderVideoRequest(request);
    const outputPath = req.outputPath ?? defaultOutputPath(req.inputPath);
    const jobId = createJobId('render');
    const controller = new AbortController();
    ctx.renders.set(jobId, controller);

    let percent = 0;
    const send = (status: RenderStatus, extra: Partial<RenderProgressEvent> = {}) => {
      const ev: RenderProgressEvent = { jobId, percent, status, ...extra };
      sender.send(API_CHANNELS.RENDER_PROGRESS, ev);
    };

    try {
      const result = await ctx.orchestrator.burnCaptions({
        inputPath: req.inputPath,
        outputPath,
        tracks: req.tracks,
        targetResolution: req.targetResolution,
        workDir: ctx.workDir,
        fonts: ctx.fonts,
        signal: controller.signal,
        progressSink: {
          report: (progress) => {
            const next = Math.round(progress * 100);
            if (next <= percent) return;
            percent = next;
            send('processing');
          },
        },
        onStateChange: (state) => send('processing', { state }),
      });

      if (result.success) {
        percent = 100;
        send('complete', { state: result.state });
        return {
          success: true,
          jobId,
          outputPath,
          dimensions: result.dimensions,
          durationMs: result.durationMs,
        };
      }

      send(result.reason === 'cancelled' ? 'cancelled' : 'error', {
        state: result.state,
        errorMessage: result.message,
      });
      return { success: false, error: result.message, details: result.log || undefined };
    } finally {
      ctx.renders.delete(jobId);
    }
  }
);

/**
 * Abort the render with the given job id, or every in-flight render.
 */
export const handleCancelRender = withErrorHandling(
  'cancel-render',
  async (ctx: HandlerContext, request?: unknown): Promise<Result<CancelRenderResponse>> => {
    const { jobId } = readCancelRenderRequest(request);
    const targets = jobId ? [...ctx.renders].filter(([id]) => id === jobId) : [...ctx.renders];

    for (const [id, controller] of targets) {
      log.info(`Cancelling ${id}`);
      controller.abort();
    }
    return { success: true, cancelled: targets.length };
  }
);
