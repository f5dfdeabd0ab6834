/**
 * Handler Utilities
 *
 * Every application handler is wrapped by withErrorHandling(), so callers get
 * a uniform ErrorResponse instead of a rejected promise, and every call is
 * logged with its duration.
 */

import { ErrorResponse, Result } from '../../types/api';
import { createLogger } from '../services/log';

const log = createLogger('API');

/**
 * Wrap a handler with logging and error-to-response conversion.
 *
 * @example
 * export const handleImportSrt = withErrorHandling('import-srt', async (request: unknown) => {
 *   const { path } = readImportSrtRequest(request);
 *   return { success: true, cues: parseSrt(await fs.promises.readFile(path, 'utf8')) };
 * });
 */
export function withErrorHandling<A extends unknown[], T>(
  name: string,
  handler: (...args: A) => Promise<Result<T>>
): (...args: A) => Promise<Result<T>> {
  return async (...args: A) => {
    const startTime = Date.now();
    log.debug(`Incoming call to '${name}'`);

    try {
      const result = await handler(...args);
      const duration = Date.now() - startTime;
      log.info(`Call to '${name}' completed (${duration}ms)`);
      return result;
    } catch (error) {
      log.error(`Error in handler '${name}':`, error);
      const errorResponse: ErrorResponse = {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred',
        details: error instanceof Error ? error.stack : String(error),
      };
      return errorResponse;
    }
  };
}

/** `render-1718000000000-k3j9xa` */
export function createJobId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}
