import * as fs from 'fs';
import { ExportSrtResponse, ImportSrtResponse, Result } from '../../types/api';
import { createLogger } from '../services/log';
import { parseSrt, serializeSrt, srtPathForTrack } from '../services/srt';
import { withErrorHandling } from './handlers';
import { readExportSrtRequest, readImportSrtRequest } from './validate';

const log = createLogger('SRT');

export const handleImportSrt = withErrorHandling(
  'import-srt',
  async (request: unknown): Promise<Result<ImportSrtResponse>> => {
    const { path } = readImportSrtRequest(request);
    const content = await fs.promises.readFile(path, 'utf8');
    const cues = parseSrt(content);
    log.info(`Imported ${cues.length} cues from ${path}`);
    return { success: true, cues };
  }
);

/**
 * Write `<video>.<lang>.srt` for every track, next to the video unless an
 * output directory is given.
 */
export const handleExportSrt = withErrorHandling(
  'export-srt',
  async (request: unknown): Promise<Result<ExportSrtResponse>> => {
    const req = readExportSrtRequest(request);
    if (req.outputDir) await fs.promises.mkdir(req.outputDir, { recursive: true });

    const files: ExportSrtResponse['files'] = [];
    for (const track of req.tracks) {
      const file = srtPathForTrack(req.videoPath, track.language, req.outputDir);
      await fs.promises.writeFile(file, serializeSrt(track.cues), 'utf8');
      log.info(`Exported ${track.cues.length} cues to ${file}`);
      files.push({ language: track.language, path: file });
    }
    return { success: true, files };
  }
);
