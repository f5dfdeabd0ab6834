import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { handleExportSrt, handleImportSrt } from '../../../main/handlers/srt-handler';
import { isErrorResponse } from '../../../types/api';
import { expectOk } from '../../helpers/fakes';

describe('srt handlers', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'srt-handler-test-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('exports one file per track next to the video', async () => {
    const videoPath = path.join(dir, 'clip.mp4');

    const result = expectOk(
      await handleExportSrt({
        videoPath,
        tracks: [
          { language: 'en', cues: [{ startMs: 0, endMs: 1500, text: 'Hello' }] },
          { language: 'pt', cues: [{ startMs: 0, endMs: 1500, text: 'Olá' }] },
        ],
      })
    );

    expect(result.files).toEqual([
      { language: 'en', path: path.join(dir, 'clip.en.srt') },
      { language: 'pt', path: path.join(dir, 'clip.pt.srt') },
    ]);
    expect(fs.readFileSync(path.join(dir, 'clip.pt.srt'), 'utf8')).toBe('1\n00:00:00,000 --> 00:00:01,500\nOlá\n\n');
  });

  it('creates the output directory when one is given', async () => {
    const outputDir = path.join(dir, 'subs', 'nested');

    const result = expectOk(
      await handleExportSrt({
        videoPath: '/videos/clip.mov',
        tracks: [{ language: 'es', cues: [{ startMs: 61_000, endMs: 62_250, text: 'Hola' }] }],
        outputDir,
      })
    );

    expect(result.files).toEqual([{ language: 'es', path: path.join(outputDir, 'clip.es.srt') }]);
    expect(fs.readFileSync(path.join(outputDir, 'clip.es.srt'), 'utf8')).toBe(
      '1\n00:01:01,000 --> 00:01:02,250\nHola\n\n'
    );
  });

  it('imports what it exported', async () => {
    const cues = [
      { startMs: 0, endMs: 1200, text: 'First line' },
      { startMs: 1200, endMs: 2500, text: 'Second line' },
    ];
    const videoPath = path.join(dir, 'talk.mp4');
    expectOk(await handleExportSrt({ videoPath, tracks: [{ language: 'en', cues }] }));

    const result = expectOk(await handleImportSrt({ path: path.join(dir, 'talk.en.srt') }));

    expect(result.cues).toEqual(cues);
  });

  it('returns an error response for a missing file', async () => {
    const result = await handleImportSrt({ path: path.join(dir, 'nope.srt') });

    expect(isErrorResponse(result)).toBe(true);
    if (!isErrorResponse(result)) return;
    expect(result.error).toContain('ENOENT');
  });

  it('rejects a cue that ends where it starts', async () => {
    const videoPath = path.join(dir, 'clip.mp4');

    const result = await handleExportSrt({
      videoPath,
      tracks: [{ language: 'en', cues: [{ startMs: 1000, endMs: 1000, text: 'Hi' }] }],
    });

    expect(result).toMatchObject({
      success: false,
      error: 'Invalid request: cue at index 0 needs integer times with 0 <= startMs < endMs (got 1000 -> 1000)',
    });
    expect(fs.existsSync(path.join(dir, 'clip.en.srt'))).toBe(false);
  });

  it('rejects fractional and negative cue times', async () => {
    const result = await handleExportSrt({
      videoPath: '/videos/clip.mp4',
      tracks: [{ language: 'en', cues: [{ startMs: -1, endMs: 500.5, text: 'Hi' }] }],
    });

    expect(result).toMatchObject({
      success: false,
      error: 'Invalid request: cue at index 0 needs integer times with 0 <= startMs < endMs (got -1 -> 500.5)',
    });
  });

  it('rejects a track without cues', async () => {
    const result = await handleExportSrt({ videoPath: '/videos/clip.mp4', tracks: [{ language: 'en' }] });

    expect(result).toMatchObject({
      success: false,
      error: "Invalid request: track 0 ('en') has no cues array",
    });
  });
});
