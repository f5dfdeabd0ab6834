/**
 * SRT import/export
 *
 * parseSrt() scans line by line and resynchronises on anything that is not a
 * timestamp line, which copes with the index-less and half-broken files
 * people export from other tools. parseSrtBlocks() is the faster path for
 * well-formed files; both return the same cues for those.
 *
 * Text lines are kept as written, surrounding spaces included; only the
 * index and timestamp lines are trimmed.
 */

import * as path from 'path';
import { Cue } from '../../types/subtitles';
import { isValidCue } from './cues';
import { ParseError } from './errors';
import { createLogger } from './log';
import { msToSrtTimestamp, parseSrtTimestampPair } from './timecode';

const log = createLogger('SRT');

const INDEX_LINE_RE = /^\d+$/;

function normalizeNewlines(content: string): string {
  return content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

function buildCue(timing: { startMs: number; endMs: number }, textLines: string[]): Cue | null {
  const text = textLines.join('\n');
  const cue: Cue = { startMs: timing.startMs, endMs: timing.endMs, text };
  if (!text) return null;
  if (!isValidCue(cue)) {
    log.debug(`Dropping cue with invalid timing ${timing.startMs} -> ${timing.endMs}`);
    return null;
  }
  return cue;
}

function tryParseTiming(line: string): { startMs: number; endMs: number } | null {
  try {
    return parseSrtTimestampPair(line);
  } catch (e) {
    if (e instanceof ParseError) {
      log.debug(e.message);
      return null;
    }
    throw e;
  }
}

/**
 * Parse SRT content, skipping blocks that do not have a usable timestamp line.
 */
export function parseSrt(content: string): Cue[] {
  const lines = normalizeNewlines(content).split('\n');
  const cues: Cue[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();
    if (line === '') {
      i++;
      continue;
    }

    // optional index line
    if (INDEX_LINE_RE.test(line)) {
      i++;
      if (i >= lines.length) break;
    }

    const timeLine = lines[i].trim();
    if (!timeLine.includes('-->')) {
      i++;
      continue;
    }
    i++;

    const textLines: string[] = [];
    while (i < lines.length && lines[i].trim() !== '') {
      textLines.push(lines[i]);
      i++;
    }

    const timing = tryParseTiming(timeLine);
    if (!timing) continue;
    const cue = buildCue(timing, textLines);
    if (cue) cues.push(cue);
  }

  return cues;
}

/**
 * Parse SRT content split into blank-line separated blocks. The index line is
 * optional here too: a block whose first line is the timestamp is accepted.
 */
export function parseSrtBlocks(content: string): Cue[] {
  const cues: Cue[] = [];
  const blocks = normalizeNewlines(content).split(/\n(?:[ \t]*\n)+/);

  for (const block of blocks) {
    const lines = block.split('\n');
    while (lines.length > 0 && lines[0].trim() === '') lines.shift();
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') lines.pop();
    const timeIdx = lines[0]?.includes('-->') ? 0 : 1;
    if (lines.length < timeIdx + 2) continue;

    const timing = tryParseTiming(lines[timeIdx].trim());
    if (!timing) continue;
    const cue = buildCue(timing, lines.slice(timeIdx + 1));
    if (cue) cues.push(cue);
  }

  return cues;
}

/**
 * Serialize cues as SRT, numbering from 1. Text is written verbatim.
 */
export function serializeSrt(cues: readonly Cue[]): string {
  return cues
    .map((cue, idx) => `${idx + 1}\n${msToSrtTimestamp(cue.startMs)} --> ${msToSrtTimestamp(cue.endMs)}\n${cue.text}\n\n`)
    .join('');
}

/**
 * `/videos/clip.mp4` + `pt` -> `/videos/clip.pt.srt`
 */
export function srtPathForTrack(videoPath: string, language: string, outputDir?: string): string {
  const base = path.basename(videoPath, path.extname(videoPath));
  return path.join(outputDir ?? path.dirname(videoPath), `${base}.${language}.srt`);
}
