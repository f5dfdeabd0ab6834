/**
 * Timestamp formatting and parsing.
 *
 * SRT:  HH:MM:SS,mmm  (hours zero-padded to 2, never wrap)
 * ASS:  H:MM:SS.cc    (centiseconds, truncated)
 */

import { ParseError } from './errors';

const pad = (n: number, w = 2) => String(n).padStart(w, '0');

function splitMs(ms: number): { h: number; m: number; s: number; rest: number } {
  const total = Math.max(0, Math.trunc(ms));
  return {
    h: Math.floor(total / 3600000),
    m: Math.floor((total % 3600000) / 60000),
    s: Math.floor((total % 60000) / 1000),
    rest: total % 1000,
  };
}

export function msToSrtTimestamp(ms: number): string {
  const { h, m, s, rest } = splitMs(ms);
  return `${pad(h)}:${pad(m)}:${pad(s)},${pad(rest, 3)}`;
}

export function msToAssTimestamp(ms: number): string {
  const { h, m, s, rest } = splitMs(ms);
  return `${h}:${pad(m)}:${pad(s)}.${pad(Math.floor(rest / 10))}`;
}

const TIMESTAMP = String.raw`(\d+):(\d{2}):(\d{2})[,.](\d{1,3})`;
const TIMESTAMP_PAIR_RE = new RegExp(`^\\s*${TIMESTAMP}\\s*-->\\s*${TIMESTAMP}`);

/**
 * "5" -> 500, "32" -> 320, "320" -> 320
 */
function fractionToMs(fraction: string): number {
  return Number(fraction.padEnd(3, '0'));
}

function toMs(h: string, m: string, s: string, fraction: string): number {
  return Number(h) * 3600000 + Number(m) * 60000 + Number(s) * 1000 + fractionToMs(fraction);
}

/**
 * Parse `HH:MM:SS,mmm --> HH:MM:SS,mmm`. Comma or dot separate the fraction,
 * which may have 1 to 3 digits. Anything after the end stamp (position
 * hints some tools append) is ignored.
 *
 * @throws ParseError when the line does not match
 */
export function parseSrtTimestampPair(line: string): { startMs: number; endMs: number } {
  const m = TIMESTAMP_PAIR_RE.exec(line);
  if (!m) {
    throw new ParseError(`Invalid timestamp line: "${line.trim()}"`);
  }
  return {
    startMs: toMs(m[1], m[2], m[3], m[4]),
    endMs: toMs(m[5], m[6], m[7], m[8]),
  };
}

/**
 * Parse an FFmpeg clock value such as `00:01:02.50` (used by both the
 * `Duration:` header and `time=` progress tokens).
 */
export function parseClockToMs(hours: string, minutes: string, seconds: string, fraction = ''): number {
  return Number(hours) * 3600000 + Number(minutes) * 60000 + Number(seconds) * 1000 + (fraction ? fractionToMs(fraction.slice(0, 3)) : 0);
}
