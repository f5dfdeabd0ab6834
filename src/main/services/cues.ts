import { Cue, Word } from '../../types/subtitles';
import { InvalidCueError } from './errors';

export const NEW_CUE_DURATION_MS = 3000;

function assertTiming(startMs: number, endMs: number, label: string): void {
  if (!Number.isInteger(startMs) || !Number.isInteger(endMs)) {
    throw new InvalidCueError(`${label}: times must be integer milliseconds (${startMs} -> ${endMs})`);
  }
  if (startMs < 0) {
    throw new InvalidCueError(`${label}: start time cannot be negative (${startMs})`);
  }
  if (endMs <= startMs) {
    throw new InvalidCueError(`${label}: end time must be greater than start time (${startMs} -> ${endMs})`);
  }
}

/**
 * Create a validated cue.
 *
 * @throws InvalidCueError on non-integer, negative or zero/negative-duration timing
 */
export function createCue(startMs: number, endMs: number, text: string): Cue {
  assertTiming(startMs, endMs, 'Invalid cue');
  return { startMs, endMs, text };
}

export function isValidCue(cue: Cue): boolean {
  return Number.isInteger(cue.startMs) && Number.isInteger(cue.endMs) && cue.startMs >= 0 && cue.endMs > cue.startMs;
}

/** Stable sort by start time; returns a new array */
export function sortCues(cues: readonly Cue[]): Cue[] {
  return [...cues].sort((a, b) => a.startMs - b.startMs);
}

/**
 * Append a placeholder cue right after the last one.
 */
export function addCue(cues: readonly Cue[], text = 'New caption'): Cue[] {
  const lastEnd = cues.length > 0 ? cues[cues.length - 1].endMs : 0;
  return sortCues([...cues, createCue(lastEnd, lastEnd + NEW_CUE_DURATION_MS, text)]);
}

export type CuePatch = Partial<Cue>;

function assertIndex(cues: readonly Cue[], index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= cues.length) {
    throw new RangeError(`Cue index ${index} out of range (0..${cues.length - 1})`);
  }
}

/**
 * Replace fields of the cue at `index`. The list is re-sorted when timing changed.
 */
export function updateCue(cues: readonly Cue[], index: number, patch: CuePatch): Cue[] {
  assertIndex(cues, index);
  const current = cues[index];
  const next = createCue(patch.startMs ?? current.startMs, patch.endMs ?? current.endMs, patch.text ?? current.text);
  const out = [...cues];
  out[index] = next;
  const timingChanged = next.startMs !== current.startMs || next.endMs !== current.endMs;
  return timingChanged ? sortCues(out) : out;
}

export function removeCue(cues: readonly Cue[], index: number): Cue[] {
  assertIndex(cues, index);
  return cues.filter((_, i) => i !== index);
}

/**
 * Check the word-list precondition the segmenter relies on.
 * Not called by segment() itself; callers opt in.
 *
 * @throws InvalidCueError naming the first offending word
 */
export function validateWords(words: readonly Word[]): void {
  let previousStart = 0;
  words.forEach((word, i) => {
    const { startMs, endMs } = word;
    if (!Number.isInteger(startMs) || !Number.isInteger(endMs) || startMs < 0 || endMs < startMs) {
      throw new InvalidCueError(`Invalid word at index ${i}: ${startMs} -> ${endMs}`);
    }
    if (startMs < previousStart) {
      throw new InvalidCueError(`Word at index ${i} starts before the previous word (${startMs} < ${previousStart})`);
    }
    previousStart = startMs;
  });
}
