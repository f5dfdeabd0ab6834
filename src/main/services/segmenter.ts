/**
 * Caption Segmenter
 *
 * Greedy, single pass, left to right: words accumulate into the current cue
 * until appending the next one would exceed the character ceiling or the
 * duration ceiling, at which point the cue is closed. A break is skipped when
 * the word being considered, or the word after it, is pure punctuation, so a
 * trailing "!" or "," never lands at the start of the following cue.
 *
 * Pure punctuation tokens are joined to the preceding word without a space,
 * so the character count always equals the length of the emitted text.
 * A single word longer than maxChars is never split.
 *
 * Both skip rules can push a cue past maxChars or maxDurationMs: a word that
 * is followed by punctuation joins the current cue however full it is, and
 * the punctuation then joins it too (`aaaa bbbb cccc ,` at maxChars 9 gives
 * one 15-character cue).
 */

import { Cue, Word } from '../../types/subtitles';

export const DEFAULT_MAX_CHARS_PER_CUE = 25;
export const DEFAULT_MAX_CUE_DURATION_MS = 2500;
export const DEFAULT_PUNCTUATION = ',.!?;:-—–';

export interface SegmentOptions {
  /** characters that make a token "pure punctuation" */
  punctuation?: string;
}

function escapeForCharClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, '\\$&');
}

export function createPunctuationMatcher(punctuation: string = DEFAULT_PUNCTUATION): (text: string) => boolean {
  if (punctuation.length === 0) return () => false;
  const re = new RegExp(`^[${escapeForCharClass(punctuation)}]+$`, 'u');
  return (text) => re.test(text.trim());
}

interface Run {
  text: string;
  startMs: number;
  endMs: number;
}

/**
 * Re-segment a flat word list into caption cues.
 *
 * @param maxChars - character ceiling per cue, spaces included
 * @param maxDurationMs - a cue is closed once adding a word would make it last this long
 */
export function segment(
  words: readonly Word[],
  maxChars: number,
  maxDurationMs: number = DEFAULT_MAX_CUE_DURATION_MS,
  options: SegmentOptions = {}
): Cue[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new RangeError(`maxChars must be a positive integer (got ${maxChars})`);
  }
  const isPunctuation = createPunctuationMatcher(options.punctuation);
  const cues: Cue[] = [];
  let run: Run | null = null;

  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    const wordIsPunctuation = isPunctuation(word.text);
    // punctuation attaches to the previous word without a space
    const separator = run && !wordIsPunctuation ? ' ' : '';
    const wouldBeChars = (run ? run.text.length : 0) + separator.length + word.text.length;
    const wouldBeDuration = word.endMs - (run ? run.startMs : word.startMs);
    const nextIsPunctuation = i + 1 < words.length && isPunctuation(words[i + 1].text);

    const exceeds = wouldBeChars > maxChars || wouldBeDuration >= maxDurationMs;
    if (run && exceeds && !wordIsPunctuation && !nextIsPunctuation) {
      cues.push({ startMs: run.startMs, endMs: run.endMs, text: run.text });
      run = null;
    }

    if (!run) {
      run = { text: word.text, startMs: word.startMs, endMs: word.endMs };
    } else {
      run.text += separator + word.text;
      run.endMs = word.endMs;
    }
  }

  if (run) cues.push({ startMs: run.startMs, endMs: run.endMs, text: run.text });
  return cues;
}
