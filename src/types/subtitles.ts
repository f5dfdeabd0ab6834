/**
 * Subtitle types for AI-generated captions
 *
 * All times are integer milliseconds. Nothing here is mutated in place:
 * services return new arrays and objects.
 */

/** A single recognised word, as produced by the transcription provider */
export interface Word {
  text: string;
  /** start time in ms */
  startMs: number;
  /** end time in ms (>= startMs) */
  endMs: number;
}

/** One timed caption entry belonging to a single language track */
export interface Cue {
  /** start time in ms */
  startMs: number;
  /** end time in ms (always > startMs) */
  endMs: number;
  /** caption text, may span several lines */
  text: string;
}

/**
 * Per-language caption styling.
 *
 * Sizes and positions are percentages of the video height so the same
 * style renders consistently at any resolution.
 */
export interface LanguageStyle {
  fontFamily: string;
  /** font size as percentage of video height (typically 2-8) */
  fontSizePercent: number;
  /** 0xAARRGGBB */
  colorARGB: number;
  /** distance from the top, as percentage of video height (50-95) */
  verticalPositionPercent: number;
  /** outline thickness in pixels */
  outlineWidth: number;
}

export const DEFAULT_FONT_FAMILY = 'Roboto';

export const DEFAULT_LANGUAGE_STYLE: Readonly<LanguageStyle> = Object.freeze({
  fontFamily: DEFAULT_FONT_FAMILY,
  fontSizePercent: 5.0,
  colorARGB: 0xffffffff,
  verticalPositionPercent: 85.0,
  outlineWidth: 4.0,
});

/**
 * One language's cues plus the style used to render them.
 * Composer input is an ordered array of these, so style-record order
 * never depends on object key traversal.
 */
export interface CaptionTrack {
  /** language code, e.g. 'en' (case-sensitive) */
  language: string;
  cues: Cue[];
  style?: LanguageStyle;
}
