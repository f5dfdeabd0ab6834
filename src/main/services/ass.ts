/**
 * Multi-language ASS composer
 *
 * Emits one style per language and one Dialogue per cue. Every Dialogue
 * carries an explicit {\pos(x,y)} override so cues from different languages
 * shown at the same time keep their own line instead of being pushed around
 * by the renderer's collision handling.
 */

import { CaptionTrack, Cue, DEFAULT_LANGUAGE_STYLE, LanguageStyle } from '../../types/subtitles';
import { msToAssTimestamp } from './timecode';

const STYLE_FORMAT =
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding';
const EVENT_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text';

const MIN_MARGIN_V = 10;
const BOTTOM_RESERVE = 50;

/** Pixel values derived from a LanguageStyle for one video size */
export interface ResolvedStyle {
  name: string;
  fontSizePx: number;
  marginV: number;
  outline: number;
  color: string;
  x: number;
  y: number;
}

/**
 * Convert 0xAARRGGBB to ASS `&HAABBGGRR`.
 * ASS alpha is inverted (00 = opaque), so opaque white becomes &H00FFFFFF.
 */
export function colorToAssHex(argb: number): string {
  const value = argb >>> 0;
  const a = 255 - ((value >>> 24) & 0xff);
  const r = (value >>> 16) & 0xff;
  const g = (value >>> 8) & 0xff;
  const b = value & 0xff;
  const hex = (n: number) => n.toString(16).padStart(2, '0');
  return `&H${hex(a)}${hex(b)}${hex(g)}${hex(r)}`.toUpperCase();
}

/**
 * Make cue text safe for a single-line Dialogue Text field: line breaks
 * (real or `\N`) become spaces, braces become parentheses so text cannot
 * open an override block. Commas are left alone; Text is the last field.
 */
export function sanitizeAssText(text: string): string {
  return text
    .replace(/\\[Nn]/g, ' ')
    .replace(/\r\n|\r|\n/g, ' ')
    .replace(/\{/g, '(')
    .replace(/\}/g, ')');
}

export function styleName(language: string): string {
  return `Lang_${language.replace(/[^A-Za-z0-9_-]/g, '_')}`;
}

function assertDimensions(videoWidth: number, videoHeight: number): void {
  for (const [label, value] of [['width', videoWidth], ['height', videoHeight]] as const) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RangeError(`Video ${label} must be a positive integer (got ${value})`);
    }
  }
}

export function resolveStyle(
  language: string,
  style: LanguageStyle,
  videoWidth: number,
  videoHeight: number
): ResolvedStyle {
  const rawMargin = Math.round(((100 - style.verticalPositionPercent) * videoHeight) / 100);
  return {
    name: styleName(language),
    fontSizePx: Math.round((style.fontSizePercent * videoHeight) / 100),
    marginV: Math.max(MIN_MARGIN_V, Math.min(rawMargin, videoHeight - BOTTOM_RESERVE)),
    outline: Math.round(style.outlineWidth),
    color: colorToAssHex(style.colorARGB),
    x: Math.floor(videoWidth / 2),
    y: Math.round((style.verticalPositionPercent * videoHeight) / 100),
  };
}

function styleLine(font: string, s: ResolvedStyle): string {
  const fontName = font.replace(/,/g, ' ');
  return `Style: ${s.name},${fontName},${s.fontSizePx},${s.color},&H000000FF,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,${s.outline},1,2,10,10,${s.marginV},1`;
}

function dialogueLine(cue: Cue, s: ResolvedStyle): string {
  const start = msToAssTimestamp(cue.startMs);
  const end = msToAssTimestamp(cue.endMs);
  return `Dialogue: 0,${start},${end},${s.name},,0,0,0,,{\\pos(${s.x},${s.y})}${sanitizeAssText(cue.text)}`;
}

/**
 * Compose one ASS document for all tracks, in the order given.
 * Tracks without a style use DEFAULT_LANGUAGE_STYLE. Style names are unique
 * within the document.
 */
export function composeAss(tracks: readonly CaptionTrack[], videoWidth: number, videoHeight: number): string {
  assertDimensions(videoWidth, videoHeight);

  // codes that sanitise to the same name get the track index appended
  const used = new Set<string>();
  const resolved = tracks.map((t, index) => {
    const style = t.style ?? DEFAULT_LANGUAGE_STYLE;
    const pixels = resolveStyle(t.language, style, videoWidth, videoHeight);
    let name = pixels.name;
    for (let n = index; used.has(name); n++) name = `${pixels.name}_${n}`;
    used.add(name);
    return { track: t, style, pixels: { ...pixels, name } };
  });

  const lines: string[] = [
    '[Script Info]',
    'Title: Multi-Language Subtitles',
    'ScriptType: v4.00+',
    'WrapStyle: 2',
    'ScaledBorderAndShadow: yes',
    `PlayResX: ${videoWidth}`,
    `PlayResY: ${videoHeight}`,
    '',
    '[V4+ Styles]',
    STYLE_FORMAT,
    ...resolved.map((r) => styleLine(r.style.fontFamily, r.pixels)),
    '',
    '[Events]',
    EVENT_FORMAT,
  ];

  for (const { track, pixels } of resolved) {
    for (const cue of track.cues) {
      lines.push(dialogueLine(cue, pixels));
    }
  }

  return lines.join('\n') + '\n';
}

/**
 * Convenience over a language -> cues map. Map insertion order decides the
 * style and event order; pass an ordered CaptionTrack[] to composeAss() when
 * that order matters.
 */
export function composeAssFromMap(
  tracks: ReadonlyMap<string, readonly Cue[]>,
  styles: ReadonlyMap<string, LanguageStyle>,
  videoWidth: number,
  videoHeight: number
): string {
  const ordered: CaptionTrack[] = [...tracks].map(([language, cues]) => ({
    language,
    cues: [...cues],
    style: styles.get(language),
  }));
  return composeAss(ordered, videoWidth, videoHeight);
}
