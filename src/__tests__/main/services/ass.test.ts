import { describe, it, expect } from 'vitest';
import {
  colorToAssHex,
  composeAss,
  composeAssFromMap,
  resolveStyle,
  sanitizeAssText,
  styleName,
} from '../../../main/services/ass';
import { Cue, DEFAULT_LANGUAGE_STYLE, LanguageStyle } from '../../../types/subtitles';

const STYLE_FORMAT =
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding';
const EVENT_FORMAT = 'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text';

const yellowHigh: LanguageStyle = {
  fontFamily: 'Montserrat',
  fontSizePercent: 4,
  colorARGB: 0xffffff00,
  verticalPositionPercent: 90,
  outlineWidth: 2,
};

describe('ass', () => {
  describe('colorToAssHex', () => {
    it('inverts alpha so opaque white is 00', () => {
      expect(colorToAssHex(0xffffffff)).toBe('&H00FFFFFF');
    });

    it('writes channels as alpha, blue, green, red', () => {
      expect(colorToAssHex(0xff123456)).toBe('&H00563412');
      expect(colorToAssHex(0x80ff0000)).toBe('&H7F0000FF');
    });
  });

  describe('sanitizeAssText', () => {
    it('turns braces into parentheses and line breaks into spaces', () => {
      expect(sanitizeAssText('a{b}c\\Nd\ne')).toBe('a(b)c d e');
    });

    it('leaves commas alone', () => {
      expect(sanitizeAssText('yes, no')).toBe('yes, no');
    });
  });

  describe('styleName', () => {
    it('prefixes the language code and replaces unsafe characters', () => {
      expect(styleName('pt-BR')).toBe('Lang_pt-BR');
      expect(styleName('zh hans')).toBe('Lang_zh_hans');
    });
  });

  describe('resolveStyle', () => {
    it('derives pixel values from the default style at 1080p', () => {
      expect(resolveStyle('en', DEFAULT_LANGUAGE_STYLE, 1920, 1080)).toEqual({
        name: 'Lang_en',
        fontSizePx: 54,
        marginV: 162,
        outline: 4,
        color: '&H00FFFFFF',
        x: 960,
        y: 918,
      });
    });

    it('clamps the vertical margin', () => {
      const at = (verticalPositionPercent: number) =>
        resolveStyle('en', { ...DEFAULT_LANGUAGE_STYLE, verticalPositionPercent }, 1920, 1080).marginV;
      expect(at(100)).toBe(10);
      expect(at(0)).toBe(1030);
    });
  });

  describe('composeAss', () => {
    it('writes header, one style and one positioned dialogue per cue', () => {
      const doc = composeAss([{ language: 'en', cues: [{ startMs: 0, endMs: 1500, text: 'Hi' }] }], 1920, 1080);
      expect(doc).toBe(
        [
          '[Script Info]',
          'Title: Multi-Language Subtitles',
          'ScriptType: v4.00+',
          'WrapStyle: 2',
          'ScaledBorderAndShadow: yes',
          'PlayResX: 1920',
          'PlayResY: 1080',
          '',
          '[V4+ Styles]',
          STYLE_FORMAT,
          'Style: Lang_en,Roboto,54,&H00FFFFFF,&H000000FF,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,4,1,2,10,10,162,1',
          '',
          '[Events]',
          EVENT_FORMAT,
          'Dialogue: 0,0:00:00.00,0:00:01.50,Lang_en,,0,0,0,,{\\pos(960,918)}Hi',
          '',
        ].join('\n')
      );
    });

    it('keeps track order and gives each language its own line', () => {
      const cue: Cue = { startMs: 1000, endMs: 2000, text: 'x' };
      const doc = composeAss(
        [
          { language: 'pt', cues: [cue], style: yellowHigh },
          { language: 'en', cues: [cue] },
        ],
        1920,
        1080
      );
      const lines = doc.split('\n');
      expect(lines.filter((l) => l.startsWith('Style:'))).toEqual([
        'Style: Lang_pt,Montserrat,43,&H0000FFFF,&H000000FF,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,2,1,2,10,10,108,1',
        'Style: Lang_en,Roboto,54,&H00FFFFFF,&H000000FF,&H00000000,&H80000000,0,0,0,0,100,100,0,0,1,4,1,2,10,10,162,1',
      ]);
      expect(lines.filter((l) => l.startsWith('Dialogue:'))).toEqual([
        'Dialogue: 0,0:00:01.00,0:00:02.00,Lang_pt,,0,0,0,,{\\pos(960,972)}x',
        'Dialogue: 0,0:00:01.00,0:00:02.00,Lang_en,,0,0,0,,{\\pos(960,918)}x',
      ]);
    });

    it('gives codes that sanitise to the same name distinct styles', () => {
      const cue: Cue = { startMs: 0, endMs: 1000, text: 'x' };
      const doc = composeAss(
        [
          { language: 'pt.BR', cues: [cue] },
          { language: 'pt_BR', cues: [cue], style: yellowHigh },
        ],
        1920,
        1080
      );
      const lines = doc.split('\n');
      expect(lines.filter((l) => l.startsWith('Style:')).map((l) => l.split(',')[0])).toEqual([
        'Style: Lang_pt_BR',
        'Style: Lang_pt_BR_1',
      ]);
      expect(lines.filter((l) => l.startsWith('Dialogue:'))).toEqual([
        'Dialogue: 0,0:00:00.00,0:00:01.00,Lang_pt_BR,,0,0,0,,{\\pos(960,918)}x',
        'Dialogue: 0,0:00:00.00,0:00:01.00,Lang_pt_BR_1,,0,0,0,,{\\pos(960,972)}x',
      ]);
    });

    it('replaces commas in font names', () => {
      const doc = composeAss([{ language: 'en', cues: [], style: { ...yellowHigh, fontFamily: 'Open,Sans' } }], 100, 100);
      expect(doc).toContain('Style: Lang_en,Open Sans,4,');
    });

    it('rejects non-positive or fractional dimensions', () => {
      expect(() => composeAss([], 0, 1080)).toThrow('Video width must be a positive integer (got 0)');
      expect(() => composeAss([], 1920, 1080.5)).toThrow(RangeError);
    });
  });

  describe('composeAssFromMap', () => {
    it('follows map insertion order and falls back to the default style', () => {
      const tracks = new Map<string, Cue[]>([
        ['en', [{ startMs: 0, endMs: 500, text: 'a' }]],
        ['pt', [{ startMs: 0, endMs: 500, text: 'b' }]],
      ]);
      const styles = new Map<string, LanguageStyle>([['pt', yellowHigh]]);
      const doc = composeAssFromMap(tracks, styles, 1920, 1080);
      expect(doc).toBe(
        composeAss(
          [
            { language: 'en', cues: [{ startMs: 0, endMs: 500, text: 'a' }] },
            { language: 'pt', cues: [{ startMs: 0, endMs: 500, text: 'b' }], style: yellowHigh },
          ],
          1920,
          1080
        )
      );
    });
  });
});
