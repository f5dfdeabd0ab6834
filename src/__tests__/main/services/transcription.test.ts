import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { transcribeWords, wordsFromTranscription } from '../../../main/services/transcription';

const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock('../../../main/services/openai-client', () => ({
  getOpenAIClient: () => ({ audio: { transcriptions: { create: createMock } } }),
}));

describe('wordsFromTranscription', () => {
  it('converts seconds to milliseconds and trims the text', () => {
    const words = wordsFromTranscription({
      text: 'Hello world',
      words: [
        { word: ' Hello', start: 0, end: 0.42 },
        { word: 'world ', start: 0.42, end: 0.9 },
      ],
    });

    expect(words).toEqual([
      { text: 'Hello', startMs: 0, endMs: 420 },
      { text: 'world', startMs: 420, endMs: 900 },
    ]);
  });

  it('skips entries without text or timing', () => {
    const words = wordsFromTranscription({
      words: [
        { word: '', start: 0, end: 1 },
        { word: 'ok', start: 'soon', end: 1 },
        { word: 'fine', start: 1, end: 2 },
        null,
      ],
    });

    expect(words).toEqual([{ text: 'fine', startMs: 1000, endMs: 2000 }]);
  });

  it('keeps starts monotonic and ends at or after starts', () => {
    const words = wordsFromTranscription({
      words: [
        { word: 'one', start: 1, end: 1.5 },
        { word: 'two', start: 0.8, end: 0.9 },
      ],
    });

    expect(words).toEqual([
      { text: 'one', startMs: 1000, endMs: 1500 },
      { text: 'two', startMs: 1000, endMs: 1000 },
    ]);
  });

  it('returns nothing for a response without words', () => {
    expect(wordsFromTranscription({ text: 'plain' })).toEqual([]);
    expect(wordsFromTranscription(null)).toEqual([]);
  });
});

describe('transcribeWords', () => {
  let dir: string;
  let audioPath: string;
  const config = { openaiApiKey: 'test-secret', transcribeModel: 'gpt-4o-transcribe' };

  beforeEach(() => {
    createMock.mockReset();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'transcription-test-'));
    audioPath = path.join(dir, 'audio.wav');
    fs.writeFileSync(audioPath, 'RIFF');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails fast when the audio file is missing', async () => {
    await expect(transcribeWords(path.join(dir, 'missing.wav'), config)).rejects.toThrow(
      `Audio file not found: ${path.join(dir, 'missing.wav')}`
    );
    expect(createMock).not.toHaveBeenCalled();
  });

  it('asks for word timestamps', async () => {
    createMock.mockResolvedValue({ words: [{ word: 'Hi', start: 0.1, end: 0.3 }] });

    const words = await transcribeWords(audioPath, { ...config, transcribeModel: 'whisper-1' });

    expect(words).toEqual([{ text: 'Hi', startMs: 100, endMs: 300 }]);
    expect(createMock).toHaveBeenCalledWith(
      expect.objectContaining({
        model: 'whisper-1',
        response_format: 'verbose_json',
        timestamp_granularities: ['word'],
      })
    );
  });

  it('falls back to whisper-1 when the model rejects the response format', async () => {
    createMock
      .mockRejectedValueOnce(new Error('400 response_format verbose_json is not supported'))
      .mockResolvedValueOnce({ words: [{ word: 'Hi', start: 0, end: 0.5 }] });

    const words = await transcribeWords(audioPath, config);

    expect(words).toEqual([{ text: 'Hi', startMs: 0, endMs: 500 }]);
    expect(createMock).toHaveBeenCalledTimes(2);
    expect(createMock).toHaveBeenLastCalledWith(expect.objectContaining({ model: 'whisper-1' }));
  });

  it('rethrows other failures', async () => {
    createMock.mockRejectedValueOnce(new Error('Connection reset'));

    await expect(transcribeWords(audioPath, config)).rejects.toThrow('Connection reset');
    expect(createMock).toHaveBeenCalledTimes(1);
  });
});
