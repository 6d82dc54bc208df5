import { describe, it, expect } from 'vitest';
import { ProcessExecutionError, SubtitleGenerationError } from '@cutline/core';
import { resolveCutList } from '../segments.js';
import { formatSrt } from './srt.js';
import {
  generateSubtitles,
  normalizeCues,
  remapTrackToCutList,
  subtitlePathFor,
} from './integrator.js';
import type { Transcriber, Transcript } from './transcriber.js';

function transcriberOf(result: Transcript | Error): Transcriber {
  return {
    transcribe: async () => {
      if (result instanceof Error) throw result;
      return result;
    },
  };
}

describe('normalizeCues', () => {
  it('sorts, trims and clips overlapping cues', () => {
    const track = normalizeCues([
      { start: 5, end: 9, text: ' second ' },
      { start: 0, end: 6, text: 'first' },
      { start: 9, end: 9, text: 'instant' },
      { start: 10, end: 12, text: '   ' },
    ]);
    expect(track).toEqual([
      { start: 0, end: 5, text: 'first' },
      { start: 5, end: 9, text: 'second' },
    ]);
  });
});

describe('remapTrackToCutList', () => {
  it('drops, shifts and clips cues around the cuts', () => {
    const cutList = resolveCutList(60, [{ start: 10, end: 20 }]);
    const track = remapTrackToCutList(
      [
        { start: 2, end: 4, text: 'kept' },
        { start: 12, end: 18, text: 'removed' },
        { start: 8, end: 22, text: 'spanning' },
        { start: 30, end: 32, text: 'shifted' },
      ],
      cutList
    );
    expect(track).toEqual([
      { start: 2, end: 4, text: 'kept' },
      { start: 8, end: 12, text: 'spanning' },
      { start: 20, end: 22, text: 'shifted' },
    ]);
  });
});

describe('formatSrt', () => {
  it('numbers cues and uses comma milliseconds', () => {
    expect(formatSrt([
      { start: 0, end: 1.5, text: 'Hello' },
      { start: 61.25, end: 3725, text: 'World' },
    ])).toBe(
      '1\n00:00:00,000 --> 00:00:01,500\nHello\n\n' +
      '2\n00:01:01,250 --> 01:02:05,000\nWorld\n'
    );
  });

  it('renders an empty track as an empty document', () => {
    expect(formatSrt([])).toBe('');
  });
});

describe('subtitlePathFor', () => {
  it('swaps the extension for .srt', () => {
    expect(subtitlePathFor('/out/talk.cut.mp4')).toBe('/out/talk.cut.srt');
    expect(subtitlePathFor('/out.d/talk')).toBe('/out.d/talk.srt');
  });
});

describe('generateSubtitles', () => {
  it('turns transcript segments into cues', async () => {
    const track = await generateSubtitles(transcriberOf({
      language: 'en',
      segments: [
        { start: 0, end: 2, text: ' Hi there.', words: [] },
        { start: 2, end: 4, text: 'Bye.', words: [] },
      ],
    }), 'in.mp4');
    expect(track).toEqual([
      { start: 0, end: 2, text: 'Hi there.' },
      { start: 2, end: 4, text: 'Bye.' },
    ]);
  });

  it('wraps engine failures', async () => {
    const failing = transcriberOf(new ProcessExecutionError('whisper', 1, 'CUDA out of memory'));
    await expect(generateSubtitles(failing, 'in.mp4')).rejects.toThrow(SubtitleGenerationError);
    await expect(generateSubtitles(failing, 'in.mp4')).rejects.toThrow(
      'Subtitle generation failed: whisper exited with code 1'
    );
  });
});
