import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collectRange, defaultOutputPath, parseIntegerOption, parseRange } from './args.js';

describe('parseRange', () => {
  it('reads plain seconds', () => {
    expect(parseRange('12.5-20')).toEqual({ start: 12.5, end: 20 });
  });

  it('reads timecodes', () => {
    expect(parseRange('00:01:02-00:01:30.5')).toEqual({ start: 62, end: 90.5 });
  });

  it('rejects a value without exactly one dash', () => {
    expect(() => parseRange('5')).toThrow(InvalidArgumentError);
    expect(() => parseRange('5')).toThrow('Expected start-end, got "5"');
    expect(() => parseRange('1-2-3')).toThrow(InvalidArgumentError);
  });

  it('reports a bad timecode as an argument error', () => {
    expect(() => parseRange('a-3')).toThrow('Invalid timecode format: a');
  });
});

describe('collectRange', () => {
  it('appends to earlier ranges', () => {
    expect(collectRange('1-2', [{ start: 0, end: 0.5 }])).toEqual([
      { start: 0, end: 0.5 },
      { start: 1, end: 2 },
    ]);
  });

  it('starts a fresh list', () => {
    expect(collectRange('3-4')).toEqual([{ start: 3, end: 4 }]);
  });
});

describe('parseIntegerOption', () => {
  it('accepts integers only', () => {
    expect(parseIntegerOption('18')).toBe(18);
    expect(() => parseIntegerOption('1.5')).toThrow('Expected an integer, got "1.5"');
  });
});

describe('defaultOutputPath', () => {
  it('writes beside the source by default', () => {
    expect(defaultOutputPath('clips/talk.mp4', '')).toBe('clips/talk.cut.mp4');
  });

  it('uses the configured output directory', () => {
    expect(defaultOutputPath('clips/talk.mov', '/out')).toBe('/out/talk.cut.mov');
  });

  it('falls back to mp4 for files without an extension', () => {
    expect(defaultOutputPath('clips/raw', '')).toBe('clips/raw.cut.mp4');
  });
});
