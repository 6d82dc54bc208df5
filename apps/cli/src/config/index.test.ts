import { describe, it, expect } from 'vitest';
import { ConfigError, defaultSettings } from '@cutline/core';
import { applyAssignments, parseAssignment } from './index.js';

describe('parseAssignment', () => {
  it('reads JSON values', () => {
    expect(parseAssignment('quality_factor=18')).toEqual({ key: 'quality_factor', value: 18 });
    expect(parseAssignment('hardware_acceleration=false')).toEqual({
      key: 'hardware_acceleration',
      value: false,
    });
    expect(parseAssignment('filler_words=["um","uh"]')).toEqual({ key: 'filler_words', value: ['um', 'uh'] });
  });

  it('keeps anything else as a string', () => {
    expect(parseAssignment('ffmpeg_path=/opt/ffmpeg/bin/ffmpeg')).toEqual({
      key: 'ffmpeg_path',
      value: '/opt/ffmpeg/bin/ffmpeg',
    });
  });

  it('rejects unknown keys and missing values', () => {
    expect(() => parseAssignment('nope=1')).toThrow(ConfigError);
    expect(() => parseAssignment('nope=1')).toThrow('unknown key "nope"');
    expect(() => parseAssignment('quality_factor')).toThrow('expected key=value');
  });
});

describe('applyAssignments', () => {
  it('updates only the named keys', () => {
    const settings = applyAssignments(defaultSettings(), [
      { key: 'quality_factor', value: 18 },
      { key: 'filler_words', value: ['um'] },
    ]);
    expect(settings.qualityFactor).toBe(18);
    expect(settings.fillerWords).toEqual(['um']);
    expect(settings.ffmpegPath).toBe('ffmpeg');
    expect(settings.defaultBitrate).toBe('20000k');
  });

  it('validates the result', () => {
    expect(() => applyAssignments(defaultSettings(), [{ key: 'quality_factor', value: 99 }])).toThrow(ConfigError);
  });
});
