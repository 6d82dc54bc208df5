import { describe, it, expect } from 'vitest';
import { qualityIntentFrom } from './export.js';

describe('qualityIntentFrom', () => {
  it('selects bitrate mode when only a bitrate is given', () => {
    expect(qualityIntentFrom({ bitrate: '8M' })).toEqual({ rateControl: 'bitrate', maxBitrate: '8M' });
  });

  it('keeps quality mode and caps the rate when both are given', () => {
    expect(qualityIntentFrom({ qualityFactor: 20, bitrate: '8M' })).toEqual({
      rateControl: 'quality',
      qualityFactor: 20,
      maxBitrate: '8M',
    });
  });

  it('leaves defaults to the settings', () => {
    expect(qualityIntentFrom({})).toEqual({ rateControl: 'quality' });
  });
});
