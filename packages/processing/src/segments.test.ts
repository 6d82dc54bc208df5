import { describe, it, expect } from 'vitest';
import { SegmentValidationError } from '@cutline/core';
import {
  DEFAULT_MIN_KEEP_DURATION,
  mapRangeToOutput,
  minKeepDurationFor,
  resolveCutList,
  totalDuration,
} from './segments.js';
import type { Segment } from './types.js';

// Small deterministic PRNG so the property run is reproducible
function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('resolveCutList', () => {
  it('keeps the complement of a single removed range', () => {
    const cutList = resolveCutList(100, [{ start: 10, end: 20 }]);
    expect(cutList.segments).toEqual([
      { start: 0, end: 10 },
      { start: 20, end: 100 },
    ]);
    expect(cutList.keptDuration).toBe(90);
    expect(cutList.sourceDuration).toBe(100);
  });

  it('keeps everything when nothing is removed', () => {
    expect(resolveCutList(42, []).segments).toEqual([{ start: 0, end: 42 }]);
  });

  it('rejects overlapping ranges', () => {
    expect(() => resolveCutList(100, [{ start: 10, end: 20 }, { start: 15, end: 25 }])).toThrow(
      SegmentValidationError
    );
    expect(() => resolveCutList(100, [{ start: 10, end: 20 }, { start: 15, end: 25 }])).toThrow(
      'Segments 0 and 1 overlap (15s < 20s)'
    );
  });

  it('rejects inverted and empty ranges', () => {
    expect(() => resolveCutList(100, [{ start: 30, end: 20 }])).toThrow(
      'Segment 0 starts at 30s, which is not before its end 20s'
    );
    expect(() => resolveCutList(100, [{ start: 5, end: 5 }])).toThrow(SegmentValidationError);
  });

  it('rejects ranges outside the source', () => {
    expect(() => resolveCutList(100, [{ start: -1, end: 5 }])).toThrow(SegmentValidationError);
    expect(() => resolveCutList(100, [{ start: 90, end: 120 }])).toThrow(
      'Segment 0 (90s-120s) lies outside the source (0s-100s)'
    );
    expect(() => resolveCutList(100, [{ start: Number.NaN, end: 5 }])).toThrow(SegmentValidationError);
  });

  it('rejects a non-positive source duration', () => {
    expect(() => resolveCutList(0, [])).toThrow('Source duration must be positive, got 0');
  });

  it('merges touching ranges', () => {
    const cutList = resolveCutList(100, [{ start: 10, end: 20 }, { start: 20, end: 30 }]);
    expect(cutList.segments).toEqual([
      { start: 0, end: 10 },
      { start: 30, end: 100 },
    ]);
  });

  it('orders the output by start time whatever the input order', () => {
    const cutList = resolveCutList(100, [{ start: 50, end: 60 }, { start: 10, end: 20 }]);
    expect(cutList.segments).toEqual([
      { start: 0, end: 10 },
      { start: 20, end: 50 },
      { start: 60, end: 100 },
    ]);
  });

  it('drops keep-segments shorter than one frame', () => {
    const inner = resolveCutList(100, [{ start: 0, end: 10 }, { start: 10.01, end: 20 }]);
    expect(inner.segments).toEqual([{ start: 20, end: 100 }]);

    const tail = resolveCutList(100, [{ start: 90, end: 99.99 }]);
    expect(tail.segments).toEqual([{ start: 0, end: 90 }]);
  });

  it('honours a custom minimum keep duration', () => {
    const cutList = resolveCutList(100, [{ start: 10, end: 20 }, { start: 20.5, end: 30 }], {
      minKeepDuration: 1,
    });
    expect(cutList.segments).toEqual([
      { start: 0, end: 10 },
      { start: 30, end: 100 },
    ]);
  });

  it('refuses to remove the whole video', () => {
    expect(() => resolveCutList(100, [{ start: 0, end: 100 }])).toThrow(/nothing is left to keep/);
  });

  it('returns a frozen cut-list', () => {
    const cutList = resolveCutList(10, [{ start: 2, end: 3 }]);
    expect(Object.isFrozen(cutList)).toBe(true);
    expect(Object.isFrozen(cutList.segments)).toBe(true);
  });

  it('keeps disjoint sorted segments summing to duration minus removed time', () => {
    const random = mulberry32(7);

    for (let run = 0; run < 200; run++) {
      const duration = 60 + random() * 600;
      const removed: Segment[] = [];
      let cursor = random() < 0.3 ? 0 : 0.5 + random() * 5;

      while (cursor < duration - 2) {
        const length = 0.5 + random() * 20;
        const end = Math.min(cursor + length, duration);
        removed.push({ start: cursor, end });
        // Either touch the previous range or leave a gap well above one frame
        cursor = random() < 0.2 ? end : end + 0.5 + random() * 30;
      }
      if (totalDuration(removed) >= duration - 0.5) continue;

      const cutList = resolveCutList(duration, removed);
      const segments = cutList.segments;

      for (let i = 0; i < segments.length; i++) {
        const current = segments[i];
        const next = segments[i + 1];
        expect(current).toBeDefined();
        if (!current) continue;
        expect(current.end).toBeGreaterThan(current.start);
        if (next) {
          expect(next.start).toBeGreaterThanOrEqual(current.end);
        }
      }
      expect(Math.abs(cutList.keptDuration - (duration - totalDuration(removed)))).toBeLessThan(
        DEFAULT_MIN_KEEP_DURATION
      );
    }
  });
});

describe('minKeepDurationFor', () => {
  it('is one frame of the source', () => {
    expect(minKeepDurationFor(25)).toBe(0.04);
    expect(minKeepDurationFor(null)).toBe(DEFAULT_MIN_KEEP_DURATION);
    expect(minKeepDurationFor(0)).toBe(DEFAULT_MIN_KEEP_DURATION);
  });
});

describe('mapRangeToOutput', () => {
  const cutList = resolveCutList(100, [{ start: 10, end: 20 }]);

  it('leaves ranges before the first cut untouched', () => {
    expect(mapRangeToOutput(cutList, 2, 5)).toEqual({ start: 2, end: 5 });
  });

  it('shifts ranges after a cut by the removed time', () => {
    expect(mapRangeToOutput(cutList, 30, 35)).toEqual({ start: 20, end: 25 });
  });

  it('drops ranges inside a removed area', () => {
    expect(mapRangeToOutput(cutList, 12, 18)).toBeNull();
  });

  it('clips ranges that span a cut', () => {
    expect(mapRangeToOutput(cutList, 8, 25)).toEqual({ start: 8, end: 15 });
  });
});
