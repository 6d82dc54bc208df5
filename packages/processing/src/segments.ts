/**
 * Segment Resolver
 *
 * Turns the user's remove-ranges into the ordered keep cut-list that the
 * command builder renders. Overlapping remove-ranges are rejected rather
 * than guessed at; ranges that merely touch are merged.
 */

import { SegmentValidationError } from '@cutline/core';
import type { CutList, Segment } from './types.js';

/** One frame at 30 fps; used when the source frame rate is unknown */
export const DEFAULT_MIN_KEEP_DURATION = 1 / 30;

/** Boundaries closer than this are considered equal */
const TIME_EPSILON = 1e-6;

export interface ResolveOptions {
  /** Keep-segments shorter than this are dropped */
  minKeepDuration?: number;
}

/**
 * Shortest keep-segment worth splicing for a source: one frame.
 */
export function minKeepDurationFor(frameRate: number | null): number {
  return frameRate && frameRate > 0 ? 1 / frameRate : DEFAULT_MIN_KEEP_DURATION;
}

export function totalDuration(segments: readonly Segment[]): number {
  return segments.reduce((sum, s) => sum + (s.end - s.start), 0);
}

function validateSegment(segment: Segment, index: number, duration: number): void {
  const { start, end } = segment;
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new SegmentValidationError(`Segment ${index} has a non-numeric boundary`, { index, start, end });
  }
  if (start >= end) {
    throw new SegmentValidationError(
      `Segment ${index} starts at ${start}s, which is not before its end ${end}s`,
      { index, start, end }
    );
  }
  if (start < 0 || end > duration + TIME_EPSILON) {
    throw new SegmentValidationError(
      `Segment ${index} (${start}s-${end}s) lies outside the source (0s-${duration}s)`,
      { index, start, end, duration }
    );
  }
}

/**
 * Resolve remove-ranges into a cut-list of keep-ranges over [0, duration].
 *
 * @throws SegmentValidationError for inverted, out-of-range or overlapping
 *   ranges, and when nothing would be left to keep
 */
export function resolveCutList(
  duration: number,
  removeSegments: readonly Segment[],
  options: ResolveOptions = {}
): CutList {
  const minKeep = options.minKeepDuration ?? DEFAULT_MIN_KEEP_DURATION;

  if (!Number.isFinite(duration) || duration <= 0) {
    throw new SegmentValidationError(`Source duration must be positive, got ${duration}`, { duration });
  }

  removeSegments.forEach((segment, index) => validateSegment(segment, index, duration));

  const sorted = removeSegments
    .map((segment, index) => ({ start: segment.start, end: Math.min(segment.end, duration), index }))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  // Merge touching ranges, reject overlapping ones
  const merged: { start: number; end: number; index: number }[] = [];
  for (const range of sorted) {
    const previous = merged[merged.length - 1];
    if (previous && range.start < previous.end - TIME_EPSILON) {
      throw new SegmentValidationError(
        `Segments ${previous.index} and ${range.index} overlap (${range.start}s < ${previous.end}s)`,
        { index: range.index, start: range.start, end: range.end }
      );
    }
    if (previous && range.start <= previous.end + TIME_EPSILON) {
      previous.end = Math.max(previous.end, range.end);
      continue;
    }
    merged.push({ ...range });
  }

  const keep: Segment[] = [];
  let cursor = 0;
  for (const range of merged) {
    if (range.start - cursor >= minKeep) {
      keep.push(Object.freeze({ start: cursor, end: range.start }));
    }
    cursor = range.end;
  }
  if (duration - cursor >= minKeep) {
    keep.push(Object.freeze({ start: cursor, end: duration }));
  }

  if (keep.length === 0) {
    throw new SegmentValidationError('The selected ranges remove the entire video; nothing is left to keep', {
      duration,
    });
  }

  return Object.freeze({
    segments: Object.freeze(keep),
    keptDuration: totalDuration(keep),
    sourceDuration: duration,
  });
}

/**
 * Map a source time range onto the output timeline of a cut-list.
 *
 * Parts of the range that fall in removed areas are dropped; a range that
 * spans a cut is clipped to its kept parts, which are contiguous in the
 * output. Returns null when nothing of the range survives.
 */
export function mapRangeToOutput(cutList: CutList, start: number, end: number): Segment | null {
  let outputOffset = 0;
  let mappedStart: number | null = null;
  let mappedEnd: number | null = null;

  for (const keep of cutList.segments) {
    const overlapStart = Math.max(start, keep.start);
    const overlapEnd = Math.min(end, keep.end);
    if (overlapEnd > overlapStart) {
      if (mappedStart === null) {
        mappedStart = outputOffset + (overlapStart - keep.start);
      }
      mappedEnd = outputOffset + (overlapEnd - keep.start);
    }
    outputOffset += keep.end - keep.start;
  }

  if (mappedStart === null || mappedEnd === null) {
    return null;
  }
  return { start: mappedStart, end: mappedEnd };
}
