/**
 * Edit-candidate analysis
 *
 * Scans word-timed speech for stretches worth cutting: long pauses between
 * words and filler words.
 */

import type { Segment } from './types.js';
import type { TranscribedWord, Transcript } from './subtitles/transcriber.js';

export type CandidateKind = 'silence' | 'filler';

export interface EditCandidate {
  readonly kind: CandidateKind;
  readonly start: number;
  readonly end: number;
  /** The filler word, for filler candidates */
  readonly text?: string;
}

export interface AnalysisOptions {
  fillerWords: readonly string[];
  /** Gaps longer than this many seconds count as silence */
  silenceThreshold: number;
}

export interface CandidateSummary {
  count: number;
  totalSeconds: number;
}

/**
 * Walk the words in order. A gap since the previous word's end (0 before the
 * first word) longer than the threshold is a silence; a word whose trimmed
 * text is in the filler list is a filler.
 */
export function findEditCandidates(
  words: readonly TranscribedWord[],
  options: AnalysisOptions
): EditCandidate[] {
  const fillers = new Set(options.fillerWords.map(w => w.trim()));
  const candidates: EditCandidate[] = [];
  let previousEnd = 0;

  for (const word of words) {
    if (word.start - previousEnd > options.silenceThreshold) {
      candidates.push({ kind: 'silence', start: previousEnd, end: word.start });
    }

    const text = word.word.trim();
    if (fillers.has(text)) {
      candidates.push({ kind: 'filler', start: word.start, end: word.end, text });
    }

    previousEnd = word.end;
  }

  return candidates;
}

export function transcriptWords(transcript: Transcript): TranscribedWord[] {
  return transcript.segments.flatMap(s => s.words);
}

export function summarizeCandidates(candidates: readonly EditCandidate[]): Record<CandidateKind, CandidateSummary> {
  const summary: Record<CandidateKind, CandidateSummary> = {
    silence: { count: 0, totalSeconds: 0 },
    filler: { count: 0, totalSeconds: 0 },
  };
  for (const candidate of candidates) {
    summary[candidate.kind].count++;
    summary[candidate.kind].totalSeconds += candidate.end - candidate.start;
  }
  return summary;
}

/**
 * Union of the chosen candidates (or any ranges) as a remove-set.
 * Overlapping ranges are merged so the result is safe to hand to the resolver.
 */
export function candidatesToRemoveSegments(candidates: readonly (EditCandidate | Segment)[]): Segment[] {
  const sorted = candidates
    .filter(c => c.end > c.start)
    .map(c => ({ start: c.start, end: c.end }))
    .sort((a, b) => a.start - b.start);

  const merged: { start: number; end: number }[] = [];
  for (const range of sorted) {
    const previous = merged[merged.length - 1];
    if (previous && range.start <= previous.end) {
      previous.end = Math.max(previous.end, range.end);
    } else {
      merged.push(range);
    }
  }
  return merged;
}
