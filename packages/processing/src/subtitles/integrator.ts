/**
 * Subtitle Integrator
 *
 * Turns a transcript of the source into a caption track for the cut output.
 * Generation failures surface as SubtitleGenerationError so the caller can
 * downgrade them to warnings.
 */

import { CancelledError, CutlineError, SubtitleGenerationError } from '@cutline/core';
import { safeWriteFile } from '@cutline/utils';
import { mapRangeToOutput } from '../segments.js';
import type { CutList, SubtitleCue, SubtitleRequest, SubtitleTrack } from '../types.js';
import { formatSrt } from './srt.js';
import type { Transcriber, Transcript } from './transcriber.js';

/** Cues shorter than this after clipping are dropped */
const MIN_CUE_DURATION = 0.001;

/**
 * Sort cues, trim their text, and clip each to end where the next begins.
 * Empty and zero-length cues are dropped.
 */
export function normalizeCues(cues: readonly SubtitleCue[]): SubtitleTrack {
  const sorted = cues
    .map(cue => ({ start: Math.max(0, cue.start), end: cue.end, text: cue.text.trim() }))
    .filter(cue => cue.text.length > 0 && Number.isFinite(cue.start) && Number.isFinite(cue.end))
    .sort((a, b) => a.start - b.start || a.end - b.end);

  const track: SubtitleCue[] = [];
  sorted.forEach((cue, i) => {
    const next = sorted[i + 1];
    const end = next ? Math.min(cue.end, next.start) : cue.end;
    if (end - cue.start >= MIN_CUE_DURATION) {
      track.push(Object.freeze({ start: cue.start, end, text: cue.text }));
    }
  });

  return Object.freeze(track);
}

export function cuesFromTranscript(transcript: Transcript): SubtitleTrack {
  return normalizeCues(transcript.segments.map(s => ({ start: s.start, end: s.end, text: s.text })));
}

/**
 * Move a source-timeline track onto the output timeline of a cut-list
 */
export function remapTrackToCutList(track: SubtitleTrack, cutList: CutList): SubtitleTrack {
  const remapped: SubtitleCue[] = [];
  for (const cue of track) {
    const range = mapRangeToOutput(cutList, cue.start, cue.end);
    if (range) {
      remapped.push({ start: range.start, end: range.end, text: cue.text });
    }
  }
  return normalizeCues(remapped);
}

/**
 * `talk.cut.mp4` -> `talk.cut.srt`
 */
export function subtitlePathFor(videoPath: string): string {
  const dot = videoPath.lastIndexOf('.');
  const slash = Math.max(videoPath.lastIndexOf('/'), videoPath.lastIndexOf('\\'));
  const stem = dot > slash ? videoPath.slice(0, dot) : videoPath;
  return `${stem}.srt`;
}

/**
 * Transcribe a media file into a normalised caption track
 *
 * @throws SubtitleGenerationError for any transcription failure
 * @throws CancelledError when the signal aborts
 */
export async function generateSubtitles(
  transcriber: Transcriber,
  mediaPath: string,
  request: SubtitleRequest = {},
  signal?: AbortSignal
): Promise<SubtitleTrack> {
  try {
    const transcript = await transcriber.transcribe(mediaPath, { language: request.language, signal });
    return cuesFromTranscript(transcript);
  } catch (error) {
    if (error instanceof CancelledError || error instanceof SubtitleGenerationError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    const detail = error instanceof CutlineError ? error.code : undefined;
    throw new SubtitleGenerationError(`Subtitle generation failed: ${message}`, detail);
  }
}

/**
 * Write a track as SubRip beside the video
 */
export async function writeSubtitleFile(videoPath: string, track: SubtitleTrack): Promise<string> {
  const path = subtitlePathFor(videoPath);
  await safeWriteFile(path, formatSrt(track));
  return path;
}
