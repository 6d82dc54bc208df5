/**
 * Processing Types
 */

import type { JobState, JobStateTransition, TerminalJobState } from '@cutline/core';
import type { VideoSource } from '@cutline/media';

/**
 * A time range in seconds, `start < end`.
 */
export interface Segment {
  readonly start: number;
  readonly end: number;
}

/**
 * Ordered, disjoint keep-ranges of a source.
 */
export interface CutList {
  readonly segments: readonly Segment[];
  /** Sum of the kept segment lengths, i.e. the output duration */
  readonly keptDuration: number;
  readonly sourceDuration: number;
}

export type EncoderCapability = 'cpu' | 'nvenc' | 'amf' | 'qsv';

export type VideoCodec = 'libx264' | 'h264_nvenc' | 'h264_amf' | 'h264_qsv';

export type RateControl =
  | { mode: 'quality'; factor: number }
  | { mode: 'bitrate'; bitrate: string };

export interface EncodingProfile {
  readonly encoder: EncoderCapability;
  readonly codec: VideoCodec;
  readonly rateControl: RateControl;
  readonly preset: string;
  /** Upper bound on the video bitrate, e.g. `20000k` */
  readonly maxBitrate: string;
  readonly pixelFormat: string;
  readonly audioCodec: 'aac';
  readonly audioBitrate: string;
}

/**
 * What the user asks for; anything left out comes from settings.
 */
export interface QualityIntent {
  rateControl?: RateControl['mode'];
  qualityFactor?: number;
  maxBitrate?: string;
}

/**
 * Fully rendered encoder invocation (without the binary).
 */
export interface CommandSpec {
  readonly args: readonly string[];
  /** Shell-quoted rendering for logs */
  readonly display: string;
}

export interface ProgressSample {
  readonly jobId: string;
  /** Output seconds written so far */
  readonly processedSeconds: number;
  readonly totalSeconds: number;
  /** 0..1 */
  readonly percent: number;
  readonly elapsedSeconds: number;
  readonly etaSeconds: number;
  /** Encoding speed relative to realtime, when the encoder reports one */
  readonly speed: number | null;
}

export interface SubtitleCue {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/** Time-ordered, non-overlapping cues */
export type SubtitleTrack = readonly SubtitleCue[];

export interface SubtitleRequest {
  language?: string;
}

export interface ExportRequest {
  source: VideoSource;
  removeSegments: readonly Segment[];
  outputPath: string;
  quality?: QualityIntent;
  subtitles?: SubtitleRequest;
}

export interface JobErrorInfo {
  code: string;
  message: string;
  exitCode?: number | null;
  stderrTail?: string;
}

/**
 * Read-only view of a job, safe to hand to any consumer.
 */
export interface JobSnapshot {
  readonly id: string;
  readonly state: JobState;
  readonly sourcePath: string;
  readonly outputPath: string;
  readonly cutList: CutList;
  readonly profile: EncodingProfile | null;
  readonly command: CommandSpec | null;
  readonly progress: ProgressSample | null;
  readonly cancelRequested: boolean;
  readonly subtitlePath: string | null;
  readonly error: JobErrorInfo | null;
  readonly warnings: readonly JobErrorInfo[];
  readonly history: readonly JobStateTransition[];
  readonly createdAt: Date;
  readonly finishedAt: Date | null;
}

export interface JobResult extends JobSnapshot {
  readonly state: TerminalJobState;
}

export type JobEvent =
  | { type: 'state'; jobId: string; from: JobState; to: JobState; at: Date }
  | { type: 'progress'; jobId: string; sample: ProgressSample }
  | { type: 'warning'; jobId: string; warning: JobErrorInfo }
  | { type: 'terminal'; jobId: string; result: JobResult };
