/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Extracts the metadata a cut job needs in JSON format.
 */

import { z } from 'zod';
import { executeCommand, type CommandResult, type CommandRunner } from '@cutline/utils';
import { ProcessExecutionError, ValidationError } from '@cutline/core';
import type { VideoSource } from '../types.js';

const streamSchema = z.object({
  index: z.number(),
  codec_type: z.string(),
  codec_name: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  duration: z.string().optional(),
});

const ffprobeSchema = z.object({
  format: z.object({
    filename: z.string().optional(),
    format_name: z.string().default(''),
    duration: z.string().optional(),
  }),
  streams: z.array(streamSchema).default([]),
});

export type FFProbeResult = z.infer<typeof ffprobeSchema>;

export interface FFProbeOptions {
  ffprobePath?: string;
  runner?: CommandRunner;
  timeoutMs?: number;
}

/**
 * Parse an ffprobe rational (`30000/1001`) or decimal frame rate.
 * Returns null for `0/0` and anything unparsable.
 */
export function parseFrameRate(value: string | undefined): number | null {
  if (!value) return null;

  const [numerator, denominator] = value.split('/');
  const num = parseFloat(numerator ?? '');
  const den = denominator === undefined ? 1 : parseFloat(denominator);

  if (!Number.isFinite(num) || !Number.isFinite(den) || num <= 0 || den <= 0) {
    return null;
  }
  return num / den;
}

/**
 * Reduce a validated ffprobe result to a VideoSource
 */
export function toVideoSource(path: string, result: FFProbeResult): VideoSource {
  const video = result.streams.find(s => s.codec_type === 'video');
  if (!video) {
    throw new ValidationError('source', `${path} has no video stream`);
  }

  let duration = parseFloat(result.format.duration ?? '');
  if (!Number.isFinite(duration) || duration <= 0) {
    // Some containers only carry per-stream durations
    const streamDurations = result.streams
      .map(s => parseFloat(s.duration ?? ''))
      .filter(d => Number.isFinite(d) && d > 0);
    duration = streamDurations.length > 0 ? Math.max(...streamDurations) : NaN;
  }
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new ValidationError('source', `${path} reports no usable duration`);
  }

  return Object.freeze({
    path,
    duration,
    container: result.format.format_name,
    width: video.width ?? null,
    height: video.height ?? null,
    frameRate: parseFrameRate(video.avg_frame_rate) ?? parseFrameRate(video.r_frame_rate),
    hasAudio: result.streams.some(s => s.codec_type === 'audio'),
  });
}

export class FFProbe {
  private ffprobePath: string;
  private runner: CommandRunner;
  private timeoutMs: number;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.runner = options.runner ?? executeCommand;
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  /**
   * Probe a media file and return validated metadata
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { timeout: this.timeoutMs });
    } catch (error) {
      throw new ProcessExecutionError(
        this.ffprobePath,
        null,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (result.exitCode !== 0) {
      throw new ProcessExecutionError(this.ffprobePath, result.exitCode, result.stderr.trim().slice(-2000));
    }

    let raw: unknown;
    try {
      raw = JSON.parse(result.stdout);
    } catch {
      throw new ValidationError('ffprobe output', `unparsable JSON: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = ffprobeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('ffprobe output', parsed.error.issues[0]?.message ?? 'unexpected shape');
    }
    return parsed.data;
  }

  /**
   * Probe a file into an immutable VideoSource
   */
  async probeVideoSource(filePath: string): Promise<VideoSource> {
    return toVideoSource(filePath, await this.probe(filePath));
  }
}
