/**
 * Settings Document
 *
 * The user-editable JSON document read at startup. Keys are snake_case on
 * disk and camelCase in code. Unknown keys are dropped, missing keys take
 * the defaults below.
 */

import { writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { ensureDir, safeReadFile } from '@cutline/utils';
import { dirname } from 'node:path';
import { ConfigError } from '../errors/index.js';

/** A positive amount with an optional k/M suffix; `0k` and `0.0M` do not match */
export const BITRATE_PATTERN = /^(?=[\d.]*[1-9])\d+(\.\d+)?[kKmM]?$/;

export const DEFAULT_FILLER_WORDS = ['嗯', '那个', '就是', '然后', '这个'] as const;

export const settingsSchema = z.object({
  default_output_dir: z.string().default(''),
  ffmpeg_path: z.string().min(1).default('ffmpeg'),
  ffprobe_path: z.string().min(1).default('ffprobe'),
  whisper_path: z.string().min(1).default('whisper'),
  whisper_model: z.string().min(1).default('small'),
  hardware_acceleration: z.boolean().default(true),
  default_bitrate: z.string().regex(BITRATE_PATTERN, 'expected a bitrate such as 20000k').default('20000k'),
  quality_factor: z.number().int().min(0).max(51).default(16),
  max_concurrent_jobs: z.number().int().min(1).default(1),
  poll_interval_ms: z.number().int().min(10).default(250),
  cancel_grace_ms: z.number().int().min(0).default(5000),
  job_timeout_ms: z.number().int().min(0).default(0),
  filler_words: z.array(z.string().min(1)).default(() => [...DEFAULT_FILLER_WORDS]),
  silence_threshold: z.number().positive().default(0.8),
});

export type SettingsDocument = z.infer<typeof settingsSchema>;

export interface Settings {
  defaultOutputDir: string;
  ffmpegPath: string;
  ffprobePath: string;
  whisperPath: string;
  whisperModel: string;
  hardwareAcceleration: boolean;
  defaultBitrate: string;
  qualityFactor: number;
  maxConcurrentJobs: number;
  pollIntervalMs: number;
  cancelGraceMs: number;
  jobTimeoutMs: number;
  fillerWords: string[];
  silenceThreshold: number;
}

function toSettings(doc: SettingsDocument): Settings {
  return {
    defaultOutputDir: doc.default_output_dir,
    ffmpegPath: doc.ffmpeg_path,
    ffprobePath: doc.ffprobe_path,
    whisperPath: doc.whisper_path,
    whisperModel: doc.whisper_model,
    hardwareAcceleration: doc.hardware_acceleration,
    defaultBitrate: doc.default_bitrate,
    qualityFactor: doc.quality_factor,
    maxConcurrentJobs: doc.max_concurrent_jobs,
    pollIntervalMs: doc.poll_interval_ms,
    cancelGraceMs: doc.cancel_grace_ms,
    jobTimeoutMs: doc.job_timeout_ms,
    fillerWords: doc.filler_words,
    silenceThreshold: doc.silence_threshold,
  };
}

export function toSettingsDocument(settings: Settings): SettingsDocument {
  return {
    default_output_dir: settings.defaultOutputDir,
    ffmpeg_path: settings.ffmpegPath,
    ffprobe_path: settings.ffprobePath,
    whisper_path: settings.whisperPath,
    whisper_model: settings.whisperModel,
    hardware_acceleration: settings.hardwareAcceleration,
    default_bitrate: settings.defaultBitrate,
    quality_factor: settings.qualityFactor,
    max_concurrent_jobs: settings.maxConcurrentJobs,
    poll_interval_ms: settings.pollIntervalMs,
    cancel_grace_ms: settings.cancelGraceMs,
    job_timeout_ms: settings.jobTimeoutMs,
    filler_words: settings.fillerWords,
    silence_threshold: settings.silenceThreshold,
  };
}

/**
 * Validate a parsed settings document
 */
export function parseSettings(raw: unknown, source: string = '<inline>'): Settings {
  const result = settingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(source, issues);
  }
  return toSettings(result.data);
}

export function defaultSettings(): Settings {
  return parseSettings({});
}

/**
 * Load settings from a JSON file; a missing file yields the defaults
 */
export async function loadSettings(path: string): Promise<Settings> {
  const content = await safeReadFile(path);
  if (content === null) {
    return defaultSettings();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(path, error instanceof Error ? error.message : 'unparsable JSON');
  }
  return parseSettings(raw, path);
}

export async function saveSettings(path: string, settings: Settings): Promise<void> {
  await ensureDir(dirname(path));
  await writeFile(path, `${JSON.stringify(toSettingsDocument(settings), null, 2)}\n`, 'utf8');
}
