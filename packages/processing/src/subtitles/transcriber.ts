/**
 * Transcriber
 *
 * Speech-to-text is an external engine. The default implementation drives
 * the `whisper` command line and reads back its JSON output.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { z } from 'zod';
import { ProcessExecutionError, ValidationError } from '@cutline/core';
import { createLogger, executeCommand, safeReadFile } from '@cutline/utils';
import type { CommandResult, CommandRunner } from '@cutline/utils';

const log = createLogger({ module: 'transcriber' });

export interface TranscribedWord {
  readonly word: string;
  readonly start: number;
  readonly end: number;
}

export interface TranscriptSegment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly words: readonly TranscribedWord[];
}

export interface Transcript {
  readonly language: string | null;
  readonly segments: readonly TranscriptSegment[];
}

export interface TranscribeOptions {
  language?: string;
  signal?: AbortSignal;
}

export interface Transcriber {
  transcribe(mediaPath: string, options?: TranscribeOptions): Promise<Transcript>;
}

const wordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
});

const whisperOutputSchema = z.object({
  language: z.string().nullish(),
  segments: z.array(z.object({
    start: z.number(),
    end: z.number(),
    text: z.string(),
    words: z.array(wordSchema).default([]),
  })),
});

/**
 * Validate whisper's JSON document into a Transcript
 */
export function parseWhisperOutput(json: string): Transcript {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new ValidationError('transcript', `unparsable JSON: ${json.substring(0, 200)}`);
  }

  const parsed = whisperOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('transcript', parsed.error.issues[0]?.message ?? 'unexpected shape');
  }

  return {
    language: parsed.data.language ?? null,
    segments: parsed.data.segments,
  };
}

export interface WhisperCliOptions {
  whisperPath?: string;
  model?: string;
  runner?: CommandRunner;
  timeoutMs?: number;
}

export class WhisperCliTranscriber implements Transcriber {
  private readonly whisperPath: string;
  private readonly model: string;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  constructor(options: WhisperCliOptions = {}) {
    this.whisperPath = options.whisperPath ?? 'whisper';
    this.model = options.model ?? 'small';
    this.runner = options.runner ?? executeCommand;
    this.timeoutMs = options.timeoutMs ?? 4 * 60 * 60 * 1000;
  }

  async transcribe(mediaPath: string, options: TranscribeOptions = {}): Promise<Transcript> {
    const outputDir = await mkdtemp(join(tmpdir(), 'cutline-whisper-'));

    try {
      const args = [
        mediaPath,
        '--model', this.model,
        '--output_format', 'json',
        '--output_dir', outputDir,
        '--word_timestamps', 'True',
      ];
      if (options.language) {
        args.push('--language', options.language);
      }

      log.debug({ mediaPath, model: this.model }, 'Transcribing');

      let result: CommandResult;
      try {
        result = await this.runner(this.whisperPath, args, {
          timeout: this.timeoutMs,
          signal: options.signal,
        });
      } catch (error) {
        throw new ProcessExecutionError(
          this.whisperPath,
          null,
          error instanceof Error ? error.message : String(error)
        );
      }

      if (result.exitCode !== 0) {
        throw new ProcessExecutionError(this.whisperPath, result.exitCode, result.stderr.trim().slice(-2000));
      }

      const outputFile = join(outputDir, `${basename(mediaPath, extname(mediaPath))}.json`);
      const json = await safeReadFile(outputFile);
      if (json === null) {
        throw new ProcessExecutionError(
          this.whisperPath,
          result.exitCode,
          result.stderr.trim().slice(-2000),
          `${this.whisperPath} produced no transcript at ${outputFile}`
        );
      }

      return parseWhisperOutput(json);
    } finally {
      await rm(outputDir, { recursive: true, force: true });
    }
  }
}

/**
 * Reuses one transcript per media file and language, so analysis and
 * caption generation for the same source transcribe it once. Failed
 * transcriptions are not kept.
 */
export class CachingTranscriber implements Transcriber {
  private readonly cache = new Map<string, Promise<Transcript>>();

  constructor(private readonly inner: Transcriber) {}

  async transcribe(mediaPath: string, options: TranscribeOptions = {}): Promise<Transcript> {
    options.signal?.throwIfAborted();

    const key = `${mediaPath}\u0000${options.language ?? ''}`;
    let pending = this.cache.get(key);
    if (!pending) {
      pending = this.inner.transcribe(mediaPath, options).catch((error: unknown) => {
        this.cache.delete(key);
        throw error;
      });
      this.cache.set(key, pending);
    }
    return pending;
  }
}
