/**
 * Job Orchestrator
 *
 * Runs export jobs through the lifecycle
 *
 *   pending → validating → building → executing → finalizing → completed
 *
 * with failed/cancelled reachable from every non-terminal state. Each job
 * gets its own supervising task; callers only submit, query and drain the
 * event channel. At most `maxConcurrentJobs` encoders run at once, the rest
 * wait in `pending`.
 */

import { randomUUID } from 'node:crypto';
import { access, constants } from 'node:fs/promises';
import { dirname, resolve as resolvePath } from 'node:path';
import {
  CancelledError,
  CutlineError,
  EncoderUnavailableError,
  JobStateMachine,
  ProcessExecutionError,
  SubtitleGenerationError,
  ValidationError,
  type JobState,
  type Settings,
  type TerminalJobState,
} from '@cutline/core';
import { createLogger, ensureDir, getFileSizeBytes, removeFile, type Logger } from '@cutline/utils';
import { getCapabilityProber, type CapabilityReport } from './capabilities.js';
import { buildExportCommand } from './commandBuilder.js';
import { EventChannel } from './eventChannel.js';
import { spawnProcess, TailBuffer, type LaunchedProcess, type ProcessExit, type ProcessLauncher } from './process.js';
import { selectProfile, type ProfileDefaults } from './profiles.js';
import { EtaEstimator, FFmpegProgressParser, type ProgressUpdate } from './progressParser.js';
import { minKeepDurationFor, resolveCutList } from './segments.js';
import { generateSubtitles, remapTrackToCutList, subtitlePathFor, writeSubtitleFile } from './subtitles/integrator.js';
import { WhisperCliTranscriber, type Transcriber } from './subtitles/transcriber.js';
import type {
  CommandSpec,
  CutList,
  EncodingProfile,
  ExportRequest,
  JobErrorInfo,
  JobEvent,
  JobResult,
  JobSnapshot,
  ProgressSample,
  SubtitleTrack,
} from './types.js';

const log = createLogger({ module: 'orchestrator' });

export interface CapabilitySource {
  probe(): Promise<CapabilityReport>;
}

export interface JobOrchestratorOptions {
  ffmpegPath?: string;
  maxConcurrentJobs?: number;
  /** How often a running job checks for cancellation and timeout */
  pollIntervalMs?: number;
  /** Wait between SIGTERM and SIGKILL */
  cancelGraceMs?: number;
  /** 0 disables the limit */
  jobTimeoutMs?: number;
  profileDefaults?: ProfileDefaults;
  prober?: CapabilitySource;
  launcher?: ProcessLauncher;
  /** Needed only for jobs that request subtitles */
  transcriber?: Transcriber;
  generateId?: () => string;
}

type SubtitleOutcome =
  | { ok: true; track: SubtitleTrack }
  | { ok: false; error: unknown };

interface JobRecord {
  readonly id: string;
  readonly request: ExportRequest;
  readonly cutList: CutList;
  readonly machine: JobStateMachine;
  readonly createdAt: Date;
  /** Aborted by cancel() */
  readonly cancellation: AbortController;
  readonly log: Logger;
  readonly result: Promise<JobResult>;
  readonly settle: (result: JobResult) => void;
  profile: EncodingProfile | null;
  command: CommandSpec | null;
  progress: ProgressSample | null;
  subtitlePath: string | null;
  error: JobErrorInfo | null;
  warnings: JobErrorInfo[];
  finishedAt: Date | null;
}

/**
 * Serialisable form of any error that ends or degrades a job
 */
export function toErrorInfo(error: unknown): JobErrorInfo {
  if (error instanceof ProcessExecutionError) {
    return { code: error.code, message: error.message, exitCode: error.exitCode, stderrTail: error.stderrTail };
  }
  if (error instanceof CutlineError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: error.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(error) };
}

function toSnapshot(record: JobRecord): JobSnapshot {
  return Object.freeze({
    id: record.id,
    state: record.machine.getState(),
    sourcePath: record.request.source.path,
    outputPath: record.request.outputPath,
    cutList: record.cutList,
    profile: record.profile,
    command: record.command,
    progress: record.progress,
    cancelRequested: record.cancellation.signal.aborted,
    subtitlePath: record.subtitlePath,
    error: record.error,
    warnings: Object.freeze([...record.warnings]),
    history: Object.freeze(record.machine.getHistory()),
    createdAt: record.createdAt,
    finishedAt: record.finishedAt,
  });
}

/**
 * Every file a job may write: the video, and its captions when requested
 */
function pathsWrittenBy(request: ExportRequest): string[] {
  const paths = [resolvePath(request.outputPath)];
  if (request.subtitles) {
    paths.push(resolvePath(subtitlePathFor(request.outputPath)));
  }
  return paths;
}

export class JobOrchestrator {
  private readonly ffmpegPath: string;
  private readonly maxConcurrentJobs: number;
  private readonly pollIntervalMs: number;
  private readonly cancelGraceMs: number;
  private readonly jobTimeoutMs: number;
  private readonly profileDefaults: ProfileDefaults;
  private readonly prober: CapabilitySource;
  private readonly launcher: ProcessLauncher;
  private readonly transcriber: Transcriber | null;
  private readonly generateId: () => string;

  private readonly jobs = new Map<string, JobRecord>();
  private readonly queue: JobRecord[] = [];
  private readonly channels = new Set<EventChannel<JobEvent>>();
  private running = 0;
  private closed = false;

  constructor(options: JobOrchestratorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.maxConcurrentJobs = Math.max(1, options.maxConcurrentJobs ?? 1);
    this.pollIntervalMs = options.pollIntervalMs ?? 250;
    this.cancelGraceMs = options.cancelGraceMs ?? 5000;
    this.jobTimeoutMs = options.jobTimeoutMs ?? 0;
    this.profileDefaults = options.profileDefaults ?? {};
    this.prober = options.prober ?? getCapabilityProber({ ffmpegPath: this.ffmpegPath });
    this.launcher = options.launcher ?? spawnProcess;
    this.transcriber = options.transcriber ?? null;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Queue an export. Bad ranges and quality values are rejected here,
   * before a job exists.
   *
   * @throws SegmentValidationError for unusable remove-ranges
   * @throws ValidationError for bad quality values, paths, or after shutdown
   */
  submit(request: ExportRequest): JobSnapshot {
    if (this.closed) {
      throw new ValidationError('orchestrator', 'no new jobs are accepted after shutdown');
    }

    const cutList = resolveCutList(request.source.duration, request.removeSegments, {
      minKeepDuration: minKeepDurationFor(request.source.frameRate),
    });

    // Surfaces bad quality values now; the real selection waits for the probe
    selectProfile('cpu', request.quality, this.profileDefaults);

    const outputPath = resolvePath(request.outputPath);
    if (outputPath === resolvePath(request.source.path)) {
      throw new ValidationError('outputPath', 'must differ from the source file');
    }
    const claimed = pathsWrittenBy(request);
    for (const other of this.jobs.values()) {
      if (other.machine.isTerminal()) continue;
      const clash = pathsWrittenBy(other.request).find(path => claimed.includes(path));
      if (clash) {
        throw new ValidationError('outputPath', `job ${other.id} is already writing ${clash}`);
      }
    }

    const id = this.generateId();
    let settle: (result: JobResult) => void = () => undefined;
    const result = new Promise<JobResult>(resolve => {
      settle = resolve;
    });

    const record: JobRecord = {
      id,
      request,
      cutList,
      machine: new JobStateMachine(id),
      createdAt: new Date(),
      cancellation: new AbortController(),
      log: log.child({ jobId: id }),
      result,
      settle,
      profile: null,
      command: null,
      progress: null,
      subtitlePath: null,
      error: null,
      warnings: [],
      finishedAt: null,
    };

    this.jobs.set(id, record);
    this.queue.push(record);
    record.log.info(
      { source: request.source.path, output: request.outputPath, segments: cutList.segments.length },
      'Job submitted'
    );

    const snapshot = toSnapshot(record);
    this.pump();
    return snapshot;
  }

  /**
   * Request cancellation. Pending jobs end at once; running jobs are
   * stopped at the next poll. Returns false for unknown or finished jobs.
   */
  cancel(jobId: string): boolean {
    const record = this.jobs.get(jobId);
    if (!record || record.machine.isTerminal()) {
      return false;
    }
    if (record.cancellation.signal.aborted) {
      return true;
    }

    record.cancellation.abort();
    record.log.info({ state: record.machine.getState() }, 'Cancellation requested');

    if (record.machine.getState() === 'pending') {
      const index = this.queue.indexOf(record);
      if (index >= 0) this.queue.splice(index, 1);
      this.finish(record, 'cancelled', 'cancelled before start');
    }
    return true;
  }

  get(jobId: string): JobSnapshot | null {
    const record = this.jobs.get(jobId);
    return record ? toSnapshot(record) : null;
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map(toSnapshot);
  }

  /**
   * Resolves with the job's terminal result
   */
  async waitFor(jobId: string): Promise<JobResult> {
    const record = this.jobs.get(jobId);
    if (!record) {
      throw new ValidationError('jobId', `unknown job ${jobId}`);
    }
    return record.result;
  }

  /**
   * A fresh channel receiving every event from now on
   */
  subscribe(): EventChannel<JobEvent> {
    const channel = new EventChannel<JobEvent>();
    if (this.closed) {
      channel.close();
    } else {
      this.channels.add(channel);
    }
    return channel;
  }

  /**
   * Cancel every live job, wait for them to end, then close all channels
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    const live = [...this.jobs.values()].filter(r => !r.machine.isTerminal());
    for (const record of live) {
      this.cancel(record.id);
    }
    await Promise.all(live.map(r => r.result));

    for (const channel of this.channels) {
      channel.close();
    }
    this.channels.clear();
  }

  private pump(): void {
    while (this.running < this.maxConcurrentJobs) {
      const record = this.queue.shift();
      if (!record) return;
      if (record.machine.isTerminal()) continue;

      this.running++;
      void this.run(record)
        .catch((error: unknown) => this.abandon(record, error))
        .finally(() => {
          this.running--;
          this.pump();
        });
    }
  }

  private async run(record: JobRecord): Promise<void> {
    const { request } = record;
    const subtitleAbort = new AbortController();
    let subtitleTask: Promise<SubtitleOutcome> | null = null;
    // Set once the encoder has actually run; before that the output path is not ours
    const encoder = { ran: false };

    try {
      this.transition(record, 'validating');
      await this.validate(record);
      this.throwIfCancelled(record);

      this.transition(record, 'building');
      // Capability is fixed for the job from here on
      const report = await this.prober.probe();
      this.throwIfCancelled(record);
      if (report.capability === 'cpu' && report.encoders && !report.encoders.has('libx264')) {
        throw new EncoderUnavailableError('libx264');
      }
      record.profile = selectProfile(report.capability, request.quality, this.profileDefaults);
      record.command = buildExportCommand(request.source, record.cutList, record.profile, request.outputPath);
      record.log.info({ encoder: record.profile.encoder, command: record.command.display }, 'Encoder command');

      if (request.subtitles) {
        subtitleTask = this.startSubtitles(record, subtitleAbort.signal);
      }

      this.transition(record, 'executing');
      const outcome = await this.execute(record, record.command, encoder);
      if (outcome === 'cancelled') {
        throw new CancelledError(record.id);
      }

      this.transition(record, 'finalizing');
      const size = await getFileSizeBytes(request.outputPath);
      if (size === null || size === 0) {
        throw new ProcessExecutionError(
          this.ffmpegPath,
          0,
          '',
          `${this.ffmpegPath} exited successfully but ${request.outputPath} is missing or empty`
        );
      }

      if (subtitleTask) {
        await this.attachSubtitles(record, await subtitleTask);
        subtitleTask = null;
      }
      this.throwIfCancelled(record);

      this.finish(record, 'completed', `wrote ${size} bytes`);
    } catch (error) {
      subtitleAbort.abort();
      if (subtitleTask) {
        await subtitleTask;
      }
      if (encoder.ran) {
        await this.removePartialOutput(record);
      }

      if (error instanceof CancelledError) {
        this.finish(record, 'cancelled', 'cancellation requested');
      } else {
        const info = toErrorInfo(error);
        record.log.error({ error: info }, 'Job failed');
        this.finish(record, 'failed', info.message, info);
      }
    }
  }

  private async validate(record: JobRecord): Promise<void> {
    const { source, outputPath } = record.request;
    try {
      await access(source.path, constants.R_OK);
    } catch {
      throw new ValidationError('source', `${source.path} is not readable`);
    }
    await ensureDir(dirname(outputPath));
  }

  /**
   * Launch the encoder and supervise it until it exits
   */
  private async execute(
    record: JobRecord,
    command: CommandSpec,
    encoder: { ran: boolean }
  ): Promise<'exited' | 'cancelled'> {
    const startedAt = Date.now();
    const stderrTail = new TailBuffer();
    const parser = new FFmpegProgressParser();
    const eta = new EtaEstimator(record.cutList.keptDuration);

    let child: LaunchedProcess;
    try {
      child = this.launcher(this.ffmpegPath, command.args);
    } catch (error) {
      throw new ProcessExecutionError(this.ffmpegPath, null, error instanceof Error ? error.message : String(error));
    }

    const onUpdates = (updates: ProgressUpdate[]): void => {
      for (const update of updates) {
        this.recordProgress(record, update, eta, startedAt);
      }
    };
    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => onUpdates(parser.feed(chunk)));
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => stderrTail.push(chunk));

    const supervision: { stop: 'cancelled' | 'timeout' | null; killTimer: NodeJS.Timeout | null } = {
      stop: null,
      killTimer: null,
    };
    const terminate = (reason: 'cancelled' | 'timeout'): void => {
      if (supervision.stop) return;
      supervision.stop = reason;
      record.log.info({ reason, pid: child.pid }, 'Stopping encoder');
      child.kill('SIGTERM');
      supervision.killTimer = setTimeout(() => {
        record.log.warn({ pid: child.pid }, 'Encoder ignored SIGTERM, killing');
        child.kill('SIGKILL');
      }, this.cancelGraceMs);
    };
    const poll = setInterval(() => {
      if (record.cancellation.signal.aborted) {
        terminate('cancelled');
      } else if (this.jobTimeoutMs > 0 && Date.now() - startedAt >= this.jobTimeoutMs) {
        terminate('timeout');
      }
    }, this.pollIntervalMs);

    let exit: ProcessExit;
    try {
      exit = await child.exited;
      encoder.ran = true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ProcessExecutionError(
        this.ffmpegPath,
        null,
        stderrTail.toString() || message,
        `Failed to run ${this.ffmpegPath}: ${message}`
      );
    } finally {
      clearInterval(poll);
      if (supervision.killTimer) clearTimeout(supervision.killTimer);
    }

    onUpdates(parser.end());
    record.log.debug({ code: exit.code, signal: exit.signal, ms: Date.now() - startedAt }, 'Encoder exited');

    // A cancel that raced a clean exit still wins
    if (supervision.stop === 'cancelled' || record.cancellation.signal.aborted) {
      return 'cancelled';
    }
    if (supervision.stop === 'timeout') {
      throw new ProcessExecutionError(
        this.ffmpegPath,
        exit.code,
        stderrTail.toString(),
        `${this.ffmpegPath} timed out after ${this.jobTimeoutMs} ms`
      );
    }
    if (exit.code !== 0) {
      throw new ProcessExecutionError(
        this.ffmpegPath,
        exit.code,
        stderrTail.toString(),
        exit.code === null ? `${this.ffmpegPath} was killed by ${exit.signal ?? 'a signal'}` : undefined
      );
    }
    return 'exited';
  }

  private recordProgress(record: JobRecord, update: ProgressUpdate, eta: EtaEstimator, startedAt: number): void {
    const elapsedSeconds = (Date.now() - startedAt) / 1000;
    const estimate = eta.update(update.processedSeconds, elapsedSeconds);
    if (!estimate) return;

    const sample: ProgressSample = Object.freeze({
      jobId: record.id,
      processedSeconds: Math.min(update.processedSeconds, record.cutList.keptDuration),
      totalSeconds: record.cutList.keptDuration,
      percent: estimate.percent,
      elapsedSeconds,
      etaSeconds: estimate.etaSeconds,
      speed: update.speed,
    });
    record.progress = sample;
    this.publish({ type: 'progress', jobId: record.id, sample });
  }

  /**
   * Transcribe the source alongside the encode. Never rejects.
   */
  private startSubtitles(record: JobRecord, abort: AbortSignal): Promise<SubtitleOutcome> {
    if (!this.transcriber) {
      return Promise.resolve({
        ok: false,
        error: new SubtitleGenerationError('Subtitles were requested but no transcriber is configured'),
      });
    }

    const signal = AbortSignal.any([abort, record.cancellation.signal]);
    return generateSubtitles(this.transcriber, record.request.source.path, record.request.subtitles, signal).then(
      (track): SubtitleOutcome => ({ ok: true, track }),
      (error: unknown): SubtitleOutcome => ({ ok: false, error })
    );
  }

  private async attachSubtitles(record: JobRecord, outcome: SubtitleOutcome): Promise<void> {
    if (!outcome.ok) {
      this.addWarning(record, outcome.error);
      return;
    }

    try {
      const track = remapTrackToCutList(outcome.track, record.cutList);
      record.subtitlePath = await writeSubtitleFile(record.request.outputPath, track);
      record.log.info({ path: record.subtitlePath, cues: track.length }, 'Subtitles written');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.addWarning(record, new SubtitleGenerationError(`Could not write subtitles: ${message}`));
    }
  }

  private addWarning(record: JobRecord, error: unknown): void {
    const warning = toErrorInfo(error);
    record.warnings.push(warning);
    record.log.warn({ warning }, 'Job warning');
    this.publish({ type: 'warning', jobId: record.id, warning });
  }

  private async removePartialOutput(record: JobRecord): Promise<void> {
    const paths = [record.request.outputPath];
    if (record.subtitlePath) {
      paths.push(record.subtitlePath);
      record.subtitlePath = null;
    }

    for (const path of paths) {
      try {
        if (await removeFile(path)) {
          record.log.info({ path }, 'Removed partial output');
        }
      } catch (error) {
        record.log.warn({ path, err: error }, 'Could not remove partial output');
      }
    }
  }

  private throwIfCancelled(record: JobRecord): void {
    if (record.cancellation.signal.aborted) {
      throw new CancelledError(record.id);
    }
  }

  private transition(record: JobRecord, to: JobState, reason?: string): void {
    const transition = record.machine.transitionTo(to, reason);
    record.log.info({ from: transition.from, to: transition.to, reason }, 'Job state changed');
    this.publish({ type: 'state', jobId: record.id, from: transition.from, to: transition.to, at: transition.timestamp });
  }

  private finish(record: JobRecord, state: TerminalJobState, reason: string, error?: JobErrorInfo): void {
    record.error = error ?? null;
    record.finishedAt = new Date();
    this.transition(record, state, reason);

    const result: JobResult = Object.freeze({ ...toSnapshot(record), state });
    this.publish({ type: 'terminal', jobId: record.id, result });
    record.settle(result);
  }

  /**
   * Last resort for a defect inside run(); keeps waiters from hanging
   */
  private abandon(record: JobRecord, error: unknown): void {
    record.log.error({ err: error }, 'Job supervisor crashed');
    if (!record.machine.isTerminal()) {
      this.finish(record, 'failed', 'internal error', toErrorInfo(error));
    }
  }

  private publish(event: JobEvent): void {
    for (const channel of this.channels) {
      if (!channel.push(event)) {
        this.channels.delete(channel);
      }
    }
  }
}

/**
 * Orchestrator wired from the settings document
 */
export function createJobOrchestrator(
  settings: Settings,
  overrides: Pick<JobOrchestratorOptions, 'prober' | 'launcher' | 'transcriber'> = {}
): JobOrchestrator {
  return new JobOrchestrator({
    ffmpegPath: settings.ffmpegPath,
    maxConcurrentJobs: settings.maxConcurrentJobs,
    pollIntervalMs: settings.pollIntervalMs,
    cancelGraceMs: settings.cancelGraceMs,
    jobTimeoutMs: settings.jobTimeoutMs,
    profileDefaults: { qualityFactor: settings.qualityFactor, maxBitrate: settings.defaultBitrate },
    prober: overrides.prober ?? getCapabilityProber({
      ffmpegPath: settings.ffmpegPath,
      hardwareAcceleration: settings.hardwareAcceleration,
    }),
    launcher: overrides.launcher,
    transcriber: overrides.transcriber ?? new WhisperCliTranscriber({
      whisperPath: settings.whisperPath,
      model: settings.whisperModel,
    }),
  });
}
