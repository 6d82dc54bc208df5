/**
 * Capability Prober
 *
 * Detects which hardware H.264 encoder the local ffmpeg can actually drive.
 * Listing an encoder is not enough (builds ship nvenc/amf/qsv regardless of
 * the GPU), so each listed candidate gets a one-frame dry run. Any failure
 * along the way means the software encoder.
 *
 * The result is cached process-wide until `invalidate()`.
 */

import { createLogger, executeCommand } from '@cutline/utils';
import type { CommandRunner } from '@cutline/utils';
import type { EncoderCapability, VideoCodec } from './types.js';
import { PROFILE_TABLE } from './profiles.js';

const log = createLogger({ module: 'capabilities' });

/** Hardware candidates, most preferred first */
export const HARDWARE_PREFERENCE = ['nvenc', 'amf', 'qsv'] as const satisfies readonly EncoderCapability[];

const PROBE_TIMEOUT_MS = 15000;

export interface CapabilityReport {
  capability: EncoderCapability;
  /** Encoder names ffmpeg lists, or null when the listing itself failed */
  encoders: ReadonlySet<string> | null;
  probedAt: Date;
}

export interface CapabilityProberOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** When false, skip hardware detection and always report `cpu` */
  hardwareAcceleration?: boolean;
}

/**
 * Pull encoder names out of `ffmpeg -encoders`.
 *
 * Rows look like ` V....D h264_nvenc   NVIDIA NVENC H.264 encoder`.
 */
export function parseEncoderList(output: string): Set<string> {
  const encoders = new Set<string>();
  for (const line of output.split('\n')) {
    const match = line.match(/^\s*[VAS][.FSXBD]{5}\s+(\S+)/);
    if (match?.[1] && match[1] !== '=') {
      encoders.add(match[1]);
    }
  }
  return encoders;
}

export function dryRunArgs(codec: VideoCodec): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', 'lavfi',
    '-i', 'color=size=256x256:duration=0.1',
    '-frames:v', '1',
    '-c:v', codec,
    '-f', 'null',
    '-',
  ];
}

export class CapabilityProber {
  readonly ffmpegPath: string;
  readonly hardwareAcceleration: boolean;
  private readonly runner: CommandRunner;
  private pending: Promise<CapabilityReport> | null = null;

  constructor(options: CapabilityProberOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? executeCommand;
    this.hardwareAcceleration = options.hardwareAcceleration ?? true;
  }

  /**
   * Detect once; concurrent and later callers share the same result
   */
  probe(): Promise<CapabilityReport> {
    if (!this.pending) {
      this.pending = this.detect();
    }
    return this.pending;
  }

  /**
   * Drop the cached result. Jobs already past Building keep their snapshot.
   */
  invalidate(): void {
    this.pending = null;
  }

  private async detect(): Promise<CapabilityReport> {
    const encoders = await this.listEncoders();

    if (this.hardwareAcceleration && encoders) {
      for (const candidate of HARDWARE_PREFERENCE) {
        const codec = PROFILE_TABLE[candidate].codec;
        if (encoders.has(codec) && await this.dryRun(codec)) {
          log.info({ capability: candidate, codec }, 'Hardware encoder available');
          return { capability: candidate, encoders, probedAt: new Date() };
        }
      }
    }

    log.info({ hardwareAcceleration: this.hardwareAcceleration }, 'Using software encoder');
    return { capability: 'cpu', encoders, probedAt: new Date() };
  }

  private async listEncoders(): Promise<Set<string> | null> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-hide_banner', '-encoders'], {
        timeout: PROBE_TIMEOUT_MS,
      });
      if (result.exitCode !== 0) {
        log.warn({ exitCode: result.exitCode, stderr: result.stderr.trim() }, 'Encoder listing failed');
        return null;
      }
      return parseEncoderList(result.stdout);
    } catch (error) {
      log.warn({ error: error instanceof Error ? error.message : String(error) }, 'Could not run ffmpeg');
      return null;
    }
  }

  private async dryRun(codec: VideoCodec): Promise<boolean> {
    try {
      const result = await this.runner(this.ffmpegPath, dryRunArgs(codec), { timeout: PROBE_TIMEOUT_MS });
      if (result.exitCode !== 0 || result.timedOut) {
        log.debug({ codec, stderr: result.stderr.trim() }, 'Encoder dry run failed');
        return false;
      }
      return true;
    } catch (error) {
      log.debug({ codec, error: error instanceof Error ? error.message : String(error) }, 'Encoder dry run failed');
      return false;
    }
  }
}

const sharedProbers = new Map<string, CapabilityProber>();

/**
 * Process-wide prober for one ffmpeg binary and acceleration setting,
 * created on first use
 */
export function getCapabilityProber(
  options: Pick<CapabilityProberOptions, 'ffmpegPath' | 'hardwareAcceleration'> = {}
): CapabilityProber {
  const ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  const hardwareAcceleration = options.hardwareAcceleration ?? true;
  const key = `${hardwareAcceleration ? 'hw' : 'cpu'}:${ffmpegPath}`;

  let prober = sharedProbers.get(key);
  if (!prober) {
    prober = new CapabilityProber({ ffmpegPath, hardwareAcceleration });
    sharedProbers.set(key, prober);
  }
  return prober;
}
