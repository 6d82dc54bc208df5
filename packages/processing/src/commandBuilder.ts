/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling FFmpeg argument lists, plus the pure
 * `buildExportCommand` that renders a cut-list and an encoding profile into
 * one deterministic invocation.
 */

import { ProfileIncompatibleError, ValidationError } from '@cutline/core';
import type { VideoSource } from '@cutline/media';
import { parseBitrate } from './profiles.js';
import type { CommandSpec, CutList, EncoderCapability, EncodingProfile, VideoCodec } from './types.js';

export interface VideoCodecOptions {
  codec: VideoCodec;
  preset?: string;
  crf?: number;
  bitrate?: string;
  maxrate?: string;
  bufsize?: string;
  pixFmt?: string;
  extraArgs?: string[];
}

export interface AudioCodecOptions {
  codec: 'aac';
  bitrate?: string;
}

export class FFmpegCommandBuilder {
  private inputs: string[] = [];
  private mappings: string[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private complexFilter: string | null = null;
  private movflags: string | null = null;
  private outputFile: string = '';
  private globalArgs: string[] = [];
  private mapMetadata: number | null = null;

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string): this {
    this.inputs.push(file);
    return this;
  }

  /**
   * Map a labelled filter graph output, e.g. `outv`
   */
  mapFilterOutput(label: string): this {
    this.mappings.push(`[${label}]`);
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(filterGraph: string): this {
    this.complexFilter = filterGraph;
    return this;
  }

  /**
   * Copy metadata from input
   */
  copyMetadata(inputIndex: number = 0): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  /**
   * `-movflags` for MP4-family outputs, e.g. `+faststart`
   */
  setMovflags(flags: string): this {
    this.movflags = flags;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Global args
    args.push(...this.globalArgs);

    // Inputs
    for (const input of this.inputs) {
      args.push('-i', input);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', this.complexFilter);
    }

    for (const mapping of this.mappings) {
      args.push('-map', mapping);
    }

    // Video codec
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
      if (this.videoCodec.bitrate) args.push('-b:v', this.videoCodec.bitrate);
      if (this.videoCodec.maxrate) args.push('-maxrate', this.videoCodec.maxrate);
      if (this.videoCodec.bufsize) args.push('-bufsize', this.videoCodec.bufsize);
      if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      if (this.videoCodec.extraArgs) args.push(...this.videoCodec.extraArgs);
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }

    if (this.movflags) {
      args.push('-movflags', this.movflags);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

/**
 * Quote an argument for display in a POSIX shell
 */
export function quoteArg(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function formatCommand(binary: string, args: readonly string[]): string {
  return [binary, ...args].map(quoteArg).join(' ');
}

/**
 * Render seconds without float noise: `10`, `20.5`, `0.3`
 */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(6)));
}

function bufferSize(bitrate: string): string {
  return `${Math.round(parseBitrate(bitrate) * 2)}k`;
}

interface ParameterSet {
  encoder: EncoderCapability;
  render(profile: EncodingProfile): VideoCodecOptions;
}

// AMF has no -preset; its -quality knob takes speed/balanced/quality
const AMF_QUALITY: Record<string, string> = {
  slower: 'quality',
  slow: 'quality',
  medium: 'balanced',
  fast: 'speed',
  faster: 'speed',
};

/**
 * Rate-control flags per codec. Each encoder spells constant quality
 * differently; the bitrate ceiling is applied through -maxrate/-bufsize.
 */
const PARAMETER_SETS = new Map<string, ParameterSet>([
  ['libx264', {
    encoder: 'cpu',
    render: (profile) => {
      const aq = ['-x264opts', 'aq-mode=2:aq-strength=1.0'];
      return profile.rateControl.mode === 'quality'
        ? {
          codec: 'libx264',
          preset: profile.preset,
          crf: profile.rateControl.factor,
          maxrate: profile.maxBitrate,
          bufsize: bufferSize(profile.maxBitrate),
          pixFmt: profile.pixelFormat,
          extraArgs: aq,
        }
        : {
          codec: 'libx264',
          preset: profile.preset,
          bitrate: profile.rateControl.bitrate,
          maxrate: profile.maxBitrate,
          bufsize: bufferSize(profile.maxBitrate),
          pixFmt: profile.pixelFormat,
          extraArgs: aq,
        };
    },
  }],
  ['h264_nvenc', {
    encoder: 'nvenc',
    render: (profile) => ({
      codec: 'h264_nvenc',
      preset: profile.preset,
      bitrate: profile.rateControl.mode === 'quality' ? '0' : profile.rateControl.bitrate,
      maxrate: profile.maxBitrate,
      bufsize: bufferSize(profile.maxBitrate),
      pixFmt: profile.pixelFormat,
      extraArgs: profile.rateControl.mode === 'quality'
        ? ['-rc', 'vbr', '-cq', profile.rateControl.factor.toString()]
        : ['-rc', 'vbr'],
    }),
  }],
  ['h264_amf', {
    encoder: 'amf',
    render: (profile) => {
      const quality = ['-quality', AMF_QUALITY[profile.preset] ?? 'balanced'];
      if (profile.rateControl.mode === 'quality') {
        const qp = profile.rateControl.factor.toString();
        return {
          codec: 'h264_amf',
          maxrate: profile.maxBitrate,
          bufsize: bufferSize(profile.maxBitrate),
          pixFmt: profile.pixelFormat,
          extraArgs: [...quality, '-rc', 'cqp', '-qp_i', qp, '-qp_p', qp, '-qp_b', qp],
        };
      }
      return {
        codec: 'h264_amf',
        bitrate: profile.rateControl.bitrate,
        maxrate: profile.maxBitrate,
        bufsize: bufferSize(profile.maxBitrate),
        pixFmt: profile.pixelFormat,
        extraArgs: [...quality, '-rc', 'vbr_peak'],
      };
    },
  }],
  ['h264_qsv', {
    encoder: 'qsv',
    render: (profile) => ({
      codec: 'h264_qsv',
      preset: profile.preset,
      bitrate: profile.rateControl.mode === 'bitrate' ? profile.rateControl.bitrate : undefined,
      maxrate: profile.maxBitrate,
      bufsize: bufferSize(profile.maxBitrate),
      pixFmt: profile.pixelFormat,
      extraArgs: profile.rateControl.mode === 'quality'
        ? ['-global_quality', profile.rateControl.factor.toString()]
        : undefined,
    }),
  }],
]);

/**
 * Render the video codec flags for a profile
 *
 * @throws ProfileIncompatibleError when the codec has no parameter set or
 *   belongs to a different encoder than the profile claims
 */
export function renderVideoCodec(profile: EncodingProfile): VideoCodecOptions {
  const parameterSet = PARAMETER_SETS.get(profile.codec);
  if (!parameterSet) {
    throw new ProfileIncompatibleError(profile.encoder, profile.codec);
  }
  if (parameterSet.encoder !== profile.encoder) {
    throw new ProfileIncompatibleError(
      profile.encoder,
      profile.codec,
      `Codec ${profile.codec} belongs to the ${parameterSet.encoder} encoder, not ${profile.encoder}`
    );
  }
  return parameterSet.render(profile);
}

/**
 * Trim every keep-segment out of input 0 and concatenate them in cut-list
 * order. Produces `[outv]` and, when the source has audio, `[outa]`.
 */
export function buildTrimConcatFilter(cutList: CutList, hasAudio: boolean): string {
  const chains: string[] = [];
  const concatInputs: string[] = [];

  cutList.segments.forEach((segment, i) => {
    const range = `start=${formatSeconds(segment.start)}:end=${formatSeconds(segment.end)}`;
    chains.push(`[0:v]trim=${range},setpts=PTS-STARTPTS[v${i}]`);
    concatInputs.push(`[v${i}]`);
    if (hasAudio) {
      chains.push(`[0:a]atrim=${range},asetpts=PTS-STARTPTS[a${i}]`);
      concatInputs.push(`[a${i}]`);
    }
  });

  const outputs = hasAudio ? '[outv][outa]' : '[outv]';
  chains.push(`${concatInputs.join('')}concat=n=${cutList.segments.length}:v=1:a=${hasAudio ? 1 : 0}${outputs}`);
  return chains.join(';');
}

/**
 * Render a cut-list and profile into the encoder invocation.
 *
 * Pure: the same inputs always give the same argument list.
 */
export function buildExportCommand(
  source: Pick<VideoSource, 'path' | 'hasAudio'>,
  cutList: CutList,
  profile: EncodingProfile,
  outputPath: string
): CommandSpec {
  if (cutList.segments.length === 0) {
    throw new ValidationError('cutList', 'no segments to keep');
  }
  if (!outputPath) {
    throw new ValidationError('outputPath', 'must not be empty');
  }

  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-nostats', '-progress', 'pipe:1', '-y')
    .addInput(source.path)
    .setComplexFilter(buildTrimConcatFilter(cutList, source.hasAudio))
    .mapFilterOutput('outv')
    .setVideoCodec(renderVideoCodec(profile))
    .copyMetadata(0)
    .setOutput(outputPath);

  if (source.hasAudio) {
    builder
      .mapFilterOutput('outa')
      .setAudioCodec({ codec: profile.audioCodec, bitrate: profile.audioBitrate });
  }

  if (/\.(mp4|mov|m4v)$/i.test(outputPath)) {
    builder.setMovflags('+faststart');
  }

  const args = builder.build();
  return Object.freeze({
    args: Object.freeze(args),
    display: formatCommand('ffmpeg', args),
  });
}
